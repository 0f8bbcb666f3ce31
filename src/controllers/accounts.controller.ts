import { Request, Response, NextFunction } from 'express';
import { AccountService } from '@/services/account.service';
import { deserializeAccount, parseAccountId } from '@/validators/account.validator';
import { serializeAccount } from '@/mappers/account.mapper';
import { AccountResponse } from '@/models';
import { NotFoundError } from '@/errors';
import { ILogger } from '@/interfaces/ILogger';

/**
 * Accounts Controller
 * Handles HTTP requests for account endpoints
 */
export interface AccountsController {
  createAccount(req: Request, res: Response, next: NextFunction): Promise<void>;
  listAccounts(req: Request, res: Response, next: NextFunction): Promise<void>;
  readAccount(req: Request, res: Response, next: NextFunction): Promise<void>;
  updateAccount(req: Request, res: Response, next: NextFunction): Promise<void>;
  deleteAccount(req: Request, res: Response, next: NextFunction): Promise<void>;
}

export function createAccountsController(
  accountService: AccountService,
  logger: ILogger
): AccountsController {
  return {
    /**
     * POST /accounts
     * Content-Type is checked by the route before this runs
     */
    async createAccount(req, res, next) {
      try {
        logger.info('Request to create an Account');

        const input = deserializeAccount(req.body);
        const account = await accountService.createAccount(input);

        res.location(`/accounts/${account.id}`).status(201).json(serializeAccount(account));
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /accounts
     * Bare JSON array, empty when nothing is stored
     */
    async listAccounts(_req, res, next) {
      try {
        logger.info('Request to list Accounts');

        const accounts: AccountResponse[] = [];
        for await (const account of accountService.all()) {
          accounts.push(serializeAccount(account));
        }

        logger.info({ count: accounts.length }, 'Returning all accounts');
        res.status(200).json(accounts);
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /accounts/:id
     */
    async readAccount(req, res, next) {
      try {
        const rawId = req.params.id;
        logger.info({ accountId: rawId }, 'Request to read an Account');

        const id = parseAccountId(rawId);
        if (id === null) {
          throw NotFoundError.account(rawId ?? '');
        }

        const account = await accountService.getAccount(id);

        res.status(200).json(serializeAccount(account));
      } catch (error) {
        next(error);
      }
    },

    /**
     * PUT /accounts/:id
     * Full-record replace; Content-Type is not enforced here
     */
    async updateAccount(req, res, next) {
      try {
        const rawId = req.params.id;
        logger.info({ accountId: rawId }, 'Request to update an Account');

        const id = parseAccountId(rawId);
        if (id === null || !(await accountService.findAccount(id))) {
          throw NotFoundError.account(rawId ?? '');
        }

        const input = deserializeAccount(req.body);
        const account = await accountService.updateAccount(id, input);

        res.status(200).json(serializeAccount(account));
      } catch (error) {
        next(error);
      }
    },

    /**
     * DELETE /accounts/:id
     * Always 204, whether or not the account existed
     */
    async deleteAccount(req, res, next) {
      try {
        const rawId = req.params.id;
        logger.info({ accountId: rawId }, 'Request to delete an Account');

        const id = parseAccountId(rawId);
        if (id !== null) {
          await accountService.deleteAccount(id);
        }

        res.status(204).end();
      } catch (error) {
        next(error);
      }
    },
  };
}
