import { Router } from 'express';
import { AccountsController } from '@/controllers/accounts.controller';
import { requireContentType } from '@/middlewares/contentType';
import { methodNotAllowed } from '@/middlewares/methodNotAllowed';
import { ILogger } from '@/interfaces/ILogger';

export function createAccountsRouter(controller: AccountsController, logger: ILogger): Router {
  const router = Router();

  /**
   * POST /accounts - create (application/json only)
   * GET  /accounts - list all
   */
  router
    .route('/')
    .post(requireContentType('application/json', logger), controller.createAccount)
    .get(controller.listAccounts)
    .all(methodNotAllowed(['GET', 'HEAD', 'POST']));

  /**
   * GET    /accounts/:id - read
   * PUT    /accounts/:id - full update
   * DELETE /accounts/:id - idempotent delete
   */
  router
    .route('/:id')
    .get(controller.readAccount)
    .put(controller.updateAccount)
    .delete(controller.deleteAccount)
    .all(methodNotAllowed(['GET', 'HEAD', 'PUT', 'DELETE']));

  return router;
}
