import { Account, AccountInput } from '@/models';
import { IAccountRepository } from '@/repositories/interfaces';
import { NotFoundError } from '@/errors';
import { ILogger } from '@/interfaces/ILogger';

/**
 * Account Service
 * Business logic for the account lifecycle
 */
export class AccountService {
  constructor(
    private readonly accountRepo: IAccountRepository,
    private readonly logger: ILogger
  ) {}

  async createAccount(input: AccountInput): Promise<Account> {
    const account = await this.accountRepo.create(input);

    this.logger.info({ accountId: account.id }, 'Account created');

    return account;
  }

  /**
   * Look up an account without failing on unknown ids
   * @returns the Account, or null when no record has this id
   */
  async findAccount(id: number): Promise<Account | null> {
    return await this.accountRepo.read(id);
  }

  /**
   * @throws NotFoundError when no record has this id
   */
  async getAccount(id: number): Promise<Account> {
    const account = await this.findAccount(id);

    if (!account) {
      this.logger.warn({ accountId: id }, 'Account not found');
      throw NotFoundError.account(id);
    }

    return account;
  }

  /**
   * Every stored account, one at a time, in storage order
   * The sequence is consumed once; call all() again for a fresh read.
   */
  async *all(): AsyncGenerator<Account, void, undefined> {
    const accounts = await this.accountRepo.list();
    yield* accounts;
  }

  /**
   * Replace every attribute of an existing account
   * @throws NotFoundError when no record has this id
   */
  async updateAccount(id: number, input: AccountInput): Promise<Account> {
    const updated = await this.accountRepo.update(id, input);

    if (!updated) {
      this.logger.warn({ accountId: id }, 'Update rejected: account not found');
      throw NotFoundError.account(id);
    }

    this.logger.info({ accountId: id }, 'Account updated');

    return updated;
  }

  /**
   * Delete is idempotent: an unknown id is not an error
   */
  async deleteAccount(id: number): Promise<void> {
    const deleted = await this.accountRepo.delete(id);

    this.logger.info({ accountId: id, deleted }, 'Account delete processed');
  }
}
