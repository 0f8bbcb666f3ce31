import { Account, AccountInput } from '@/models';

/**
 * Account Repository Interface
 * Defines the contract for account data access operations
 */
export interface IAccountRepository {
  /**
   * Insert a new account; the store assigns the id
   * @returns Promise resolving to the stored Account
   */
  create(input: AccountInput): Promise<Account>;

  /**
   * Find an account by its ID
   * @returns Promise resolving to Account or null if not found
   */
  read(id: number): Promise<Account | null>;

  /**
   * Replace every attribute of an existing account
   * @returns Promise resolving to the updated Account or null if not found
   */
  update(id: number, input: AccountInput): Promise<Account | null>;

  /**
   * Remove an account
   * @returns Promise resolving to true if a record was deleted
   */
  delete(id: number): Promise<boolean>;

  /**
   * List every stored account in ascending id order
   */
  list(): Promise<Account[]>;
}
