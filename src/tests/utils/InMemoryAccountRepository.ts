import { Account, AccountInput } from '@/models';
import { IAccountRepository } from '@/repositories/interfaces';

/**
 * In-process stand-in for the PostgreSQL repository
 *
 * Mirrors the SQL behaviour the API relies on: SERIAL ids that are never
 * reused, CURRENT_DATE for an omitted date_joined, ascending id order.
 */
export class InMemoryAccountRepository implements IAccountRepository {
  private readonly accounts = new Map<number, Account>();
  private nextId = 1;

  constructor(private readonly today: () => string = () => new Date().toISOString().slice(0, 10)) {}

  async create(input: AccountInput): Promise<Account> {
    const account = this.toAccount(this.nextId++, input);
    this.accounts.set(account.id, account);
    return { ...account };
  }

  async read(id: number): Promise<Account | null> {
    const account = this.accounts.get(id);
    return account ? { ...account } : null;
  }

  async update(id: number, input: AccountInput): Promise<Account | null> {
    if (!this.accounts.has(id)) return null;

    const account = this.toAccount(id, input);
    this.accounts.set(id, account);
    return { ...account };
  }

  async delete(id: number): Promise<boolean> {
    return this.accounts.delete(id);
  }

  async list(): Promise<Account[]> {
    return [...this.accounts.values()]
      .sort((a, b) => a.id - b.id)
      .map((account) => ({ ...account }));
  }

  private toAccount(id: number, input: AccountInput): Account {
    return {
      id,
      name: input.name,
      email: input.email,
      address: input.address,
      phoneNumber: input.phoneNumber,
      dateJoined: input.dateJoined ?? this.today(),
    };
  }
}
