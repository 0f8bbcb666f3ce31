import { Queryable } from '@/config/database';
import { Account, AccountInput } from '@/models';
import { IAccountRepository } from './interfaces/IAccountRepository';

/**
 * Columns selected for every account query
 * snake_case columns are aliased to the camelCase model and the DATE column
 * is rendered as YYYY-MM-DD so it never goes through a JS Date.
 */
const ACCOUNT_COLUMNS = `
  id,
  name,
  email,
  address,
  phone_number AS "phoneNumber",
  to_char(date_joined, 'YYYY-MM-DD') AS "dateJoined"
`;

/**
 * Account Repository
 * Handles all database operations for accounts
 */
export class AccountRepository implements IAccountRepository {
  constructor(private readonly db: Queryable) {}

  /**
   * Create a new account
   * date_joined falls back to the database's current date when not supplied
   */
  async create(input: AccountInput): Promise<Account> {
    const result = await this.db.query<Account>(
      `
      INSERT INTO accounts (name, email, address, phone_number, date_joined)
      VALUES ($1, $2, $3, $4, COALESCE($5::date, CURRENT_DATE))
      RETURNING ${ACCOUNT_COLUMNS}
      `,
      [input.name, input.email, input.address, input.phoneNumber, input.dateJoined ?? null]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('INSERT INTO accounts returned no row');
    }

    return row;
  }

  /**
   * Find account by ID
   */
  async read(id: number): Promise<Account | null> {
    const result = await this.db.query<Account>(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE id = $1`,
      [id]
    );

    return result.rows[0] ?? null;
  }

  /**
   * Full-record replace in a single statement
   * An omitted date_joined resets to the current date, matching create.
   */
  async update(id: number, input: AccountInput): Promise<Account | null> {
    const result = await this.db.query<Account>(
      `
      UPDATE accounts
      SET
        name = $2,
        email = $3,
        address = $4,
        phone_number = $5,
        date_joined = COALESCE($6::date, CURRENT_DATE)
      WHERE id = $1
      RETURNING ${ACCOUNT_COLUMNS}
      `,
      [id, input.name, input.email, input.address, input.phoneNumber, input.dateJoined ?? null]
    );

    return result.rows[0] ?? null;
  }

  /**
   * Delete account by ID
   */
  async delete(id: number): Promise<boolean> {
    const result = await this.db.query('DELETE FROM accounts WHERE id = $1', [id]);

    return (result.rowCount ?? 0) > 0;
  }

  /**
   * Get all accounts
   */
  async list(): Promise<Account[]> {
    const result = await this.db.query<Account>(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts ORDER BY id`
    );

    return result.rows;
  }
}
