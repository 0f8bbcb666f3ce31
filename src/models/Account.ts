/**
 * Account model
 * Matches the 'accounts' table schema (db/schema.sql)
 *
 * Column names are snake_case in the database and aliased to camelCase
 * by the repository queries.
 */
export interface Account {
  id: number;
  name: string;
  email: string;
  address: string;
  phoneNumber: string | null;
  dateJoined: string; // DATE column rendered as YYYY-MM-DD
}

/**
 * Account data accepted for create and full-record update
 * dateJoined is undefined when the payload omitted it; the store fills in the current date.
 */
export interface AccountInput {
  name: string;
  email: string;
  address: string;
  phoneNumber: string | null;
  dateJoined?: string;
}

/**
 * Account wire format (request and response bodies)
 */
export interface AccountResponse {
  id: number;
  name: string;
  email: string;
  address: string;
  phone_number: string | null;
  date_joined: string;
}

/**
 * Column size limits from the accounts table
 */
export const ACCOUNT_FIELD_LIMITS = {
  name: 64,
  email: 64,
  address: 256,
  phone_number: 32,
} as const;

/**
 * Largest identifier a SERIAL (int4) column can hold
 */
export const MAX_ACCOUNT_ID = 2_147_483_647;
