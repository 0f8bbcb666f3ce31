import { z } from 'zod';
import { AccountInput, ACCOUNT_FIELD_LIMITS, MAX_ACCOUNT_ID } from '@/models';
import { DataValidationError, FieldError } from '@/errors';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True when value is YYYY-MM-DD and names a real calendar day
 * (rejects 2023-02-30, 2023-13-01, ...)
 */
export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  // setUTCFullYear keeps years below 100 literal (Date.UTC would map them to 19xx)
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  // PostgreSQL has no year 0
  return (
    year >= 1 &&
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

const isoDateSchema = z
  .string()
  .regex(ISO_DATE_PATTERN, { message: 'Expected an ISO date (YYYY-MM-DD)' })
  .refine(isCalendarDate, { message: 'Not a valid calendar date' });

/**
 * String that fits a VARCHAR(limit) column
 * Length is counted in code points, as PostgreSQL counts characters; NUL
 * is rejected because text columns cannot store it.
 */
function columnString(limit: number) {
  return z
    .string()
    .refine((value) => !value.includes('\u0000'), { message: 'Must not contain NUL characters' })
    .refine((value) => [...value].length <= limit, {
      message: `String must contain at most ${limit} character(s)`,
    });
}

/**
 * Account payload validation schema
 *
 * - name, email, address are required strings
 * - phone_number and date_joined may be omitted or null
 * - Lengths match the accounts table columns
 * - Unknown keys (including id) are stripped
 */
export const accountSchema = z.object({
  name: columnString(ACCOUNT_FIELD_LIMITS.name),
  email: columnString(ACCOUNT_FIELD_LIMITS.email),
  address: columnString(ACCOUNT_FIELD_LIMITS.address),
  phone_number: columnString(ACCOUNT_FIELD_LIMITS.phone_number).nullish(),
  date_joined: isoDateSchema.nullish(),
});

export type AccountPayload = z.infer<typeof accountSchema>;

function isMissingField(issue: z.ZodIssue): boolean {
  return (
    issue.code === z.ZodIssueCode.invalid_type &&
    issue.received === z.ZodParsedType.undefined
  );
}

function toFieldError(issue: z.ZodIssue): FieldError {
  return {
    field: issue.path.length > 0 ? issue.path.map(String).join('.') : 'body',
    message: issue.message,
  };
}

/**
 * Deserialize an Account from a parsed JSON body
 *
 * @throws DataValidationError naming the first missing (or otherwise invalid)
 *   attribute, with every failing field listed in fieldErrors
 */
export function deserializeAccount(payload: unknown): AccountInput {
  if (payload === null || typeof payload !== 'object' || Array.isArray(payload)) {
    throw new DataValidationError(
      'Invalid Account: body of request contained bad or no data',
      [{ field: 'body', message: 'Expected a JSON object' }]
    );
  }

  const result = accountSchema.safeParse(payload);

  if (!result.success) {
    const issues = result.error.issues;
    const missing = issues.find(isMissingField);
    const culprit = missing ?? issues[0];
    const field = culprit ? toFieldError(culprit).field : 'body';

    throw new DataValidationError(
      missing ? `Invalid Account: missing ${field}` : `Invalid Account: invalid ${field}`,
      issues.map(toFieldError)
    );
  }

  const data = result.data;

  return {
    name: data.name,
    email: data.email,
    address: data.address,
    phoneNumber: data.phone_number ?? null,
    dateJoined: data.date_joined ?? undefined,
  };
}

/**
 * Parse an account id path parameter
 *
 * Returns null for anything that cannot name a stored account
 * (non-numeric, negative, or beyond the SERIAL range). Callers treat
 * null exactly like an id with no record.
 */
export function parseAccountId(raw: string | undefined): number | null {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    return null;
  }

  const id = Number(raw);
  return id <= MAX_ACCOUNT_ID ? id : null;
}
