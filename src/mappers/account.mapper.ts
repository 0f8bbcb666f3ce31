import { Account, AccountResponse } from '@/models';

/**
 * Serialize an Account to its wire format
 * Every attribute is present; phone_number is null when unset.
 */
export function serializeAccount(account: Account): AccountResponse {
  return {
    id: account.id,
    name: account.name,
    email: account.email,
    address: account.address,
    phone_number: account.phoneNumber,
    date_joined: account.dateJoined,
  };
}
