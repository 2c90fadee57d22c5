import { Account, AccountSummary } from '../../db/types';
import { FormattedAccount } from './types';

export function formatAccount(account: Account): FormattedAccount {
  return {
    id: account.id,
    email: account.email,
    username: account.username,
    name: account.name,
    role: account.role,
    provider: account.provider,
    avatar_url: account.avatar_url,
    email_verified: account.email_verified === 1,
    created_at: account.created_at,
    updated_at: account.updated_at,
  };
}

export function toAccountSummary(account: Account): AccountSummary {
  return {
    id: account.id,
    email: account.email,
    username: account.username,
    name: account.name,
    role: account.role,
    avatar_url: account.avatar_url,
  };
}
