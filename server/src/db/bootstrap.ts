import { Account, AccountRole, Session } from './types';
import { StoreRegistry } from '../stores';
import { ConflictError, NotFoundError } from '../utils/errors';
import { validateAccountRole } from '../utils/validation';

export interface BootstrapAccountInput {
  email: string;
  username: string;
  role?: string;
  name?: string;
}

/**
 * Create an account from the command line. The first account on an empty
 * database is always made an admin.
 */
export function bootstrapAccount(stores: StoreRegistry, input: BootstrapAccountInput): Account {
  if (stores.accounts.findByEmail(input.email)) {
    throw new ConflictError(`An account with email ${input.email} already exists`);
  }
  if (stores.accounts.findByUsername(input.username)) {
    throw new ConflictError(`An account with username ${input.username} already exists`);
  }

  const role: AccountRole = stores.accounts.count() === 0
    ? 'admin'
    : input.role === undefined ? 'user' : validateAccountRole({ role: input.role });

  return stores.accounts.create({
    email: input.email,
    username: input.username,
    name: input.name ?? null,
    role,
  });
}

/**
 * Open a bearer session for `username` that expires `ttlMs` after `now`.
 */
export function issueSessionToken(
  stores: StoreRegistry,
  username: string,
  ttlMs: number,
  now: Date = new Date()
): Session {
  const account = stores.accounts.findByUsername(username);
  if (!account) {
    throw new NotFoundError('Account');
  }
  return stores.sessions.create({
    account_id: account.id,
    expires_at: new Date(now.getTime() + ttlMs).toISOString(),
  });
}

/**
 * Revoke every active session of `username`. Returns how many were open.
 */
export function revokeSessionTokens(stores: StoreRegistry, username: string): number {
  const account = stores.accounts.findByUsername(username);
  if (!account) {
    throw new NotFoundError('Account');
  }
  return stores.sessions.revokeAllForAccount(account.id);
}
