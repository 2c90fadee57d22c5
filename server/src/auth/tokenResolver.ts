import { getStores } from '../stores';
import { Account } from '../db/types';

/**
 * Resolves a bearer credential to the account it authenticates.
 */
export interface AuthResolver {
  resolve(token: string): Account | undefined;
}

/**
 * Looks the token up in the sessions table. Revoked and expired sessions
 * resolve to nothing.
 */
export class SessionTokenResolver implements AuthResolver {
  resolve(token: string): Account | undefined {
    const stores = getStores();
    const session = stores.sessions.findActiveByToken(token);
    if (!session) {
      return undefined;
    }
    return stores.accounts.findById(session.account_id);
  }
}

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

export function extractBearerToken(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  const match = BEARER_PATTERN.exec(header.trim());
  return match ? match[1] : undefined;
}
