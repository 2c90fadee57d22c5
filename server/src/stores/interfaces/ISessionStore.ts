import { Session } from '../../db/types';
import { SessionCreateInput } from '../types';

/**
 * Store interface for bearer sessions
 */
export interface ISessionStore {
  create(input: SessionCreateInput): Session;
  findActiveByToken(token: string, now?: Date): Session | undefined;
  findByAccountId(accountId: string): Session[];
  revoke(token: string): boolean;
  revokeAllForAccount(accountId: string): number;
}
