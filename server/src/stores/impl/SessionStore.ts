import { randomBytes, randomUUID } from 'crypto';
import { Database } from 'better-sqlite3';
import { Session } from '../../db/types';
import { ISessionStore } from '../interfaces/ISessionStore';
import { SessionCreateInput } from '../types';

const TOKEN_BYTES = 32;

/**
 * Store implementation for bearer sessions. Tokens are opaque random hex
 * strings.
 */
export class SessionStore implements ISessionStore {
  constructor(private db: Database) {}

  create(input: SessionCreateInput): Session {
    const id = randomUUID();
    const token = randomBytes(TOKEN_BYTES).toString('hex');
    const now = new Date().toISOString();

    this.db
      .prepare(`
        INSERT INTO sessions (id, account_id, session_token, expires_at, created_at, ip_address, is_active)
        VALUES (?, ?, ?, ?, ?, ?, 1)
      `)
      .run(id, input.account_id, token, input.expires_at, now, input.ip_address ?? null);

    return this.db
      .prepare('SELECT * FROM sessions WHERE id = ?')
      .get(id) as Session;
  }

  findActiveByToken(token: string, now: Date = new Date()): Session | undefined {
    return this.db
      .prepare(`
        SELECT * FROM sessions
        WHERE session_token = ? AND is_active = 1 AND expires_at > ?
      `)
      .get(token, now.toISOString()) as Session | undefined;
  }

  findByAccountId(accountId: string): Session[] {
    return this.db
      .prepare(`
        SELECT * FROM sessions
        WHERE account_id = ?
        ORDER BY created_at DESC, rowid DESC
      `)
      .all(accountId) as Session[];
  }

  revoke(token: string): boolean {
    const result = this.db
      .prepare('UPDATE sessions SET is_active = 0 WHERE session_token = ? AND is_active = 1')
      .run(token);
    return result.changes > 0;
  }

  revokeAllForAccount(accountId: string): number {
    const result = this.db
      .prepare('UPDATE sessions SET is_active = 0 WHERE account_id = ? AND is_active = 1')
      .run(accountId);
    return result.changes;
  }
}
