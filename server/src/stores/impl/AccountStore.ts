import { randomUUID } from 'crypto';
import { Database } from 'better-sqlite3';
import { Account } from '../../db/types';
import { IAccountStore } from '../interfaces/IAccountStore';
import { AccountCreateInput, AccountUpdateInput, ListOptions } from '../types';

/**
 * Store implementation for Account entity operations
 */
export class AccountStore implements IAccountStore {
  constructor(private db: Database) {}

  findById(id: string): Account | undefined {
    return this.db
      .prepare('SELECT * FROM accounts WHERE id = ?')
      .get(id) as Account | undefined;
  }

  findByEmail(email: string): Account | undefined {
    return this.db
      .prepare('SELECT * FROM accounts WHERE email = ?')
      .get(email) as Account | undefined;
  }

  findByUsername(username: string): Account | undefined {
    return this.db
      .prepare('SELECT * FROM accounts WHERE username = ?')
      .get(username) as Account | undefined;
  }

  findAll(options?: ListOptions): Account[] {
    return this.db
      .prepare('SELECT * FROM accounts ORDER BY username ASC LIMIT ? OFFSET ?')
      .all(options?.limit ?? -1, options?.offset ?? 0) as Account[];
  }

  create(input: AccountCreateInput): Account {
    const id = randomUUID();
    const now = new Date().toISOString();

    this.db
      .prepare(`
        INSERT INTO accounts (
          id, email, username, name, role, provider, provider_account_id,
          avatar_url, email_verified, created_at, updated_at
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, 0, ?, ?)
      `)
      .run(
        id,
        input.email,
        input.username,
        input.name ?? null,
        input.role ?? 'user',
        input.provider ?? 'email',
        input.provider_account_id ?? null,
        input.avatar_url ?? null,
        now,
        now
      );

    return this.findById(id)!;
  }

  update(id: string, input: AccountUpdateInput): Account | undefined {
    const existing = this.findById(id);
    if (!existing) {
      return undefined;
    }

    const updates: string[] = [];
    const params: unknown[] = [];

    if (input.name !== undefined) {
      updates.push('name = ?');
      params.push(input.name);
    }
    if (input.username !== undefined) {
      updates.push('username = ?');
      params.push(input.username);
    }
    if (input.avatar_url !== undefined) {
      updates.push('avatar_url = ?');
      params.push(input.avatar_url);
    }
    if (input.role !== undefined) {
      updates.push('role = ?');
      params.push(input.role);
    }

    if (updates.length === 0) {
      return existing;
    }

    updates.push('updated_at = ?');
    params.push(new Date().toISOString());
    params.push(id);

    this.db
      .prepare(`UPDATE accounts SET ${updates.join(', ')} WHERE id = ?`)
      .run(...params);

    return this.findById(id);
  }

  exists(id: string): boolean {
    const row = this.db
      .prepare('SELECT 1 FROM accounts WHERE id = ?')
      .get(id);
    return row !== undefined;
  }

  count(): number {
    const row = this.db
      .prepare('SELECT COUNT(*) as count FROM accounts')
      .get() as { count: number };
    return row.count;
  }

  countAdmins(): number {
    const row = this.db
      .prepare('SELECT COUNT(*) as count FROM accounts WHERE role = ?')
      .get('admin') as { count: number };
    return row.count;
  }
}
