import { randomUUID } from 'crypto';
import { Database } from 'better-sqlite3';
import { AccountSummary, Team, TeamRelation } from '../../db/types';
import { ITeamStore } from '../interfaces/ITeamStore';
import { TeamCreateInput, TeamUpdateInput } from '../types';

const RELATION_TABLES: Record<TeamRelation, { table: string; timestamp: string }> = {
  members: { table: 'team_members', timestamp: 'joined_at' },
  managers: { table: 'team_managers', timestamp: 'assigned_at' },
};

/**
 * Store implementation for Team entity operations
 */
export class TeamStore implements ITeamStore {
  constructor(private db: Database) {}

  findById(id: string): Team | undefined {
    return this.db
      .prepare('SELECT * FROM teams WHERE id = ?')
      .get(id) as Team | undefined;
  }

  findAll(): Team[] {
    return this.db
      .prepare('SELECT * FROM teams ORDER BY name ASC, id ASC')
      .all() as Team[];
  }

  findByIds(ids: string[]): Team[] {
    if (ids.length === 0) {
      return [];
    }
    const placeholders = ids.map(() => '?').join(', ');
    return this.db
      .prepare(`SELECT * FROM teams WHERE id IN (${placeholders}) ORDER BY name ASC, id ASC`)
      .all(...ids) as Team[];
  }

  create(input: TeamCreateInput): Team {
    const id = randomUUID();
    const now = new Date().toISOString();

    this.db
      .prepare(`
        INSERT INTO teams (id, name, avatar_url, owner_id, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `)
      .run(id, input.name, input.avatar_url ?? null, input.owner_id, now, now);

    return this.findById(id)!;
  }

  update(id: string, input: TeamUpdateInput): Team | undefined {
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
    if (input.avatar_url !== undefined) {
      updates.push('avatar_url = ?');
      params.push(input.avatar_url);
    }

    if (updates.length === 0) {
      return existing;
    }

    updates.push('updated_at = ?');
    params.push(new Date().toISOString());
    params.push(id);

    this.db
      .prepare(`UPDATE teams SET ${updates.join(', ')} WHERE id = ?`)
      .run(...params);

    return this.findById(id);
  }

  delete(id: string): boolean {
    const result = this.db
      .prepare('DELETE FROM teams WHERE id = ?')
      .run(id);
    return result.changes > 0;
  }

  private getOwnedTeamIds(accountId: string): string[] {
    const rows = this.db
      .prepare('SELECT id FROM teams WHERE owner_id = ?')
      .all(accountId) as { id: string }[];
    return rows.map((row) => row.id);
  }

  private getRelatedTeamIds(relation: TeamRelation, accountId: string): string[] {
    const { table } = RELATION_TABLES[relation];
    const rows = this.db
      .prepare(`SELECT team_id FROM ${table} WHERE account_id = ?`)
      .all(accountId) as { team_id: string }[];
    return rows.map((row) => row.team_id);
  }

  /**
   * Every team the account owns, belongs to, or manages, without duplicates.
   */
  getTeamIdsForAccount(accountId: string): string[] {
    const teamIds = new Set([
      ...this.getOwnedTeamIds(accountId),
      ...this.getRelatedTeamIds('members', accountId),
      ...this.getRelatedTeamIds('managers', accountId),
    ]);
    return [...teamIds];
  }

  findRelated(teamId: string, relation: TeamRelation): AccountSummary[] {
    const { table, timestamp } = RELATION_TABLES[relation];
    return this.db
      .prepare(`
        SELECT a.id, a.email, a.username, a.name, a.role, a.avatar_url
        FROM ${table} r
        JOIN accounts a ON r.account_id = a.id
        WHERE r.team_id = ?
        ORDER BY r.${timestamp} ASC, a.username ASC
      `)
      .all(teamId) as AccountSummary[];
  }

  addRelated(teamId: string, relation: TeamRelation, accountId: string): boolean {
    const { table, timestamp } = RELATION_TABLES[relation];
    const result = this.db
      .prepare(`INSERT OR IGNORE INTO ${table} (team_id, account_id, ${timestamp}) VALUES (?, ?, ?)`)
      .run(teamId, accountId, new Date().toISOString());
    return result.changes > 0;
  }

  removeRelated(teamId: string, relation: TeamRelation, accountId: string): boolean {
    const { table } = RELATION_TABLES[relation];
    const result = this.db
      .prepare(`DELETE FROM ${table} WHERE team_id = ? AND account_id = ?`)
      .run(teamId, accountId);
    return result.changes > 0;
  }

  exists(id: string): boolean {
    const row = this.db
      .prepare('SELECT 1 FROM teams WHERE id = ?')
      .get(id);
    return row !== undefined;
  }

  getMemberCount(teamId: string): number {
    const row = this.db
      .prepare('SELECT COUNT(*) as count FROM team_members WHERE team_id = ?')
      .get(teamId) as { count: number };
    return row.count;
  }

  getDataSourceCount(teamId: string): number {
    const row = this.db
      .prepare('SELECT COUNT(*) as count FROM data_sources WHERE team_id = ?')
      .get(teamId) as { count: number };
    return row.count;
  }
}
