import { randomUUID } from 'crypto';
import { Database } from 'better-sqlite3';
import { DataSource, DataSourceConfig, DataSourceRow } from '../../db/types';
import { IDataSourceStore } from '../interfaces/IDataSourceStore';
import {
  DataSourceCreateInput,
  DataSourceUpdateInput,
  DataSourceListOptions,
  DataSourceScope,
} from '../types';

function toDataSource(row: DataSourceRow): DataSource {
  return {
    ...row,
    config: JSON.parse(row.config) as DataSourceConfig,
  };
}

/**
 * Store implementation for DataSource entity operations.
 * Config is persisted as JSON text and parsed on read.
 */
export class DataSourceStore implements IDataSourceStore {
  constructor(private db: Database) {}

  findById(id: string): DataSource | undefined {
    const row = this.db
      .prepare('SELECT * FROM data_sources WHERE id = ?')
      .get(id) as DataSourceRow | undefined;
    return row ? toDataSource(row) : undefined;
  }

  findByTitle(title: string): DataSource | undefined {
    const row = this.db
      .prepare('SELECT * FROM data_sources WHERE title = ?')
      .get(title) as DataSourceRow | undefined;
    return row ? toDataSource(row) : undefined;
  }

  findAll(scope: DataSourceScope, options?: DataSourceListOptions): DataSource[] {
    const clause = this.buildWhereClause(scope, options);
    if (!clause) {
      return [];
    }

    const rows = this.db
      .prepare(`
        SELECT * FROM data_sources
        ${clause.where}
        ORDER BY created_at ASC, id ASC
        LIMIT ? OFFSET ?
      `)
      .all(...clause.params, options?.limit ?? -1, options?.offset ?? 0) as DataSourceRow[];

    return rows.map(toDataSource);
  }

  create(input: DataSourceCreateInput): DataSource {
    const id = randomUUID();
    const now = new Date().toISOString();

    this.db
      .prepare(`
        INSERT INTO data_sources (id, title, type, status, created_by, team_id, config, created_at, updated_at)
        VALUES (?, ?, ?, 'pending', ?, ?, ?, ?, ?)
      `)
      .run(
        id,
        input.title,
        input.type,
        input.created_by,
        input.team_id,
        JSON.stringify(input.config),
        now,
        now
      );

    return this.findById(id)!;
  }

  update(id: string, input: DataSourceUpdateInput): DataSource | undefined {
    const existing = this.findById(id);
    if (!existing) {
      return undefined;
    }

    const updates: string[] = [];
    const params: unknown[] = [];

    if (input.title !== undefined) {
      updates.push('title = ?');
      params.push(input.title);
    }
    if (input.status !== undefined) {
      updates.push('status = ?');
      params.push(input.status);
    }
    if (input.team_id !== undefined) {
      updates.push('team_id = ?');
      params.push(input.team_id);
    }
    if (input.config !== undefined) {
      updates.push('config = ?');
      params.push(JSON.stringify(input.config));
    }

    if (updates.length === 0) {
      return existing;
    }

    updates.push('updated_at = ?');
    params.push(new Date().toISOString());
    params.push(id);

    this.db
      .prepare(`UPDATE data_sources SET ${updates.join(', ')} WHERE id = ?`)
      .run(...params);

    return this.findById(id);
  }

  delete(id: string): boolean {
    const result = this.db
      .prepare('DELETE FROM data_sources WHERE id = ?')
      .run(id);
    return result.changes > 0;
  }

  /**
   * Returns null when the scope can match no rows at all.
   */
  private buildWhereClause(
    scope: DataSourceScope,
    options?: DataSourceListOptions
  ): { where: string; params: unknown[] } | null {
    const conditions: string[] = [];
    const params: unknown[] = [];

    switch (scope.kind) {
      case 'all':
        break;
      case 'creator':
        conditions.push('created_by = ?');
        params.push(scope.accountId);
        break;
      case 'teams': {
        if (scope.teamIds.length === 0) {
          return null;
        }
        const placeholders = scope.teamIds.map(() => '?').join(', ');
        conditions.push(`team_id IN (${placeholders})`);
        params.push(...scope.teamIds);
        break;
      }
      case 'accessible': {
        if (scope.teamIds.length === 0) {
          conditions.push('created_by = ?');
          params.push(scope.accountId);
        } else {
          const placeholders = scope.teamIds.map(() => '?').join(', ');
          conditions.push(`(created_by = ? OR team_id IN (${placeholders}))`);
          params.push(scope.accountId, ...scope.teamIds);
        }
        break;
      }
    }

    if (options?.type) {
      conditions.push('type = ?');
      params.push(options.type);
    }
    if (options?.status) {
      conditions.push('status = ?');
      params.push(options.status);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    return { where, params };
  }
}
