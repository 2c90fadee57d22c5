import { Database } from 'better-sqlite3';
import { getDatabase } from '../db';

import type { IAccountStore } from './interfaces/IAccountStore';
import type { ITeamStore } from './interfaces/ITeamStore';
import type { ISessionStore } from './interfaces/ISessionStore';
import type { IDataSourceStore } from './interfaces/IDataSourceStore';

import { AccountStore } from './impl/AccountStore';
import { TeamStore } from './impl/TeamStore';
import { SessionStore } from './impl/SessionStore';
import { DataSourceStore } from './impl/DataSourceStore';

/**
 * Central registry providing access to all stores.
 * Supports both singleton access (production) and scoped creation (testing/transactions).
 */
export class StoreRegistry {
  private static instance: StoreRegistry | null = null;

  public readonly accounts: IAccountStore;
  public readonly teams: ITeamStore;
  public readonly sessions: ISessionStore;
  public readonly dataSources: IDataSourceStore;

  private constructor(database: Database) {
    this.accounts = new AccountStore(database);
    this.teams = new TeamStore(database);
    this.sessions = new SessionStore(database);
    this.dataSources = new DataSourceStore(database);
  }

  /**
   * Get the singleton instance bound to the initialized database.
   */
  static getInstance(): StoreRegistry {
    if (!StoreRegistry.instance) {
      StoreRegistry.instance = new StoreRegistry(getDatabase());
    }
    return StoreRegistry.instance;
  }

  /**
   * Create a new registry instance bound to a specific database.
   */
  static create(database: Database): StoreRegistry {
    return new StoreRegistry(database);
  }

  static resetInstance(): void {
    StoreRegistry.instance = null;
  }
}

/**
 * Convenience function to get the store registry singleton.
 *
 * @example
 * ```typescript
 * import { getStores } from '../stores';
 *
 * const source = getStores().dataSources.findById(id);
 * ```
 */
export function getStores(): StoreRegistry {
  return StoreRegistry.getInstance();
}

export * from './types';
export * from './interfaces';

export { withTransaction } from './transaction';
