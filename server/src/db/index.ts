import fs from 'fs';
import path from 'path';
import Database, { Database as DatabaseType } from 'better-sqlite3';
import type { AppConfig } from '../config';
import logger from '../utils/logger';
import { runMigrations } from './migrate';

let database: DatabaseType | null = null;

/**
 * Open the SQLite file at `dbPath`, creating its directory when needed.
 */
export function openDatabase(dbPath: string): DatabaseType {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const opened = new Database(dbPath);
  // Required for the ON DELETE SET NULL / CASCADE policies
  opened.pragma('foreign_keys = ON');
  return opened;
}

/**
 * Open the database named by `config`, bring its schema up to date and make
 * it the connection returned by `getDatabase()`.
 */
export function initializeDatabase(config: Pick<AppConfig, 'databasePath'>): DatabaseType {
  if (database?.open) {
    throw new Error('Database already initialized');
  }

  database = openDatabase(config.databasePath);
  // WAL lets readers proceed while a write transaction is open
  database.pragma('journal_mode = WAL');

  runMigrations(database);

  logger.info('database initialized');
  return database;
}

export function getDatabase(): DatabaseType {
  if (!database) {
    throw new Error('Database not initialized');
  }
  return database;
}

export function closeDatabase(): void {
  if (database?.open) {
    database.close();
    logger.info('database connection closed');
  }
  database = null;
}

// Re-export migration utilities for CLI usage
export { runMigrations, getMigrationStatus, rollbackMigration } from './migrate';
