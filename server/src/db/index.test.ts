import Database from 'better-sqlite3';
import { runMigrations, rollbackMigration, getMigrationStatus } from './migrate';
import { initializeDatabase, getDatabase, closeDatabase } from './index';

describe('Database', () => {
  let testDb: Database.Database;

  beforeEach(() => {
    testDb = new Database(':memory:');
    testDb.pragma('foreign_keys = ON');
    runMigrations(testDb);

    testDb.exec(`
      INSERT INTO accounts (id, email, username, role) VALUES
        ('acc-1', 'one@example.com', 'one', 'user');
      INSERT INTO teams (id, name, owner_id) VALUES ('team-1', 'Team One', 'acc-1');
    `);
  });

  afterEach(() => {
    testDb.close();
  });

  it('should create all required tables', () => {
    const tables = testDb
      .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'")
      .all() as { name: string }[];

    const tableNames = tables.map(t => t.name);

    expect(tableNames).toEqual(expect.arrayContaining([
      'accounts',
      'teams',
      'team_members',
      'team_managers',
      'sessions',
      'data_sources',
    ]));
  });

  it('should be idempotent', () => {
    expect(() => runMigrations(testDb)).not.toThrow();
    expect(getMigrationStatus(testDb).every(m => m.applied)).toBe(true);
  });

  it('should enforce a unique title on data sources', () => {
    const insert = testDb.prepare(`
      INSERT INTO data_sources (id, title, type, config) VALUES (?, ?, 'oracle', '{}')
    `);
    insert.run('ds-1', 'Warehouse');

    expect(() => insert.run('ds-2', 'Warehouse')).toThrow(/UNIQUE constraint failed: data_sources.title/);
  });

  it('should treat titles case-sensitively', () => {
    const insert = testDb.prepare(`
      INSERT INTO data_sources (id, title, type, config) VALUES (?, ?, 'oracle', '{}')
    `);
    insert.run('ds-1', 'Warehouse');

    expect(() => insert.run('ds-2', 'warehouse')).not.toThrow();
  });

  it('should reject unknown data source types and statuses', () => {
    expect(() => testDb.prepare(`
      INSERT INTO data_sources (id, title, type, config) VALUES ('ds-1', 'x', 'sqlite', '{}')
    `).run()).toThrow(/CHECK constraint failed/);

    expect(() => testDb.prepare(`
      INSERT INTO data_sources (id, title, type, status, config) VALUES ('ds-1', 'x', 'mysql', 'broken', '{}')
    `).run()).toThrow(/CHECK constraint failed/);
  });

  it('should set creator and team to null when they are deleted', () => {
    testDb.prepare(`
      INSERT INTO data_sources (id, title, type, created_by, team_id, config)
      VALUES ('ds-1', 'Warehouse', 'oracle', 'acc-1', 'team-1', '{}')
    `).run();

    testDb.prepare("DELETE FROM teams WHERE id = 'team-1'").run();
    testDb.prepare("DELETE FROM accounts WHERE id = 'acc-1'").run();

    const row = testDb
      .prepare("SELECT created_by, team_id FROM data_sources WHERE id = 'ds-1'")
      .get() as { created_by: string | null; team_id: string | null };

    expect(row).toEqual({ created_by: null, team_id: null });
  });

  it('should cascade team relations when an account is deleted', () => {
    testDb.exec(`
      INSERT INTO accounts (id, email, username) VALUES ('acc-2', 'two@example.com', 'two');
      INSERT INTO team_members (team_id, account_id) VALUES ('team-1', 'acc-2');
      INSERT INTO team_managers (team_id, account_id) VALUES ('team-1', 'acc-2');
    `);

    testDb.prepare("DELETE FROM accounts WHERE id = 'acc-2'").run();

    const members = testDb.prepare('SELECT COUNT(*) as count FROM team_members').get() as { count: number };
    const managers = testDb.prepare('SELECT COUNT(*) as count FROM team_managers').get() as { count: number };
    expect(members.count).toBe(0);
    expect(managers.count).toBe(0);
  });

  it('should roll back only the latest migration without a target', () => {
    rollbackMigration(testDb);

    const status = getMigrationStatus(testDb);
    expect(status).toEqual([
      { id: '001', name: 'initial_schema', applied: true },
      { id: '002', name: 'add_data_sources', applied: false },
    ]);
  });
});

describe('database lifecycle', () => {
  afterEach(() => {
    closeDatabase();
  });

  it('should refuse access before initialization', () => {
    expect(() => getDatabase()).toThrow('Database not initialized');
  });

  it('should open and migrate the configured database', () => {
    const database = initializeDatabase({ databasePath: ':memory:' });

    expect(getDatabase()).toBe(database);
    expect(getMigrationStatus(database).every(m => m.applied)).toBe(true);
    expect(database.pragma('foreign_keys', { simple: true })).toBe(1);
  });

  it('should release the connection on close', () => {
    const database = initializeDatabase({ databasePath: ':memory:' });

    closeDatabase();

    expect(database.open).toBe(false);
    expect(() => getDatabase()).toThrow('Database not initialized');
  });
});
