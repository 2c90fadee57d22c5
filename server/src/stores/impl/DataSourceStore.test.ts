import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate';
import { OracleConfig, PostgresConfig } from '../../db/types';
import { DataSourceStore } from './DataSourceStore';

const pgConfig: PostgresConfig = {
  host: 'db.local',
  port: 5432,
  username: 'app',
  password: 'test-secret',
  database: 'orders',
  ssl: false,
  ssl_mode: null,
  connect_timeout: 10,
  application_name: null,
};

const oracleConfig: OracleConfig = {
  host: 'ora.local',
  port: 1521,
  username: 'app',
  password: 'test-secret',
  service_name: 'ORCL',
};

describe('DataSourceStore', () => {
  let db: Database.Database;
  let store: DataSourceStore;

  beforeEach(() => {
    db = new Database(':memory:');
    db.pragma('foreign_keys = ON');
    runMigrations(db);
    db.exec(`
      INSERT INTO accounts (id, email, username) VALUES
        ('acc-1', 'one@example.com', 'one'),
        ('acc-2', 'two@example.com', 'two');
      INSERT INTO teams (id, name) VALUES ('team-1', 'Team One'), ('team-2', 'Team Two');
    `);
    store = new DataSourceStore(db);
  });

  afterEach(() => {
    db.close();
  });

  function setCreatedAt(id: string, createdAt: string): void {
    db.prepare('UPDATE data_sources SET created_at = ? WHERE id = ?').run(createdAt, id);
  }

  describe('create', () => {
    it('should start in pending status and round-trip the config', () => {
      const source = store.create({
        title: 'Orders',
        type: 'postgresql',
        created_by: 'acc-1',
        team_id: null,
        config: pgConfig,
      });

      expect(source.status).toBe('pending');
      expect(source.created_by).toBe('acc-1');
      expect(source.team_id).toBeNull();
      expect(source.config).toEqual(pgConfig);
      expect(store.findById(source.id)).toEqual(source);
    });

    it('should fail on a duplicate title', () => {
      const input = { title: 'Orders', type: 'oracle' as const, created_by: null, team_id: null, config: oracleConfig };
      store.create(input);

      expect(() => store.create(input)).toThrow(/UNIQUE constraint failed: data_sources.title/);
    });
  });

  describe('findByTitle', () => {
    it('should match titles exactly', () => {
      store.create({ title: 'Orders', type: 'oracle', created_by: null, team_id: null, config: oracleConfig });

      expect(store.findByTitle('Orders')?.title).toBe('Orders');
      expect(store.findByTitle('orders')).toBeUndefined();
    });
  });

  describe('findAll', () => {
    let ids: Record<string, string>;

    beforeEach(() => {
      const a = store.create({ title: 'A', type: 'oracle', created_by: 'acc-1', team_id: null, config: oracleConfig });
      const b = store.create({ title: 'B', type: 'postgresql', created_by: 'acc-2', team_id: 'team-1', config: pgConfig });
      const c = store.create({ title: 'C', type: 'oracle', created_by: 'acc-2', team_id: 'team-2', config: oracleConfig });
      setCreatedAt(a.id, '2024-01-01T00:00:00.000Z');
      setCreatedAt(b.id, '2024-01-02T00:00:00.000Z');
      setCreatedAt(c.id, '2024-01-03T00:00:00.000Z');
      store.update(c.id, { status: 'active' });
      ids = { a: a.id, b: b.id, c: c.id };
    });

    it('should return every row in creation order for the all scope', () => {
      expect(store.findAll({ kind: 'all' }).map((s) => s.title)).toEqual(['A', 'B', 'C']);
    });

    it('should apply offset and limit', () => {
      expect(store.findAll({ kind: 'all' }, { offset: 1, limit: 1 }).map((s) => s.id)).toEqual([ids.b]);
    });

    it('should filter by type and status', () => {
      expect(store.findAll({ kind: 'all' }, { type: 'oracle' }).map((s) => s.title)).toEqual(['A', 'C']);
      expect(store.findAll({ kind: 'all' }, { status: 'active' }).map((s) => s.title)).toEqual(['C']);
      expect(store.findAll({ kind: 'all' }, { type: 'postgresql', status: 'active' })).toEqual([]);
    });

    it('should scope by creator', () => {
      expect(store.findAll({ kind: 'creator', accountId: 'acc-2' }).map((s) => s.title)).toEqual(['B', 'C']);
    });

    it('should scope by teams and return nothing for an empty team list', () => {
      expect(store.findAll({ kind: 'teams', teamIds: ['team-2'] }).map((s) => s.title)).toEqual(['C']);
      expect(store.findAll({ kind: 'teams', teamIds: [] })).toEqual([]);
    });

    it('should union creator and team rows for the accessible scope', () => {
      const scope = { kind: 'accessible' as const, accountId: 'acc-1', teamIds: ['team-2'] };
      expect(store.findAll(scope).map((s) => s.title)).toEqual(['A', 'C']);
      expect(store.findAll({ kind: 'accessible', accountId: 'acc-1', teamIds: [] }).map((s) => s.title)).toEqual(['A']);
    });
  });

  describe('update', () => {
    it('should change only the provided fields', () => {
      const source = store.create({ title: 'Orders', type: 'oracle', created_by: 'acc-1', team_id: 'team-1', config: oracleConfig });

      const updated = store.update(source.id, { status: 'inactive' });

      expect(updated?.status).toBe('inactive');
      expect(updated?.title).toBe('Orders');
      expect(updated?.team_id).toBe('team-1');
      expect(updated?.config).toEqual(oracleConfig);
    });

    it('should clear the team when team_id is null', () => {
      const source = store.create({ title: 'Orders', type: 'oracle', created_by: null, team_id: 'team-1', config: oracleConfig });

      expect(store.update(source.id, { team_id: null })?.team_id).toBeNull();
    });

    it('should replace the config', () => {
      const source = store.create({ title: 'Orders', type: 'oracle', created_by: null, team_id: null, config: oracleConfig });
      const next = { ...oracleConfig, port: 1522 };

      expect(store.update(source.id, { config: next })?.config).toEqual(next);
    });

    it('should return undefined for an unknown id', () => {
      expect(store.update('missing', { status: 'active' })).toBeUndefined();
    });
  });

  describe('delete', () => {
    it('should remove the row once', () => {
      const source = store.create({ title: 'Orders', type: 'oracle', created_by: null, team_id: null, config: oracleConfig });

      expect(store.delete(source.id)).toBe(true);
      expect(store.delete(source.id)).toBe(false);
      expect(store.findById(source.id)).toBeUndefined();
      expect(store.findAll({ kind: 'all' })).toEqual([]);
    });
  });
});
