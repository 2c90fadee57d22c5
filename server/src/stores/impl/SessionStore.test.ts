import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate';
import { SessionStore } from './SessionStore';

describe('SessionStore', () => {
  let db: Database.Database;
  let store: SessionStore;

  const future = '2999-01-01T00:00:00.000Z';

  beforeEach(() => {
    db = new Database(':memory:');
    db.pragma('foreign_keys = ON');
    runMigrations(db);
    db.exec(`
      INSERT INTO accounts (id, email, username) VALUES ('acc-1', 'one@example.com', 'one');
    `);
    store = new SessionStore(db);
  });

  afterEach(() => {
    db.close();
  });

  it('should issue a random 64 character hex token', () => {
    const first = store.create({ account_id: 'acc-1', expires_at: future });
    const second = store.create({ account_id: 'acc-1', expires_at: future });

    expect(first.session_token).toMatch(/^[0-9a-f]{64}$/);
    expect(first.session_token).not.toBe(second.session_token);
    expect(first.is_active).toBe(1);
  });

  it('should find an active, unexpired session by token', () => {
    const session = store.create({ account_id: 'acc-1', expires_at: future, ip_address: '127.0.0.1' });

    expect(store.findActiveByToken(session.session_token)?.id).toBe(session.id);
    expect(store.findActiveByToken('unknown')).toBeUndefined();
  });

  it('should ignore expired sessions', () => {
    const session = store.create({ account_id: 'acc-1', expires_at: '2024-01-01T00:00:00.000Z' });

    expect(store.findActiveByToken(session.session_token, new Date('2024-01-02T00:00:00.000Z'))).toBeUndefined();
    expect(store.findActiveByToken(session.session_token, new Date('2023-12-31T00:00:00.000Z'))?.id).toBe(session.id);
  });

  it('should revoke a session', () => {
    const session = store.create({ account_id: 'acc-1', expires_at: future });

    expect(store.revoke(session.session_token)).toBe(true);
    expect(store.revoke(session.session_token)).toBe(false);
    expect(store.findActiveByToken(session.session_token)).toBeUndefined();
  });

  it('should list an account\'s sessions newest first, revoked ones included', () => {
    db.exec("INSERT INTO accounts (id, email, username) VALUES ('acc-2', 'two@example.com', 'two')");
    const first = store.create({ account_id: 'acc-1', expires_at: future });
    const second = store.create({ account_id: 'acc-1', expires_at: future });
    store.create({ account_id: 'acc-2', expires_at: future });
    store.revoke(first.session_token);

    const sessions = store.findByAccountId('acc-1');

    expect(sessions.map((s) => s.id)).toEqual([second.id, first.id]);
    expect(sessions.map((s) => s.is_active)).toEqual([1, 0]);
  });

  it('should revoke every session of an account', () => {
    store.create({ account_id: 'acc-1', expires_at: future });
    store.create({ account_id: 'acc-1', expires_at: future });

    expect(store.revokeAllForAccount('acc-1')).toBe(2);
    const active = db
      .prepare('SELECT COUNT(*) as count FROM sessions WHERE account_id = ? AND is_active = 1')
      .get('acc-1') as { count: number };
    expect(active.count).toBe(0);
  });
});
