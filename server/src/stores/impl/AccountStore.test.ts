import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate';
import { AccountStore } from './AccountStore';

describe('AccountStore', () => {
  let db: Database.Database;
  let store: AccountStore;

  beforeEach(() => {
    db = new Database(':memory:');
    runMigrations(db);
    store = new AccountStore(db);
  });

  afterEach(() => {
    db.close();
  });

  it('should create an account with defaults', () => {
    const account = store.create({ email: 'one@example.com', username: 'one' });

    expect(account).toMatchObject({
      email: 'one@example.com',
      username: 'one',
      name: null,
      role: 'user',
      provider: 'email',
      email_verified: 0,
    });
    expect(store.findByEmail('one@example.com')?.id).toBe(account.id);
    expect(store.findByUsername('one')?.id).toBe(account.id);
  });

  it('should reject a duplicate email', () => {
    store.create({ email: 'one@example.com', username: 'one' });

    expect(() => store.create({ email: 'one@example.com', username: 'other' }))
      .toThrow(/UNIQUE constraint failed: accounts.email/);
  });

  it('should list accounts by username with pagination', () => {
    store.create({ email: 'c@example.com', username: 'carol' });
    store.create({ email: 'a@example.com', username: 'alice' });
    store.create({ email: 'b@example.com', username: 'bob' });

    expect(store.findAll().map((a) => a.username)).toEqual(['alice', 'bob', 'carol']);
    expect(store.findAll({ offset: 1, limit: 1 }).map((a) => a.username)).toEqual(['bob']);
  });

  it('should update the role', () => {
    const account = store.create({ email: 'one@example.com', username: 'one' });

    const updated = store.update(account.id, { role: 'admin' });

    expect(updated?.role).toBe('admin');
    expect(store.countAdmins()).toBe(1);
  });

  it('should update profile fields and leave the rest untouched', () => {
    const account = store.create({ email: 'one@example.com', username: 'one', name: 'One' });

    const updated = store.update(account.id, { username: 'uno', avatar_url: 'https://example.com/one.png' });

    expect(updated?.username).toBe('uno');
    expect(updated?.avatar_url).toBe('https://example.com/one.png');
    expect(updated?.name).toBe('One');
    expect(store.update(account.id, { name: null })?.name).toBeNull();
  });

  it('should return undefined when updating an unknown account', () => {
    expect(store.update('missing', { role: 'admin' })).toBeUndefined();
  });

  it('should count accounts and report existence', () => {
    expect(store.count()).toBe(0);
    const account = store.create({ email: 'one@example.com', username: 'one' });

    expect(store.exists(account.id)).toBe(true);
    expect(store.exists('missing')).toBe(false);
    expect(store.count()).toBe(1);
  });
});
