import { Database } from 'better-sqlite3';

export const up = (db: Database): void => {
  // Accounts table
  db.exec(`
    CREATE TABLE IF NOT EXISTS accounts (
      id TEXT PRIMARY KEY,
      email TEXT NOT NULL UNIQUE,
      username TEXT NOT NULL UNIQUE,
      name TEXT,
      role TEXT NOT NULL DEFAULT 'user' CHECK (role IN ('owner', 'manager', 'admin', 'user')),
      provider TEXT NOT NULL DEFAULT 'email' CHECK (provider IN ('email', 'google')),
      provider_account_id TEXT,
      avatar_url TEXT,
      email_verified INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      updated_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  // Teams table (owner is singular per team)
  db.exec(`
    CREATE TABLE IF NOT EXISTS teams (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      avatar_url TEXT,
      owner_id TEXT,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      updated_at TEXT NOT NULL DEFAULT (datetime('now')),
      FOREIGN KEY (owner_id) REFERENCES accounts(id) ON DELETE SET NULL
    )
  `);

  // Team members junction table
  db.exec(`
    CREATE TABLE IF NOT EXISTS team_members (
      team_id TEXT NOT NULL,
      account_id TEXT NOT NULL,
      joined_at TEXT NOT NULL DEFAULT (datetime('now')),
      PRIMARY KEY (team_id, account_id),
      FOREIGN KEY (team_id) REFERENCES teams(id) ON DELETE CASCADE,
      FOREIGN KEY (account_id) REFERENCES accounts(id) ON DELETE CASCADE
    )
  `);

  // Team managers junction table
  db.exec(`
    CREATE TABLE IF NOT EXISTS team_managers (
      team_id TEXT NOT NULL,
      account_id TEXT NOT NULL,
      assigned_at TEXT NOT NULL DEFAULT (datetime('now')),
      PRIMARY KEY (team_id, account_id),
      FOREIGN KEY (team_id) REFERENCES teams(id) ON DELETE CASCADE,
      FOREIGN KEY (account_id) REFERENCES accounts(id) ON DELETE CASCADE
    )
  `);

  // Bearer sessions
  db.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT PRIMARY KEY,
      account_id TEXT NOT NULL,
      session_token TEXT NOT NULL UNIQUE,
      expires_at TEXT NOT NULL,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      ip_address TEXT,
      is_active INTEGER NOT NULL DEFAULT 1,
      FOREIGN KEY (account_id) REFERENCES accounts(id) ON DELETE CASCADE
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_teams_owner ON teams(owner_id);
    CREATE INDEX IF NOT EXISTS idx_team_members_account ON team_members(account_id);
    CREATE INDEX IF NOT EXISTS idx_team_managers_account ON team_managers(account_id);
    CREATE INDEX IF NOT EXISTS idx_sessions_account ON sessions(account_id);
  `);
};

export const down = (db: Database): void => {
  db.exec('DROP TABLE IF EXISTS sessions');
  db.exec('DROP TABLE IF EXISTS team_managers');
  db.exec('DROP TABLE IF EXISTS team_members');
  db.exec('DROP TABLE IF EXISTS teams');
  db.exec('DROP TABLE IF EXISTS accounts');
};
