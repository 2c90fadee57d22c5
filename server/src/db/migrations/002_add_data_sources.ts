import { Database } from 'better-sqlite3';

export function up(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS data_sources (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      type TEXT NOT NULL CHECK (type IN ('postgresql', 'mysql', 'oracle')),
      status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('active', 'inactive', 'error', 'pending')),
      created_by TEXT,
      team_id TEXT,
      config TEXT NOT NULL,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      updated_at TEXT NOT NULL DEFAULT (datetime('now')),
      FOREIGN KEY (created_by) REFERENCES accounts(id) ON DELETE SET NULL,
      FOREIGN KEY (team_id) REFERENCES teams(id) ON DELETE SET NULL
    )
  `);

  // Titles are globally unique, compared case-sensitively
  db.exec(`
    CREATE UNIQUE INDEX IF NOT EXISTS idx_data_sources_title ON data_sources(title);
    CREATE INDEX IF NOT EXISTS idx_data_sources_created_by ON data_sources(created_by);
    CREATE INDEX IF NOT EXISTS idx_data_sources_team_id ON data_sources(team_id);
  `);
}

export function down(db: Database): void {
  db.exec('DROP INDEX IF EXISTS idx_data_sources_team_id');
  db.exec('DROP INDEX IF EXISTS idx_data_sources_created_by');
  db.exec('DROP INDEX IF EXISTS idx_data_sources_title');
  db.exec('DROP TABLE IF EXISTS data_sources');
}
