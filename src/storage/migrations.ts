import Database from 'better-sqlite3';

export function migrate(db: Database.Database) {
    db.exec(`
    CREATE TABLE IF NOT EXISTS audit_logs(
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    action TEXT NOT NULL,
    actor_id TEXT,
    target_id TEXT,
    details TEXT, --JSON
      timestamp TEXT NOT NULL
  );

    CREATE TABLE IF NOT EXISTS event_logs(
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    type TEXT NOT NULL,
    payload TEXT NOT NULL, --JSON
      timestamp TEXT NOT NULL
  );

    CREATE INDEX IF NOT EXISTS idx_audit_logs_action ON audit_logs(action);
    CREATE INDEX IF NOT EXISTS idx_event_logs_type ON event_logs(type);
  `);

    console.error('[Migration] Schema up to date');
}
