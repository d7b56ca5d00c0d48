/**
 * Failed login bookkeeping and temporary IP bans.
 */
export const up = (db: { exec: (sql: string) => void }) => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS login_attempts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      ip TEXT NOT NULL,
      context TEXT NOT NULL,
      attempted_email TEXT,
      user_agent TEXT,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS ip_bans (
      ip TEXT NOT NULL,
      context TEXT NOT NULL,
      banned_until TEXT NOT NULL,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      updated_at TEXT NOT NULL DEFAULT (datetime('now')),
      PRIMARY KEY (ip, context)
    );

    CREATE INDEX IF NOT EXISTS idx_login_attempts_ip_context_created_at
      ON login_attempts (ip, context, created_at);
    CREATE INDEX IF NOT EXISTS idx_ip_bans_until ON ip_bans (banned_until);
  `);
};

export const down = (db: { exec: (sql: string) => void }) => {
  db.exec(`
    DROP INDEX IF EXISTS idx_ip_bans_until;
    DROP INDEX IF EXISTS idx_login_attempts_ip_context_created_at;
    DROP TABLE IF EXISTS ip_bans;
    DROP TABLE IF EXISTS login_attempts;
  `);
};
