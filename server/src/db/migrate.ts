import { db } from './index.js';
import * as m001 from './migrations/001_initial.js';
import * as m002 from './migrations/002_messages.js';
import * as m003 from './migrations/003_login_attempts.js';

const migrations = [
  { name: '001_initial', ...m001 },
  { name: '002_messages', ...m002 },
  { name: '003_login_attempts', ...m003 },
];

const MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS _migrations (
    name TEXT PRIMARY KEY,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  );
`;

function getApplied(): Set<string> {
  db.exec(MIGRATIONS_TABLE);
  const rows = db.prepare<[], { name: string }>('SELECT name FROM _migrations').all();
  return new Set(rows.map((r) => r.name));
}

const applied = getApplied();
let appliedCount = 0;
for (const m of migrations) {
  if (applied.has(m.name)) continue;
  console.log('Applying migration:', m.name);
  m.up(db);
  db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(m.name);
  appliedCount++;
}
if (appliedCount > 0) console.log('Migrations complete.');
