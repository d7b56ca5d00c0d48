import Database from "better-sqlite3";
import { join } from "path";
import { getDataDir, ensureDir } from "../services/paths.js";
import { DB_FILENAME } from "../config.js";

const IN_MEMORY = DB_FILENAME === ":memory:";

function resolveDbPath(): string {
  if (IN_MEMORY) return DB_FILENAME;
  ensureDir(getDataDir());
  return join(getDataDir(), DB_FILENAME);
}

export const db = new Database(resolveDbPath());
if (!IN_MEMORY) db.pragma("journal_mode = WAL");
db.pragma("foreign_keys = ON");

export function closeDb() {
  db.close();
}
