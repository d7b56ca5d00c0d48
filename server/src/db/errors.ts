import Database from "better-sqlite3";

/** A UNIQUE constraint rejected the write (e.g. a concurrent registration with the same email). */
export function isUniqueViolation(err: unknown): boolean {
  return (
    err instanceof Database.SqliteError &&
    err.code === "SQLITE_CONSTRAINT_UNIQUE"
  );
}
