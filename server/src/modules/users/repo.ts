import { db } from "../../db/index.js";

export type UserRole = "user" | "admin";

export interface UserRow {
  id: number;
  email: string;
  name: string;
  password_hash: string;
  role: UserRole;
  created_at: string;
}

export interface NewUser {
  name: string;
  email: string;
  passwordHash: string;
}

export interface CreatedUser {
  id: number;
  role: UserRole;
}

const USER_SELECT =
  "SELECT id, email, name, password_hash, role, created_at FROM users";

export function findByEmail(email: string): UserRow | undefined {
  return db
    .prepare<[string], UserRow>(`${USER_SELECT} WHERE email = ?`)
    .get(email);
}

export function findById(id: number): UserRow | undefined {
  return db.prepare<[number], UserRow>(`${USER_SELECT} WHERE id = ?`).get(id);
}

export function countUsers(): number {
  const row = db
    .prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM users")
    .get();
  return row?.count ?? 0;
}

/** The account created first holds the admin role; later accounts are plain users. */
export const createUser = db.transaction((user: NewUser): CreatedUser => {
  const role: UserRole = countUsers() === 0 ? "admin" : "user";
  const result = db
    .prepare(
      "INSERT INTO users (email, password_hash, name, role) VALUES (?, ?, ?, ?)",
    )
    .run(user.email, user.passwordHash, user.name, role);
  return { id: Number(result.lastInsertRowid), role };
});

/** Oldest admin account, if any. */
export function findAdmin(): UserRow | undefined {
  return db
    .prepare<[], UserRow>(
      `${USER_SELECT} WHERE role = 'admin' ORDER BY id ASC LIMIT 1`,
    )
    .get();
}

export function updatePasswordHash(id: number, passwordHash: string): void {
  db.prepare("UPDATE users SET password_hash = ? WHERE id = ?").run(
    passwordHash,
    id,
  );
}
