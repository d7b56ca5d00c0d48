import type { FastifyBaseLogger, FastifyRequest } from "fastify";
import {
  LOGIN_BAN_MINUTES,
  LOGIN_FAILURE_THRESHOLD,
  LOGIN_WINDOW_MINUTES,
} from "../config.js";
import { db } from "../db/index.js";

/** Rows in login_attempts and ip_bans are scoped by this context. */
const LOGIN_CONTEXT = "auth_login";

export interface LoginBan {
  banned: boolean;
  retryAfterSec: number;
}

export interface FailedLogin {
  ip: string;
  email: string;
  userAgent: string | null;
}

/** Requires trustProxy when running behind a reverse proxy. */
export function getClientIp(request: FastifyRequest): string {
  return request.ip.trim() || "unknown";
}

export function getUserAgent(request: FastifyRequest): string | null {
  return request.headers["user-agent"]?.trim() || null;
}

const ACTIVE_BAN_SQL = `
  SELECT CAST(CEIL((julianday(banned_until) - julianday('now')) * 86400.0) AS INTEGER) AS retry_after_sec
  FROM ip_bans
  WHERE ip = ? AND context = ? AND datetime(banned_until) > datetime('now')
`;

const RECENT_FAILURES_SQL = `
  SELECT COUNT(*) AS count FROM login_attempts
  WHERE ip = ? AND context = ? AND datetime(created_at) >= datetime('now', ?)
`;

const UPSERT_BAN_SQL = `
  INSERT INTO ip_bans (ip, context, banned_until) VALUES (?, ?, datetime('now', ?))
  ON CONFLICT(ip, context) DO UPDATE SET
    banned_until = excluded.banned_until,
    updated_at = datetime('now')
`;

export function getLoginBan(ip: string): LoginBan {
  const row = db
    .prepare<[string, string], { retry_after_sec: number }>(ACTIVE_BAN_SQL)
    .get(ip, LOGIN_CONTEXT);
  if (!row) return { banned: false, retryAfterSec: 0 };
  return { banned: true, retryAfterSec: Math.max(1, row.retry_after_sec) };
}

/**
 * Log a failed login. Once the address has more than LOGIN_FAILURE_THRESHOLD
 * failures inside the window it is banned for LOGIN_BAN_MINUTES.
 */
export function recordLoginFailure(
  attempt: FailedLogin,
  log: FastifyBaseLogger,
): LoginBan {
  const { ip } = attempt;
  db.prepare(
    "INSERT INTO login_attempts (ip, context, attempted_email, user_agent) VALUES (?, ?, ?, ?)",
  ).run(ip, LOGIN_CONTEXT, attempt.email.trim().toLowerCase(), attempt.userAgent);

  const failures =
    db
      .prepare<[string, string, string], { count: number }>(RECENT_FAILURES_SQL)
      .get(ip, LOGIN_CONTEXT, `-${LOGIN_WINDOW_MINUTES} minutes`)?.count ?? 0;
  if (failures <= LOGIN_FAILURE_THRESHOLD) return { banned: false, retryAfterSec: 0 };

  db.prepare(UPSERT_BAN_SQL).run(ip, LOGIN_CONTEXT, `+${LOGIN_BAN_MINUTES} minutes`);
  log.warn(
    { ip, context: LOGIN_CONTEXT, failures, banMinutes: LOGIN_BAN_MINUTES },
    "Login banned after repeated failures",
  );
  const ban = getLoginBan(ip);
  return ban.banned ? ban : { banned: true, retryAfterSec: LOGIN_BAN_MINUTES * 60 };
}

export function clearLoginFailures(ip: string): void {
  db.prepare("DELETE FROM login_attempts WHERE ip = ? AND context = ?").run(
    ip,
    LOGIN_CONTEXT,
  );
}
