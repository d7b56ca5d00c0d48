import type { FastifyInstance, LightMyRequestResponse } from "fastify";
import { buildApp } from "../src/app.js";
import { db } from "../src/db/index.js";
import { CSRF_COOKIE_NAME, FLASH_COOKIE_NAME, JWT_COOKIE_NAME } from "../src/config.js";

export const TEST_CSRF = "test-csrf";

export const ADMIN = {
  name: "Ada Admin",
  email: "admin@example.com",
  password: "test-password",
};

export const READER = {
  name: "Rita Reader",
  email: "reader@example.com",
  password: "test-password",
};

export const VALID_POST = {
  title: "First Post",
  subtitle: "Getting started",
  body: "<p>Hello world</p>",
  img_url: "https://example.com/cover.jpg",
};

export async function createTestApp(): Promise<FastifyInstance> {
  const app = await buildApp({ logger: false, jwtSecret: "test-secret" });
  await app.ready();
  return app;
}

/** Empties every table so each test starts from a fresh database with ids counting from 1. */
export function resetDb(): void {
  db.exec(`
    DELETE FROM comments;
    DELETE FROM posts;
    DELETE FROM messages;
    DELETE FROM users;
    DELETE FROM login_attempts;
    DELETE FROM ip_bans;
    DELETE FROM sqlite_sequence;
  `);
}

export function countRows(table: "users" | "posts" | "comments" | "messages"): number {
  const row = db
    .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`)
    .get();
  return row?.count ?? 0;
}

export interface FormOptions {
  /** Session cookie value (JWT). */
  session?: string;
  /** CSRF cookie value; null sends no CSRF cookie at all. */
  csrfCookie?: string | null;
}

/** POST an urlencoded form carrying the test CSRF token (override it via `fields._csrf`). */
export function postForm(
  app: FastifyInstance,
  url: string,
  fields: Record<string, string>,
  options: FormOptions = {},
): Promise<LightMyRequestResponse> {
  const cookies: Record<string, string> = {};
  if (options.csrfCookie !== null) {
    cookies[CSRF_COOKIE_NAME] = options.csrfCookie ?? TEST_CSRF;
  }
  if (options.session) cookies[JWT_COOKIE_NAME] = options.session;
  return app.inject({
    method: "POST",
    url,
    headers: { "content-type": "application/x-www-form-urlencoded" },
    cookies,
    payload: new URLSearchParams({ _csrf: TEST_CSRF, ...fields }).toString(),
  });
}

export function getPage(
  app: FastifyInstance,
  url: string,
  session?: string,
): Promise<LightMyRequestResponse> {
  const cookies: Record<string, string> = { [CSRF_COOKIE_NAME]: TEST_CSRF };
  if (session) cookies[JWT_COOKIE_NAME] = session;
  return app.inject({ method: "GET", url, cookies });
}

export function getCookie(res: LightMyRequestResponse, name: string): string | undefined {
  return res.cookies.find((c) => c.name === name)?.value;
}

export function sessionFrom(res: LightMyRequestResponse): string {
  const token = getCookie(res, JWT_COOKIE_NAME);
  if (!token) throw new Error(`No session cookie in response (status ${res.statusCode})`);
  return token;
}

export function flashesFrom(res: LightMyRequestResponse): unknown {
  const raw = getCookie(res, FLASH_COOKIE_NAME);
  return raw === undefined ? [] : JSON.parse(raw);
}

export async function register(
  app: FastifyInstance,
  user: { name: string; email: string; password: string },
): Promise<string> {
  const res = await postForm(app, "/register", {
    name: user.name,
    email: user.email,
    password: user.password,
    confirm_password: user.password,
  });
  return sessionFrom(res);
}

/** Registers the admin (first account) and a plain reader, returning both sessions. */
export async function registerAdminAndReader(
  app: FastifyInstance,
): Promise<{ admin: string; reader: string }> {
  const admin = await register(app, ADMIN);
  const reader = await register(app, READER);
  return { admin, reader };
}
