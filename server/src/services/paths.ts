import { dirname, join, resolve } from "path";
import { existsSync, mkdirSync } from "fs";
import { fileURLToPath } from "url";
import { PUBLIC_DIR, VIEWS_DIR } from "../config.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const DATA_DIR = resolve(process.env.DATA_DIR ?? join(process.cwd(), "data"));
const SECRETS_DIR = resolve(
  process.env.SECRETS_DIR ?? join(process.cwd(), "secrets"),
);

/** server/ package root: from server/src/services -> server. */
const SERVER_ROOT = join(__dirname, "..", "..");

export function getDataDir() {
  return DATA_DIR;
}

export function getSecretsDir() {
  return SECRETS_DIR;
}

export function ensureSecretsDir() {
  ensureDir(SECRETS_DIR);
}

export function ensureDir(dir: string) {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/** Handlebars templates (pages at the top level, partials under partials/). */
export function getViewsDir(): string {
  return resolve(VIEWS_DIR ?? join(SERVER_ROOT, "views"));
}

/** Static assets served under /static/. */
export function getPublicDir(): string {
  return resolve(PUBLIC_DIR ?? join(SERVER_ROOT, "public"));
}
