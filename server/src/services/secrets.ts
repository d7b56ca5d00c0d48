import { existsSync, readFileSync, writeFileSync, chmodSync } from "fs";
import { join } from "path";
import { randomBytes } from "crypto";
import { ensureSecretsDir, getSecretsDir } from "./paths.js";

/**
 * JWT_SECRET from the environment, else the secret persisted in SECRETS_DIR,
 * else a freshly generated one (persisted for the next start).
 */
export function loadOrCreateJwtSecret(): string {
  const fromEnv = process.env.JWT_SECRET?.trim();
  if (fromEnv) return fromEnv;

  ensureSecretsDir();
  const secretPath = join(getSecretsDir(), "jwt-secret.txt");
  if (existsSync(secretPath)) {
    console.warn(
      `[security] JWT_SECRET is not set in the environment. Using the persisted secret.`,
    );
    const existing = readFileSync(secretPath, "utf8").trim();
    // Too short means the file was truncated; regenerate.
    if (existing.length >= 32) return existing;
  }

  const secret = randomBytes(48).toString("base64url");
  writeFileSync(secretPath, `${secret}\n`, { mode: 0o600 });
  try {
    chmodSync(secretPath, 0o600);
  } catch (err) {
    // chmod is not supported on every filesystem; the mode passed to writeFileSync still applies.
    console.warn("[security] Could not chmod JWT secret file:", err);
  }

  console.warn(
    `[security] JWT_SECRET is not set in the environment; generated and persisted a secret. ` +
      `Persist SECRETS_DIR to keep sessions stable across restarts, or set JWT_SECRET via env.`,
  );
  return secret;
}
