/**
 * Central app config. All values can be overridden via environment variables.
 * Use .env or set in the shell when running the server.
 */

/** Application display name (page titles, emails). Env: APP_NAME */
export const APP_NAME = process.env.APP_NAME?.trim() || "Khaled Blog";

/** Slug form of APP_NAME (lowercase, spaces to hyphens) for filenames, cookie names, etc. */
export const APP_NAME_SLUG = APP_NAME.toLowerCase().replace(/\s+/g, "-");

/** Server port. Env: PORT. Default 5001. */
export const PORT = Number(process.env.PORT) || 5001;

/** Server listen host. Env: HOST. Default "0.0.0.0". */
export const HOST = process.env.HOST?.trim() || "0.0.0.0";

/** Enable Fastify logger. Env: LOGGER. Set to "false" or "0" to disable. Default true. */
export const LOGGER =
  process.env.LOGGER !== "false" && process.env.LOGGER !== "0";

/** Trust X-Forwarded-* headers (set true when behind a reverse proxy). Env: TRUST_PROXY. Set to "false" or "0" to disable. Default true. */
export const TRUST_PROXY =
  process.env.TRUST_PROXY === "false" || process.env.TRUST_PROXY === "0"
    ? false
    : true;

/** SQLite database filename (under DATA_DIR), or ":memory:". Env: DB_FILENAME. Default derived from APP_NAME (e.g. khaled-blog.db). */
export const DB_FILENAME =
  process.env.DB_FILENAME?.trim() || `${APP_NAME_SLUG}.db`;

/** Directory holding Handlebars page templates (partials in views/partials). Env: VIEWS_DIR. */
export const VIEWS_DIR = process.env.VIEWS_DIR?.trim() || undefined;

/** Directory with static assets served under /static/. Env: PUBLIC_DIR. */
export const PUBLIC_DIR = process.env.PUBLIC_DIR?.trim() || undefined;

/** Name of the CSRF cookie. Env: CSRF_COOKIE_NAME. Default derived from APP_NAME (e.g. khaled-blog_csrf). */
export const CSRF_COOKIE_NAME =
  process.env.CSRF_COOKIE_NAME?.trim() || `${APP_NAME_SLUG}_csrf`;

/** Form field carrying the CSRF token on HTML form posts. */
export const CSRF_FORM_FIELD = "_csrf";

/** CSRF cookie max age in seconds. Env: CSRF_COOKIE_MAX_AGE_SECONDS. Default 7 days. */
export const CSRF_COOKIE_MAX_AGE_SECONDS =
  Number(process.env.CSRF_COOKIE_MAX_AGE_SECONDS) || 60 * 60 * 24 * 7;

/** Name of the JWT session cookie. Env: JWT_COOKIE_NAME. Default derived from APP_NAME (e.g. khaled-blog_jwt). */
export const JWT_COOKIE_NAME =
  process.env.JWT_COOKIE_NAME?.trim() || `${APP_NAME_SLUG}_jwt`;

/** Whether the JWT cookie is signed with the cookie secret. Env: JWT_COOKIE_SIGNED. Default false. */
export const JWT_COOKIE_SIGNED =
  process.env.JWT_COOKIE_SIGNED === "true" ||
  process.env.JWT_COOKIE_SIGNED === "1";

/** Session lifetime in seconds (JWT expiry and cookie max age). Env: SESSION_MAX_AGE_SECONDS. Default 7 days. */
export const SESSION_MAX_AGE_SECONDS =
  Number(process.env.SESSION_MAX_AGE_SECONDS) || 60 * 60 * 24 * 7;

/** Name of the one-shot flash message cookie. Env: FLASH_COOKIE_NAME. Default derived from APP_NAME. */
export const FLASH_COOKIE_NAME =
  process.env.FLASH_COOKIE_NAME?.trim() || `${APP_NAME_SLUG}_flash`;

/** Login failure threshold: ban after this many failures in the window. Env: LOGIN_FAILURE_THRESHOLD. Default 5. */
export const LOGIN_FAILURE_THRESHOLD =
  Number(process.env.LOGIN_FAILURE_THRESHOLD) || 5;

/** Login ban duration (minutes). Env: LOGIN_BAN_MINUTES. Default 10. */
export const LOGIN_BAN_MINUTES = Number(process.env.LOGIN_BAN_MINUTES) || 10;

/** Login failure counting window (minutes). Env: LOGIN_WINDOW_MINUTES. Default 10. */
export const LOGIN_WINDOW_MINUTES =
  Number(process.env.LOGIN_WINDOW_MINUTES) || 10;

/** Global rate limit: max requests per time window. Env: RATE_LIMIT_MAX. Default 100. */
export const RATE_LIMIT_MAX = Number(process.env.RATE_LIMIT_MAX) || 100;

/** Global rate limit: time window (e.g. "1 minute"). Env: RATE_LIMIT_TIME_WINDOW. Default "1 minute". */
export const RATE_LIMIT_TIME_WINDOW =
  process.env.RATE_LIMIT_TIME_WINDOW?.trim() || "1 minute";

/** Page size of the admin message inbox. Env: MESSAGES_PAGE_SIZE. Default 20. */
export const MESSAGES_PAGE_SIZE = Number(process.env.MESSAGES_PAGE_SIZE) || 20;

/** Gravatar image size (px) next to comments. Env: GRAVATAR_SIZE. Default 100. */
export const GRAVATAR_SIZE = Number(process.env.GRAVATAR_SIZE) || 100;

/** Gravatar rating filter. Env: GRAVATAR_RATING. Default "g". */
export const GRAVATAR_RATING = process.env.GRAVATAR_RATING?.trim() || "g";

/** Gravatar fallback image style. Env: GRAVATAR_DEFAULT. Default "retro". */
export const GRAVATAR_DEFAULT = process.env.GRAVATAR_DEFAULT?.trim() || "retro";

/** SMTP host for contact notifications. Empty disables email. Env: SMTP_HOST. */
export const SMTP_HOST = process.env.SMTP_HOST?.trim() || "";

/** SMTP port. Env: SMTP_PORT. Default 587. */
export const SMTP_PORT = Number(process.env.SMTP_PORT) || 587;

/** SMTP user. Env: SMTP_USER. */
export const SMTP_USER = process.env.SMTP_USER?.trim() || "";

/** SMTP password. Env: SMTP_PASSWORD. */
export const SMTP_PASSWORD = process.env.SMTP_PASSWORD ?? "";

/** Sender address for outgoing email. Env: SMTP_FROM. Default noreply@localhost. */
export const SMTP_FROM = process.env.SMTP_FROM?.trim() || "noreply@localhost";

const COOKIE_SECURE_ENV = process.env.COOKIE_SECURE?.trim() ?? "";

/** Mark session, CSRF and flash cookies Secure. Env: COOKIE_SECURE ("true"/"1" or "false"/"0"). Default: on when NODE_ENV is production. */
export const COOKIE_SECURE =
  COOKIE_SECURE_ENV === ""
    ? process.env.NODE_ENV === "production"
    : COOKIE_SECURE_ENV === "true" || COOKIE_SECURE_ENV === "1";
