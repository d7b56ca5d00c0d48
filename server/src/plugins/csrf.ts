import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { randomBytes } from "crypto";
import {
  COOKIE_SECURE,
  CSRF_COOKIE_NAME,
  CSRF_COOKIE_MAX_AGE_SECONDS,
  CSRF_FORM_FIELD,
} from "../config.js";

const CSRF_COOKIE_OPTS = {
  httpOnly: false,
  secure: COOKIE_SECURE,
  sameSite: "lax" as const,
  path: "/",
  maxAge: CSRF_COOKIE_MAX_AGE_SECONDS,
};

declare module "fastify" {
  interface FastifyRequest {
    /** Double-submit token: mirrors the CSRF cookie; templates put it in every form. */
    csrfToken: string;
    /** True when the request arrived without a CSRF cookie and one was just issued. */
    csrfIssued: boolean;
  }
}

function isUnsafeMethod(method: string): boolean {
  const m = method.toUpperCase();
  return m !== "GET" && m !== "HEAD" && m !== "OPTIONS";
}

function getHeaderValue(h: unknown): string | undefined {
  if (typeof h === "string") return h;
  if (Array.isArray(h)) return typeof h[0] === "string" ? h[0] : undefined;
  return undefined;
}

function getFormToken(body: unknown): string | undefined {
  if (typeof body !== "object" || body === null) return undefined;
  const value: unknown = Reflect.get(body, CSRF_FORM_FIELD);
  return typeof value === "string" ? value : undefined;
}

export function newCsrfToken(): string {
  return randomBytes(32).toString("base64url");
}

/** onRequest hook: make sure the visitor holds a CSRF cookie. */
export async function issueCsrfToken(
  request: FastifyRequest,
  reply: FastifyReply,
): Promise<void> {
  const existing = request.cookies[CSRF_COOKIE_NAME];
  if (existing) {
    request.csrfToken = existing;
    request.csrfIssued = false;
    return;
  }
  request.csrfToken = newCsrfToken();
  request.csrfIssued = true;
  reply.setCookie(CSRF_COOKIE_NAME, request.csrfToken, CSRF_COOKIE_OPTS);
}

/**
 * preHandler hook: unsafe methods must echo the cookie value back, either in the
 * `_csrf` form field or the `x-csrf-token` header.
 */
export async function verifyCsrfToken(
  request: FastifyRequest,
  reply: FastifyReply,
): Promise<FastifyReply | void> {
  if (!isUnsafeMethod(request.method)) return;
  if (request.csrfIssued) {
    request.log.warn({ url: request.url }, "CSRF cookie missing");
    return reply.renderError(403, "Your session expired. Refresh the page and try again.");
  }
  const submitted =
    getFormToken(request.body) ??
    getHeaderValue(request.headers["x-csrf-token"]);
  if (!submitted || submitted !== request.csrfToken) {
    request.log.warn({ url: request.url }, "CSRF token invalid");
    return reply.renderError(403, "The form could not be verified. Refresh the page and try again.");
  }
}

export function registerCsrf(app: FastifyInstance): void {
  app.decorateRequest("csrfToken", "");
  app.decorateRequest("csrfIssued", false);
  app.addHook("onRequest", issueCsrfToken);
  app.addHook("preHandler", verifyCsrfToken);
}
