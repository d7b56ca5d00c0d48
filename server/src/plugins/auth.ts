import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { findById, type UserRow } from "../modules/users/repo.js";
import {
  COOKIE_SECURE,
  JWT_COOKIE_NAME,
  JWT_COOKIE_SIGNED,
  SESSION_MAX_AGE_SECONDS,
} from "../config.js";

const COOKIE_OPTS = {
  httpOnly: true,
  secure: COOKIE_SECURE,
  sameSite: "lax" as const,
  path: "/",
  maxAge: SESSION_MAX_AGE_SECONDS,
  signed: JWT_COOKIE_SIGNED,
};

/** The logged-in user as exposed to routes and templates. */
export interface SessionUser {
  id: number;
  name: string;
  email: string;
  isAdmin: boolean;
}

export interface SessionTokenPayload {
  sub: string;
}

declare module "@fastify/jwt" {
  interface FastifyJWT {
    payload: SessionTokenPayload;
    user: SessionTokenPayload;
  }
}

declare module "fastify" {
  interface FastifyRequest {
    /** Set by the session hook on every request; null when anonymous. */
    currentUser: SessionUser | null;
  }
}

type SessionUserSource = Pick<UserRow, "id" | "name" | "email" | "role">;

function toSessionUser(row: SessionUserSource): SessionUser {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    isAdmin: row.role === "admin",
  };
}

/** onRequest hook: resolve the session cookie to a user row, or leave the request anonymous. */
export async function loadSession(request: FastifyRequest): Promise<void> {
  request.currentUser = null;
  if (!request.cookies[JWT_COOKIE_NAME]) return;

  let payload: SessionTokenPayload;
  try {
    payload = await request.jwtVerify<SessionTokenPayload>();
  } catch (err) {
    request.log.debug({ err }, "Session cookie rejected");
    return;
  }
  const userId = Number(payload.sub);
  if (!Number.isInteger(userId)) return;
  const row = findById(userId);
  if (row) request.currentUser = toSessionUser(row);
}

/** Issue the session cookie for a freshly registered or logged-in user. */
export function startSession(
  request: FastifyRequest,
  reply: FastifyReply,
  user: SessionUserSource,
): FastifyReply {
  const token = request.server.jwt.sign(
    { sub: String(user.id) },
    { expiresIn: `${SESSION_MAX_AGE_SECONDS}s` },
  );
  request.currentUser = toSessionUser(user);
  return reply.setCookie(JWT_COOKIE_NAME, token, COOKIE_OPTS);
}

export function endSession(reply: FastifyReply): FastifyReply {
  return reply.clearCookie(JWT_COOKIE_NAME, { path: "/" });
}

/** preHandler factory: anonymous visitors are sent to the login page with `notice` flashed. */
export function requireLogin(notice: string) {
  return async function requireSession(
    request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<FastifyReply | void> {
    if (request.currentUser) return;
    return reply.flash("warning", notice).redirect("/login");
  };
}

/** Require the admin role; everyone else gets 403. */
export async function requireAdmin(
  request: FastifyRequest,
  reply: FastifyReply,
): Promise<FastifyReply | void> {
  if (request.currentUser?.isAdmin) return;
  request.log.warn(
    { userId: request.currentUser?.id ?? null, url: request.url },
    "Admin route rejected",
  );
  return reply.renderError(403, "You do not have permission to access this page.");
}

export function registerAuth(app: FastifyInstance): void {
  app.decorateRequest("currentUser", null);
  app.addHook("onRequest", loadSession);
}
