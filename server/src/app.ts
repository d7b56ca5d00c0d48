import Fastify, { type FastifyInstance } from "fastify";
import jwt from "@fastify/jwt";
import cookie from "@fastify/cookie";
import formbody from "@fastify/formbody";
import rateLimit from "@fastify/rate-limit";
import fastifyStatic from "@fastify/static";
import {
  JWT_COOKIE_NAME,
  JWT_COOKIE_SIGNED,
  LOGGER,
  RATE_LIMIT_MAX,
  RATE_LIMIT_TIME_WINDOW,
  TRUST_PROXY,
} from "./config.js";
import "./db/migrate.js";
import { registerAuth } from "./plugins/auth.js";
import { registerCsrf } from "./plugins/csrf.js";
import { registerViews } from "./plugins/views.js";
import { loadViews } from "./services/views.js";
import { getPublicDir, getViewsDir } from "./services/paths.js";
import { loadOrCreateJwtSecret } from "./services/secrets.js";
import { healthRoutes } from "./modules/health/index.js";
import { authRoutes } from "./modules/auth/index.js";
import { postRoutes } from "./modules/posts/index.js";
import { commentRoutes } from "./modules/comments/index.js";
import { contactRoutes } from "./modules/contact/index.js";
import { messagesRoutes } from "./modules/messages/index.js";
import { pageRoutes } from "./modules/pages/index.js";

export interface BuildAppOptions {
  logger?: boolean;
  /** Overrides JWT_SECRET / the persisted secret. */
  jwtSecret?: string;
}

export async function buildApp(
  options: BuildAppOptions = {},
): Promise<FastifyInstance> {
  const secret = options.jwtSecret ?? loadOrCreateJwtSecret();
  const app = Fastify({
    logger: options.logger ?? LOGGER,
    trustProxy: TRUST_PROXY,
  });

  await app.register(rateLimit, {
    max: RATE_LIMIT_MAX,
    timeWindow: RATE_LIMIT_TIME_WINDOW,
  });
  await app.register(cookie, { secret });
  await app.register(formbody);
  await app.register(jwt, {
    secret,
    cookie: { cookieName: JWT_COOKIE_NAME, signed: JWT_COOKIE_SIGNED },
  });
  await app.register(fastifyStatic, {
    root: getPublicDir(),
    prefix: "/static/",
  });

  // Hooks and reply decorators live on the root instance so every route sees them.
  registerViews(app, loadViews(getViewsDir()));
  registerCsrf(app);
  registerAuth(app);

  app.setErrorHandler((error, request, reply) => {
    const statusCode =
      typeof error.statusCode === "number" && error.statusCode >= 400
        ? error.statusCode
        : 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "Request failed");
      return reply.renderError(500, "Something went wrong on our side. Please try again later.");
    }
    request.log.info({ err: error, statusCode }, "Request rejected");
    return reply.renderError(statusCode, error.message);
  });

  app.setNotFoundHandler((_request, reply) => {
    return reply.renderError(404, "The page you are looking for does not exist.");
  });

  await app.register(healthRoutes);
  await app.register(authRoutes);
  await app.register(postRoutes);
  await app.register(commentRoutes);
  await app.register(contactRoutes);
  await app.register(messagesRoutes);
  await app.register(pageRoutes);

  return app;
}
