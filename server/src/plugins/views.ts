import type { FastifyInstance, FastifyReply } from "fastify";
import { STATUS_CODES } from "http";
import { z } from "zod";
import type { ViewData, ViewRenderer } from "../services/views.js";
import {
  APP_NAME,
  COOKIE_SECURE,
  CSRF_FORM_FIELD,
  FLASH_COOKIE_NAME,
} from "../config.js";

const FLASH_COOKIE_OPTS = {
  httpOnly: true,
  secure: COOKIE_SECURE,
  sameSite: "lax" as const,
  path: "/",
  maxAge: 60,
};

const flashMessageSchema = z.object({
  category: z.enum(["success", "info", "warning", "danger"]),
  message: z.string(),
});
const flashListSchema = z.array(flashMessageSchema);

export type FlashMessage = z.infer<typeof flashMessageSchema>;
export type FlashCategory = FlashMessage["category"];

declare module "fastify" {
  interface FastifyReply {
    /** Flash messages queued on this reply; sent to the next page in a cookie. */
    pendingFlashes: FlashMessage[] | null;
    render(view: string, data?: ViewData): FastifyReply;
    renderError(statusCode: number, message: string): FastifyReply;
    flash(category: FlashCategory, message: string): FastifyReply;
  }
}

export function parseFlashCookie(raw: string | undefined): FlashMessage[] {
  if (!raw) return [];
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return [];
  }
  const parsed = flashListSchema.safeParse(value);
  return parsed.success ? parsed.data : [];
}

/** Messages from the previous request's redirect plus any queued on this reply; clears the cookie. */
function takeFlashes(reply: FastifyReply): FlashMessage[] {
  const raw = reply.request.cookies[FLASH_COOKIE_NAME];
  const flashes = [...parseFlashCookie(raw), ...(reply.pendingFlashes ?? [])];
  if (raw !== undefined || reply.pendingFlashes) {
    reply.clearCookie(FLASH_COOKIE_NAME, { path: "/" });
    reply.pendingFlashes = null;
  }
  return flashes;
}

export function registerViews(app: FastifyInstance, views: ViewRenderer): void {
  app.decorateReply("pendingFlashes", null);

  app.decorateReply(
    "render",
    function (this: FastifyReply, view: string, data: ViewData = {}) {
      const request = this.request;
      const html = views.render(view, {
        appName: APP_NAME,
        year: new Date().getFullYear(),
        currentUser: request.currentUser,
        isAdmin: request.currentUser?.isAdmin === true,
        csrfField: CSRF_FORM_FIELD,
        csrfToken: request.csrfToken,
        flashes: takeFlashes(this),
        ...data,
      });
      return this.type("text/html; charset=utf-8").send(html);
    },
  );

  app.decorateReply(
    "renderError",
    function (this: FastifyReply, statusCode: number, message: string) {
      return this.status(statusCode).render("error", {
        title: STATUS_CODES[statusCode] ?? "Error",
        statusCode,
        message,
      });
    },
  );

  app.decorateReply(
    "flash",
    function (this: FastifyReply, category: FlashCategory, message: string) {
      this.pendingFlashes = [...(this.pendingFlashes ?? []), { category, message }];
      return this.setCookie(
        FLASH_COOKIE_NAME,
        JSON.stringify(this.pendingFlashes),
        FLASH_COOKIE_OPTS,
      );
    },
  );
}
