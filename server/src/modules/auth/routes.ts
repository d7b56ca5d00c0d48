import type { FastifyInstance } from "fastify";
import argon2 from "argon2";
import { registerBodySchema, loginBodySchema } from "@khaled-blog/shared";
import { endSession, startSession } from "../../plugins/auth.js";
import { createUser, findByEmail, type CreatedUser } from "../users/repo.js";
import { isUniqueViolation } from "../../db/errors.js";
import {
  clearLoginFailures,
  getClientIp,
  getLoginBan,
  getUserAgent,
  recordLoginFailure,
} from "../../services/loginAttempts.js";
import { pickFormValues, redactEmail } from "../../utils/forms.js";

const REGISTER_FIELDS = ["name", "email"] as const;
const LOGIN_FIELDS = ["email"] as const;
const DUPLICATE_EMAIL_ERROR =
  "You've already signed up with that email, log in instead!";
const TOO_MANY_ATTEMPTS_ERROR =
  "Too many failed login attempts. Try again in a few minutes.";

export async function authRoutes(app: FastifyInstance) {
  app.get("/register", async (_request, reply) => {
    return reply.render("register", { title: "Register", values: {}, errors: {} });
  });

  app.post("/register", async (request, reply) => {
    const values = pickFormValues(request.body, REGISTER_FIELDS);
    const parsed = registerBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).render("register", {
        title: "Register",
        values,
        errors: parsed.error.flatten().fieldErrors,
      });
    }
    const { name, email, password } = parsed.data;
    const duplicate = () =>
      reply.status(409).render("register", {
        title: "Register",
        values,
        errors: { email: [DUPLICATE_EMAIL_ERROR] },
      });

    if (findByEmail(email)) {
      request.log.info(
        { emailRedacted: redactEmail(email) },
        "Registration rejected: email already registered",
      );
      return duplicate();
    }

    const passwordHash = await argon2.hash(password);
    let created: CreatedUser;
    try {
      created = createUser({ name, email, passwordHash });
    } catch (err) {
      if (isUniqueViolation(err)) return duplicate();
      throw err;
    }

    request.log.info({ userId: created.id, role: created.role }, "User registered");
    return startSession(request, reply, {
      id: created.id,
      name,
      email,
      role: created.role,
    }).redirect("/");
  });

  app.get("/login", async (_request, reply) => {
    return reply.render("login", { title: "Log In", values: {}, errors: {} });
  });

  app.post("/login", async (request, reply) => {
    const ip = getClientIp(request);
    const values = pickFormValues(request.body, LOGIN_FIELDS);

    const ban = getLoginBan(ip);
    if (ban.banned) {
      return reply
        .status(429)
        .header("Retry-After", String(ban.retryAfterSec))
        .render("login", {
          title: "Log In",
          values,
          errors: {},
          formError: TOO_MANY_ATTEMPTS_ERROR,
        });
    }

    const parsed = loginBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).render("login", {
        title: "Log In",
        values,
        errors: parsed.error.flatten().fieldErrors,
      });
    }
    const { email, password } = parsed.data;

    const user = findByEmail(email);
    if (!user || !(await argon2.verify(user.password_hash, password))) {
      request.log.warn(
        { emailRedacted: redactEmail(email), ip },
        "Login failed: invalid credentials",
      );
      const after = recordLoginFailure(
        { ip, email, userAgent: getUserAgent(request) },
        request.log,
      );
      if (after.banned) {
        return reply
          .status(429)
          .header("Retry-After", String(after.retryAfterSec))
          .render("login", {
            title: "Log In",
            values,
            errors: {},
            formError: TOO_MANY_ATTEMPTS_ERROR,
          });
      }
      return reply.status(401).render("login", {
        title: "Log In",
        values,
        errors: {},
        formError: "Invalid email or password.",
      });
    }

    clearLoginFailures(ip);
    request.log.info({ userId: user.id }, "User logged in");
    return startSession(request, reply, user).redirect("/");
  });

  app.get("/logout", async (_request, reply) => {
    return endSession(reply).redirect("/");
  });
}
