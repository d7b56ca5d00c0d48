import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import Fastify from "fastify";
import "../src/db/migrate.js";
import {
  clearLoginFailures,
  getLoginBan,
  recordLoginFailure,
} from "../src/services/loginAttempts.js";
import { resetDb } from "./helpers.js";

const IP = "203.0.113.9";

describe("login failure tracking", () => {
  const log = Fastify({ logger: false }).log;

  beforeEach(() => {
    resetDb();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function fail() {
    return recordLoginFailure({ ip: IP, email: " Reader@Example.com ", userAgent: null }, log);
  }

  it("stays unbanned up to the threshold", () => {
    for (let i = 0; i < 5; i++) {
      expect(fail()).toEqual({ banned: false, retryAfterSec: 0 });
    }
    expect(getLoginBan(IP)).toEqual({ banned: false, retryAfterSec: 0 });
  });

  it("bans past the threshold and logs the ban through the given logger", () => {
    const warn = vi.spyOn(log, "warn");
    for (let i = 0; i < 5; i++) fail();
    expect(warn).not.toHaveBeenCalled();

    const result = fail();
    expect(result.banned).toBe(true);
    expect(result.retryAfterSec).toBeGreaterThan(0);
    expect(getLoginBan(IP).banned).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      { ip: IP, context: "auth_login", failures: 6, banMinutes: 10 },
      "Login banned after repeated failures",
    );
  });

  it("forgets failures once cleared", () => {
    for (let i = 0; i < 5; i++) fail();
    clearLoginFailures(IP);
    expect(fail()).toEqual({ banned: false, retryAfterSec: 0 });
  });
});
