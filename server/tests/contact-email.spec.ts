import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import type { FastifyInstance } from "fastify";

const { sendMail, createTransport } = vi.hoisted(() => {
  process.env.SMTP_HOST = "smtp.test";
  const sendMail = vi.fn();
  return { sendMail, createTransport: vi.fn((_options: unknown) => ({ sendMail })) };
});

vi.mock("nodemailer", () => ({ default: { createTransport } }));

import {
  ADMIN,
  countRows,
  createTestApp,
  flashesFrom,
  postForm,
  register,
  resetDb,
} from "./helpers.js";

const MESSAGE = {
  name: "Grace",
  email: "grace@example.com",
  phone: "",
  message: "Loved the last post.",
};

describe("contact notification email", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    resetDb();
    sendMail.mockReset();
    sendMail.mockResolvedValue({ messageId: "test-message" });
  });

  it("mails the admin with the sender as reply-to", async () => {
    await register(app, ADMIN);
    const res = await postForm(app, "/contact", MESSAGE);

    expect(res.statusCode).toBe(302);
    expect(countRows("messages")).toBe(1);
    expect(sendMail).toHaveBeenCalledTimes(1);
    expect(sendMail).toHaveBeenCalledWith(
      expect.objectContaining({
        from: "noreply@localhost",
        to: ADMIN.email,
        replyTo: "grace@example.com",
        subject: "Khaled Blog Contact Form: Grace",
      }),
    );
    expect(createTransport).toHaveBeenCalledWith(
      expect.objectContaining({ host: "smtp.test", port: 587, secure: false }),
    );
  });

  it("still stores the message and redirects when sending fails", async () => {
    await register(app, ADMIN);
    sendMail.mockRejectedValueOnce(new Error("connection refused"));
    const warn = vi.spyOn(app.log, "warn");

    const res = await postForm(app, "/contact", MESSAGE);

    expect(res.statusCode).toBe(302);
    expect(res.headers.location).toBe("/contact");
    expect(flashesFrom(res)).toEqual([
      { category: "success", message: "Your message has been sent successfully!" },
    ]);
    expect(countRows("messages")).toBe(1);
    expect(warn).toHaveBeenCalledWith(
      { messageId: 1, error: "connection refused" },
      "Contact notification email failed",
    );
    warn.mockRestore();
  });

  it("sends nothing when there is no admin yet", async () => {
    const res = await postForm(app, "/contact", MESSAGE);
    expect(res.statusCode).toBe(302);
    expect(countRows("messages")).toBe(1);
    expect(sendMail).not.toHaveBeenCalled();
  });
});
