import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { db } from "../src/db/index.js";
import { createMessage } from "../src/modules/messages/repo.js";
import {
  countRows,
  createTestApp,
  flashesFrom,
  getPage,
  postForm,
  registerAdminAndReader,
  resetDb,
} from "./helpers.js";

const MESSAGE = {
  name: "Grace",
  email: "grace@example.com",
  phone: "555-0100",
  message: "Loved the last post.",
};

describe("contact form", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    resetDb();
  });

  it("renders without a login", async () => {
    const res = await getPage(app, "/contact");
    expect(res.statusCode).toBe(200);
    expect(res.body).toContain('<form class="form" method="post" action="/contact">');
  });

  it("stores exactly one message for an anonymous visitor", async () => {
    const res = await postForm(app, "/contact", MESSAGE);
    expect(res.statusCode).toBe(302);
    expect(res.headers.location).toBe("/contact");
    expect(flashesFrom(res)).toEqual([
      { category: "success", message: "Your message has been sent successfully!" },
    ]);
    expect(countRows("messages")).toBe(1);

    const row = db
      .prepare<[], { name: string; email: string; phone: string | null; message: string }>(
        "SELECT name, email, phone, message FROM messages",
      )
      .get();
    expect(row).toEqual(MESSAGE);
  });

  it("stores a blank phone number as NULL", async () => {
    await postForm(app, "/contact", { ...MESSAGE, phone: "" });
    const row = db
      .prepare<[], { phone: string | null }>("SELECT phone FROM messages")
      .get();
    expect(row?.phone).toBeNull();
  });

  it("rejects an invalid email and keeps what was typed", async () => {
    const res = await postForm(app, "/contact", { ...MESSAGE, email: "grace-at-example" });
    expect(res.statusCode).toBe(400);
    expect(res.body).toContain("Please provide a valid email address");
    expect(res.body).toContain("Loved the last post.</textarea>");
    expect(countRows("messages")).toBe(0);
  });

  it("rejects an empty message", async () => {
    const res = await postForm(app, "/contact", { ...MESSAGE, message: "" });
    expect(res.statusCode).toBe(400);
    expect(res.body).toContain("Please provide a message");
    expect(countRows("messages")).toBe(0);
  });
});

describe("message inbox", () => {
  let app: FastifyInstance;
  let admin: string;
  let reader: string;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(async () => {
    resetDb();
    ({ admin, reader } = await registerAdminAndReader(app));
  });

  it("is closed to readers and anonymous visitors", async () => {
    expect((await getPage(app, "/admin/messages", reader)).statusCode).toBe(403);
    expect((await getPage(app, "/admin/messages")).statusCode).toBe(403);
  });

  it("lists messages newest first by default", async () => {
    createMessage({ name: "Early", email: "early@example.com", phone: null, message: "one" });
    createMessage({ name: "Late", email: "late@example.com", phone: null, message: "two" });

    const res = await getPage(app, "/admin/messages", admin);
    expect(res.statusCode).toBe(200);
    expect(res.body).toContain("2 total");
    expect(res.body.indexOf("Late")).toBeLessThan(res.body.indexOf("Early"));

    const oldest = await getPage(app, "/admin/messages?sort=oldest", admin);
    expect(oldest.body.indexOf("Early")).toBeLessThan(oldest.body.indexOf("Late"));
  });

  it("keeps a valid sort when the page is malformed", async () => {
    createMessage({ name: "Early", email: "early@example.com", phone: null, message: "one" });
    createMessage({ name: "Late", email: "late@example.com", phone: null, message: "two" });

    const res = await getPage(app, "/admin/messages?page=abc&sort=oldest", admin);
    expect(res.statusCode).toBe(200);
    expect(res.body).toContain("Page 1 of 1");
    expect(res.body.indexOf("Early")).toBeLessThan(res.body.indexOf("Late"));
  });

  it("pages through the inbox", async () => {
    for (let i = 1; i <= 21; i++) {
      createMessage({ name: `Sender ${i}`, email: `s${i}@example.com`, phone: null, message: "hi" });
    }
    const first = await getPage(app, "/admin/messages", admin);
    expect(first.body).toContain("Page 1 of 2");
    expect(first.body).toContain("<strong>Sender 21</strong>");
    expect(first.body).not.toContain("<strong>Sender 1</strong>");

    const second = await getPage(app, "/admin/messages?page=2", admin);
    expect(second.body).toContain("Page 2 of 2");
    expect(second.body).toContain("<strong>Sender 1</strong>");
  });

  it("deletes a message", async () => {
    createMessage({ name: "Spam", email: "spam@example.com", phone: null, message: "buy" });

    expect((await postForm(app, "/admin/messages/1/delete", {}, { session: reader })).statusCode).toBe(403);
    expect(countRows("messages")).toBe(1);

    const res = await postForm(app, "/admin/messages/1/delete", {}, { session: admin });
    expect(res.statusCode).toBe(302);
    expect(res.headers.location).toBe("/admin/messages");
    expect(countRows("messages")).toBe(0);

    const missing = await postForm(app, "/admin/messages/1/delete", {}, { session: admin });
    expect(missing.statusCode).toBe(404);
  });
});
