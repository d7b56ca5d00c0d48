import { describe, expect, it } from "vitest";
import {
  contactBodySchema,
  idParamSchema,
  isHttpUrl,
  messagesListQuerySchema,
  postBodySchema,
  registerBodySchema,
} from "@khaled-blog/shared";

describe("registerBodySchema", () => {
  it("normalizes the email and reports mismatched passwords on confirm_password", () => {
    const ok = registerBodySchema.safeParse({
      name: " Ada ",
      email: " Ada@Example.com ",
      password: "test-password",
      confirm_password: "test-password",
    });
    expect(ok.success && ok.data.email).toBe("ada@example.com");
    expect(ok.success && ok.data.name).toBe("Ada");

    const bad = registerBodySchema.safeParse({
      name: "Ada",
      email: "ada@example.com",
      password: "test-password",
      confirm_password: "other-password",
    });
    expect(bad.success).toBe(false);
    expect(bad.error?.flatten().fieldErrors.confirm_password).toEqual(["Passwords do not match"]);
  });
});

describe("postBodySchema", () => {
  const base = {
    title: "T",
    subtitle: "S",
    body: "<p>B</p>",
    img_url: "https://example.com/a.png",
  };

  it("maps a missing or blank project link to null", () => {
    const missing = postBodySchema.safeParse(base);
    expect(missing.success && missing.data.project_url).toBeNull();
    const blank = postBodySchema.safeParse({ ...base, project_url: "" });
    expect(blank.success && blank.data.project_url).toBeNull();
  });

  it("rejects non-http project links", () => {
    const res = postBodySchema.safeParse({ ...base, project_url: "ftp://example.com" });
    expect(res.error?.flatten().fieldErrors.project_url).toEqual([
      "Project link must be a valid http(s) URL",
    ]);
  });
});

describe("isHttpUrl", () => {
  it("accepts only absolute http(s) URLs", () => {
    expect(isHttpUrl("http://example.com")).toBe(true);
    expect(isHttpUrl("https://example.com/x?y=1")).toBe(true);
    expect(isHttpUrl("javascript:alert(1)")).toBe(false);
    expect(isHttpUrl("/relative")).toBe(false);
  });
});

describe("contactBodySchema", () => {
  it("makes the phone optional", () => {
    const res = contactBodySchema.safeParse({
      name: "Grace",
      email: "grace@example.com",
      message: "Hi",
    });
    expect(res.success && res.data.phone).toBeNull();
  });
});

describe("idParamSchema", () => {
  it("accepts positive integers only", () => {
    expect(idParamSchema.safeParse({ id: "12" }).data).toEqual({ id: 12 });
    expect(idParamSchema.safeParse({ id: "abc" }).success).toBe(false);
    expect(idParamSchema.safeParse({ id: "0" }).success).toBe(false);
    expect(idParamSchema.safeParse({ id: "1.5" }).success).toBe(false);
  });

  it("rejects hex, exponent and padded forms", () => {
    for (const id of ["0x10", "1e1", " 7", "7 ", "+7"]) {
      expect(idParamSchema.safeParse({ id }).success).toBe(false);
    }
  });
});

describe("messagesListQuerySchema", () => {
  it("defaults to the first page, newest first", () => {
    expect(messagesListQuerySchema.parse({})).toEqual({ page: 1, sort: "newest" });
    expect(messagesListQuerySchema.parse({ page: "3", sort: "oldest" })).toEqual({ page: 3, sort: "oldest" });
  });

  it("falls back per field, keeping the valid one", () => {
    expect(messagesListQuerySchema.parse({ page: "abc", sort: "oldest" })).toEqual({ page: 1, sort: "oldest" });
    expect(messagesListQuerySchema.parse({ page: "2", sort: "sideways" })).toEqual({ page: 2, sort: "newest" });
    expect(messagesListQuerySchema.parse({ page: "0" })).toEqual({ page: 1, sort: "newest" });
  });
});
