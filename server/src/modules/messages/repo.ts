import type { ContactBody } from "@khaled-blog/shared";
import { db } from "../../db/index.js";

export interface MessageRow {
  id: number;
  name: string;
  email: string;
  phone: string | null;
  message: string;
  created_at: string;
}

export interface MessagePage {
  messages: MessageRow[];
  pagination: {
    page: number;
    limit: number;
    total: number;
    totalPages: number;
  };
}

export function createMessage(body: ContactBody): number {
  const result = db
    .prepare(
      "INSERT INTO messages (name, email, phone, message) VALUES (?, ?, ?, ?)",
    )
    .run(body.name, body.email, body.phone, body.message);
  return Number(result.lastInsertRowid);
}

export function listMessages(options: {
  page: number;
  limit: number;
  sort: "newest" | "oldest";
}): MessagePage {
  const { page, limit } = options;
  const order = options.sort === "oldest" ? "ASC" : "DESC";
  const offset = (page - 1) * limit;

  const total =
    db
      .prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM messages")
      .get()?.count ?? 0;
  const messages = db
    .prepare<[number, number], MessageRow>(
      `SELECT id, name, email, phone, message, created_at FROM messages
       ORDER BY created_at ${order}, id ${order} LIMIT ? OFFSET ?`,
    )
    .all(limit, offset);

  return {
    messages,
    pagination: {
      page,
      limit,
      total,
      totalPages: Math.ceil(total / limit),
    },
  };
}

export function deleteMessage(id: number): boolean {
  return db.prepare("DELETE FROM messages WHERE id = ?").run(id).changes > 0;
}
