import { db } from "../../db/index.js";

export interface CommentRow {
  id: number;
  text: string;
  created_at: string;
  author_id: number;
  author_name: string;
  author_email: string;
}

export function listForPost(postId: number): CommentRow[] {
  return db
    .prepare<[number], CommentRow>(
      `SELECT c.id, c.text, c.created_at, c.author_id, u.name AS author_name, u.email AS author_email
       FROM comments c INNER JOIN users u ON u.id = c.author_id
       WHERE c.post_id = ?
       ORDER BY c.id ASC`,
    )
    .all(postId);
}

export function getPostId(commentId: number): number | undefined {
  const row = db
    .prepare<[number], { post_id: number }>(
      "SELECT post_id FROM comments WHERE id = ?",
    )
    .get(commentId);
  return row?.post_id;
}

export function createComment(
  postId: number,
  authorId: number,
  text: string,
): number {
  const result = db
    .prepare("INSERT INTO comments (text, author_id, post_id) VALUES (?, ?, ?)")
    .run(text, authorId, postId);
  return Number(result.lastInsertRowid);
}

export function deleteComment(id: number): boolean {
  return db.prepare("DELETE FROM comments WHERE id = ?").run(id).changes > 0;
}
