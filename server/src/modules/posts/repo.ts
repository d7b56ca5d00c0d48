import { db } from "../../db/index.js";

export interface PostListRow {
  id: number;
  title: string;
  subtitle: string;
  date: string;
  img_url: string;
  author_name: string;
}

export interface PostRow extends PostListRow {
  body: string;
  project_url: string | null;
  author_id: number;
}

export interface PostInput {
  title: string;
  subtitle: string;
  body: string;
  img_url: string;
  project_url: string | null;
}

const POST_LIST_SELECT = `SELECT p.id, p.title, p.subtitle, p.date, p.img_url, u.name AS author_name
  FROM posts p INNER JOIN users u ON u.id = p.author_id`;

export function listPosts(): PostListRow[] {
  return db
    .prepare<[], PostListRow>(`${POST_LIST_SELECT} ORDER BY p.id DESC`)
    .all();
}

export function getById(id: number): PostRow | undefined {
  return db
    .prepare<[number], PostRow>(
      `SELECT p.id, p.title, p.subtitle, p.date, p.body, p.img_url, p.project_url, p.author_id,
         u.name AS author_name
       FROM posts p INNER JOIN users u ON u.id = p.author_id
       WHERE p.id = ?`,
    )
    .get(id);
}

/** True when another post already uses this title (titles are unique). */
export function isTitleTaken(title: string, exceptId?: number): boolean {
  const row = db
    .prepare<[string, number], { id: number }>(
      "SELECT id FROM posts WHERE title = ? AND id != ?",
    )
    .get(title, exceptId ?? 0);
  return row !== undefined;
}

export function createPost(
  input: PostInput,
  authorId: number,
  date: string,
): number {
  const result = db
    .prepare(
      `INSERT INTO posts (author_id, title, subtitle, date, body, img_url, project_url)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    )
    .run(
      authorId,
      input.title,
      input.subtitle,
      date,
      input.body,
      input.img_url,
      input.project_url,
    );
  return Number(result.lastInsertRowid);
}

/** Replaces the editable fields and hands authorship to the editing admin; the date is kept. */
export function updatePost(id: number, input: PostInput, authorId: number): boolean {
  const result = db
    .prepare(
      `UPDATE posts SET title = ?, subtitle = ?, body = ?, img_url = ?, project_url = ?, author_id = ?,
         updated_at = datetime('now')
       WHERE id = ?`,
    )
    .run(
      input.title,
      input.subtitle,
      input.body,
      input.img_url,
      input.project_url,
      authorId,
      id,
    );
  return result.changes > 0;
}

/** Comments go with the post (ON DELETE CASCADE). */
export function deletePost(id: number): boolean {
  return db.prepare("DELETE FROM posts WHERE id = ?").run(id).changes > 0;
}
