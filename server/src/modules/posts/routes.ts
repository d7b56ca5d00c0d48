import type { FastifyInstance, FastifyReply } from "fastify";
import { idParamSchema, postBodySchema } from "@khaled-blog/shared";
import { requireAdmin } from "../../plugins/auth.js";
import { isUniqueViolation } from "../../db/errors.js";
import { sanitizePostBody } from "../../services/sanitize.js";
import { formatPostDate } from "../../utils/dates.js";
import { pickFormValues } from "../../utils/forms.js";
import { listForPost } from "../comments/repo.js";
import * as posts from "./repo.js";

const POST_FIELDS = [
  "title",
  "subtitle",
  "body",
  "img_url",
  "project_url",
] as const;
const DUPLICATE_TITLE_ERROR = "A post with that title already exists.";
const POST_NOT_FOUND = "That post does not exist.";
const EMPTY_BODY_ERROR = "Blog content is required";

type PostFormValues = Partial<Record<(typeof POST_FIELDS)[number], string>>;

function renderPostForm(
  reply: FastifyReply,
  options: {
    postId?: number;
    values: PostFormValues;
    errors?: Record<string, string[] | undefined>;
  },
): FastifyReply {
  const isEdit = options.postId !== undefined;
  return reply.render("make-post", {
    title: isEdit ? "Edit Post" : "New Post",
    isEdit,
    action: isEdit ? `/edit-post/${options.postId}` : "/new-post",
    values: options.values,
    errors: options.errors ?? {},
  });
}

export async function postRoutes(app: FastifyInstance) {
  app.get("/", async (_request, reply) => {
    return reply.render("index", { title: "Home", posts: posts.listPosts() });
  });

  app.get("/post/:id", async (request, reply) => {
    const params = idParamSchema.safeParse(request.params);
    const post = params.success ? posts.getById(params.data.id) : undefined;
    if (!post) return reply.renderError(404, POST_NOT_FOUND);
    return reply.render("post", {
      title: post.title,
      post,
      comments: listForPost(post.id),
      values: {},
      errors: {},
    });
  });

  app.get(
    "/new-post",
    { preHandler: [requireAdmin] },
    async (_request, reply) => renderPostForm(reply, { values: {} }),
  );

  app.post(
    "/new-post",
    { preHandler: [requireAdmin] },
    async (request, reply) => {
      const values = pickFormValues(request.body, POST_FIELDS);
      const parsed = postBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return renderPostForm(reply.status(400), {
          values,
          errors: parsed.error.flatten().fieldErrors,
        });
      }
      const input = { ...parsed.data, body: sanitizePostBody(parsed.data.body) };
      if (input.body.trim() === "") {
        return renderPostForm(reply.status(400), {
          values,
          errors: { body: [EMPTY_BODY_ERROR] },
        });
      }
      const duplicate = () =>
        renderPostForm(reply.status(409), {
          values,
          errors: { title: [DUPLICATE_TITLE_ERROR] },
        });
      if (posts.isTitleTaken(input.title)) return duplicate();

      const authorId = request.currentUser?.id;
      if (authorId === undefined) return reply.renderError(403, "Admin access required.");
      let id: number;
      try {
        id = posts.createPost(input, authorId, formatPostDate());
      } catch (err) {
        if (isUniqueViolation(err)) return duplicate();
        throw err;
      }
      request.log.info({ postId: id }, "Post created");
      return reply.flash("success", "Post published.").redirect("/");
    },
  );

  app.get(
    "/edit-post/:id",
    { preHandler: [requireAdmin] },
    async (request, reply) => {
      const params = idParamSchema.safeParse(request.params);
      const post = params.success ? posts.getById(params.data.id) : undefined;
      if (!post) return reply.renderError(404, POST_NOT_FOUND);
      return renderPostForm(reply, {
        postId: post.id,
        values: {
          title: post.title,
          subtitle: post.subtitle,
          body: post.body,
          img_url: post.img_url,
          project_url: post.project_url ?? "",
        },
      });
    },
  );

  app.post(
    "/edit-post/:id",
    { preHandler: [requireAdmin] },
    async (request, reply) => {
      const params = idParamSchema.safeParse(request.params);
      const post = params.success ? posts.getById(params.data.id) : undefined;
      if (!post) return reply.renderError(404, POST_NOT_FOUND);

      const values = pickFormValues(request.body, POST_FIELDS);
      const parsed = postBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return renderPostForm(reply.status(400), {
          postId: post.id,
          values,
          errors: parsed.error.flatten().fieldErrors,
        });
      }
      const input = { ...parsed.data, body: sanitizePostBody(parsed.data.body) };
      if (input.body.trim() === "") {
        return renderPostForm(reply.status(400), {
          postId: post.id,
          values,
          errors: { body: [EMPTY_BODY_ERROR] },
        });
      }
      const duplicate = () =>
        renderPostForm(reply.status(409), {
          postId: post.id,
          values,
          errors: { title: [DUPLICATE_TITLE_ERROR] },
        });
      if (posts.isTitleTaken(input.title, post.id)) return duplicate();

      const authorId = request.currentUser?.id;
      if (authorId === undefined) return reply.renderError(403, "Admin access required.");
      try {
        posts.updatePost(post.id, input, authorId);
      } catch (err) {
        if (isUniqueViolation(err)) return duplicate();
        throw err;
      }
      request.log.info({ postId: post.id }, "Post updated");
      return reply.flash("success", "Post updated.").redirect(`/post/${post.id}`);
    },
  );

  app.post(
    "/delete/:id",
    { preHandler: [requireAdmin] },
    async (request, reply) => {
      const params = idParamSchema.safeParse(request.params);
      if (!params.success || !posts.deletePost(params.data.id)) {
        return reply.renderError(404, POST_NOT_FOUND);
      }
      request.log.info({ postId: params.data.id }, "Post deleted");
      return reply.flash("info", "Post deleted.").redirect("/");
    },
  );
}
