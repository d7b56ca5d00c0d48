import type { FastifyInstance } from "fastify";
import { commentBodySchema, idParamSchema } from "@khaled-blog/shared";
import { requireAdmin, requireLogin } from "../../plugins/auth.js";
import { pickFormValues } from "../../utils/forms.js";
import { getById as getPostById } from "../posts/repo.js";
import * as comments from "./repo.js";

export async function commentRoutes(app: FastifyInstance) {
  app.post(
    "/post/:id/comment",
    { preHandler: [requireLogin("You need to login or register to comment.")] },
    async (request, reply) => {
      const params = idParamSchema.safeParse(request.params);
      const post = params.success ? getPostById(params.data.id) : undefined;
      if (!post) return reply.renderError(404, "That post does not exist.");

      const author = request.currentUser;
      if (!author) return reply.redirect("/login");

      const parsed = commentBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).render("post", {
          title: post.title,
          post,
          comments: comments.listForPost(post.id),
          values: pickFormValues(request.body, ["comment_text"]),
          errors: parsed.error.flatten().fieldErrors,
        });
      }

      const id = comments.createComment(post.id, author.id, parsed.data.comment_text);
      request.log.info({ commentId: id, postId: post.id, userId: author.id }, "Comment added");
      return reply.redirect(`/post/${post.id}#comments`);
    },
  );

  app.post(
    "/comment/:id/delete",
    { preHandler: [requireAdmin] },
    async (request, reply) => {
      const params = idParamSchema.safeParse(request.params);
      const postId = params.success ? comments.getPostId(params.data.id) : undefined;
      if (!params.success || postId === undefined) {
        return reply.renderError(404, "That comment does not exist.");
      }
      comments.deleteComment(params.data.id);
      request.log.info({ commentId: params.data.id, postId }, "Comment deleted");
      return reply.flash("info", "Comment deleted.").redirect(`/post/${postId}#comments`);
    },
  );
}
