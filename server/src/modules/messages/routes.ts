import type { FastifyInstance } from "fastify";
import { idParamSchema, messagesListQuerySchema } from "@khaled-blog/shared";
import { requireAdmin } from "../../plugins/auth.js";
import { MESSAGES_PAGE_SIZE } from "../../config.js";
import { deleteMessage, listMessages } from "./repo.js";

export async function messagesRoutes(app: FastifyInstance) {
  app.get(
    "/admin/messages",
    { preHandler: [requireAdmin] },
    async (request, reply) => {
      const { page, sort } = messagesListQuerySchema.parse(request.query ?? {});
      const result = listMessages({ page, sort, limit: MESSAGES_PAGE_SIZE });
      const { totalPages } = result.pagination;
      return reply.render("admin-messages", {
        title: "Messages",
        messages: result.messages,
        pagination: result.pagination,
        sort,
        sortOldest: sort === "oldest",
        prevPage: page > 1 ? page - 1 : null,
        nextPage: page < totalPages ? page + 1 : null,
      });
    },
  );

  app.post(
    "/admin/messages/:id/delete",
    { preHandler: [requireAdmin] },
    async (request, reply) => {
      const params = idParamSchema.safeParse(request.params);
      if (!params.success || !deleteMessage(params.data.id)) {
        return reply.renderError(404, "That message does not exist.");
      }
      request.log.info({ messageId: params.data.id }, "Message deleted");
      return reply.flash("info", "Message deleted.").redirect("/admin/messages");
    },
  );
}
