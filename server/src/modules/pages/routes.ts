import type { FastifyInstance } from "fastify";

export async function pageRoutes(app: FastifyInstance) {
  app.get("/about", async (_request, reply) => {
    return reply.render("about", { title: "About Me" });
  });

  app.get("/how-it-works", async (_request, reply) => {
    return reply.render("how-it-works", { title: "How It Works" });
  });
}
