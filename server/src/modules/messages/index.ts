export { messagesRoutes } from "./routes.js";
export * from "./repo.js";
