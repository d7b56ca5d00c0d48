export { commentRoutes } from "./routes.js";
