export { postRoutes } from "./routes.js";
