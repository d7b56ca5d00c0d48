export { healthRoutes, readPackageVersion, type HealthRoutesOptions } from "./routes.js";
