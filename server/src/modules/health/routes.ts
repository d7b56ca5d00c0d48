import type { FastifyInstance } from "fastify";
import { existsSync, readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Root package.json: from server/src/modules/health up to the repo root. */
const ROOT_PACKAGE_JSON = join(__dirname, "..", "..", "..", "..", "package.json");

/** `version` of a package.json, or null when the file is missing, unreadable or has none. */
export function readPackageVersion(pkgPath: string): string | null {
  if (!existsSync(pkgPath)) return null;
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    if (typeof pkg !== "object" || pkg === null) return null;
    const version: unknown = Reflect.get(pkg, "version");
    return typeof version === "string" ? version : null;
  } catch {
    return null;
  }
}

export interface HealthRoutesOptions {
  /** package.json whose version `GET /version` reports. Defaults to the repo root's. */
  packageJsonPath?: string;
}

export async function healthRoutes(
  app: FastifyInstance,
  opts: HealthRoutesOptions = {},
) {
  const packageJsonPath = opts.packageJsonPath ?? ROOT_PACKAGE_JSON;

  app.get("/health", async (_request, reply) => {
    return reply.send({ ok: true, timestamp: new Date().toISOString() });
  });

  app.get("/version", async (_request, reply) => {
    return reply.send({ version: readPackageVersion(packageJsonPath) ?? "unknown" });
  });
}
