import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["server/tests/**/*.spec.ts"],
    environment: "node",
    env: {
      DB_FILENAME: ":memory:",
      JWT_SECRET: "test-secret",
      LOGGER: "false",
      RATE_LIMIT_MAX: "10000",
      SMTP_HOST: "",
    },
  },
});
