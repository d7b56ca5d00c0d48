import { HOST, PORT } from "./config.js";
import { closeDb } from "./db/index.js";
import { buildApp } from "./app.js";

async function main() {
  const app = await buildApp();
  app.addHook("onClose", async () => {
    closeDb();
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "Shutting down");
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error(err);
          process.exit(1);
        },
      );
    });
  }

  await app.listen({ port: PORT, host: HOST });
  console.log(`Server listening on http://${HOST}:${PORT}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
