import { loadConfig } from "../config.js";
import { closeConnection, getDb } from "../db/connection.js";
import { runMigration } from "../db/migrate.js";
import { serverLogger } from "../logger.js";
import { createSyncServices } from "../services/sync/index.js";
import { buildApp } from "./app.js";

const config = loadConfig();
const db = getDb();

await runMigration(db);

const app = await buildApp(createSyncServices(db, config), {
  serverUrl: `http://localhost:${String(config.server.port)}`,
});

app.addHook("onClose", async () => {
  await closeConnection();
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    serverLogger.info({ signal }, "Shutting down");
    app.close().catch((error: unknown) => {
      serverLogger.error({ error }, "Error during shutdown");
      process.exitCode = 1;
    });
  });
}

try {
  await app.listen({ port: config.server.port, host: config.server.host });
  app.log.info(
    { host: config.server.host, port: config.server.port },
    "Server started"
  );
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}
