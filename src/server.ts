import { buildApp } from "./app";
import { loadServerConfig, loadSyncConfig } from "./config/sync.config";
import { DrizzlePosStore } from "./db/drizzle-store";
import { checkDatabaseHealth, createDatabase } from "./utils/db";

const start = async () => {
  const serverConfig = loadServerConfig();
  const syncConfig = loadSyncConfig();
  const { pool, db } = createDatabase(serverConfig.databaseUrl, serverConfig);

  const app = buildApp({
    store: new DrizzlePosStore(db),
    config: syncConfig,
    nodeEnv: serverConfig.nodeEnv,
    bodyLimit: serverConfig.bodyLimitBytes,
    corsOrigin: serverConfig.corsOrigin,
    checkDatabase: () => checkDatabaseHealth(pool),
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    app.log.info(`Received ${signal}, shutting down gracefully...`);
    try {
      await app.close();
      app.log.info("Server closed successfully");

      app.log.info("Closing database pool...");
      await pool.end();

      app.log.info("All connections closed successfully");
      process.exit(0);
    } catch (err) {
      app.log.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  try {
    const database = await checkDatabaseHealth(pool);
    if (!database.healthy) {
      app.log.warn(
        { error: database.error },
        "Database unreachable - server will start but health checks will report degraded",
      );
    }

    await app.listen({ port: serverConfig.port, host: serverConfig.host });
    app.log.info(`Server listening on ${serverConfig.host}:${serverConfig.port}`);
    app.log.info("Health endpoint available at /api/health");
    app.log.info(
      {
        cashAccountLegacyId: syncConfig.cashAccountLegacyId,
        businessTimezone: syncConfig.businessTimezone,
        batchMaxItems: syncConfig.batchMaxItems,
      },
      "POS sync configuration loaded",
    );
  } catch (err) {
    app.log.error(err);
    await pool.end();
    process.exit(1);
  }
};

start().catch((err: unknown) => {
  console.error("[Server] Failed to start:", err);
  process.exit(1);
});
