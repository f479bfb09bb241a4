import type { Server } from "node:http";

import { loadConfig } from "./lib/config";
import { createLogger } from "./lib/logger";
import { openDatabase } from "./server/db";
import { createApp } from "./server/http";
import { PokeApiClient } from "./server/pokeApi";
import { createServices } from "./server/services";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);
  const db = openDatabase(config.databasePath);
  const upstream = PokeApiClient.fromConfig(config, logger);
  const services = createServices({ db, upstream, config, logger });

  let server: Server | null = null;
  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutting down");
    upstream.close();
    const finish = () => {
      db.close();
      process.exit(0);
    };
    if (server) server.close(finish);
    else finish();
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  // The catalog must exist before the first request is served
  await services.catalog.initCatalog();

  const app = createApp({ services, db, logger });
  server = app.listen(config.port, () => {
    logger.info({ port: config.port, env: config.environment }, `${config.appName} listening`);
  });
}

main().catch((err: unknown) => {
  // The logger may not exist yet if configuration failed
  console.error("Fatal startup error:", err);
  process.exit(1);
});
