import dotenv from "dotenv";
import type { Server } from "http";
import { loadConfig } from "./config";
import { createServices } from "./services";
import { createApp } from "./app";
import logger from "./utils/logger";

// Load environment variables
dotenv.config();

async function startServer(): Promise<void> {
  const config = loadConfig();

  logger.info("Initializing services...");
  const services = await createServices(config);

  // Leftover staging files and expired shares from a previous run
  await services.storage.purgeStaging();
  await services.cleanup.sweep();
  services.cleanup.start(config.sweepSchedule);
  services.progress.startEviction();

  const app = createApp(config, services);
  const server: Server = app.listen(config.port, "0.0.0.0", () => {
    logger.info(`Server listening on port ${config.port}`);
    logger.info("Server ready to accept requests");
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down gracefully...`);

    services.cleanup.stop();
    services.progress.stopEviction();
    server.close();
    try {
      await services.registry.close();
    } catch (error) {
      logger.error("Error closing database", error);
    }
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

startServer().catch((error: unknown) => {
  logger.error("Failed to start server:", error);
  process.exit(1);
});
