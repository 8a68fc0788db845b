import "dotenv/config";
import { createApp } from "./app.js";
import { createAppContext } from "./lib/context.js";
import { errorMessage } from "./lib/errors.js";

const ctx = createAppContext();
const { logger, config } = ctx;
const app = createApp(ctx.repository, logger);

/**
 * Start Server
 */
const server = app.listen(config.port, () => {
  logger.info(`🚀 Stock Analytics API running on port ${config.port}`);
  logger.info(`   Health: http://localhost:${config.port}/health`);
  logger.info(`   Stats: http://localhost:${config.port}/stats`);
});

// Graceful shutdown
const shutdown = (signal: string): void => {
  logger.info(`${signal} received, shutting down gracefully...`);
  server.close();
  ctx.db
    .close()
    .then(() => process.exit(0))
    .catch((error) => {
      logger.error(`Error closing database connection: ${errorMessage(error)}`);
      process.exit(1);
    });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
