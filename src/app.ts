import express, { type Express } from "express";
import cors from "cors";
import { createHealthHandler } from "./api/health/v1.js";
import { createStatsHandler, createTickerStatsHandler } from "./api/stats/v1.js";
import { createTickersHandler } from "./api/tickers/v1.js";
import type { Logger } from "./lib/logger.js";
import type { StockRepository } from "./lib/stocks/repository.js";

/**
 * Read-only statistics API
 */
export function createApp(repository: StockRepository, logger: Logger): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/health", createHealthHandler(repository, logger));
  app.get("/tickers", createTickersHandler(repository, logger));
  app.get("/stats", createStatsHandler(repository, logger));
  app.get("/stats/:ticker", createTickerStatsHandler(repository, logger));

  return app;
}
