/**
 * Wires config, logger, connection manager and repository for an entry point
 */

import { StockAnalyzer } from "./analyzer.js";
import { loadConfig, type AppConfig } from "./config.js";
import { DatabaseManager } from "./db.js";
import { createAppLogger, type Logger } from "./logger.js";
import { MarketDataFetcher, createYahooChartSource } from "./market-data.js";
import { createPostgresStockRepository, type StockRepository } from "./stocks/index.js";

export interface AppContext {
  config: AppConfig;
  logger: Logger;
  db: DatabaseManager;
  repository: StockRepository;
  createAnalyzer(): StockAnalyzer;
}

export function createAppContext(env: NodeJS.ProcessEnv = process.env): AppContext {
  const config = loadConfig(env);
  const logger = createAppLogger(config.log);
  const db = new DatabaseManager({ config: config.database, retry: config.retry, logger });
  const repository = createPostgresStockRepository(db, logger);

  return {
    config,
    logger,
    db,
    repository,
    createAnalyzer: () =>
      new StockAnalyzer(new MarketDataFetcher(createYahooChartSource(), logger), repository, logger),
  };
}
