/**
 * Stock Details Library
 *
 * Price bar types, per-bar metrics and the SQL behind the StockDetails and
 * ProfitStatistics tables.
 */

// Types
export type {
  PriceBar,
  ProfitLoss,
  StockDetailRecord,
  ProfitStatistic,
  FetchResult,
} from "./types.js";

// Per-bar metrics
export {
  roundTo2,
  calculatePercentageChange,
  classifyProfitLoss,
  toStockDetailRecord,
} from "./price.js";

// SQL
export {
  STOCK_DETAIL_COLUMNS,
  buildPlaceholder,
  buildStockDetailValues,
  INSERT_STOCK_DETAIL_SQL,
  UPSERT_PROFIT_STATISTICS_SQL,
  SELECT_TICKERS_SQL,
  SELECT_PROFIT_STATISTICS_SQL,
  SELECT_PROFIT_STATISTIC_SQL,
} from "./db-writer.js";

// Repository
export type { StockRepository } from "./repository.js";
export { createPostgresStockRepository } from "./repository.js";
