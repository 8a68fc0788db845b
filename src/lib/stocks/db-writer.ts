/**
 * SQL for the "StockDetails" and "ProfitStatistics" tables.
 *
 * Every value goes through a $n placeholder; nothing is interpolated.
 */

import type { StockDetailRecord } from "./types.js";

/** Number of columns in the StockDetails INSERT statement */
export const STOCK_DETAIL_COLUMNS = 7;

/**
 * Build placeholder string for parameterized query
 * @param offset - Starting parameter number (0-based)
 * @param count - Number of columns
 */
export function buildPlaceholder(offset: number, count: number): string {
  const parts: string[] = [];
  for (let i = 1; i <= count; i++) {
    parts.push(`$${offset + i}`);
  }
  return `(${parts.join(", ")})`;
}

export const INSERT_STOCK_DETAIL_SQL = `
  INSERT INTO "StockDetails" (
    ticker, date, open_price, close_price, volume, percentage_change, profit_loss
  )
  VALUES ${buildPlaceholder(0, STOCK_DETAIL_COLUMNS)}
`;

/**
 * Values for one StockDetails row, in column order
 */
export function buildStockDetailValues(record: StockDetailRecord): (string | number)[] {
  return [
    record.ticker,
    record.date,
    record.openPrice,
    record.closePrice,
    record.volume,
    record.percentageChange,
    record.profitLoss,
  ];
}

/**
 * Recompute every ticker's statistics from the full StockDetails history
 * and upsert them keyed by ticker.
 */
export const UPSERT_PROFIT_STATISTICS_SQL = `
  INSERT INTO "ProfitStatistics" (
    ticker, total_days, profit_days, loss_days, profit_probability, last_calculated
  )
  SELECT
    ticker,
    COUNT(*) AS total_days,
    SUM(CASE WHEN profit_loss = 'profit' THEN 1 ELSE 0 END) AS profit_days,
    SUM(CASE WHEN profit_loss = 'loss' THEN 1 ELSE 0 END) AS loss_days,
    ROUND(
      SUM(CASE WHEN profit_loss = 'profit' THEN 1 ELSE 0 END)::numeric / COUNT(*) * 100,
      2
    ) AS profit_probability,
    CURRENT_DATE AS last_calculated
  FROM "StockDetails"
  GROUP BY ticker
  ON CONFLICT (ticker) DO UPDATE SET
    total_days = EXCLUDED.total_days,
    profit_days = EXCLUDED.profit_days,
    loss_days = EXCLUDED.loss_days,
    profit_probability = EXCLUDED.profit_probability,
    last_calculated = EXCLUDED.last_calculated
`;

export const SELECT_TICKERS_SQL = `
  SELECT DISTINCT ticker FROM "StockDetails" ORDER BY ticker
`;

const PROFIT_STATISTIC_COLUMNS = `
  ticker, total_days, profit_days, loss_days, profit_probability,
  to_char(last_calculated, 'YYYY-MM-DD') AS last_calculated
`;

export const SELECT_PROFIT_STATISTICS_SQL = `
  SELECT ${PROFIT_STATISTIC_COLUMNS}
  FROM "ProfitStatistics"
  ORDER BY profit_probability DESC, ticker ASC
`;

export const SELECT_PROFIT_STATISTIC_SQL = `
  SELECT ${PROFIT_STATISTIC_COLUMNS}
  FROM "ProfitStatistics"
  WHERE ticker = $1
`;
