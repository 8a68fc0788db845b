import type { DatabaseManager } from "../db.js";
import { AggregationError, InsertError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import {
  INSERT_STOCK_DETAIL_SQL,
  SELECT_PROFIT_STATISTIC_SQL,
  SELECT_PROFIT_STATISTICS_SQL,
  SELECT_TICKERS_SQL,
  UPSERT_PROFIT_STATISTICS_SQL,
  buildStockDetailValues,
} from "./db-writer.js";
import { toStockDetailRecord } from "./price.js";
import type { PriceBar, ProfitStatistic } from "./types.js";

/** pg returns NUMERIC and BIGINT columns as strings */
type ProfitStatisticRow = {
  ticker: string;
  total_days: number | string;
  profit_days: number | string;
  loss_days: number | string;
  profit_probability: number | string;
  last_calculated: string;
};

function toProfitStatistic(row: ProfitStatisticRow): ProfitStatistic {
  return {
    ticker: row.ticker,
    totalDays: Number(row.total_days),
    profitDays: Number(row.profit_days),
    lossDays: Number(row.loss_days),
    profitProbability: Number(row.profit_probability),
    lastCalculated: row.last_calculated,
  };
}

/**
 * Reads and writes the StockDetails / ProfitStatistics tables
 */
export interface StockRepository {
  saveStockDetails(bars: PriceBar[]): Promise<number>;
  updateProfitStatistics(): Promise<number>;
  getAvailableTickers(): Promise<string[]>;
  getProfitStatistics(): Promise<ProfitStatistic[]>;
  getProfitStatistic(ticker: string): Promise<ProfitStatistic | null>;
  ping(): Promise<void>;
}

export function createPostgresStockRepository(db: DatabaseManager, logger: Logger): StockRepository {
  return {
    /**
     * Insert one StockDetails row per bar in a single transaction.
     * Any failure rolls back the whole batch.
     *
     * @returns Number of rows inserted
     */
    async saveStockDetails(bars: PriceBar[]): Promise<number> {
      if (bars.length === 0) return 0;
      const ticker = bars[0].ticker;

      try {
        await db.withTransaction(async (tx) => {
          for (const bar of bars) {
            await tx.query(INSERT_STOCK_DETAIL_SQL, buildStockDetailValues(toStockDetailRecord(bar)));
          }
        });
      } catch (error) {
        logger.error(`Error saving stock details: ${errorMessage(error)}`, {
          ticker,
          rows: bars.length,
        });
        throw new InsertError(ticker, error);
      }

      logger.info(`Successfully saved stock details for ${ticker}`, { rows: bars.length });
      return bars.length;
    },

    /**
     * Recompute ProfitStatistics for every ticker.
     *
     * @returns Number of tickers upserted
     */
    async updateProfitStatistics(): Promise<number> {
      let upserted: number;
      try {
        upserted = await db.withTransaction(async (tx) => {
          const result = await tx.query(UPSERT_PROFIT_STATISTICS_SQL);
          return result.rowCount ?? 0;
        });
      } catch (error) {
        logger.error(`Error updating profit statistics: ${errorMessage(error)}`);
        throw new AggregationError(error);
      }

      logger.info("Successfully updated profit statistics", { tickers: upserted });
      return upserted;
    },

    async getAvailableTickers(): Promise<string[]> {
      const result = await db.query<{ ticker: string }>(SELECT_TICKERS_SQL);
      return result.rows.map((row) => row.ticker);
    },

    async getProfitStatistics(): Promise<ProfitStatistic[]> {
      const result = await db.query<ProfitStatisticRow>(SELECT_PROFIT_STATISTICS_SQL);
      return result.rows.map(toProfitStatistic);
    },

    async getProfitStatistic(ticker: string): Promise<ProfitStatistic | null> {
      const result = await db.query<ProfitStatisticRow>(SELECT_PROFIT_STATISTIC_SQL, [ticker]);
      const row = result.rows[0];
      return row ? toProfitStatistic(row) : null;
    },

    async ping(): Promise<void> {
      await db.query("SELECT 1");
    },
  };
}
