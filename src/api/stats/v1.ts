import type { Request, Response } from "express";
import { errorMessage } from "../../lib/errors.js";
import type { Logger } from "../../lib/logger.js";
import type { StockRepository } from "../../lib/stocks/repository.js";

/**
 * Profit Statistics
 * All tickers, best profit probability first
 */
export function createStatsHandler(repository: StockRepository, logger: Logger) {
  return async function statsHandler(_req: Request, res: Response): Promise<void> {
    try {
      const data = await repository.getProfitStatistics();
      res.json({ count: data.length, data });
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Error fetching statistics: ${message}`);
      res.status(500).json({
        error: "Failed to fetch statistics",
        message,
      });
    }
  };
}

/**
 * Profit Statistics - Single Ticker
 */
export function createTickerStatsHandler(repository: StockRepository, logger: Logger) {
  return async function tickerStatsHandler(req: Request, res: Response): Promise<void> {
    try {
      const ticker = req.params.ticker?.trim().toUpperCase();

      if (!ticker) {
        res.status(400).json({ error: "Missing required param: ticker" });
        return;
      }

      const stat = await repository.getProfitStatistic(ticker);

      if (!stat) {
        res.status(404).json({ error: "No statistics available for ticker" });
        return;
      }

      res.json(stat);
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Error fetching statistics for ticker: ${message}`);
      res.status(500).json({
        error: "Failed to fetch statistics",
        message,
      });
    }
  };
}
