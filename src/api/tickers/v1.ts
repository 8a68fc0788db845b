import type { Request, Response } from "express";
import { errorMessage } from "../../lib/errors.js";
import type { Logger } from "../../lib/logger.js";
import type { StockRepository } from "../../lib/stocks/repository.js";

/**
 * Known Tickers
 * Distinct tickers present in StockDetails
 */
export function createTickersHandler(repository: StockRepository, logger: Logger) {
  return async function tickersHandler(_req: Request, res: Response): Promise<void> {
    try {
      const tickers = await repository.getAvailableTickers();
      res.json({ tickers });
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Error fetching tickers: ${message}`);
      res.status(500).json({
        error: "Failed to fetch tickers",
        message,
      });
    }
  };
}
