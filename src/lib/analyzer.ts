/**
 * Analysis Orchestrator
 *
 * Fetch → save per ticker, then one statistics recompute. Each ticker is
 * committed on its own: a failure on ticker N leaves tickers 1..N-1 saved.
 */

import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { FetchResult, StockRepository } from "./stocks/index.js";

export interface StockDataFetcher {
  getStockData(ticker: string): Promise<FetchResult>;
}

export interface AnalysisResult {
  success: boolean;
  message: string;
  /** Tickers whose bars were committed this run */
  saved: string[];
  /** Tickers with no data */
  skipped: string[];
  rowsInserted: number;
}

export const SUCCESS_MESSAGE = "Analysis completed successfully";

export class StockAnalyzer {
  constructor(
    private readonly fetcher: StockDataFetcher,
    private readonly repository: StockRepository,
    private readonly logger: Logger
  ) {}

  async analyzeStocks(tickers: string[]): Promise<AnalysisResult> {
    const saved: string[] = [];
    const skipped: string[] = [];
    let rowsInserted = 0;

    try {
      for (const ticker of tickers) {
        const result = await this.fetcher.getStockData(ticker);
        if (result.kind === "none") {
          this.logger.info(`Skipping ${ticker}: ${result.reason}`, { ticker });
          skipped.push(ticker);
          continue;
        }

        rowsInserted += await this.repository.saveStockDetails(result.bars);
        saved.push(ticker);
      }

      await this.repository.updateProfitStatistics();

      return { success: true, message: SUCCESS_MESSAGE, saved, skipped, rowsInserted };
    } catch (error) {
      const message = `Analysis failed: ${errorMessage(error)}`;
      this.logger.error(message, { saved: saved.length, skipped: skipped.length });
      return { success: false, message, saved, skipped, rowsInserted };
    }
  }
}
