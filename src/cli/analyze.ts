/**
 * Interactive analysis run: list known tickers, ask which to analyze,
 * run the analysis and print the statistics table.
 */

import type { StockAnalyzer } from "../lib/analyzer.js";
import type { DatabaseManager } from "../lib/db.js";
import type { Logger } from "../lib/logger.js";
import { displayStockStats } from "../lib/report.js";
import type { StockRepository } from "../lib/stocks/repository.js";
import { parseTickerSelection } from "../lib/tickers.js";

export const TICKER_PROMPT =
  "\nEnter stock tickers to analyze (comma-separated) or 'all' for all stocks: ";

export interface AnalyzeCliDeps {
  db: Pick<DatabaseManager, "connect">;
  repository: StockRepository;
  analyzer: Pick<StockAnalyzer, "analyzeStocks">;
  logger: Logger;
  prompt: (question: string) => Promise<string>;
  write: (line: string) => void;
}

/**
 * @returns Process exit code
 */
export async function runAnalyzeCli(deps: AnalyzeCliDeps): Promise<number> {
  const { db, repository, analyzer, logger, prompt, write } = deps;

  // ConnectionError propagates: nothing can run without the store
  await db.connect();

  const available = await repository.getAvailableTickers();
  write(`Available stocks: ${available.join(", ")}`);

  const answer = await prompt(TICKER_PROMPT);
  const tickers = parseTickerSelection(answer, available);
  logger.info("Starting analysis", { tickers: tickers.join(",") });

  const result = await analyzer.analyzeStocks(tickers);
  write(result.message);

  if (!result.success) return 1;

  await displayStockStats(repository, logger, write);
  return 0;
}
