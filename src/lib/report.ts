import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { ProfitStatistic, StockRepository } from "./stocks/index.js";

export const TABLE_WIDTH = 80;

/**
 * Fixed-width statistics table, one string per line
 */
export function formatStatsTable(stats: ProfitStatistic[]): string[] {
  const lines = [
    "",
    "Stock Performance Statistics:",
    "=".repeat(TABLE_WIDTH),
    `${"Ticker".padEnd(10)} ${"Total Days".padEnd(12)} ${"Profit Days".padEnd(12)} ` +
      `${"Loss Days".padEnd(12)} ${"Profit Probability".padEnd(15)}`,
    "-".repeat(TABLE_WIDTH),
  ];

  for (const stat of stats) {
    lines.push(
      `${stat.ticker.padEnd(10)} ${String(stat.totalDays).padEnd(12)} ` +
        `${String(stat.profitDays).padEnd(12)} ${String(stat.lossDays).padEnd(12)} ` +
        `${stat.profitProbability.toFixed(2)}%`
    );
  }

  return lines;
}

/**
 * Print every ticker's statistics, best probability first.
 * Query errors are logged, not thrown.
 */
export async function displayStockStats(
  repository: StockRepository,
  logger: Logger,
  write: (line: string) => void = console.log
): Promise<void> {
  let stats: ProfitStatistic[];
  try {
    stats = await repository.getProfitStatistics();
  } catch (error) {
    logger.error(`Error displaying statistics: ${errorMessage(error)}`);
    return;
  }

  for (const line of formatStatsTable(stats)) {
    write(line);
  }
}
