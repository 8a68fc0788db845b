#!/usr/bin/env npx tsx
/**
 * Stock Analyzer CLI
 *
 * Usage:
 *   npx tsx scripts/analyze-stocks.ts
 *
 * Prompts for tickers (comma-separated, or "all" for every ticker already in
 * StockDetails), stores today's minute bars and prints profit statistics.
 */

import "dotenv/config";
import { createInterface } from "readline/promises";
import { runAnalyzeCli } from "../src/cli/analyze.js";
import { createAppContext } from "../src/lib/context.js";
import { errorMessage } from "../src/lib/errors.js";

async function main(): Promise<number> {
  const ctx = createAppContext();
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  try {
    return await runAnalyzeCli({
      db: ctx.db,
      repository: ctx.repository,
      analyzer: ctx.createAnalyzer(),
      logger: ctx.logger,
      prompt: (question) => rl.question(question),
      write: (line) => console.log(line),
    });
  } catch (error) {
    ctx.logger.error(`Fatal: ${errorMessage(error)}`);
    return 1;
  } finally {
    rl.close();
    await ctx.db.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error("❌ Fatal error:", errorMessage(error));
    process.exit(1);
  });
