#!/usr/bin/env npx tsx
/**
 * Create the StockDetails / ProfitStatistics tables if missing.
 *
 * Usage:
 *   npx tsx scripts/init-db.ts
 */

import "dotenv/config";
import { createAppContext } from "../src/lib/context.js";
import { errorMessage } from "../src/lib/errors.js";
import { readSchema } from "../src/lib/schema.js";

async function main(): Promise<void> {
  const ctx = createAppContext();
  try {
    const { path, sql } = readSchema(import.meta.url);
    await ctx.db.withTransaction(async (tx) => {
      await tx.query(sql);
    });
    ctx.logger.info("✅ Schema applied", { file: path });
  } finally {
    await ctx.db.close();
  }
}

main().catch((error) => {
  console.error("❌ Failed to apply schema:", errorMessage(error));
  process.exit(1);
});
