import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { PGlite } from "@electric-sql/pglite";
import type { QueryResultRow } from "pg";
import { DatabaseManager, type DbClient } from "../../db.js";
import { readSchema } from "../../schema.js";
import { createTestLogger, noSleep } from "../../__tests__/helpers.js";
import { createPostgresStockRepository, type StockRepository } from "../repository.js";
import type { PriceBar } from "../types.js";

/** DbClient over an in-process Postgres */
class PGliteClient implements DbClient {
  constructor(private readonly pg: PGlite) {}

  async connect(): Promise<void> {}

  async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: R[]; rowCount: number | null }> {
    const result = await this.pg.query<R>(text, values);
    return { rows: result.rows, rowCount: result.affectedRows ?? result.rows.length };
  }

  async end(): Promise<void> {}

  onLost(): void {}
}

const bar = (ticker: string, time: string, open: number, close: number): PriceBar => ({
  ticker,
  date: "2025-03-14",
  time,
  open,
  close,
  volume: 1000,
});

let pg: PGlite;
let db: DatabaseManager;
let repo: StockRepository;

async function today(): Promise<string> {
  const result = await pg.query<{ today: string }>("SELECT to_char(CURRENT_DATE, 'YYYY-MM-DD') AS today");
  return result.rows[0].today;
}

beforeEach(async () => {
  pg = new PGlite();
  await pg.exec(readSchema(import.meta.url).sql);

  const { logger } = createTestLogger();
  db = new DatabaseManager({
    config: { host: "localhost", port: 5432, user: "root", password: "test-secret", database: "StockAnalytics" },
    retry: { maxRetries: 1, retryDelayMs: 0 },
    logger,
    createClient: () => new PGliteClient(pg),
    sleep: noSleep,
  });
  repo = createPostgresStockRepository(db, logger);

  await repo.saveStockDetails([
    bar("AAPL", "09:30:00", 100, 101),
    bar("AAPL", "09:31:00", 101, 100.5),
    bar("AAPL", "09:32:00", 100.5, 100.5),
  ]);
  await repo.saveStockDetails([
    bar("MSFT", "09:30:00", 400, 401),
    bar("MSFT", "09:31:00", 401, 402),
    bar("MSFT", "09:32:00", 402, 399),
  ]);
}, 30_000);

afterEach(async () => {
  await db.close();
  await pg.close();
});

describe("profit statistics aggregate", () => {
  it("counts profit and loss bars per ticker, a flat bar as a loss", async () => {
    expect(await repo.updateProfitStatistics()).toBe(2);

    const date = await today();
    expect(await repo.getProfitStatistics()).toEqual([
      { ticker: "MSFT", totalDays: 3, profitDays: 2, lossDays: 1, profitProbability: 66.67, lastCalculated: date },
      { ticker: "AAPL", totalDays: 3, profitDays: 1, lossDays: 2, profitProbability: 33.33, lastCalculated: date },
    ]);
  });

  it("keeps total = profit + loss and probability = profit / total * 100", async () => {
    await repo.updateProfitStatistics();

    for (const stat of await repo.getProfitStatistics()) {
      expect(stat.totalDays).toBe(stat.profitDays + stat.lossDays);
      expect(stat.profitProbability).toBeCloseTo((stat.profitDays / stat.totalDays) * 100, 2);
    }
  });

  it("leaves the statistics unchanged when recomputed without new bars", async () => {
    await repo.updateProfitStatistics();
    const first = await repo.getProfitStatistics();

    await repo.updateProfitStatistics();

    expect(await repo.getProfitStatistics()).toEqual(first);
    expect((await pg.query('SELECT ticker FROM "ProfitStatistics"')).rows).toHaveLength(2);
  });

  it("updates an existing ticker in place after new bars arrive", async () => {
    await repo.updateProfitStatistics();
    await repo.saveStockDetails([bar("AAPL", "09:33:00", 100.5, 102)]);

    await repo.updateProfitStatistics();

    expect(await repo.getProfitStatistic("AAPL")).toEqual({
      ticker: "AAPL",
      totalDays: 4,
      profitDays: 2,
      lossDays: 2,
      profitProbability: 50,
      lastCalculated: await today(),
    });
    expect((await pg.query('SELECT ticker FROM "ProfitStatistics"')).rows).toHaveLength(2);
  });
});
