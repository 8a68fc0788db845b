/**
 * Test doubles shared by the unit tests
 */

import type { QueryResultRow } from "pg";
import type { DbClient } from "../db.js";
import { createLogger, type LogRecord, type LogSink, type Logger, LogLevel } from "../logger.js";
import type { ProfitStatistic } from "../stocks/index.js";
import type { StockRepository } from "../stocks/repository.js";

export class MemorySink implements LogSink {
  readonly records: LogRecord[] = [];

  write(record: LogRecord): void {
    this.records.push(record);
  }

  messages(level?: LogLevel): string[] {
    return this.records.filter((r) => !level || r.level === level).map((r) => r.message);
  }
}

export function createTestLogger(level: LogLevel = LogLevel.DEBUG): { logger: Logger; sink: MemorySink } {
  const sink = new MemorySink();
  return { logger: createLogger({ level, sinks: [sink] }), sink };
}

export interface RecordedQuery {
  text: string;
  values?: unknown[];
}

export type QueryHandler = (
  text: string,
  values?: unknown[]
) => { rows: QueryResultRow[]; rowCount: number | null } | Error;

const emptyResult = () => ({ rows: [], rowCount: 0 });

/**
 * In-process stand-in for a pg client; records every statement
 */
export class FakeDbClient implements DbClient {
  readonly queries: RecordedQuery[] = [];
  connected = false;
  ended = false;
  private lostListener: ((err?: Error) => void) | null = null;

  constructor(
    private readonly handler: QueryHandler = emptyResult,
    private readonly connectError: Error | null = null
  ) {}

  async connect(): Promise<void> {
    if (this.connectError) throw this.connectError;
    this.connected = true;
  }

  async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: R[]; rowCount: number | null }> {
    this.queries.push({ text: text.trim(), values });
    const result = this.handler(text.trim(), values);
    if (result instanceof Error) throw result;
    // Test double: rows are whatever the handler returns for this statement
    return { rows: result.rows as R[], rowCount: result.rowCount };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  onLost(listener: (err?: Error) => void): void {
    this.lostListener = listener;
  }

  /** Simulate the server dropping the connection */
  drop(err?: Error): void {
    this.lostListener?.(err);
  }

  statements(): string[] {
    return this.queries.map((q) => q.text.split(/\s+/)[0]);
  }
}

export const noSleep = async (_ms: number): Promise<void> => {};

export function makeStat(overrides: Partial<ProfitStatistic> = {}): ProfitStatistic {
  return {
    ticker: "AAPL",
    totalDays: 10,
    profitDays: 6,
    lossDays: 4,
    profitProbability: 60,
    lastCalculated: "2025-03-14",
    ...overrides,
  };
}

/**
 * Repository fake backed by plain arrays
 */
export function createFakeRepository(
  overrides: Partial<StockRepository> = {},
  stats: ProfitStatistic[] = [],
  tickers: string[] = []
): StockRepository {
  return {
    saveStockDetails: async (bars) => bars.length,
    updateProfitStatistics: async () => stats.length,
    getAvailableTickers: async () => [...tickers],
    getProfitStatistics: async () => [...stats],
    getProfitStatistic: async (ticker) => stats.find((s) => s.ticker === ticker) ?? null,
    ping: async () => {},
    ...overrides,
  };
}
