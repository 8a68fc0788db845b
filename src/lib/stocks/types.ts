/**
 * Type definitions for price bars and the persisted statistics tables
 */

/**
 * One minute of trading for a ticker, as returned by the fetcher
 */
export interface PriceBar {
  ticker: string;
  /** Exchange-local calendar date, "YYYY-MM-DD" */
  date: string;
  /** Exchange-local time of day, "HH:MM:SS" */
  time: string;
  open: number;
  close: number;
  volume: number;
}

export type ProfitLoss = "profit" | "loss";

/**
 * Row of the "StockDetails" table
 */
export interface StockDetailRecord {
  ticker: string;
  date: string;
  openPrice: number;
  closePrice: number;
  volume: number;
  /** Rounded to 2 decimal places */
  percentageChange: number;
  profitLoss: ProfitLoss;
}

/**
 * Row of the "ProfitStatistics" table (one per ticker)
 */
export interface ProfitStatistic {
  ticker: string;
  totalDays: number;
  profitDays: number;
  lossDays: number;
  /** profitDays / totalDays * 100 */
  profitProbability: number;
  /** "YYYY-MM-DD" */
  lastCalculated: string;
}

/**
 * Outcome of a fetch. A missing or failed fetch is a value, not an exception.
 */
export type FetchResult =
  | { kind: "data"; ticker: string; bars: PriceBar[] }
  | { kind: "none"; ticker: string; reason: string };
