/**
 * Market Data Fetcher
 *
 * Pulls 1-minute bars from Yahoo Finance and keeps the most recent trading
 * day. Provider failures come back as a `none` result.
 */

import yahooFinance from "yahoo-finance2";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { FetchResult, PriceBar } from "./stocks/index.js";

/** Calendar days requested so weekends and holidays still reach a session */
export const LOOKBACK_DAYS = 5;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ChartQuote {
  date: Date;
  open: number | null;
  close: number | null;
  volume: number | null;
}

export interface ChartData {
  /** IANA zone of the exchange, e.g. "America/New_York" */
  timezone: string | null;
  quotes: ChartQuote[];
}

/**
 * Source of raw minute bars
 */
export interface ChartSource {
  fetchMinuteBars(ticker: string, since: Date): Promise<ChartData>;
}

export function createYahooChartSource(): ChartSource {
  return {
    async fetchMinuteBars(ticker: string, since: Date): Promise<ChartData> {
      const result = await yahooFinance.chart(ticker, {
        period1: since,
        interval: "1m",
        return: "array",
      });
      return {
        timezone: result.meta.exchangeTimezoneName ?? null,
        quotes: result.quotes.map((q) => ({
          date: q.date,
          open: q.open ?? null,
          close: q.close ?? null,
          volume: q.volume ?? null,
        })),
      };
    },
  };
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-CA", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    getFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Split an instant into exchange-local "YYYY-MM-DD" and "HH:MM:SS"
 */
export function splitTimestamp(instant: Date, timeZone: string = "UTC"): { date: string; time: string } {
  const parts: Record<string, string> = {};
  for (const part of getFormatter(timeZone).formatToParts(instant)) {
    parts[part.type] = part.value;
  }
  return {
    date: `${parts.year}-${parts.month}-${parts.day}`,
    time: `${parts.hour}:${parts.minute}:${parts.second}`,
  };
}

/**
 * Turn raw quotes into bars of the latest session only.
 * Quotes without an open or close are dropped.
 */
export function normalizeBars(ticker: string, data: ChartData): PriceBar[] {
  const timeZone = data.timezone && isValidTimeZone(data.timezone) ? data.timezone : "UTC";

  const bars: PriceBar[] = [];
  const sorted = [...data.quotes].sort((a, b) => a.date.getTime() - b.date.getTime());
  for (const quote of sorted) {
    if (quote.open === null || quote.close === null) continue;
    const { date, time } = splitTimestamp(quote.date, timeZone);
    bars.push({
      ticker,
      date,
      time,
      open: quote.open,
      close: quote.close,
      volume: quote.volume ?? 0,
    });
  }

  if (bars.length === 0) return bars;
  const latestDate = bars[bars.length - 1].date;
  return bars.filter((bar) => bar.date === latestDate);
}

export class MarketDataFetcher {
  constructor(
    private readonly source: ChartSource,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async getStockData(ticker: string): Promise<FetchResult> {
    const since = new Date(this.now().getTime() - LOOKBACK_DAYS * DAY_MS);

    let data: ChartData;
    try {
      data = await this.source.fetchMinuteBars(ticker, since);
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.error(`Error fetching data for ${ticker}: ${reason}`, { ticker });
      return { kind: "none", ticker, reason };
    }

    const bars = normalizeBars(ticker, data);
    if (bars.length === 0) {
      this.logger.warn(`No data returned for ${ticker}`, { ticker });
      return { kind: "none", ticker, reason: "No data returned" };
    }

    this.logger.debug(`Fetched ${bars.length} bars for ${ticker}`, { ticker, date: bars[0].date });
    return { kind: "data", ticker, bars };
  }
}
