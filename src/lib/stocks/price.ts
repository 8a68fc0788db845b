/**
 * Price Metrics: percentage_change, profit_loss
 */

import type { PriceBar, ProfitLoss, StockDetailRecord } from "./types.js";

/**
 * Round to 2 decimal places on the exact binary value, ties to even.
 *
 * A double sits exactly halfway between two cents only when it is an odd
 * multiple of 1/8 (0.125, 0.375, ...). Everything else rounds to the nearest
 * cent through `toFixed`, which works on the exact value.
 */
export function roundTo2(value: number): number {
  const eighths = value * 8;
  if (Number.isInteger(eighths) && Math.abs(eighths) % 2 === 1) {
    const lower = Math.floor(value * 100);
    return (lower % 2 === 0 ? lower : lower + 1) / 100;
  }
  return Number(value.toFixed(2));
}

/**
 * Price change as a percentage of the open, rounded to 2 places
 *
 * Percentage Change = ((close - open) / open) * 100
 *
 * @returns Rounded percentage, or 0 if open is 0
 */
export function calculatePercentageChange(open: number, close: number): number {
  if (open === 0) return 0;
  return roundTo2(((close - open) / open) * 100);
}

/**
 * A bar is a profit only when it closes strictly above its open.
 * An unchanged bar counts as a loss.
 */
export function classifyProfitLoss(open: number, close: number): ProfitLoss {
  return close > open ? "profit" : "loss";
}

export function toStockDetailRecord(bar: PriceBar): StockDetailRecord {
  return {
    ticker: bar.ticker,
    date: bar.date,
    openPrice: bar.open,
    closePrice: bar.close,
    volume: bar.volume,
    percentageChange: calculatePercentageChange(bar.open, bar.close),
    profitLoss: classifyProfitLoss(bar.open, bar.close),
  };
}
