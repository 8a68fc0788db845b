/**
 * Ticker selection from the interactive prompt
 */

export const ALL_KEYWORD = "all";

/**
 * Resolve user input to a ticker list.
 *
 * "all" (any case) selects every known ticker. Otherwise the input is split on
 * commas, trimmed, upper-cased and de-duplicated in first-seen order.
 */
export function parseTickerSelection(input: string, available: string[]): string[] {
  if (input.trim().toLowerCase() === ALL_KEYWORD) {
    return [...available];
  }

  const seen = new Set<string>();
  for (const raw of input.split(",")) {
    const ticker = raw.trim().toUpperCase();
    if (ticker) seen.add(ticker);
  }
  return [...seen];
}
