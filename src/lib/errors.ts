/**
 * Error types raised by the configuration and persistence layers.
 */

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Store unreachable after every connection attempt failed */
export class ConnectionError extends Error {
  constructor(
    readonly attempts: number,
    readonly cause?: unknown
  ) {
    super(`Failed to connect to database after ${attempts} attempts`);
    this.name = "ConnectionError";
  }
}

/** A StockDetails batch was rolled back */
export class InsertError extends Error {
  constructor(
    readonly ticker: string,
    readonly cause?: unknown
  ) {
    super(`Error saving stock details for ${ticker}: ${errorMessage(cause)}`);
    this.name = "InsertError";
  }
}

/** The ProfitStatistics upsert was rolled back */
export class AggregationError extends Error {
  constructor(readonly cause?: unknown) {
    super(`Error updating profit statistics: ${errorMessage(cause)}`);
    this.name = "AggregationError";
  }
}
