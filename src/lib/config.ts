/**
 * Environment configuration
 *
 * `dotenv/config` is imported by each entry point before this module is used,
 * so `.env` values are already merged into `process.env` here.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LogLevel } from "./logger.js";

/** Database name is not configurable */
export const DATABASE_NAME = "StockAnalytics";

const envSchema = z.object({
  DB_HOST: z.string().min(1).default("localhost"),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USER: z.string().min(1).default("root"),
  // Placeholder only; set DB_PASS in .env
  DB_PASS: z.string().default("changeme"),

  DB_CONNECT_RETRIES: z.coerce.number().int().min(1).default(3),
  DB_CONNECT_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(5000),

  LOG_LEVEL: z
    .string()
    .transform((s) => s.toUpperCase())
    .pipe(z.nativeEnum(LogLevel))
    .default("INFO"),
  LOG_FILE: z.string().min(1).default("stock_analyzer.log"),

  PORT: z.coerce.number().int().positive().default(8080),
});

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

export interface RetryPolicy {
  maxRetries: number;
  retryDelayMs: number;
}

export interface AppConfig {
  database: DatabaseConfig;
  retry: RetryPolicy;
  log: {
    level: LogLevel;
    file: string;
  };
  port: number;
}

/**
 * Parse configuration from an environment map.
 * Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") cleaned[key] = value;
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  return {
    database: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      user: e.DB_USER,
      password: e.DB_PASS,
      database: DATABASE_NAME,
    },
    retry: {
      maxRetries: e.DB_CONNECT_RETRIES,
      retryDelayMs: e.DB_CONNECT_RETRY_DELAY_MS,
    },
    log: {
      level: e.LOG_LEVEL,
      file: e.LOG_FILE,
    },
    port: e.PORT,
  };
}
