import { describe, it, expect } from "vitest";
import { DATABASE_NAME, loadConfig } from "../config.js";
import { ConfigError } from "../errors.js";
import { LogLevel } from "../logger.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      database: {
        host: "localhost",
        port: 5432,
        user: "root",
        password: "changeme",
        database: "StockAnalytics",
      },
      retry: { maxRetries: 3, retryDelayMs: 5000 },
      log: { level: LogLevel.INFO, file: "stock_analyzer.log" },
      port: 8080,
    });
  });

  it("reads overrides and coerces numbers", () => {
    const config = loadConfig({
      DB_HOST: "db.internal",
      DB_PORT: "6543",
      DB_USER: "analyst",
      DB_PASS: "test-secret",
      DB_CONNECT_RETRIES: "5",
      DB_CONNECT_RETRY_DELAY_MS: "250",
      LOG_LEVEL: "debug",
      PORT: "3000",
    });

    expect(config.database).toEqual({
      host: "db.internal",
      port: 6543,
      user: "analyst",
      password: "test-secret",
      database: DATABASE_NAME,
    });
    expect(config.retry).toEqual({ maxRetries: 5, retryDelayMs: 250 });
    expect(config.log.level).toBe(LogLevel.DEBUG);
    expect(config.port).toBe(3000);
  });

  it("treats empty strings as unset", () => {
    expect(loadConfig({ DB_HOST: "", DB_PORT: "" }).database.host).toBe("localhost");
  });

  it("never takes the database name from the environment", () => {
    expect(loadConfig({ DB_NAME: "other" }).database.database).toBe("StockAnalytics");
  });

  it("rejects invalid values with the offending keys", () => {
    expect(() => loadConfig({ DB_PORT: "not-a-port", LOG_LEVEL: "LOUD" })).toThrow(ConfigError);

    let caught: unknown = null;
    try {
      loadConfig({ DB_PORT: "not-a-port" });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ issues: [expect.stringMatching(/^DB_PORT: /)] });
  });
});
