import { Client, type QueryResultRow } from "pg";
import type { DatabaseConfig, RetryPolicy } from "./config.js";
import { ConnectionError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

/**
 * The slice of `pg.Client` the manager relies on
 */
export interface DbClient {
  connect(): Promise<void>;
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: R[]; rowCount: number | null }>;
  end(): Promise<void>;
  /** Called once the connection errors out or is closed by the server */
  onLost(listener: (err?: Error) => void): void;
}

/**
 * Query capability handed out by `acquire()` and `withTransaction()`
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: R[]; rowCount: number | null }>;
}

export type ClientFactory = (config: DatabaseConfig) => DbClient;

export const createPgClient: ClientFactory = (config) => {
  const client = new Client({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    connectionTimeoutMillis: 10000,
  });

  return {
    connect: () => client.connect(),
    query: <R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) =>
      client.query<R>(text, values),
    end: () => client.end(),
    onLost: (listener) => {
      client.on("error", (err) => listener(err));
      client.on("end", () => listener());
    },
  };
};

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export interface DatabaseManagerOptions {
  config: DatabaseConfig;
  retry: RetryPolicy;
  logger: Logger;
  createClient?: ClientFactory;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Owns a single long-lived connection.
 *
 * The connection is opened lazily and re-opened when it has gone stale
 * (emitted `error` or `end`). Every query path goes through `acquire()`.
 */
export class DatabaseManager {
  private client: DbClient | null = null;
  private healthy = false;
  private connecting: Promise<void> | null = null;

  private readonly config: DatabaseConfig;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;
  private readonly createClient: ClientFactory;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: DatabaseManagerOptions) {
    this.config = options.config;
    this.retry = options.retry;
    this.logger = options.logger;
    this.createClient = options.createClient ?? createPgClient;
    this.sleep = options.sleep ?? sleep;
  }

  get isConnected(): boolean {
    return this.client !== null && this.healthy;
  }

  /**
   * Open a connection, retrying with a fixed delay.
   * Throws ConnectionError once every attempt has failed.
   *
   * Concurrent callers share the attempt already in flight.
   */
  connect(): Promise<void> {
    if (!this.connecting) {
      this.connecting = this.connectWithRetry().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async connectWithRetry(): Promise<void> {
    const { maxRetries, retryDelayMs } = this.retry;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      const client = this.createClient(this.config);
      try {
        await client.connect();
        await this.adopt(client);
        this.logger.info("Successfully connected to database", {
          host: this.config.host,
          database: this.config.database,
          attempt,
        });
        return;
      } catch (error) {
        lastError = error;
        this.logger.error(`Attempt ${attempt} failed: ${errorMessage(error)}`, {
          attempt,
          maxRetries,
        });
        if (attempt < maxRetries) {
          await this.sleep(retryDelayMs);
        }
      }
    }

    throw new ConnectionError(maxRetries, lastError);
  }

  /**
   * Health-checked handle on the connection; reconnects if stale.
   */
  async acquire(): Promise<Queryable> {
    if (!this.isConnected) {
      if (this.client && !this.connecting) {
        this.logger.warn("Database connection is stale, reconnecting");
      }
      await this.connect();
    }
    const client = this.client;
    if (!client) {
      throw new ConnectionError(this.retry.maxRetries);
    }
    return client;
  }

  async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: R[]; rowCount: number | null }> {
    const client = await this.acquire();
    return client.query<R>(text, values);
  }

  /**
   * Run `fn` inside BEGIN/COMMIT. Any error rolls back and is rethrown.
   */
  async withTransaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    const client = await this.acquire();
    await client.query("BEGIN");
    try {
      const result = await fn(client);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        this.logger.error("Rollback failed", { error: errorMessage(rollbackError) });
        this.healthy = false;
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.healthy = false;
    if (client) {
      await client.end();
    }
  }

  /** Swap in a freshly connected client and end the one it replaces */
  private async adopt(client: DbClient): Promise<void> {
    client.onLost((err) => {
      if (err) {
        this.logger.error("Database connection error", { error: err.message });
      }
      if (this.client === client) this.healthy = false;
    });
    const previous = this.client;
    this.client = client;
    this.healthy = true;

    if (previous && previous !== client) {
      try {
        await previous.end();
      } catch (error) {
        this.logger.warn("Failed to close previous database connection", { error: errorMessage(error) });
      }
    }
  }
}
