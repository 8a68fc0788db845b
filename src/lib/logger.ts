/**
 * Logger
 *
 * Explicitly constructed logger: each process builds one instance at startup
 * and hands it to the components that need it. Records go to every sink.
 *
 * Priority: ERROR > WARN > INFO > DEBUG
 * Only records at or above the configured level are written.
 */

import { appendFileSync } from "fs";

export enum LogLevel {
  ERROR = "ERROR",
  WARN = "WARN",
  INFO = "INFO",
  DEBUG = "DEBUG",
}

export type LogFields = Record<string, unknown>;

export interface LogRecord {
  tsMs: number;
  level: LogLevel;
  message: string;
  fields?: Record<string, string>;
}

export interface LogSink {
  write(record: LogRecord): void;
}

export interface Logger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  readonly level: LogLevel;
}

// Lower number = higher priority
const LOG_LEVEL_PRIORITY = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3,
} as const;

function stringifyField(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  return JSON.stringify(value) ?? String(value);
}

function toFields(fields: LogFields | undefined): Record<string, string> | undefined {
  if (!fields) return undefined;
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(fields)) {
    out[k] = stringifyField(v);
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

/**
 * Render a record as a single plain line:
 * `2025-01-02T15:04:05.000Z - INFO - message key=value`
 */
export function formatRecord(record: LogRecord): string {
  const timestamp = new Date(record.tsMs).toISOString();
  const fields = record.fields
    ? " " +
      Object.entries(record.fields)
        .map(([k, v]) => `${k}=${v}`)
        .join(" ")
    : "";
  return `${timestamp} - ${record.level} - ${record.message}${fields}`;
}

const colorize = (text: string, level: LogLevel): string => {
  const colors = {
    [LogLevel.ERROR]: "\x1b[31m", // Red
    [LogLevel.WARN]: "\x1b[33m", // Yellow
    [LogLevel.INFO]: "\x1b[36m", // Cyan
    [LogLevel.DEBUG]: "\x1b[32m", // Green
  };
  return `${colors[level]}${text}\x1b[0m`;
};

/**
 * Writes to stdout/stderr with a colored `[timestamp] [LEVEL]` header.
 */
export class ConsoleSink implements LogSink {
  constructor(private readonly useColor: boolean = process.stdout.isTTY === true) {}

  write(record: LogRecord): void {
    const header = `[${new Date(record.tsMs).toISOString()}] [${record.level}]`;
    const fields = record.fields ? ` ${JSON.stringify(record.fields)}` : "";
    const line = `${this.useColor ? colorize(header, record.level) : header} ${record.message}${fields}`;

    if (record.level === LogLevel.ERROR) {
      console.error(line);
    } else if (record.level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Appends one plain line per record to a file.
 */
export class FileSink implements LogSink {
  constructor(readonly path: string) {}

  write(record: LogRecord): void {
    appendFileSync(this.path, formatRecord(record) + "\n", "utf8");
  }
}

export interface LoggerOptions {
  level?: LogLevel;
  sinks: LogSink[];
}

export function createLogger({ level = LogLevel.INFO, sinks }: LoggerOptions): Logger {
  const emit = (recordLevel: LogLevel, message: string, fields?: LogFields): void => {
    if (LOG_LEVEL_PRIORITY[recordLevel] > LOG_LEVEL_PRIORITY[level]) return;

    const record: LogRecord = {
      tsMs: Date.now(),
      level: recordLevel,
      message,
      fields: toFields(fields),
    };
    for (const sink of sinks) {
      sink.write(record);
    }
  };

  return {
    level,
    error: (message, fields) => emit(LogLevel.ERROR, message, fields),
    warn: (message, fields) => emit(LogLevel.WARN, message, fields),
    info: (message, fields) => emit(LogLevel.INFO, message, fields),
    debug: (message, fields) => emit(LogLevel.DEBUG, message, fields),
  };
}

/** Console + file, the default pair for the CLI and the API server */
export function createAppLogger(options: { level: LogLevel; file: string }): Logger {
  return createLogger({
    level: options.level,
    sinks: [new ConsoleSink(), new FileSink(options.file)],
  });
}
