/**
 * Simple structured logger for the stdio MCP server.
 * Provides consistent log format with timestamps, levels, and structured data.
 *
 * Standard output carries the protocol, so a logger never writes there: it is
 * handed an explicit sink (stderr or a log file) when it is created.
 */

import { createWriteStream } from "fs";
import type { Config } from "./config";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Anything log lines can be written to.
 */
export interface LogSink {
  write(chunk: string): unknown;
  /** Resolves once everything written so far has been flushed */
  close?(): Promise<void>;
}

export interface LoggerOptions {
  minLevel: LogLevel;
  enableColors: boolean;
  includeTimestamp: boolean;
  sink: LogSink;
  context?: Record<string, unknown>;
}

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  debug: "\x1b[36m", // cyan
  info: "\x1b[32m", // green
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
  bold: "\x1b[1m",
};

export class Logger {
  private options: LoggerOptions;
  private context: Record<string, unknown>;

  constructor(options: Partial<LoggerOptions> & Pick<LoggerOptions, "sink">) {
    this.options = {
      minLevel: options.minLevel ?? "info",
      enableColors: options.enableColors ?? false,
      includeTimestamp: options.includeTimestamp ?? true,
      sink: options.sink,
      context: options.context,
    };
    this.context = options.context ?? {};
  }

  get minLevel(): LogLevel {
    return this.options.minLevel;
  }

  /**
   * Set the minimum log level
   */
  setMinLevel(level: LogLevel): void {
    this.options.minLevel = level;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      ...this.options,
      context: {
        ...this.context,
        ...context,
      },
    });
  }

  /**
   * Flush and release the sink. Shared with every child logger, so call it
   * once, when the process is done logging.
   */
  async close(): Promise<void> {
    await this.options.sink.close?.();
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(
    message: string,
    error?: unknown,
    data?: Record<string, unknown>
  ): void {
    const errorData =
      error instanceof Error
        ? {
            error: error.message,
            stack: error.stack,
            ...data,
          }
        : error !== undefined
        ? { error: String(error), ...data }
        : data;

    this.log("error", message, errorData);
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.options.minLevel]) {
      return;
    }

    const timestamp = this.options.includeTimestamp
      ? new Date().toISOString()
      : undefined;
    const context =
      Object.keys(this.context).length > 0 ? this.context : undefined;

    if (this.options.enableColors) {
      const color = COLORS[level];
      const levelString = `${color}${level.toUpperCase()}${COLORS.reset}`;
      const timestampString = timestamp
        ? `${COLORS.dim}${timestamp}${COLORS.reset} `
        : "";
      const messageString = `${color}${message}${COLORS.reset}`;
      const details =
        context || data ? ` ${safeStringify({ ...context, ...data })}` : "";

      this.options.sink.write(
        `${timestampString}${levelString}: ${messageString}${details}\n`
      );
    } else {
      const logEntry = {
        timestamp,
        level,
        message,
        ...(context && { context }),
        ...(data && { data }),
      };
      this.options.sink.write(`${safeStringify(logEntry)}\n`);
    }
  }
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

/**
 * Builds the root logger from configuration. Logs go to stderr unless a log
 * file is configured, in which case they are appended to it.
 */
export function createLogger(
  config: Pick<Config, "logging">,
  stderr: LogSink = process.stderr
): Logger {
  let sink: LogSink = stderr;
  const file = config.logging.file;
  if (file) {
    const stream = createWriteStream(file, { flags: "a" });
    stream.on("error", (err) => {
      stderr.write(`Failed to write log file ${file}: ${err.message}\n`);
    });
    sink = {
      write: (chunk) => stream.write(chunk),
      close: () =>
        new Promise<void>((resolve) => {
          stream.end(() => resolve());
        }),
    };
  }

  return new Logger({
    minLevel: config.logging.level,
    enableColors: config.logging.file ? false : config.logging.colors,
    includeTimestamp: true,
    sink,
  });
}
