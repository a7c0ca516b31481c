/**
 * Structured Logging Interface
 *
 * Provides a consistent logging interface for the session, callback handlers
 * and dispatch loop. Messages are snake_case event keys with a context record.
 */

import { appendFileSync } from "fs";

/**
 * Log levels in order of severity
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Log context data - any JSON-serializable object
 */
export type LogContext = Record<string, unknown>;

/**
 * Structured logger interface
 */
export interface StructuredLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function buildLogger(
  minLevel: LogLevel,
  write: (level: LogLevel, line: string) => void
): StructuredLogger {
  const minValue = LOG_LEVEL_VALUES[minLevel];

  const log = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LOG_LEVEL_VALUES[level] < minValue) {
      return;
    }

    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : "";
    write(level, `[${timestamp}] ${level.toUpperCase()} ${message}${contextStr}`);
  };

  return {
    debug: (message, context): void => {
      log("debug", message, context);
    },
    info: (message, context): void => {
      log("info", message, context);
    },
    warn: (message, context): void => {
      log("warn", message, context);
    },
    error: (message, context): void => {
      log("error", message, context);
    },
  };
}

/**
 * Create a console logger with structured output.
 *
 * Everything goes to stderr so that CLI output on stdout stays readable.
 *
 * @param minLevel - Minimum log level to output (default: "info")
 */
export function createConsoleLogger(minLevel: LogLevel = "info"): StructuredLogger {
  return buildLogger(minLevel, (_level, line) => {
    console.error(line);
  });
}

/**
 * Create a logger that appends to a file.
 *
 * @param minLevel - Minimum log level to output
 * @param filePath - File to append to (created if missing)
 */
export function createFileLogger(minLevel: LogLevel, filePath: string): StructuredLogger {
  return buildLogger(minLevel, (_level, line) => {
    appendFileSync(filePath, `${line}\n`, "utf-8");
  });
}

/**
 * Create a no-op logger that discards all output.
 * Useful for testing.
 */
export function createNullLogger(): StructuredLogger {
  const noop = (): void => {
    // Intentionally empty
  };

  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
  };
}

/**
 * Render an unknown thrown value for a log context.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
