/**
 * Structured Logger
 *
 * Outputs structured JSON in production and human-readable lines in development.
 *
 * Usage:
 * ```typescript
 * import { logger } from "@/lib/logger";
 *
 * logger.info("Bucket view served", { userId: "123", selection: "today" });
 * logger.error("Failed to mark bucket read", { userId: "123", error: error.message });
 * ```
 */

import * as Sentry from "@sentry/node";

/**
 * Log levels in order of severity.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Context data that can be attached to log entries.
 */
export type LogContext = Record<string, unknown>;

/**
 * Methods shared by the root logger and its children.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(additionalContext: LogContext): Logger;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

interface LoggerConfig {
  /** Minimum log level to output (default: LOG_LEVEL, else "info" in production, "debug" otherwise) */
  minLevel?: LogLevel;
  /** Whether to output JSON format (default: true in production) */
  json?: boolean;
  /** Service name for structured logs */
  service?: string;
  /** Where formatted lines go; defaults to the console */
  sink?: (level: LogLevel, line: string) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const isProduction = process.env.NODE_ENV === "production";

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case "debug":
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

/**
 * Creates a logger instance with the given configuration.
 */
function createLogger(config: LoggerConfig = {}): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const {
    minLevel = isLogLevel(envLevel) ? envLevel : isProduction ? "info" : "debug",
    json = isProduction,
    service = "dated-reader",
    sink = consoleSink,
  } = config;

  const minLevelPriority = LOG_LEVEL_PRIORITY[minLevel];

  function formatEntry(entry: LogEntry): string {
    if (json) {
      return JSON.stringify({
        ...entry,
        service,
        ...(entry.context && { ...entry.context }),
      });
    }

    const levelColors: Record<LogLevel, string> = {
      debug: "\x1b[36m", // cyan
      info: "\x1b[32m", // green
      warn: "\x1b[33m", // yellow
      error: "\x1b[31m", // red
    };
    const reset = "\x1b[0m";
    const levelStr = `[${entry.level.toUpperCase()}]`.padEnd(7);

    let output = `${levelColors[entry.level]}${levelStr}${reset} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += ` ${JSON.stringify(entry.context)}`;
    }

    return output;
  }

  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < minLevelPriority) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context,
    };

    sink(level, formatEntry(entry));

    if (level === "error" && isProduction) {
      Sentry.addBreadcrumb({
        category: "log",
        message,
        level: "error",
        data: context,
      });
    }
  }

  function bind(baseContext: LogContext): Logger {
    const merge = (context?: LogContext) => ({ ...baseContext, ...context });
    return {
      debug: (message, context) => log("debug", message, merge(context)),
      info: (message, context) => log("info", message, merge(context)),
      warn: (message, context) => log("warn", message, merge(context)),
      error: (message, context) => log("error", message, merge(context)),
      child: (additionalContext) => bind({ ...baseContext, ...additionalContext }),
    };
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (additionalContext) => bind(additionalContext),
  };
}

/**
 * Default logger instance.
 */
export const logger = createLogger();

/**
 * Creates a request-scoped logger with request context.
 */
export function createRequestLogger(context: {
  requestId?: string;
  userId?: string;
  path?: string;
  method?: string;
}): Logger {
  return logger.child(context);
}

/**
 * Extracts a loggable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export { createLogger };
