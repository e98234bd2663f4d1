// src/observability/logger.ts
// Structured JSON Logging - Logger Configuration
//
// Configures Pino for structured logging with:
// - Environment-based log levels
// - JSON output by default
// - Pretty printing for local runs
// - Module-scoped child loggers

import pino, { type Logger } from "pino";

/* ---------- Types ---------- */
export type LogLevel =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal"
  | "silent";

const VALID_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

/* ---------- Configuration ---------- */

/**
 * Get the configured log level from environment.
 * Defaults to 'info'; tests run with 'silent'.
 */
export function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return "info";
}

/**
 * Check if pretty printing is enabled
 */
export function isPrettyEnabled(): boolean {
  return process.env.LOG_PRETTY === "true";
}

/* ---------- Logger Factory ---------- */

// Root logger instance (singleton)
let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    const options: pino.LoggerOptions = {
      level: getLogLevel(),
      base: {
        service: "invoice-ledger",
        version: process.env.npm_package_version || "unknown",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    };

    if (isPrettyEnabled()) {
      rootLogger = pino({
        ...options,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
      });
    } else {
      rootLogger = pino(options);
    }
  }

  return rootLogger;
}

/**
 * Create a logger instance, optionally scoped to a module
 *
 * @example
 * const log = createLogger('knowledge/ingest');
 * log.info({ sourceFile }, 'Invoice stored');
 */
export function createLogger(moduleName?: string): Logger {
  const root = getRootLogger();

  if (moduleName) {
    return root.child({ module: moduleName });
  }

  return root;
}

/**
 * Create a child logger with additional context
 *
 * @example
 * const fileLog = createChildLogger(log, { sourceFile: 'inv-001.pdf' });
 */
export function createChildLogger(
  parent: Logger,
  bindings: Record<string, unknown>
): Logger {
  return parent.child(bindings);
}

/**
 * Default logger instance for quick usage.
 * Prefer createLogger() for module-scoped loggers.
 */
export const logger = createLogger();
