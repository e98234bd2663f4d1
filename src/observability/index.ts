// src/observability/index.ts
// Central export point for observability functionality.

export {
  createLogger,
  createChildLogger,
  logger,
  getLogLevel,
  isPrettyEnabled,
  type LogLevel,
} from "./logger";
