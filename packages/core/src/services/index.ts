/**
 * Services
 *
 * - Errors: coder registry, coded error chains, catalogs
 * - Logger: structured logging
 */

export * from "./errors";
export { createLogger, getLogger, initLogger, getDefaultLoggerConfig } from "./logger";
export type { Logger, LogLevel, LogContext, LoggerConfig } from "./logger";
