/**
 * Logger Service
 *
 * Structured logging with level filtering, sensitive field redaction
 * and child loggers.
 *
 * @example
 * ```typescript
 * import { getLogger, initLogger } from '@errcode/core';
 *
 * initLogger({ level: 'debug', serviceName: 'billing' });
 *
 * const logger = getLogger().child({ component: 'checkout' });
 * logger.warn('Overriding error code', { code: 40401 });
 * ```
 */

export {
  createLogger,
  getLogger,
  initLogger,
  getDefaultLoggerConfig,
  redactSensitiveFields,
} from "./logger";

export type {
  Logger,
  LogLevel,
  LogContext,
  LoggerConfig,
  ErrorLogContext,
} from "./types";

export { DEFAULT_REDACT_FIELDS } from "./types";
