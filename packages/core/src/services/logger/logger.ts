/**
 * Structured Logger
 *
 * Console-backed structured logging with:
 * - JSON output for log aggregation
 * - Coloured single-line output in development
 * - Sensitive field redaction
 * - Child loggers that inherit context
 */

import { hostname } from "os";
import { logLevelSchema } from "../../utils/validation";
import type { ErrorLogContext, LogContext, Logger, LoggerConfig, LogLevel } from "./types";
import { DEFAULT_REDACT_FIELDS } from "./types";

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  service: string;
  environment: string;
  version?: string;
  hostname: string;
  [key: string]: unknown;
}

interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  code?: string | number;
  cause?: unknown;
}

/**
 * Log level numeric values for comparison
 */
const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

const BASE_FIELDS = [
  "level",
  "message",
  "timestamp",
  "service",
  "environment",
  "version",
  "hostname",
];

/**
 * Get hostname safely
 */
function getHostname(): string {
  try {
    return process.env.HOSTNAME || hostname() || "unknown";
  } catch {
    return "unknown";
  }
}

/**
 * Deep clone and redact sensitive fields
 */
export function redactSensitiveFields(
  obj: unknown,
  redactFields: string[],
  seen = new WeakSet<object>()
): unknown {
  if (obj === null || typeof obj !== "object") {
    return obj;
  }

  // Handle circular references
  if (seen.has(obj)) {
    return "[Circular]";
  }
  seen.add(obj);

  if (Array.isArray(obj)) {
    return obj.map((item) => redactSensitiveFields(item, redactFields, seen));
  }

  const lowerFields = redactFields.map((field) => field.toLowerCase());
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    const shouldRedact = lowerFields.some((field) => lowerKey.includes(field));

    result[key] = shouldRedact
      ? "[REDACTED]"
      : redactSensitiveFields(value, redactFields, seen);
  }

  return result;
}

function errorCode(error: Error): string | number | undefined {
  if (!("code" in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === "string" || typeof code === "number" ? code : undefined;
}

/**
 * Format error for logging
 */
function formatError(error: Error): SerializedError {
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    code: errorCode(error),
    cause: error.cause,
  };
}

/**
 * Create a log entry
 */
function createLogEntry(
  level: LogLevel,
  message: string,
  config: LoggerConfig,
  context: LogContext,
  additionalFields: Record<string, unknown>
): LogEntry {
  return {
    ...context,
    ...additionalFields,
    level,
    message,
    timestamp: new Date().toISOString(),
    service: config.serviceName,
    environment: config.environment,
    version: config.version,
    hostname: getHostname(),
  };
}

/**
 * Output log entry
 */
function outputLog(entry: LogEntry, config: LoggerConfig): void {
  const redacted = redactSensitiveFields(
    entry,
    config.redactFields || DEFAULT_REDACT_FIELDS
  );
  const write =
    entry.level === "error" || entry.level === "fatal"
      ? console.error
      : console.log;

  if (!config.prettyPrint || redacted === null || typeof redacted !== "object") {
    write(JSON.stringify(redacted));
    return;
  }

  const colors: Record<LogLevel, string> = {
    trace: "\x1b[90m",
    debug: "\x1b[36m",
    info: "\x1b[32m",
    warn: "\x1b[33m",
    error: "\x1b[31m",
    fatal: "\x1b[35m",
  };
  const reset = "\x1b[0m";

  const time = new Date(entry.timestamp).toLocaleTimeString();
  const level = entry.level.toUpperCase().padEnd(5);
  let output = `${colors[entry.level]}[${time}] ${level}${reset} ${entry.message}`;

  const contextObj: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(redacted)) {
    if (!BASE_FIELDS.includes(key)) {
      contextObj[key] = value;
    }
  }
  if (Object.keys(contextObj).length > 0) {
    output += ` ${JSON.stringify(contextObj)}`;
  }

  write(output);
}

/**
 * Check if log level should be output
 */
function shouldLog(level: LogLevel, configLevel: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[configLevel];
}

/**
 * Create a logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  const log = (
    level: LogLevel,
    message: string,
    context?: LogContext,
    additionalFields: Record<string, unknown> = {}
  ): void => {
    if (!shouldLog(level, config.level)) {
      return;
    }

    const mergedContext = {
      ...config.defaultContext,
      ...context,
    };

    outputLog(
      createLogEntry(level, message, config, mergedContext, additionalFields),
      config
    );
  };

  const logWithError = (
    level: "error" | "fatal",
    message: string,
    context?: ErrorLogContext
  ): void => {
    const { error, ...rest }: ErrorLogContext = context ?? {};
    log(level, message, rest, error ? { error: formatError(error) } : {});
  };

  return {
    trace(message: string, context?: LogContext): void {
      log("trace", message, context);
    },

    debug(message: string, context?: LogContext): void {
      log("debug", message, context);
    },

    info(message: string, context?: LogContext): void {
      log("info", message, context);
    },

    warn(message: string, context?: LogContext): void {
      log("warn", message, context);
    },

    error(message: string, context?: ErrorLogContext): void {
      logWithError("error", message, context);
    },

    fatal(message: string, context?: ErrorLogContext): void {
      logWithError("fatal", message, context);
    },

    child(additionalContext: LogContext): Logger {
      return createLogger({
        ...config,
        defaultContext: {
          ...config.defaultContext,
          ...additionalContext,
        },
      });
    },

    async flush(): Promise<void> {
      // Console output is unbuffered
      return Promise.resolve();
    },
  };
}

/**
 * Default logger configuration
 */
export function getDefaultLoggerConfig(): LoggerConfig {
  const environment = process.env.NODE_ENV || "development";
  const isDevelopment = environment === "development";
  const level = logLevelSchema.safeParse(process.env.LOG_LEVEL);

  return {
    level: level.success ? level.data : isDevelopment ? "debug" : "info",
    serviceName: process.env.SERVICE_NAME || "errcode",
    environment,
    version: process.env.APP_VERSION || process.env.npm_package_version || "0.0.0",
    prettyPrint: isDevelopment,
    redactFields: DEFAULT_REDACT_FIELDS,
  };
}

/**
 * Default logger instance (singleton)
 */
let defaultLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger(getDefaultLoggerConfig());
  }
  return defaultLogger;
}

/**
 * Initialize logger with custom config
 */
export function initLogger(config: Partial<LoggerConfig>): Logger {
  defaultLogger = createLogger({
    ...getDefaultLoggerConfig(),
    ...config,
  });
  return defaultLogger;
}
