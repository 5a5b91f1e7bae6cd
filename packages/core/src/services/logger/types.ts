/**
 * Logger Types
 */

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Fields merged into an entry; the registry sets `component`. */
export interface LogContext {
  component?: string;
  [key: string]: unknown;
}

/** Context for error and fatal entries; `error` is serialized. */
export type ErrorLogContext = LogContext & { error?: Error };

export interface LoggerConfig {
  /** Entries below this level are dropped */
  level: LogLevel;
  serviceName: string;
  environment: string;
  version?: string;
  /** Single coloured line instead of JSON */
  prettyPrint?: boolean;
  /** Keys containing any of these (case-insensitive) print as [REDACTED] */
  redactFields?: string[];
  defaultContext?: LogContext;
}

export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: ErrorLogContext): void;
  fatal(message: string, context?: ErrorLogContext): void;
  child(context: LogContext): Logger;
  flush(): Promise<void>;
}

export const DEFAULT_REDACT_FIELDS = ["password", "secret", "token", "apiKey", "authorization"];
