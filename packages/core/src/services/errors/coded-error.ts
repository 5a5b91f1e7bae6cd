/**
 * CodedError - one link of a coded error chain.
 *
 * Each link carries the numeric code it claims and, optionally, the error
 * it wraps. The code does not have to be registered when the error is
 * created; parseCoder resolves it against the registry later.
 */

import { ErrcodeError } from "./errors";

export interface CodedErrorOptions {
  /** The wrapped underlying error. */
  cause?: unknown;
}

export class CodedError extends ErrcodeError {
  /** Numeric code this link claims. */
  readonly code: number;

  constructor(code: number, message: string, options: CodedErrorOptions = {}) {
    super(message, options);
    this.code = code;
  }
}

/**
 * Type guard to check if an unknown value is a CodedError.
 */
export function isCodedError(error: unknown): error is CodedError {
  return error instanceof CodedError;
}

/**
 * View a value as a chain link, or undefined if it is not one.
 */
export function asCodedError(error: unknown): CodedError | undefined {
  return isCodedError(error) ? error : undefined;
}

// ---------------------------------------------------------------------------
// Factory helpers
// ---------------------------------------------------------------------------

/** Create a root link carrying `code`. */
export function withCode(code: number, message: string): CodedError {
  return new CodedError(code, message);
}

/**
 * Wrap `cause` in a new link carrying `code`.
 * Wrapping null or undefined yields undefined, so `wrapWithCode(err, ...)`
 * can be applied to a possibly-absent error.
 */
export function wrapWithCode(cause: null | undefined, code: number, message: string): undefined;
export function wrapWithCode(cause: NonNullable<unknown>, code: number, message: string): CodedError;
export function wrapWithCode(cause: unknown, code: number, message: string): CodedError | undefined;
export function wrapWithCode(cause: unknown, code: number, message: string): CodedError | undefined {
  if (cause === null || cause === undefined) {
    return undefined;
  }
  return new CodedError(code, message, { cause });
}
