/**
 * Base error classes for errcode itself.
 */

export interface ErrcodeErrorOptions {
  /** The underlying error, if any. */
  cause?: unknown;
}

/** Base for every error thrown by this package. */
export class ErrcodeError extends Error {
  constructor(message: string, options: ErrcodeErrorOptions = {}) {
    super(message, "cause" in options ? { cause: options.cause } : undefined);

    // Maintains proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export type CoderRegistrationFailure =
  | "reserved_code"
  | "invalid_code"
  | "duplicate_code";

/**
 * Thrown when the error-code catalog is wired up wrong: registering the
 * reserved code 0, a non-integer code, or a duplicate under mustRegister.
 */
export class CoderRegistrationError extends ErrcodeError {
  readonly reason: CoderRegistrationFailure;
  readonly attemptedCode: number;

  constructor(reason: CoderRegistrationFailure, attemptedCode: number, message: string) {
    super(message);
    this.reason = reason;
    this.attemptedCode = attemptedCode;
  }
}

/** Thrown when a coder catalog cannot be read or fails validation. */
export class CoderCatalogError extends ErrcodeError {
  readonly issues: readonly string[];
  readonly source?: string;

  constructor(
    message: string,
    input: { issues: readonly string[]; source?: string; cause?: unknown },
  ) {
    super(message, "cause" in input ? { cause: input.cause } : {});
    this.issues = input.issues;
    this.source = input.source;
  }
}
