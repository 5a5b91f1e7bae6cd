/**
 * Coder - error code descriptors.
 *
 * A Coder bundles a numeric error code with the HTTP status, user-facing
 * message and documentation reference that clients see for it. Errors
 * only ever carry the numeric code; the descriptor is resolved through a
 * CoderRegistry when the error is observed.
 */

// ---------------------------------------------------------------------------
// Coder shape
// ---------------------------------------------------------------------------

export interface Coder {
  /** Unique non-zero numeric error code. */
  readonly code: number;
  /** HTTP status code to return in API responses. */
  readonly httpStatus: number;
  /** User-facing message (safe to display in UI). */
  readonly message: string;
  /** Link to the documentation for this error. */
  readonly reference: string;
}

export interface CoderInit {
  code: number;
  /** Defaults to 500 when omitted or 0. */
  httpStatus?: number;
  message: string;
  reference?: string;
}

// ---------------------------------------------------------------------------
// Reserved values
// ---------------------------------------------------------------------------

/** Never registrable; marks "no code". */
export const RESERVED_CODE = 0;

/** Permanently bound to UNKNOWN_CODER in every registry. */
export const UNKNOWN_CODE = 1;

export const DEFAULT_HTTP_STATUS = 500;

// ---------------------------------------------------------------------------
// Default implementation
// ---------------------------------------------------------------------------

export class DefaultCoder implements Coder {
  readonly code: number;
  readonly message: string;
  readonly reference: string;
  private readonly status: number;

  constructor(init: CoderInit) {
    this.code = init.code;
    this.status = init.httpStatus ?? 0;
    this.message = init.message;
    this.reference = init.reference ?? "";
  }

  get httpStatus(): number {
    return this.status === 0 ? DEFAULT_HTTP_STATUS : this.status;
  }

  toString(): string {
    return this.message;
  }
}

export function createCoder(init: CoderInit): Coder {
  return new DefaultCoder(init);
}

/**
 * Fallback descriptor for errors that carry no code, or a code nobody
 * registered.
 */
export const UNKNOWN_CODER: Coder = new DefaultCoder({
  code: UNKNOWN_CODE,
  httpStatus: DEFAULT_HTTP_STATUS,
  message: "An internal server error occurred",
  reference: "README.md#error-codes",
});
