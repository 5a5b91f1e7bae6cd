/**
 * Queries over coded error chains.
 */

import { UNKNOWN_CODER } from "./coder";
import type { Coder } from "./coder";
import { asCodedError } from "./coded-error";
import { getCoderRegistry } from "./registry";
import type { CoderRegistry } from "./registry";

/**
 * Resolve the Coder for an error.
 *
 * - null/undefined yields undefined: there was no error.
 * - A CodedError whose code is registered yields that Coder.
 * - Anything else, including a CodedError with an unregistered code,
 *   yields UNKNOWN_CODER.
 *
 * Only the outermost link is consulted.
 */
export function parseCoder(
  error: unknown,
  registry: CoderRegistry = getCoderRegistry(),
): Coder | undefined {
  if (error === null || error === undefined) {
    return undefined;
  }

  const coded = asCodedError(error);
  if (coded) {
    const coder = registry.lookup(coded.code);
    if (coder) {
      return coder;
    }
  }

  return UNKNOWN_CODER;
}

/**
 * Reports whether any link in the error's chain carries `code`, walking
 * from the outermost link inwards. The walk stops at the first cause that
 * is not a CodedError.
 */
export function isCode(error: unknown, code: number): boolean {
  let link = asCodedError(error);
  while (link) {
    if (link.code === code) {
      return true;
    }
    link = asCodedError(link.cause);
  }
  return false;
}

/**
 * Follow `cause` links to the innermost error.
 */
export function rootCause(error: unknown): unknown {
  const seen = new Set<unknown>();
  let current = error;
  while (current instanceof Error && current.cause !== undefined && !seen.has(current)) {
    seen.add(current);
    current = current.cause;
  }
  return current;
}
