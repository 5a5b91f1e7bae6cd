/**
 * Error Codes
 *
 * - Coder descriptors (code, HTTP status, user-facing message, reference)
 * - A registry mapping codes to coders, pre-seeded with the unknown coder
 * - CodedError chains and the queries that resolve codes from them
 * - JSON catalogs of coder definitions
 */

// Coders
export {
  DefaultCoder,
  createCoder,
  UNKNOWN_CODER,
  UNKNOWN_CODE,
  RESERVED_CODE,
  DEFAULT_HTTP_STATUS,
} from "./coder";
export type { Coder, CoderInit } from "./coder";

// Registry
export {
  CoderRegistry,
  getCoderRegistry,
  initCoderRegistry,
  resetCoderRegistry,
  register,
  mustRegister,
  lookupCoder,
} from "./registry";
export type { CoderRegistryOptions, InitCoderRegistryOptions } from "./registry";

// Coded errors & chain queries
export {
  CodedError,
  isCodedError,
  asCodedError,
  withCode,
  wrapWithCode,
} from "./coded-error";
export type { CodedErrorOptions } from "./coded-error";
export { parseCoder, isCode, rootCause } from "./chain";

// Catalog
export { parseCoderCatalog, registerCatalog, loadCoderCatalog } from "./catalog";
export type { RegisterCatalogOptions } from "./catalog";

// Errors
export { ErrcodeError, CoderRegistrationError, CoderCatalogError } from "./errors";
export type { ErrcodeErrorOptions, CoderRegistrationFailure } from "./errors";
