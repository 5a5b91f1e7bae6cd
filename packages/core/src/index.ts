/**
 * @errcode/core
 *
 * Stable numeric error codes for internal errors: a registry of code
 * descriptors, coded error chains, and the lookups that connect them.
 */

export * from "./services";

export {
  coderDefinitionSchema,
  coderCatalogSchema,
  logLevelSchema,
  type CoderDefinition,
} from "./utils/validation";
