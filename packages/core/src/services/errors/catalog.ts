/**
 * Coder Catalog
 *
 * Declarative coder definitions, validated and registered in bulk.
 * A catalog file is a JSON array:
 *
 * ```json
 * [
 *   { "code": 100101, "httpStatus": 404, "message": "User not found" },
 *   { "code": 100102, "httpStatus": 409, "message": "User already exists",
 *     "reference": "https://docs.example.com/errors#100102" }
 * ]
 * ```
 */

import { readFile } from "fs/promises";
import { coderCatalogSchema } from "../../utils/validation";
import type { CoderDefinition } from "../../utils/validation";
import { createCoder } from "./coder";
import type { Coder, CoderInit } from "./coder";
import { CoderCatalogError } from "./errors";
import { getCoderRegistry } from "./registry";
import type { CoderRegistry } from "./registry";

export interface RegisterCatalogOptions {
  /** Replace already-registered codes instead of failing. */
  override?: boolean;
  /** Defaults to the process-wide registry. */
  registry?: CoderRegistry;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Validate untrusted catalog input.
 *
 * @throws CoderCatalogError listing every issue as `path: message`.
 */
export function parseCoderCatalog(input: unknown, source?: string): CoderDefinition[] {
  const result = coderCatalogSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new CoderCatalogError(
      source ? `Invalid coder catalog in ${source}` : "Invalid coder catalog",
      { issues, source },
    );
  }
  return result.data;
}

/**
 * Create and register a coder per definition, all or nothing.
 * Uses mustRegister semantics unless `override` is set.
 */
export function registerCatalog(
  definitions: readonly CoderInit[],
  options: RegisterCatalogOptions = {},
): Coder[] {
  const registry = options.registry ?? getCoderRegistry();
  const coders = definitions.map(createCoder);

  if (options.override) {
    registry.registerAll(coders);
  } else {
    registry.mustRegisterAll(coders);
  }
  return coders;
}

/**
 * Read, validate and register a JSON catalog file.
 */
export async function loadCoderCatalog(
  filePath: string,
  options: RegisterCatalogOptions = {},
): Promise<Coder[]> {
  let input: unknown;
  try {
    input = JSON.parse(await readFile(filePath, "utf8"));
  } catch (error) {
    throw new CoderCatalogError(`Unable to read coder catalog ${filePath}`, {
      issues: [errorMessage(error)],
      source: filePath,
      cause: error,
    });
  }

  return registerCatalog(parseCoderCatalog(input, filePath), options);
}
