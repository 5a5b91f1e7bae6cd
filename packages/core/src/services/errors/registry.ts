/**
 * Coder Registry
 *
 * Maps numeric error codes to their Coder descriptors. Every registry is
 * seeded with UNKNOWN_CODER under code 1; code 0 can never be registered.
 *
 * Registry operations are synchronous single map accesses, so they are
 * atomic with respect to each other on the event loop: concurrent callers
 * see last-writer-wins for register() and never observe a partial update.
 *
 * @example
 * ```typescript
 * import { createCoder, mustRegister } from '@errcode/core';
 *
 * mustRegister(createCoder({
 *   code: 100101,
 *   httpStatus: 404,
 *   message: 'User not found',
 *   reference: 'https://docs.example.com/errors#100101',
 * }));
 * ```
 */

import { getLogger } from "../logger";
import type { Logger } from "../logger";
import { RESERVED_CODE, UNKNOWN_CODER, createCoder } from "./coder";
import type { Coder, CoderInit } from "./coder";
import { CoderRegistrationError } from "./errors";
import type { CoderRegistrationFailure } from "./errors";

export interface CoderRegistryOptions {
  /** Defaults to the process logger with component "coder-registry". */
  logger?: Logger;
}

export class CoderRegistry {
  private readonly coders = new Map<number, Coder>();
  private readonly logger: Logger;

  constructor(options: CoderRegistryOptions = {}) {
    this.logger =
      options.logger ?? getLogger().child({ component: "coder-registry" });
    this.coders.set(UNKNOWN_CODER.code, UNKNOWN_CODER);
  }

  /**
   * Register a coder, replacing any coder already registered under the
   * same code.
   *
   * @throws CoderRegistrationError if the code is 0 or not an integer.
   */
  register(coder: Coder): void {
    this.assertRegistrable(coder);

    const previous = this.coders.get(coder.code);
    if (previous && previous !== coder) {
      this.logger.warn("Overriding registered error code", {
        code: coder.code,
        previousMessage: previous.message,
        nextMessage: coder.message,
      });
    }

    this.coders.set(coder.code, coder);
  }

  /**
   * Register a coder whose code must not be registered yet.
   *
   * @throws CoderRegistrationError if the code is 0, not an integer, or
   * already registered.
   */
  mustRegister(coder: Coder): void {
    this.assertRegistrable(coder);

    if (this.coders.has(coder.code)) {
      this.fail("duplicate_code", coder.code, `code: ${coder.code} already exist`);
    }

    this.coders.set(coder.code, coder);
  }

  /**
   * register() for several coders. Codes are checked before any coder is
   * stored, so a rejected batch leaves the registry unchanged.
   */
  registerAll(coders: readonly Coder[]): void {
    for (const coder of coders) {
      this.assertRegistrable(coder);
    }
    for (const coder of coders) {
      this.register(coder);
    }
  }

  /**
   * mustRegister() for several coders. A code may appear once in the batch
   * and must not be registered yet; on failure nothing is stored.
   */
  mustRegisterAll(coders: readonly Coder[]): void {
    const pending = new Set<number>();
    for (const coder of coders) {
      this.assertRegistrable(coder);
      if (this.coders.has(coder.code) || pending.has(coder.code)) {
        this.fail("duplicate_code", coder.code, `code: ${coder.code} already exist`);
      }
      pending.add(coder.code);
    }

    for (const coder of coders) {
      this.coders.set(coder.code, coder);
    }
  }

  lookup(code: number): Coder | undefined {
    return this.coders.get(code);
  }

  has(code: number): boolean {
    return this.coders.has(code);
  }

  /** All registered coders, ordered by code. */
  list(): Coder[] {
    return [...this.coders.values()].sort((a, b) => a.code - b.code);
  }

  get size(): number {
    return this.coders.size;
  }

  private assertRegistrable(coder: Coder): void {
    if (coder.code === RESERVED_CODE) {
      this.fail(
        "reserved_code",
        coder.code,
        "code `0` is reserved as the unknown error code and cannot be registered",
      );
    }

    if (!Number.isSafeInteger(coder.code)) {
      this.fail("invalid_code", coder.code, `code ${coder.code} is not an integer`);
    }
  }

  private fail(
    reason: CoderRegistrationFailure,
    code: number,
    message: string,
  ): never {
    const error = new CoderRegistrationError(reason, code, message);
    this.logger.fatal("Invalid error code registration", {
      reason,
      code,
      error,
    });
    throw error;
  }
}

// ---------------------------------------------------------------------------
// Process-wide registry
// ---------------------------------------------------------------------------

export interface InitCoderRegistryOptions extends CoderRegistryOptions {
  /** Coders registered with mustRegister right after the registry is created. */
  catalog?: readonly CoderInit[];
}

let defaultRegistry: CoderRegistry | null = null;

/**
 * The process-wide registry, created on first use.
 */
export function getCoderRegistry(): CoderRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new CoderRegistry();
  }
  return defaultRegistry;
}

/**
 * Create the process-wide registry explicitly, replacing any existing one.
 * Call once during startup.
 */
export function initCoderRegistry(
  options: InitCoderRegistryOptions = {},
): CoderRegistry {
  const registry = new CoderRegistry({ logger: options.logger });
  registry.mustRegisterAll((options.catalog ?? []).map(createCoder));
  defaultRegistry = registry;
  return registry;
}

/**
 * Drop the process-wide registry so the next access starts fresh.
 * Intended for tests.
 */
export function resetCoderRegistry(): void {
  defaultRegistry = null;
}

/** Register on the process-wide registry, overriding silently. */
export function register(coder: Coder): void {
  getCoderRegistry().register(coder);
}

/** Register on the process-wide registry; duplicates are fatal. */
export function mustRegister(coder: Coder): void {
  getCoderRegistry().mustRegister(coder);
}

export function lookupCoder(code: number): Coder | undefined {
  return getCoderRegistry().lookup(code);
}
