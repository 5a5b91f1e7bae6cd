/**
 * Test helpers for packages/core
 */

import { vi } from "vitest";
import type { Logger } from "../services/logger";

export function createMockLogger(): Logger {
  const logger: Logger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(() => logger),
    flush: vi.fn(() => Promise.resolve()),
  };
  return logger;
}
