/**
 * Test setup file
 */

import { vi } from "vitest";

// Log lines all go to stderr; keep test output quiet.
vi.stubGlobal("console", {
  ...console,
  debug: vi.fn(),
  log: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});
