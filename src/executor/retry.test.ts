import { describe, it, expect, vi } from "vitest";

import { FatalProviderError, TransientProviderError, UnresolvedReferenceError } from "../errors.js";
import { backoffDelay, isTransientError, RETRY_DEFAULTS, RETRYABLE_CODES, shouldRetry, withRetry } from "./retry.js";

// =============================================================================
// Defaults & Constants
// =============================================================================

describe("RETRY_DEFAULTS", () => {
  it("has expected default values", () => {
    expect(RETRY_DEFAULTS).toEqual({ maxAttempts: 3, minDelayMs: 100, maxDelayMs: 30_000, jitterFactor: 0.2 });
  });
});

describe("RETRYABLE_CODES", () => {
  it("contains core network error codes", () => {
    for (const code of ["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED", "EPIPE"]) {
      expect(RETRYABLE_CODES.has(code)).toBe(true);
    }
  });
});

// =============================================================================
// Classification
// =============================================================================

describe("isTransientError", () => {
  it("returns true for a retryable code", () => {
    expect(isTransientError({ code: "ECONNRESET" })).toBe(true);
  });

  it("returns false for a non-retryable code", () => {
    expect(isTransientError({ code: "ENOENT" })).toBe(false);
  });

  it("returns true for HTTP 429 and 5xx", () => {
    expect(isTransientError({ statusCode: 429 })).toBe(true);
    expect(isTransientError({ status: 503 })).toBe(true);
  });

  it("returns false for HTTP 400", () => {
    expect(isTransientError({ statusCode: 400 })).toBe(false);
  });

  it("matches throttling messages", () => {
    expect(isTransientError(new Error("Rate Limit exceeded for account"))).toBe(true);
    expect(isTransientError(new Error("invalid cidr"))).toBe(false);
  });

  it("returns false for non-objects", () => {
    expect(isTransientError(null)).toBe(false);
    expect(isTransientError("timed out")).toBe(false);
  });
});

describe("shouldRetry", () => {
  it("follows classified provider errors", () => {
    expect(shouldRetry(new TransientProviderError("slow down"))).toBe(true);
    expect(shouldRetry(new FatalProviderError("quota exceeded"), () => true)).toBe(false);
  });

  it("never retries engine errors", () => {
    expect(shouldRetry(new UnresolvedReferenceError("instance.web", "network.main", "id"))).toBe(false);
  });

  it("prefers the handler's classification for unclassified errors", () => {
    expect(shouldRetry(new Error("boom"), () => true)).toBe(true);
    expect(shouldRetry({ code: "ECONNRESET" }, () => false)).toBe(false);
  });
});

describe("backoffDelay", () => {
  const config = { ...RETRY_DEFAULTS, maxDelayMs: 1_000 };

  it("doubles per attempt without jitter", () => {
    expect([1, 2, 3].map((a) => backoffDelay(a, config, () => 0.5))).toEqual([100, 200, 400]);
  });

  it("caps at maxDelayMs", () => {
    expect(backoffDelay(10, config, () => 1)).toBe(1_000);
  });

  it("never drops below minDelayMs", () => {
    expect(backoffDelay(1, config, () => 0)).toBe(100);
  });

  it("applies jitter within the factor", () => {
    expect(backoffDelay(2, config, () => 1)).toBe(240);
    expect(backoffDelay(2, config, () => 0)).toBe(160);
  });
});

// =============================================================================
// withRetry
// =============================================================================

describe("withRetry", () => {
  const fast = { minDelayMs: 1, maxDelayMs: 5 };

  it("returns the first success", async () => {
    const fn = vi.fn(async () => "ok");
    expect(await withRetry(fn, fast)).toEqual({ ok: true, value: "ok", attempts: 1 });
    expect(fn).toHaveBeenCalledWith(1);
  });

  it("retries transient failures until success", async () => {
    const onRetry = vi.fn();
    let calls = 0;
    const outcome = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new TransientProviderError("throttled");
        return calls;
      },
      { ...fast, onRetry },
    );

    expect(outcome).toEqual({ ok: true, value: 3, attempts: 3 });
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it("stops at maxAttempts", async () => {
    const error = new TransientProviderError("still throttled");
    const outcome = await withRetry(async () => Promise.reject(error), { ...fast, maxAttempts: 2 });
    expect(outcome).toEqual({ ok: false, error, attempts: 2 });
  });

  it("does not retry fatal errors", async () => {
    const fn = vi.fn(async () => {
      throw new FatalProviderError("bad request");
    });
    const outcome = await withRetry(fn, fast);
    expect(outcome.attempts).toBe(1);
    expect(outcome.ok).toBe(false);
  });

  it("does not retry unrecognized errors", async () => {
    const outcome = await withRetry(async () => Promise.reject(new Error("boom")), fast);
    expect(outcome.attempts).toBe(1);
  });

  it("honours a server-suggested delay", async () => {
    const onRetry = vi.fn();
    let calls = 0;
    await withRetry(
      async () => {
        calls++;
        if (calls === 1) throw new TransientProviderError("busy", { retryAfterMs: 3 });
        return calls;
      },
      { ...fast, onRetry },
    );
    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ attempt: 1, delayMs: 3 }));
  });

  it("stops backing off when the signal aborts", async () => {
    const controller = new AbortController();
    const error = new TransientProviderError("throttled");
    const fn = vi.fn(async () => Promise.reject(error));

    const outcome = await withRetry(fn, {
      minDelayMs: 60_000,
      maxDelayMs: 60_000,
      signal: controller.signal,
      onRetry: () => controller.abort(),
    });

    expect(outcome).toEqual({ ok: false, error, attempts: 1 });
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
