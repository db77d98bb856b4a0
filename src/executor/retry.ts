/**
 * Retry Utilities
 *
 * Bounded exponential backoff with jitter for provider calls, plus the
 * classification of errors into transient (retried) and fatal.
 */

import { FatalProviderError, isReconcileError, TransientProviderError } from "../errors.js";
import { sleep } from "../utils.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

export type RetryConfig = Required<RetryOptions>;

export const RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/** Error codes that are safe to retry. */
export const RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EAI_AGAIN",
  "EBUSY",
  "ERR_SOCKET_CONNECTION_TIMEOUT",
  "UNAVAILABLE",
  "DEADLINE_EXCEEDED",
  "RESOURCE_EXHAUSTED",
  "THROTTLING",
  "RATE_LIMIT_EXCEEDED",
  "SERVICE_UNAVAILABLE",
]);

const RETRYABLE_MESSAGES = [
  "throttl",
  "too many requests",
  "rate limit",
  "temporarily unavailable",
  "service unavailable",
  "connection reset",
  "socket hang up",
  "timed out",
  "network error",
];

export function resolveRetryConfig(options?: RetryOptions): RetryConfig {
  return {
    maxAttempts: options?.maxAttempts ?? RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options?.minDelayMs ?? RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? RETRY_DEFAULTS.jitterFactor,
  };
}

// =============================================================================
// Error Classification
// =============================================================================

/**
 * Recognize common transient failures by code, HTTP status or message.
 */
export function isTransientError(error: unknown): boolean {
  if (error === null || typeof error !== "object") return false;

  const code = "code" in error ? error.code : undefined;
  if (typeof code === "string" && RETRYABLE_CODES.has(code)) return true;

  // 429 = throttled, 5xx = server errors
  const status = "statusCode" in error ? error.statusCode : "status" in error ? error.status : undefined;
  if (typeof status === "number" && (status === 429 || (status >= 500 && status < 600))) return true;

  const message = "message" in error && typeof error.message === "string" ? error.message.toLowerCase() : "";
  return RETRYABLE_MESSAGES.some((pattern) => message.includes(pattern));
}

/**
 * Decide whether a failed attempt may be retried. Classified provider errors
 * decide for themselves; anything else asks `isRetryable`, then the heuristic.
 */
export function shouldRetry(error: unknown, isRetryable?: (error: unknown) => boolean): boolean {
  if (error instanceof TransientProviderError) return true;
  if (error instanceof FatalProviderError) return false;
  if (isReconcileError(error)) return false;
  return isRetryable ? isRetryable(error) : isTransientError(error);
}

/** Delay before attempt `attempt + 1`. */
export function backoffDelay(attempt: number, config: RetryConfig, random: () => number = Math.random): number {
  const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
  const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
  const jitter = cappedDelay * config.jitterFactor * (random() * 2 - 1);
  return Math.min(config.maxDelayMs, Math.max(config.minDelayMs, cappedDelay + jitter));
}

// =============================================================================
// Retry Execution
// =============================================================================

export type RetryRunOptions = RetryOptions & {
  signal?: AbortSignal;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  random?: () => number;
};

export type RetryOutcome<T> = { ok: true; value: T; attempts: number } | { ok: false; error: unknown; attempts: number };

/**
 * Run `fn` until it succeeds, fails with a non-retryable error, runs out of
 * attempts or the signal aborts. Never throws; the outcome carries the attempt count.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryRunOptions = {},
): Promise<RetryOutcome<T>> {
  const config = resolveRetryConfig(options);
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      return { ok: true, value: await fn(attempt), attempts: attempt };
    } catch (error) {
      if (attempt >= config.maxAttempts || options.signal?.aborted || !shouldRetry(error, options.isRetryable)) {
        return { ok: false, error, attempts: attempt };
      }

      const delayMs =
        error instanceof TransientProviderError && error.retryAfterMs !== undefined
          ? Math.min(error.retryAfterMs, config.maxDelayMs)
          : backoffDelay(attempt, config, options.random);
      options.onRetry?.({ attempt, delayMs, error });

      try {
        await sleep(delayMs, options.signal);
      } catch {
        // Aborted while backing off; the last provider error stands
        return { ok: false, error, attempts: attempt };
      }
    }
  }
}
