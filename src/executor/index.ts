/**
 * Executor Module Index
 */

export {
  type ExecuteOptions,
  type ExecutorOptions,
  DEFAULT_CONCURRENCY,
  Executor,
  resolveAttributes,
} from "./executor.js";
export {
  type RetryConfig,
  type RetryOptions,
  type RetryOutcome,
  type RetryRunOptions,
  RETRY_DEFAULTS,
  RETRYABLE_CODES,
  backoffDelay,
  isTransientError,
  resolveRetryConfig,
  shouldRetry,
  withRetry,
} from "./retry.js";
export { formatRunReport } from "./report.js";
