import pRetry, { type Options as PRetryOptions } from "p-retry";
import type { RuntimeErrorKind } from "./errors.js";
import { isRuntimeError } from "./errors.js";

/**
 * Retry configuration.
 */
export interface RetryOptions {
  /** Maximum number of retries after the first attempt (default: 2) */
  maxRetries?: number;
  /** Base delay in ms for exponential backoff (default: 500) */
  baseDelayMs?: number;
  /** Maximum delay in ms (default: 10000) */
  maxDelayMs?: number;
  /** Error filter: return true to retry, false to abort */
  shouldRetry?: (error: Error) => boolean;
  /** Callback on each retry attempt */
  onRetry?: (error: Error, attempt: number) => void;
}

/**
 * Errors that reflect a structurally wrong request; retrying cannot help.
 */
const NON_RETRYABLE_ERRORS = new Set<RuntimeErrorKind>([
  "CAPABILITY_NOT_FOUND",
  "ACTION_NOT_FOUND",
  "INVALID_PARAMETERS",
  "DUPLICATE_CAPABILITY",
  "BUDGET_EXCEEDED",
  "NO_PENDING_TASKS",
  "CONFIG_INVALID",
]);

export function isRetryable(error: unknown): boolean {
  if (isRuntimeError(error)) return !NON_RETRYABLE_ERRORS.has(error.kind);
  return true;
}

/**
 * Execute a function with retry logic using exponential backoff.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 2,
    baseDelayMs = 500,
    maxDelayMs = 10_000,
    shouldRetry,
    onRetry,
  } = options;

  if (maxRetries <= 0) {
    return fn();
  }

  const pRetryOptions: PRetryOptions = {
    retries: maxRetries,
    minTimeout: baseDelayMs,
    maxTimeout: Math.max(baseDelayMs, maxDelayMs),
    randomize: baseDelayMs > 0,
    factor: 2,
    onFailedAttempt: (error) => {
      if (shouldRetry && !shouldRetry(error)) {
        throw error;
      }
      if (!isRetryable(error)) {
        throw error;
      }
      if (error.retriesLeft > 0) {
        onRetry?.(error, error.attemptNumber);
      }
    },
  };

  return pRetry(fn, pRetryOptions);
}
