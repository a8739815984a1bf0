/**
 * @petledger/sdk — Retry with exponential backoff.
 *
 * Retry policy for the HTTP transport's reads (nonce, block events,
 * dry run). Submissions are never retried: a resent envelope carries a
 * nonce the node has already counted and comes back `invalid`.
 *
 * Backoff formula: min(baseDelayMs * 2^attempt + jitter, maxDelayMs)
 * where jitter = random(0, jitterMs)
 */

import { SdkError } from "./types.js";

/**
 * Configuration for retry behavior.
 */
export interface RetryConfig {
  /** Maximum number of attempts (including the first try). Default: 3 */
  readonly maxAttempts: number;
  /** Base delay in ms before first retry. Default: 250 */
  readonly baseDelayMs: number;
  /** Maximum delay in ms between retries. Default: 5000 */
  readonly maxDelayMs: number;
  /** Maximum random jitter in ms added to each delay. Default: 100 */
  readonly jitterMs: number;
}

/**
 * Reads are cheap and the node answers fast, so the defaults are short.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 5000,
  jitterMs: 100,
};

/**
 * Error thrown when all retry attempts are exhausted.
 */
export class RetryExhaustedError extends Error {
  constructor(
    /** Number of attempts made */
    public readonly attempts: number,
    /** The last error encountered */
    public readonly lastError: unknown,
  ) {
    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    super(`All ${attempts} retry attempts exhausted. Last error: ${msg}`);
    this.name = "RetryExhaustedError";
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * @param attempt - Zero-based attempt index (0 = first retry)
 */
export function computeDelay(attempt: number, config: RetryConfig): number {
  const exponential = config.baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * config.jitterMs;
  return Math.min(exponential + jitter, config.maxDelayMs);
}

/**
 * Execute `fn`, retrying while `shouldRetry` accepts the error.
 *
 * @throws RetryExhaustedError if all attempts fail
 * @throws The original error if shouldRetry returns false
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  shouldRetry: (err: unknown) => boolean = () => true,
  sleepFn: (ms: number) => Promise<void> = sleep,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      lastError = err;

      if (!shouldRetry(err)) {
        throw err;
      }

      // No sleep after the last attempt
      if (attempt < config.maxAttempts - 1) {
        await sleepFn(computeDelay(attempt, config));
      }
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError);
}

// =============================================================================
// Read policy
// =============================================================================

/**
 * Retry 5xx responses, timeouts and network failures. Anything else the
 * server said is final.
 */
export function isRetryableError(err: unknown): boolean {
  if (!(err instanceof SdkError)) return true;
  return err.statusCode >= 500 || err.code === "NETWORK_ERROR" || err.code === "TIMEOUT";
}

/**
 * Run an idempotent read under the read policy.
 *
 * Callers see an SdkError whether the read failed once or on every
 * attempt: exhaustion surfaces the last attempt's error.
 */
export async function retryRead<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  sleepFn: (ms: number) => Promise<void> = sleep,
): Promise<T> {
  try {
    return await withRetry(fn, config, isRetryableError, sleepFn);
  } catch (err) {
    if (!(err instanceof RetryExhaustedError)) {
      throw err;
    }
    if (err.lastError instanceof SdkError) {
      throw err.lastError;
    }
    throw new SdkError("NETWORK_ERROR", err.message);
  }
}
