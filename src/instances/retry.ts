import { logger } from "../config/logger.js";
import { ConfigurationError, RetryExhaustedError, TransientError } from "./errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RetryPolicy {
  /** Total attempts per call, first try included. Default 3. */
  maxAttempts: number;
  /** Delay in ms after failed attempt N (1-based) before attempt N+1. */
  backoff: (attempt: number) => number;
  /** Cap on any single wait, including one asked for by retry-after. Default 30000. */
  maxDelayMs: number;
  /** Injected for tests; defaults to a setTimeout-based sleep. */
  sleep: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_DELAY_MS = 1_000;
export const DEFAULT_MAX_RETRY_DELAY_MS = 30_000;

/** Linear backoff: attempt N waits stepMs * N. */
export function linearBackoff(stepMs: number): (attempt: number) => number {
  return (attempt) => stepMs * attempt;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoff: linearBackoff(DEFAULT_RETRY_DELAY_MS),
  maxDelayMs: DEFAULT_MAX_RETRY_DELAY_MS,
  sleep,
};

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

/**
 * Run `attempt` until it succeeds, throws a non-transient error, or the policy
 * runs out of attempts. Only TransientError is retried; anything else
 * propagates from the attempt that raised it.
 */
export async function withRetry<T>(
  operation: string,
  policy: RetryPolicy,
  attempt: (attemptNumber: number) => Promise<T>,
): Promise<T> {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new ConfigurationError(`Retry policy for ${operation} allows no attempts (maxAttempts=${policy.maxAttempts})`);
  }

  for (let n = 1; ; n++) {
    try {
      return await attempt(n);
    } catch (err) {
      if (!(err instanceof TransientError)) throw err;

      if (n === policy.maxAttempts) {
        logger.error("Platform request failed after retries", {
          operation,
          attempts: n,
          error: err.message,
        });
        throw new RetryExhaustedError(operation, n, err);
      }

      // retry-after may lengthen the wait, never past maxDelayMs.
      const delayMs = Math.min(Math.max(policy.backoff(n), err.retryAfterMs ?? 0), policy.maxDelayMs);
      logger.warn("Platform request failed, retrying", {
        operation,
        attempt: n,
        maxAttempts: policy.maxAttempts,
        delayMs,
        httpStatus: err.httpStatus,
        error: err.message,
      });
      await policy.sleep(delayMs);
    }
  }
}
