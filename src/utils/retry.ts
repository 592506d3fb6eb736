/**
 * @module utils/retry
 * @description Retry with linear backoff for retry-eligible failures.
 */

import { isRetryable } from "../interfaces/errors.js";
import type { MeshLogger } from "../logger.js";

export interface RetryOptions {
  /** Total tries, including the first. */
  readonly attempts: number;
  /** Wait before retry n is `baseDelayMs * n`. */
  readonly baseDelayMs: number;
  readonly logger?: MeshLogger;
  /** Overrides {@link isRetryable}. */
  readonly shouldRetry?: (error: unknown) => boolean;
  /** Called before each wait, with the upcoming attempt number (2, 3, …). */
  readonly onRetry?: (attempt: number, error: unknown) => void;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `operation` until it succeeds, fails with a terminal error, or
 * `attempts` is used up. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryable;
  const attempts = Math.max(1, Math.floor(options.attempts));

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error)) throw error;

      const wait = options.baseDelayMs * attempt;
      options.logger?.debug(
        "attempt %d failed (%s), retrying in %dms",
        attempt,
        error instanceof Error ? error.message : String(error),
        wait
      );
      options.onRetry?.(attempt + 1, error);
      await delay(wait);
    }
  }
}
