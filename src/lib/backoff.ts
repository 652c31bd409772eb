/**
 * Exponential backoff utilities for handling API failures
 */

import { setTimeout as delay } from "timers/promises";
import { isTransientError } from "./errors";
import { describeError, logger } from "./logger";

const BACKOFF_MULTIPLIER = 2; // 2x exponential backoff
const MAX_DELAY_MS = 60 * 1000; // 1 minute

export interface RetryOptions {
  /** Attempts after the first one */
  retries: number;
  baseDelayMs: number;
  /** Used in log lines, e.g. "arXiv search" */
  label: string;
  isRetryable?: (error: unknown) => boolean;
}

/**
 * Delay before retry number `attempt + 1` (attempt is zero-based)
 */
export function calculateDelay(attempt: number, baseDelayMs: number): number {
  return Math.min(baseDelayMs * Math.pow(BACKOFF_MULTIPLIER, attempt), MAX_DELAY_MS);
}

/**
 * Run `fn`, retrying transient failures with exponential backoff.
 * Non-retryable errors and the last failure are rethrown unchanged.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const isRetryable = options.isRetryable ?? isTransientError;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= options.retries || !isRetryable(error)) {
        throw error;
      }
      const delayMs = calculateDelay(attempt, options.baseDelayMs);
      logger.warn(`${options.label} failed, retrying in ${delayMs}ms`, {
        attempt: attempt + 1,
        retries: options.retries,
        error: describeError(error),
      });
      await delay(delayMs);
    }
  }
}
