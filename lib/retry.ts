/**
 * Bounded Retry
 *
 * The OCM token endpoint and read calls fail intermittently under load.
 * Retries are bounded by attempt count; the caller decides which errors
 * qualify and whether the delay grows between attempts.
 */

import type { Logger } from "./logger.js";
import { isTransientError } from "./transient-error.js";

// ───────────────────────────────────────────────────────────────────────────────
// Types & Defaults
// ───────────────────────────────────────────────────────────────────────────────

export interface RetryConfig {
  /** Total attempts including the first call */
  maxAttempts: number;
  /** Delay before the second attempt (ms) */
  initialDelayMs: number;
  /** Multiplier applied to the delay after each failed attempt; 1 keeps it flat */
  backoffFactor: number;
  /** Cap on any single delay (ms) */
  maxDelayMs: number;
  /** Decides whether an error is worth another attempt */
  shouldRetry: (error: unknown) => boolean;
  /** Label used in retry log lines */
  operation: string;
}

export const RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 0,
  backoffFactor: 1,
  maxDelayMs: 30_000,
  shouldRetry: isTransientError,
  operation: "request",
};

// ───────────────────────────────────────────────────────────────────────────────
// Retry Wrapper
// ───────────────────────────────────────────────────────────────────────────────

/**
 * Execute an async function, retrying failures accepted by `shouldRetry`.
 *
 * After the last attempt the original error is rethrown unmodified.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config?: Partial<RetryConfig>,
  logger?: Logger
): Promise<T> {
  const { maxAttempts, initialDelayMs, backoffFactor, maxDelayMs, shouldRetry, operation } = {
    ...RETRY_DEFAULTS,
    ...config,
  };

  let delay = initialDelayMs;
  let lastError: unknown;

  for (let attempt = 1; attempt <= Math.max(1, maxAttempts); attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!shouldRetry(error) || attempt >= maxAttempts) {
        throw error;
      }

      const wait = Math.min(delay, maxDelayMs);
      logger?.warn(
        `${operation} failed (attempt ${attempt}/${maxAttempts}), ` +
          (wait > 0 ? `retrying in ${(wait / 1000).toFixed(1)}s` : "retrying")
      );

      if (wait > 0) {
        await sleep(wait);
      }
      delay = delay * backoffFactor;
    }
  }

  throw lastError;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
