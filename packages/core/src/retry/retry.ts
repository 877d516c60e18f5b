/**
 * Retry with exponential backoff for vendor calls.
 *
 * @module core/retry
 */

import { ErrorCode } from "@tessera/shared";
import { getRetryDelay, isRetryable } from "../errors/classify.js";
import { providerError } from "../errors/provider-error.js";

export interface RetryOptions {
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Delay before the first retry (default: 1000) */
  initialDelayMs?: number;
  /** Upper bound for any single delay (default: 60000) */
  maxDelayMs?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Random extra delay as a fraction of the computed delay (default: 0.3) */
  jitterFactor?: number;
  /** Called before each retry */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  /** Overrides the classification-based check */
  isRetryable?: (error: unknown) => boolean;
  signal?: AbortSignal;
}

type BackoffOptions = Required<
  Pick<RetryOptions, "maxRetries" | "initialDelayMs" | "maxDelayMs" | "backoffMultiplier" | "jitterFactor">
>;

const DEFAULT_RETRY_OPTIONS: BackoffOptions = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 60_000,
  backoffMultiplier: 2,
  jitterFactor: 0.3,
};

function abortedError() {
  return providerError("Operation aborted", ErrorCode.ABORTED);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortedError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timeoutId);
      reject(abortedError());
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * The larger of the vendor's suggestion (`Retry-After` or the
 * classification's delay) and the configured backoff, capped at `maxDelayMs`.
 */
function calculateDelay(attempt: number, options: BackoffOptions, error: unknown): number {
  const suggested = getRetryDelay(error, attempt);
  const exponential = options.initialDelayMs * options.backoffMultiplier ** (attempt - 1);
  const jitter = Math.random() * options.jitterFactor * exponential;
  return Math.min(Math.max(suggested, exponential + jitter), options.maxDelayMs);
}

/**
 * Run `fn`, retrying retryable failures with exponential backoff.
 *
 * The last error is rethrown once retries are exhausted or an error is not
 * retryable. Aborting `signal` stops further attempts with an `ABORTED`
 * {@link ProviderError}.
 *
 * @example
 * ```typescript
 * const response = await withProviderRetry(() => fetch(url, init), {
 *   maxRetries: 5,
 *   onRetry: (attempt, error, delayMs) => logger.warn("retrying", { attempt, delayMs }),
 * });
 * ```
 */
export async function withProviderRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const backoff: BackoffOptions = {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries,
    initialDelayMs: options.initialDelayMs ?? DEFAULT_RETRY_OPTIONS.initialDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs,
    backoffMultiplier: options.backoffMultiplier ?? DEFAULT_RETRY_OPTIONS.backoffMultiplier,
    jitterFactor: options.jitterFactor ?? DEFAULT_RETRY_OPTIONS.jitterFactor,
  };
  const checkRetryable = options.isRetryable ?? isRetryable;

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw abortedError();
    }

    try {
      return await fn();
    } catch (error) {
      if (attempt > backoff.maxRetries || !checkRetryable(error)) {
        throw error;
      }

      const delayMs = calculateDelay(attempt, backoff, error);
      options.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs, options.signal);
    }
  }
}
