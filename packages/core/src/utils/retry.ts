/**
 * Retry with exponential backoff for Shopify rate limits.
 * REST answers 429; GraphQL reports THROTTLED, which the client surfaces as 430.
 */

import { logger } from "./logger.js";
import { ShopifyApiError, errorMessage } from "./types.js";

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  jitterMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export function isRateLimitError(error: unknown): boolean {
  return error instanceof ShopifyApiError && error.isRateLimited;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 4,
  initialDelayMs: 1000,
  maxDelayMs: 16000,
  jitterMs: 250,
  shouldRetry: isRateLimitError,
  sleep,
};

/**
 * Run `fn`, retrying while `shouldRetry` accepts the thrown error.
 * A `retryAfterMs` on the error (from the Retry-After header) wins over the computed backoff.
 *
 * @example
 * const product = await withBackoff(() => rest.post("products.json", body));
 */
export async function withBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (!opts.shouldRetry(error)) {
        throw error;
      }

      if (attempt >= opts.maxAttempts) {
        logger.error("Max retry attempts reached", {
          attempts: attempt,
          error: errorMessage(error),
        });
        throw error;
      }

      const delayMs = backoffDelay(attempt, error, opts);

      logger.warn("Rate limited, retrying", {
        attempt,
        maxAttempts: opts.maxAttempts,
        delayMs: Math.round(delayMs),
        error: errorMessage(error),
        status: error instanceof ShopifyApiError ? error.status : undefined,
      });

      await opts.sleep(delayMs);
    }
  }
}

function backoffDelay(
  attempt: number,
  error: unknown,
  opts: Required<RetryOptions>
): number {
  if (error instanceof ShopifyApiError && error.retryAfterMs !== undefined) {
    return Math.min(error.retryAfterMs, opts.maxDelayMs);
  }
  const exponential = Math.min(
    opts.initialDelayMs * Math.pow(2, attempt - 1),
    opts.maxDelayMs
  );
  return exponential + Math.random() * opts.jitterMs;
}

/**
 * Parse a Retry-After header (seconds, possibly fractional as Shopify sends "2.0").
 */
export function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number.parseFloat(header);
  if (!Number.isFinite(seconds) || seconds < 0) return undefined;
  return seconds * 1000;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
