/**
 * Retry with exponential backoff for completion calls.
 */

import { logger } from "./logger.js";

export interface IRetryOptions {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Server-requested minimum wait for an error, in ms. */
  readonly retryAfter?: (error: unknown) => number | undefined;
  /** Jitter source, 0..1. Defaults to Math.random. */
  readonly random?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_RETRY_OPTIONS: IRetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
};

/**
 * Delay before retry number `attempt + 1`: base * 2^attempt plus up to one
 * base interval of jitter, capped at maxDelayMs.
 */
export function computeBackoffDelay(
  attempt: number,
  options: Pick<IRetryOptions, "baseDelayMs" | "maxDelayMs">,
  random: () => number = Math.random,
): number {
  return Math.min(
    options.baseDelayMs * Math.pow(2, attempt) + random() * options.baseDelayMs,
    options.maxDelayMs,
  );
}

/**
 * Execute a function with exponential backoff retry.
 * Rethrows the last error once the attempt ceiling is reached or
 * `shouldRetry` declines.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: Partial<IRetryOptions>,
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const wait = opts.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      lastError = error;

      if (attempt === opts.maxRetries) {
        break;
      }

      if (opts.shouldRetry && !opts.shouldRetry(error, attempt)) {
        break;
      }

      const backoff = computeBackoffDelay(attempt, opts, opts.random);
      const requested = opts.retryAfter?.(error);
      const delay =
        requested !== undefined ? Math.min(Math.max(backoff, requested), opts.maxDelayMs) : backoff;

      logger.warn(
        { attempt: attempt + 1, maxRetries: opts.maxRetries, delayMs: delay },
        "Retrying after error",
      );

      await wait(delay);
    }
  }

  throw lastError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
