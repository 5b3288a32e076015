/**
 * Retry Handler
 *
 * Exponential backoff and retry logic for embedding and search calls.
 *
 * Features:
 * - Exponential backoff (500ms, 1s, 2s, 4s, ...) capped at maxDelayMs
 * - Parses provider-specific wait times from error messages
 * - Stops retrying as soon as the caller's abort signal fires
 *
 * Usage:
 *   const result = await retryHandler.execute(() => apiCall(), { signal });
 */

import { AppError } from '@/lib/utils/errors';
import { sleep } from '@/lib/utils/deadline';

export interface RetryConfig {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
};

export interface RetryAttempt {
  attempt: number;
  maxAttempts: number;
  waitMs: number;
  error: unknown;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Defaults to the AppError retryable flag */
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: RetryAttempt) => void;
}

export class RetryHandler {
  private config: RetryConfig;

  constructor(config: Partial<RetryConfig> = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
  }

  /**
   * Execute a function, retrying retryable failures with exponential backoff.
   * The last error is rethrown once attempts are exhausted.
   */
  async execute<T>(fn: () => Promise<T>, options: ExecuteOptions = {}): Promise<T> {
    const isRetryable = options.isRetryable ?? defaultIsRetryable;
    const maxAttempts = this.config.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (options.signal?.aborted || attempt >= maxAttempts || !isRetryable(error)) {
          throw error;
        }

        const waitMs = this.calculateWaitTime(error, attempt);
        options.onRetry?.({ attempt, maxAttempts, waitMs, error });

        await sleep(waitMs, options.signal);
      }
    }
  }

  /**
   * Calculate wait time with exponential backoff.
   * Also parses provider-specific wait times from error messages.
   */
  calculateWaitTime(error: unknown, attempt: number): number {
    const errorStr = String(error);

    // OpenAI style: "Please try again in 1.242s"
    const secondsMatch = errorStr.match(/try again in (\d+\.?\d*)s/i);
    if (secondsMatch) {
      const parsed = Math.ceil(parseFloat(secondsMatch[1]) * 1000);
      return Math.min(parsed, this.config.maxDelayMs);
    }

    // "Retry-After: X" / "retry after X"
    const retryAfterMatch = errorStr.match(/retry[- ]after:?\s*(\d+)/i);
    if (retryAfterMatch) {
      const parsed = parseInt(retryAfterMatch[1], 10) * 1000;
      return Math.min(parsed, this.config.maxDelayMs);
    }

    const exponentialDelay = this.config.baseDelayMs * Math.pow(2, attempt - 1);
    return Math.min(exponentialDelay, this.config.maxDelayMs);
  }
}

function defaultIsRetryable(error: unknown): boolean {
  return error instanceof AppError && error.retryable;
}
