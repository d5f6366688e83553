// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Retry utility with exponential backoff for completion calls.
 */

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 0, no retries) */
  maxRetries?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Add random jitter to delays (default: true) */
  jitter?: boolean;
  /** Decide whether an error is worth retrying (default: isRetryableError) */
  isRetryable?: (error: Error) => boolean;
  /** Callback when a retry occurs */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

const RETRYABLE_STATUS = new Set([408, 409, 429, 500, 502, 503, 504, 529]);

const RETRYABLE_MESSAGES = [
  'rate limit',
  'too many requests',
  'overloaded',
  'econnrefused',
  'econnreset',
  'etimedout',
  'socket hang up',
  'fetch failed',
  'network',
  'model is loading',
];

/**
 * Read an HTTP status from SDK errors that carry one.
 */
function statusOf(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Default check for retryable errors: rate limits, overload, network
 * failures and 5xx responses.
 */
export function isRetryableError(error: Error): boolean {
  const status = statusOf(error);
  if (status !== undefined) {
    return RETRYABLE_STATUS.has(status);
  }
  const message = error.message.toLowerCase();
  return RETRYABLE_MESSAGES.some(fragment => message.includes(fragment));
}

/**
 * Calculate delay with exponential backoff and optional jitter.
 */
export function calculateDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
  jitter: boolean
): number {
  let delay = Math.min(initialDelayMs * Math.pow(backoffMultiplier, attempt), maxDelayMs);

  // 0-25% random variation
  if (jitter) {
    delay += delay * 0.25 * Math.random();
  }

  return Math.round(delay);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic and exponential backoff.
 *
 * @throws The last error once retries are exhausted or the error is not retryable
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 0,
    initialDelayMs = 1000,
    maxDelayMs = 30000,
    backoffMultiplier = 2,
    jitter = true,
    isRetryable = isRetryableError,
    onRetry,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= maxRetries || !isRetryable(lastError)) {
        throw lastError;
      }

      const delayMs = calculateDelay(attempt, initialDelayMs, maxDelayMs, backoffMultiplier, jitter);
      onRetry?.(attempt + 1, lastError, delayMs);
      await sleep(delayMs);
    }
  }
}
