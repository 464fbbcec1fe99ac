/**
 * Bounded retry with exponential backoff for transient registry failures.
 */

import { TransportFailureError } from '../migration/errors.js';
import { toError } from './error-utils.js';

type DelayFn = (ms: number) => Promise<void>;

const defaultDelay: DelayFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

let delayFn: DelayFn = defaultDelay;

/**
 * Replaces the sleep used between attempts. Call without arguments to
 * restore the real timer.
 */
export function setDelayFunction(fn?: DelayFn): void {
  delayFn = fn ?? defaultDelay;
}

export interface RetryOptions {
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Delay before the first retry; doubles on each further retry (default: 500) */
  initialDelayMs?: number;
  /** Decides whether an error is worth another attempt (default: isTransientError) */
  shouldRetry?: (error: Error, attempt: number) => boolean;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

/**
 * calculateBackoffDelay(0, 500) === 500, (1, 500) === 1000, (2, 500) === 2000
 */
export function calculateBackoffDelay(attempt: number, initialDelayMs: number): number {
  return initialDelayMs * Math.pow(2, attempt);
}

export function isTimeoutError(error: Error): boolean {
  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return true;
  }
  const message = error.message.toLowerCase();
  return message.includes('timeout') || message.includes('etimedout') || message.includes('econnaborted');
}

/**
 * Timeouts, connection failures, 5xx and 429 responses are transient.
 * Anything else (bad input, 4xx, missing content) is not.
 */
export function isTransientError(error: Error): boolean {
  if (TransportFailureError.isTransportFailureError(error)) {
    if (error.status === undefined) {
      return true;
    }
    return error.status >= 500 || error.status === 429;
  }
  if (isTimeoutError(error)) {
    return true;
  }
  // fetch() rejects with a TypeError on network-level failures
  return error instanceof TypeError && error.message.toLowerCase().includes('fetch failed');
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { maxRetries = 3, initialDelayMs = 500, shouldRetry = isTransientError, onRetry } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (e) {
      const error = toError(e);
      if (attempt >= maxRetries || !shouldRetry(error, attempt)) {
        throw error;
      }
      const retryDelay = calculateBackoffDelay(attempt, initialDelayMs);
      onRetry?.(error, attempt, retryDelay);
      await delayFn(retryDelay);
    }
  }
}
