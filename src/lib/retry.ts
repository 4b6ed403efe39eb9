/**
 * Bounded exponential backoff for adapter calls
 */

import chalk from 'chalk';
import { errorMessage, isTransientError } from './errors';

export const MAX_RETRIES = 3;
export const BASE_RETRY_DELAY_MS = 1000;

export interface RetryOptions {
  /** Retries after the first attempt */
  retries?: number;
  baseDelayMs?: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function warnRetry(label: string, retries: number) {
  return (attempt: number, delayMs: number, error: unknown): void => {
    console.warn(
      chalk.yellow(
        `⚠ ${label} failed (attempt ${attempt}/${retries + 1}): ${errorMessage(error)}. Retrying in ${delayMs}ms...`
      )
    );
  };
}

export async function withRetry<T>(fn: () => Promise<T>, label: string, options: RetryOptions = {}): Promise<T> {
  const retries = Math.max(0, options.retries ?? MAX_RETRIES);
  const baseDelayMs = options.baseDelayMs ?? BASE_RETRY_DELAY_MS;
  const isRetryable = options.isRetryable ?? isTransientError;
  const onRetry = options.onRetry ?? warnRetry(label, retries);

  let lastError: unknown;
  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === retries || !isRetryable(error)) {
        throw error;
      }
      const delay = baseDelayMs * Math.pow(2, attempt);
      onRetry(attempt + 1, delay, error);
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }
  throw lastError;
}
