import { MAX_RETRIES, BASE_RETRY_DELAY_MS, TRANSIENT_IO_CODES } from '../constants.js';
import { errnoOf } from '../core/errors.js';
import type { RetryOptions } from '../types/config.js';
import { logger } from './logger.js';

export const DEFAULT_RETRY: RetryOptions = {
  retries: MAX_RETRIES,
  baseDelayMs: BASE_RETRY_DELAY_MS,
};

export function isTransientIOError(err: unknown): boolean {
  const code = errnoOf(err);
  return code !== undefined && TRANSIENT_IO_CODES.has(code);
}

/**
 * Run `fn`, retrying with exponential backoff while `shouldRetry` accepts the error.
 * The last error is rethrown once the attempts run out.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  label: string,
  options: RetryOptions = DEFAULT_RETRY,
  shouldRetry: (err: unknown) => boolean = isTransientIOError,
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= options.retries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt >= options.retries || !shouldRetry(err)) {
        break;
      }
      const delay = options.baseDelayMs * Math.pow(2, attempt);
      logger.warn(`${label} failed (attempt ${attempt + 1}/${options.retries + 1}), retrying in ${delay}ms...`);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
  throw lastError;
}
