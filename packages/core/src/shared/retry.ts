import { setTimeout as sleep } from 'node:timers/promises';
import { StorageUnavailableError } from './errors.js';
import { isTransientStorageError } from './database.js';
import type { Logger } from './logger.js';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
}

export const DEFAULT_RETRY: RetryOptions = { maxAttempts: 3, baseDelayMs: 50 };

/**
 * Re-runs a whole unit of work while it fails with a transient storage
 * fault. Anything else propagates on the first failure.
 */
export async function withStorageRetry<T>(
  operation: string,
  work: () => Promise<T>,
  options: RetryOptions,
  logger: Logger,
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await work();
    } catch (error) {
      if (!isTransientStorageError(error)) throw error;

      if (attempt >= maxAttempts) {
        logger.error({ err: error, operation, attempts: attempt }, 'storage unavailable, giving up');
        throw new StorageUnavailableError(operation, attempt, error);
      }

      const delayMs = options.baseDelayMs * 2 ** (attempt - 1);
      logger.warn({ err: error, operation, attempt, delay_ms: delayMs }, 'transient storage fault, retrying');
      if (delayMs > 0) await sleep(delayMs);
    }
  }
}
