import { ValidationError, withSpan, withStorageRetry } from '@lineage/core';
import type { Logger, RetryOptions } from '@lineage/core';

export type OperationAttributes = Record<string, string | number>;

/**
 * Runs one engine operation: a span named after it, a child logger bound to
 * its attributes, and the whole unit of work re-run on transient storage
 * faults.
 */
export function runOperation<T>(
  operation: string,
  attributes: OperationAttributes,
  logger: Logger,
  retry: RetryOptions,
  work: (log: Logger) => Promise<T>,
): Promise<T> {
  const log = logger.child({ operation, ...attributes });
  return withSpan(`lineage.${operation}`, attributes, () =>
    withStorageRetry(operation, () => work(log), retry, log),
  );
}

export function assertId(value: number, field: string): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ValidationError(`${field} must be a positive integer`, field);
  }
  return value;
}

export function assertLimit(value: number | undefined, fallback: number, max: number): number {
  if (value === undefined) return fallback;
  if (!Number.isSafeInteger(value) || value < 1 || value > max) {
    throw new ValidationError(`limit must be an integer between 1 and ${max}`, 'limit');
  }
  return value;
}

export function assertDate(value: Date, field: string): Date {
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
    throw new ValidationError(`${field} must be a valid date`, field);
  }
  return value;
}
