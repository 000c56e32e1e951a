import type { EntityKind, FieldValue, Logger, RecordPage, RetryOptions } from '@lineage/core';

export type Clock = () => Date;

export interface EngineOptions {
  logger: Logger;
  /** Source of `recorded_at` / `updated_at` timestamps. */
  clock?: Clock;
  retry?: RetryOptions;
}

export interface UpdateOptions {
  /** Reject with `ConflictError` unless the record is still at this version. */
  expected_version?: number;
}

export interface GetOptions {
  /** Also return tombstoned and dangling records. */
  include_tombstoned?: boolean;
}

export interface ListOptions {
  where?: Record<string, FieldValue>;
  include_tombstoned?: boolean;
  after_id?: number;
  limit?: number;
}

export type ListResult<K extends EntityKind> = RecordPage<K>;
