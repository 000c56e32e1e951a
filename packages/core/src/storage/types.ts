import type { EntityKind, EntityRecord, FieldsOf, RecordQuery } from '../entities/types.js';
import type { NewRevision, Revision, RevisionQuery } from '../ledger/types.js';
import type { Account, FieldPatch } from '../shared/types.js';

export interface NewRecord<K extends EntityKind> {
  account_id: number;
  fields: FieldsOf<K>;
  recorded_at: Date;
}

export interface RecordChange {
  /** New values of the changed columns only. */
  changes: FieldPatch;
  is_deleted?: boolean;
  expected_version: number;
  recorded_at: Date;
  /** Purge bookkeeping may touch tombstoned rows; ordinary updates may not. */
  allow_tombstoned?: boolean;
}

/**
 * One atomic unit of work against the entity tables and the revision log.
 * Nothing written through it is visible to others until the surrounding
 * `GenealogyStorage.transaction` commits.
 */
export interface StorageTransaction {
  /**
   * Serializes relationship mutations within one account until commit.
   * Throws `NotFoundError` for an unknown account.
   */
  lockAccount(accountId: number): Promise<void>;
  findAccount(accountId: number): Promise<Account | null>;

  insertRecord<K extends EntityKind>(kind: K, record: NewRecord<K>): Promise<EntityRecord<K>>;
  /** Tombstoned rows included; account scoping is the caller's job. */
  findRecord<K extends EntityKind>(kind: K, id: number): Promise<EntityRecord<K> | null>;
  /** Ordered by id ascending. */
  queryRecords<K extends EntityKind>(
    kind: K,
    accountId: number,
    query?: RecordQuery,
  ): Promise<EntityRecord<K>[]>;
  countRecords(kind: EntityKind, accountId: number, includeTombstoned: boolean): Promise<number>;
  /**
   * Applies the change when the row is still at `expected_version` (and
   * live, unless `allow_tombstoned`); returns `null` otherwise.
   */
  updateRecord<K extends EntityKind>(
    kind: K,
    id: number,
    change: RecordChange,
  ): Promise<EntityRecord<K> | null>;
  deleteRecord(kind: EntityKind, id: number): Promise<boolean>;

  appendRevision(revision: NewRevision): Promise<Revision>;
  /** Ordered by revision id (commit order). */
  readRevisions(accountId: number, query: RevisionQuery): Promise<Revision[]>;
}

export interface GenealogyStorage {
  transaction<T>(work: (tx: StorageTransaction) => Promise<T>): Promise<T>;
  createAccount(name: string, createdAt: Date): Promise<Account>;
  findAccount(accountId: number): Promise<Account | null>;
}
