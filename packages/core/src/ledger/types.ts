import type { EntityKind, FieldsOf } from '../entities/types.js';
import type { FieldValue } from '../shared/types.js';

export type RevisionAction = 'create' | 'update' | 'delete' | 'purge';

export interface FieldChange {
  before: FieldValue;
  after: FieldValue;
}

/** Only the fields that changed; the tombstone travels as `is_deleted`. */
export type RevisionChanges = Record<string, FieldChange>;

export interface Revision {
  id: number;
  account_id: number;
  entity_type: EntityKind;
  entity_id: number;
  entity_version: number;
  author: string;
  action: RevisionAction;
  changes: RevisionChanges;
  recorded_at: Date;
}

export type NewRevision = Omit<Revision, 'id'>;

export interface RevisionQuery {
  entity_type?: EntityKind;
  entity_id?: number;
  /** Inclusive lower bound on `recorded_at`. */
  from?: Date;
  /** Inclusive upper bound on `recorded_at`. */
  to?: Date;
  after_id?: number;
  limit?: number;
}

export interface RevisionPage {
  revisions: Revision[];
  has_more: boolean;
  next_after_id?: number;
}

export interface ReconstructedRecord<K extends EntityKind = EntityKind> {
  kind: K;
  id: number;
  version: number;
  is_deleted: boolean;
  fields: FieldsOf<K>;
  /** Timestamp of the last revision folded in. */
  as_of: Date;
}
