import { isDeepStrictEqual } from 'node:util';
import type { FieldMap, FieldValue } from '../shared/types.js';
import type { Revision, RevisionChanges } from './types.js';

/**
 * Field-level diff between two states. `null` on either side stands for
 * "entity absent"; absent fields read as `null`.
 */
export function diffFields(before: FieldMap | null, after: FieldMap | null): RevisionChanges {
  const changes: RevisionChanges = {};
  const keys = new Set([...Object.keys(before ?? {}), ...Object.keys(after ?? {})]);

  for (const key of [...keys].sort()) {
    const previous: FieldValue = before?.[key] ?? null;
    const next: FieldValue = after?.[key] ?? null;
    if (!isDeepStrictEqual(previous, next)) {
      changes[key] = { before: previous, after: next };
    }
  }
  return changes;
}

export function hasChanges(changes: RevisionChanges): boolean {
  return Object.keys(changes).length > 0;
}

export interface ReplayState {
  fields: Record<string, FieldValue>;
  is_deleted: boolean;
  version: number;
  as_of: Date;
}

/**
 * Folds revisions of one entity, in commit order, into its state after the
 * last one. Returns `null` when the entity does not exist at that point.
 */
export function foldRevisions(revisions: readonly Revision[]): ReplayState | null {
  let fields: Record<string, FieldValue> | null = null;
  let version = 0;
  let asOf: Date | null = null;

  for (const revision of revisions) {
    asOf = revision.recorded_at;
    if (revision.action === 'purge') {
      fields = null;
      continue;
    }
    if (revision.action === 'create' || fields === null) {
      fields = {};
    }
    for (const [key, change] of Object.entries(revision.changes)) {
      fields[key] = change.after;
    }
    version = revision.entity_version;
  }

  if (fields === null || asOf === null) return null;

  const { is_deleted: deleted, ...rest } = fields;
  return { fields: rest, is_deleted: deleted === true, version, as_of: asOf };
}
