import { compareOptionalDates } from '../entities/dates.js';
import type { EntityKind, EntityRecord } from '../entities/types.js';

export function byId<K extends EntityKind>(a: EntityRecord<K>, b: EntityRecord<K>): number {
  return a.id - b.id;
}

/** Birth date ascending, undated last, then id. */
export function comparePeople(a: EntityRecord<'person'>, b: EntityRecord<'person'>): number {
  return compareOptionalDates(a.fields.birth_date, b.fields.birth_date) || a.id - b.id;
}

/** Event date ascending, undated last, then id. */
export function compareEvents(a: EntityRecord<'event'>, b: EntityRecord<'event'>): number {
  return compareOptionalDates(a.fields.event_date, b.fields.event_date) || a.id - b.id;
}

export function compareRelationships(
  a: EntityRecord<'relationship'>,
  b: EntityRecord<'relationship'>,
): number {
  return (
    a.fields.person1_id - b.fields.person1_id ||
    a.fields.person2_id - b.fields.person2_id ||
    (a.fields.type === b.fields.type ? 0 : a.fields.type < b.fields.type ? -1 : 1) ||
    a.id - b.id
  );
}

export function sortedIds(ids: Iterable<number>): number[] {
  return [...new Set(ids)].sort((a, b) => a - b);
}
