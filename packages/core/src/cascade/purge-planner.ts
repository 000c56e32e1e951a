import type { EntityKind, EntityRecord, LinkTargetKind } from '../entities/types.js';
import type { StorageTransaction } from '../storage/types.js';

/** Rows a hard purge of one person removes or rewrites. */
export interface PurgePlan {
  person: EntityRecord<'person'>;
  relationships: EntityRecord<'relationship'>[];
  event_people: EntityRecord<'event_person'>[];
  media_links: EntityRecord<'media_link'>[];
  source_links: EntityRecord<'source_link'>[];
  /** Events whose `created_by` is cleared rather than deleted. */
  detached_events: EntityRecord<'event'>[];
}

export interface PurgeReport {
  person_id: number;
  relationships: number;
  event_people: number;
  media_links: number;
  source_links: number;
  detached_events: number;
}

function uniqueById<K extends EntityKind>(records: EntityRecord<K>[]): EntityRecord<K>[] {
  const seen = new Map<number, EntityRecord<K>>();
  for (const record of records) seen.set(record.id, record);
  return [...seen.values()].sort((a, b) => a.id - b.id);
}

async function linksTo<K extends 'media_link' | 'source_link'>(
  tx: StorageTransaction,
  kind: K,
  accountId: number,
  targets: { entity_type: LinkTargetKind; entity_id: number }[],
): Promise<EntityRecord<K>[]> {
  const found: EntityRecord<K>[] = [];
  for (const target of targets) {
    found.push(
      ...(await tx.queryRecords(kind, accountId, {
        where: { entity_type: target.entity_type, entity_id: target.entity_id },
        include_tombstoned: true,
      })),
    );
  }
  return uniqueById(found);
}

/**
 * Collects everything that cannot survive the physical removal of
 * `person`, tombstoned rows included: relationships touching the person,
 * its event participations, and media/source links aimed at the person or
 * at one of those relationships.
 */
export async function planPersonPurge(
  tx: StorageTransaction,
  person: EntityRecord<'person'>,
): Promise<PurgePlan> {
  const accountId = person.account_id;
  const all = { include_tombstoned: true };

  const relationships = uniqueById([
    ...(await tx.queryRecords('relationship', accountId, { ...all, where: { person1_id: person.id } })),
    ...(await tx.queryRecords('relationship', accountId, { ...all, where: { person2_id: person.id } })),
  ]);

  const targets: { entity_type: LinkTargetKind; entity_id: number }[] = [
    { entity_type: 'person', entity_id: person.id },
    ...relationships.map((edge) => ({ entity_type: 'relationship' as const, entity_id: edge.id })),
  ];

  return {
    person,
    relationships,
    event_people: await tx.queryRecords('event_person', accountId, { ...all, where: { person_id: person.id } }),
    media_links: await linksTo(tx, 'media_link', accountId, targets),
    source_links: await linksTo(tx, 'source_link', accountId, targets),
    detached_events: await tx.queryRecords('event', accountId, { ...all, where: { created_by: person.id } }),
  };
}

export function summarizePurge(plan: PurgePlan): PurgeReport {
  return {
    person_id: plan.person.id,
    relationships: plan.relationships.length,
    event_people: plan.event_people.length,
    media_links: plan.media_links.length,
    source_links: plan.source_links.length,
    detached_events: plan.detached_events.length,
  };
}
