import { GraphCorruptedError, ValidationError } from '../shared/errors.js';
import { VisibilityResolver } from '../cascade/visibility-resolver.js';
import { descriptorFor } from '../entities/kinds.js';
import type { EntityKind, EntityRecord, Privacy } from '../entities/types.js';
import type { GenealogyStorage, StorageTransaction } from '../storage/types.js';
import { byId, compareEvents, comparePeople, compareRelationships } from './ordering.js';
import type {
  ExportOptions,
  GraphSnapshot,
  LineageEntry,
  LineageOptions,
  Neighborhood,
  TimelineEntry,
} from './types.js';

type Direction = 'up' | 'down';

function assertGenerations(options: LineageOptions): number {
  const max = options.max_generations;
  if (max === undefined) return Number.POSITIVE_INFINITY;
  if (!Number.isSafeInteger(max) || max < 1) {
    throw new ValidationError('max_generations must be a positive integer', 'max_generations');
  }
  return max;
}

async function liveRecords<K extends EntityKind>(
  tx: StorageTransaction,
  resolver: VisibilityResolver,
  kind: K,
  accountId: number,
): Promise<EntityRecord<K>[]> {
  return resolver.filterLive(await tx.queryRecords(kind, accountId));
}

/**
 * Read-side walks over committed state. Every call runs in its own
 * storage transaction and sees only live records.
 */
export class GraphTraversal {
  constructor(private readonly storage: GenealogyStorage) {}

  ancestors(accountId: number, personId: number, options: LineageOptions = {}): Promise<LineageEntry[]> {
    return this.lineage(accountId, personId, 'up', assertGenerations(options));
  }

  descendants(accountId: number, personId: number, options: LineageOptions = {}): Promise<LineageEntry[]> {
    return this.lineage(accountId, personId, 'down', assertGenerations(options));
  }

  /**
   * Breadth-first over live parent edges. Each person is reported once, at
   * the nearest generation it was reached.
   */
  private lineage(
    accountId: number,
    personId: number,
    direction: Direction,
    maxGenerations: number,
  ): Promise<LineageEntry[]> {
    return this.storage.transaction(async (tx) => {
      const resolver = new VisibilityResolver(tx);
      const start = await resolver.requireLiveTarget('person', personId, accountId);

      const entries: LineageEntry[] = [];
      const visited = new Set<number>([start.id]);
      let frontier = [start.id];
      let generation = 0;

      while (frontier.length > 0 && generation < maxGenerations) {
        generation += 1;
        const next: number[] = [];

        for (const current of frontier) {
          const edges = await resolver.filterLive(
            await tx.queryRecords('relationship', accountId, {
              where:
                direction === 'up'
                  ? { type: 'parent', person2_id: current }
                  : { type: 'parent', person1_id: current },
            }),
          );

          for (const edge of edges) {
            const relativeId = direction === 'up' ? edge.fields.person1_id : edge.fields.person2_id;
            if (relativeId === start.id) {
              throw new GraphCorruptedError(
                `Person ${start.id} is reachable from itself through parent edges`,
                accountId,
                start.id,
              );
            }
            if (visited.has(relativeId)) continue;
            visited.add(relativeId);

            const person = await tx.findRecord('person', relativeId);
            if (!person) continue;
            entries.push({ generation, person });
            next.push(relativeId);
          }
        }
        frontier = next;
      }

      return entries.sort(
        (a, b) => a.generation - b.generation || comparePeople(a.person, b.person),
      );
    });
  }

  neighbors(accountId: number, personId: number): Promise<Neighborhood> {
    return this.storage.transaction(async (tx) => {
      const resolver = new VisibilityResolver(tx);
      const person = await resolver.requireLiveTarget('person', personId, accountId);

      const edges = await resolver.filterLive([
        ...(await tx.queryRecords('relationship', accountId, { where: { person1_id: person.id } })),
        ...(await tx.queryRecords('relationship', accountId, { where: { person2_id: person.id } })),
      ]);

      const buckets: { [R in keyof Neighborhood]: Set<number> } = {
        parents: new Set(),
        children: new Set(),
        spouses: new Set(),
        partners: new Set(),
        siblings: new Set(),
        guardians: new Set(),
        wards: new Set(),
        godparents: new Set(),
        godchildren: new Set(),
      };

      for (const edge of edges) {
        const { person1_id, person2_id, type } = edge.fields;
        const outgoing = person1_id === person.id;
        const other = outgoing ? person2_id : person1_id;
        switch (type) {
          case 'parent':
            (outgoing ? buckets.children : buckets.parents).add(other);
            break;
          case 'guardian':
            (outgoing ? buckets.wards : buckets.guardians).add(other);
            break;
          case 'godparent':
            (outgoing ? buckets.godchildren : buckets.godparents).add(other);
            break;
          case 'spouse':
            buckets.spouses.add(other);
            break;
          case 'partner':
            buckets.partners.add(other);
            break;
          case 'sibling':
            buckets.siblings.add(other);
            break;
        }
      }

      const load = async (ids: Set<number>): Promise<EntityRecord<'person'>[]> => {
        const people: EntityRecord<'person'>[] = [];
        for (const id of [...ids].sort((a, b) => a - b)) {
          const record = await tx.findRecord('person', id);
          if (record) people.push(record);
        }
        return people;
      };

      return {
        parents: await load(buckets.parents),
        children: await load(buckets.children),
        spouses: await load(buckets.spouses),
        partners: await load(buckets.partners),
        siblings: await load(buckets.siblings),
        guardians: await load(buckets.guardians),
        wards: await load(buckets.wards),
        godparents: await load(buckets.godparents),
        godchildren: await load(buckets.godchildren),
      };
    });
  }

  /** Events the person took part in or created, oldest first. */
  timeline(accountId: number, personId: number): Promise<TimelineEntry[]> {
    return this.storage.transaction(async (tx) => {
      const resolver = new VisibilityResolver(tx);
      const person = await resolver.requireLiveTarget('person', personId, accountId);

      const entries = new Map<number, TimelineEntry>();
      const entryFor = (event: EntityRecord<'event'>): TimelineEntry => {
        const existing = entries.get(event.id);
        if (existing) return existing;
        const entry: TimelineEntry = { event, roles: [], created_by_person: false };
        entries.set(event.id, entry);
        return entry;
      };

      const participations = await resolver.filterLive(
        await tx.queryRecords('event_person', accountId, { where: { person_id: person.id } }),
      );
      for (const link of participations) {
        const event = await tx.findRecord('event', link.fields.event_id);
        if (!event) continue;
        const entry = entryFor(event);
        if (link.fields.role !== null) entry.roles.push(link.fields.role);
      }

      const created = await resolver.filterLive(
        await tx.queryRecords('event', accountId, { where: { created_by: person.id } }),
      );
      for (const event of created) {
        entryFor(event).created_by_person = true;
      }

      return [...entries.values()].sort((a, b) => compareEvents(a.event, b.event));
    });
  }

  /**
   * One consistent, ordered read of the account's live graph. With a
   * privacy filter, excluded people and everything depending on them are
   * left out, and `created_by` pointers at people not in the snapshot are
   * cleared.
   */
  snapshot(accountId: number, options: ExportOptions = {}): Promise<GraphSnapshot> {
    const allowed: ReadonlySet<Privacy> | null = options.privacy ? new Set(options.privacy) : null;

    return this.storage.transaction(async (tx) => {
      const resolver = new VisibilityResolver(tx);
      const included = new Set<string>();

      const keep = async <K extends EntityKind>(
        kind: K,
        accept: (record: EntityRecord<K>) => boolean = () => true,
      ): Promise<EntityRecord<K>[]> => {
        const kept = (await liveRecords(tx, resolver, kind, accountId)).filter(
          (record) =>
            accept(record) &&
            descriptorFor(record.kind)
              .dependencies(record.fields)
              .every((ref) => included.has(`${ref.entity_type}:${ref.entity_id}`)),
        );
        for (const record of kept) included.add(`${kind}:${record.id}`);
        return kept;
      };

      // Dependencies always come from an earlier kind in this sequence.
      const people = await keep('person', (p) => allowed === null || allowed.has(p.fields.privacy));
      const relationships = await keep('relationship');
      const events = (await keep('event')).map((event) =>
        event.fields.created_by !== null && !included.has(`person:${event.fields.created_by}`)
          ? { ...event, fields: { ...event.fields, created_by: null } }
          : event,
      );
      const eventPeople = await keep('event_person');
      const media = await keep('media');
      const mediaLinks = await keep('media_link');
      const sources = await keep('source');
      const sourceLinks = await keep('source_link');

      return {
        account_id: accountId,
        people: people.sort(comparePeople),
        relationships: relationships.sort(compareRelationships),
        events: events.sort(compareEvents),
        event_people: eventPeople.sort(byId),
        media: media.sort(byId),
        media_links: mediaLinks.sort(byId),
        sources: sources.sort(byId),
        source_links: sourceLinks.sort(byId),
      };
    });
  }
}
