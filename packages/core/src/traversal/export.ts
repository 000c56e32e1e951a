import type { EntityKind, EntityRecord, FieldsOf, Privacy, RelationshipType } from '../entities/types.js';
import { sortedIds } from './ordering.js';
import type { GraphSnapshot } from './types.js';

export interface ExportParticipation {
  event_id: number;
  role: string | null;
}

export interface ExportIndividual {
  id: number;
  given_name: string;
  family_name: string;
  other_names: string | null;
  gender: string | null;
  birth_date: string | null;
  death_date: string | null;
  birth_place: string | null;
  bio: string | null;
  privacy: Privacy;
  parents: number[];
  children: number[];
  spouses: number[];
  partners: number[];
  siblings: number[];
  events: ExportParticipation[];
  media: number[];
  sources: number[];
}

export interface ExportRelationship {
  id: number;
  type: RelationshipType;
  person1_id: number;
  person2_id: number;
  start_date: string | null;
  end_date: string | null;
  details: string | null;
}

export interface ExportEvent {
  id: number;
  title: string | null;
  event_date: string | null;
  place: string | null;
  description: string | null;
  created_by: number | null;
  participants: { person_id: number; role: string | null }[];
}

/** Individual-centred view, shaped for GEDCOM-style writers. */
export interface ExportGraph {
  account_id: number;
  individuals: ExportIndividual[];
  relationships: ExportRelationship[];
  events: ExportEvent[];
  media: FlatRecord<'media'>[];
  sources: FlatRecord<'source'>[];
}

export type FlatRecord<K extends EntityKind> = { id: number } & FieldsOf<K>;

/** Flat table-per-kind view of the same snapshot. */
export interface JsonProjection {
  account_id: number;
  people: FlatRecord<'person'>[];
  relationships: FlatRecord<'relationship'>[];
  events: FlatRecord<'event'>[];
  event_people: FlatRecord<'event_person'>[];
  media: FlatRecord<'media'>[];
  media_links: FlatRecord<'media_link'>[];
  sources: FlatRecord<'source'>[];
  source_links: FlatRecord<'source_link'>[];
}

function flatten<K extends EntityKind>(record: EntityRecord<K>): FlatRecord<K> {
  return { id: record.id, ...record.fields };
}

function pushTo(index: Map<number, number[]>, key: number, value: number): void {
  const list = index.get(key);
  if (list) list.push(value);
  else index.set(key, [value]);
}

export function buildExportGraph(snapshot: GraphSnapshot): ExportGraph {
  const kin = {
    parents: new Map<number, number[]>(),
    children: new Map<number, number[]>(),
    spouses: new Map<number, number[]>(),
    partners: new Map<number, number[]>(),
    siblings: new Map<number, number[]>(),
  };

  for (const { fields } of snapshot.relationships) {
    const { person1_id: first, person2_id: second } = fields;
    switch (fields.type) {
      case 'parent':
        pushTo(kin.children, first, second);
        pushTo(kin.parents, second, first);
        break;
      case 'spouse':
      case 'partner':
      case 'sibling': {
        const index = fields.type === 'spouse' ? kin.spouses : fields.type === 'partner' ? kin.partners : kin.siblings;
        pushTo(index, first, second);
        pushTo(index, second, first);
        break;
      }
      // Guardianship and godparenthood stay in `relationships` only.
      default:
        break;
    }
  }

  const participations = new Map<number, ExportParticipation[]>();
  const participants = new Map<number, { person_id: number; role: string | null }[]>();
  for (const { fields } of snapshot.event_people) {
    const byPerson = participations.get(fields.person_id) ?? [];
    byPerson.push({ event_id: fields.event_id, role: fields.role });
    participations.set(fields.person_id, byPerson);

    const byEvent = participants.get(fields.event_id) ?? [];
    byEvent.push({ person_id: fields.person_id, role: fields.role });
    participants.set(fields.event_id, byEvent);
  }

  const mediaOf = new Map<number, number[]>();
  for (const { fields } of snapshot.media_links) {
    if (fields.entity_type === 'person') pushTo(mediaOf, fields.entity_id, fields.media_id);
  }
  const sourcesOf = new Map<number, number[]>();
  for (const { fields } of snapshot.source_links) {
    if (fields.entity_type === 'person') pushTo(sourcesOf, fields.entity_id, fields.source_id);
  }

  const individuals = snapshot.people.map((person): ExportIndividual => {
    const f = person.fields;
    return {
      id: person.id,
      given_name: f.given_name,
      family_name: f.family_name,
      other_names: f.other_names,
      gender: f.gender,
      birth_date: f.birth_date,
      death_date: f.death_date,
      birth_place: f.birth_place,
      bio: f.bio,
      privacy: f.privacy,
      parents: sortedIds(kin.parents.get(person.id) ?? []),
      children: sortedIds(kin.children.get(person.id) ?? []),
      spouses: sortedIds(kin.spouses.get(person.id) ?? []),
      partners: sortedIds(kin.partners.get(person.id) ?? []),
      siblings: sortedIds(kin.siblings.get(person.id) ?? []),
      events: participations.get(person.id) ?? [],
      media: sortedIds(mediaOf.get(person.id) ?? []),
      sources: sortedIds(sourcesOf.get(person.id) ?? []),
    };
  });

  return {
    account_id: snapshot.account_id,
    individuals,
    relationships: snapshot.relationships.map(({ id, fields }) => ({
      id,
      type: fields.type,
      person1_id: fields.person1_id,
      person2_id: fields.person2_id,
      start_date: fields.start_date,
      end_date: fields.end_date,
      details: fields.details,
    })),
    events: snapshot.events.map(({ id, fields }) => ({
      id,
      title: fields.title,
      event_date: fields.event_date,
      place: fields.place,
      description: fields.description,
      created_by: fields.created_by,
      participants: participants.get(id) ?? [],
    })),
    media: snapshot.media.map(flatten),
    sources: snapshot.sources.map(flatten),
  };
}

export function toJsonProjection(snapshot: GraphSnapshot): JsonProjection {
  return {
    account_id: snapshot.account_id,
    people: snapshot.people.map(flatten),
    relationships: snapshot.relationships.map(flatten),
    events: snapshot.events.map(flatten),
    event_people: snapshot.event_people.map(flatten),
    media: snapshot.media.map(flatten),
    media_links: snapshot.media_links.map(flatten),
    sources: snapshot.sources.map(flatten),
    source_links: snapshot.source_links.map(flatten),
  };
}

export function serializeProjection(projection: JsonProjection): string {
  return `${JSON.stringify(projection, null, 2)}\n`;
}
