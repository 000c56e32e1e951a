import { PARTIAL_DATE_PATTERN } from './dates.js';
import {
  readEnum,
  readId,
  readOptionalId,
  readOptionalJsonObject,
  readOptionalText,
  readText,
} from './decode.js';
import type { Source } from './decode.js';
import {
  ENTITY_KINDS,
  LINK_TARGET_KINDS,
  PRIVACY_LEVELS,
  RELATIONSHIP_TYPES,
} from './types.js';
import type { EntityKind, EntityRef, FieldsOf } from './types.js';

export type JsonSchema = Record<string, unknown>;

/**
 * Everything the engine knows about one entity kind: where it lives, which
 * columns it accepts, and which other entities it cannot outlive.
 */
export interface KindDescriptor<K extends EntityKind> {
  kind: K;
  table: string;
  columns: readonly string[];
  required: readonly string[];
  /** Columns fixed at creation time. */
  immutable: readonly string[];
  properties: Readonly<Record<string, JsonSchema>>;
  decode(source: Source): FieldsOf<K>;
  /** Entities that must be live for a record of this kind to be live. */
  dependencies(fields: FieldsOf<K>): EntityRef[];
}

const text: JsonSchema = { type: 'string', nullable: true, maxLength: 10_000 };
const name: JsonSchema = { type: 'string', minLength: 1, maxLength: 200 };
const partialDate: JsonSchema = { type: 'string', nullable: true, pattern: PARTIAL_DATE_PATTERN };
const id: JsonSchema = { type: 'integer', minimum: 1 };
const optionalId: JsonSchema = { type: 'integer', nullable: true, minimum: 1 };
const linkTarget: JsonSchema = { type: 'string', enum: [...LINK_TARGET_KINDS] };

const person: KindDescriptor<'person'> = {
  kind: 'person',
  table: 'people',
  columns: [
    'given_name',
    'family_name',
    'other_names',
    'gender',
    'birth_date',
    'death_date',
    'birth_place',
    'bio',
    'privacy',
    'relation',
  ],
  required: ['given_name', 'family_name'],
  immutable: [],
  properties: {
    given_name: name,
    family_name: name,
    other_names: text,
    gender: text,
    birth_date: partialDate,
    death_date: partialDate,
    birth_place: text,
    bio: text,
    privacy: { type: 'string', enum: [...PRIVACY_LEVELS] },
    relation: text,
  },
  decode: (s) => ({
    given_name: readText(s, 'given_name'),
    family_name: readText(s, 'family_name'),
    other_names: readOptionalText(s, 'other_names'),
    gender: readOptionalText(s, 'gender'),
    birth_date: readOptionalText(s, 'birth_date'),
    death_date: readOptionalText(s, 'death_date'),
    birth_place: readOptionalText(s, 'birth_place'),
    bio: readOptionalText(s, 'bio'),
    privacy: readEnum(s, 'privacy', PRIVACY_LEVELS, 'private'),
    relation: readOptionalText(s, 'relation'),
  }),
  dependencies: () => [],
};

const relationship: KindDescriptor<'relationship'> = {
  kind: 'relationship',
  table: 'relationships',
  columns: ['person1_id', 'person2_id', 'type', 'details', 'start_date', 'end_date'],
  required: ['person1_id', 'person2_id', 'type'],
  immutable: ['person1_id', 'person2_id', 'type'],
  properties: {
    person1_id: id,
    person2_id: id,
    // Aliases such as "father" are accepted here and normalised later.
    type: { type: 'string', minLength: 1, maxLength: 50 },
    details: text,
    start_date: partialDate,
    end_date: partialDate,
  },
  decode: (s) => ({
    person1_id: readId(s, 'person1_id'),
    person2_id: readId(s, 'person2_id'),
    type: readEnum(s, 'type', RELATIONSHIP_TYPES),
    details: readOptionalText(s, 'details'),
    start_date: readOptionalText(s, 'start_date'),
    end_date: readOptionalText(s, 'end_date'),
  }),
  dependencies: (f) => [
    { entity_type: 'person', entity_id: f.person1_id },
    { entity_type: 'person', entity_id: f.person2_id },
  ],
};

const event: KindDescriptor<'event'> = {
  kind: 'event',
  table: 'events',
  columns: ['title', 'event_date', 'place', 'description', 'created_by'],
  required: [],
  immutable: [],
  properties: {
    title: text,
    event_date: partialDate,
    place: text,
    description: text,
    created_by: optionalId,
  },
  decode: (s) => ({
    title: readOptionalText(s, 'title'),
    event_date: readOptionalText(s, 'event_date'),
    place: readOptionalText(s, 'place'),
    description: readOptionalText(s, 'description'),
    created_by: readOptionalId(s, 'created_by'),
  }),
  // created_by is attribution only; the event outlives its author.
  dependencies: () => [],
};

const eventPerson: KindDescriptor<'event_person'> = {
  kind: 'event_person',
  table: 'event_people',
  columns: ['event_id', 'person_id', 'role'],
  required: ['event_id', 'person_id'],
  immutable: ['event_id', 'person_id'],
  properties: { event_id: id, person_id: id, role: text },
  decode: (s) => ({
    event_id: readId(s, 'event_id'),
    person_id: readId(s, 'person_id'),
    role: readOptionalText(s, 'role'),
  }),
  dependencies: (f) => [
    { entity_type: 'event', entity_id: f.event_id },
    { entity_type: 'person', entity_id: f.person_id },
  ],
};

const media: KindDescriptor<'media'> = {
  kind: 'media',
  table: 'media',
  columns: ['filename', 'url', 'mime_type', 'caption', 'metadata'],
  required: [],
  immutable: [],
  properties: {
    filename: text,
    url: text,
    mime_type: text,
    caption: text,
    metadata: { type: 'object', nullable: true },
  },
  decode: (s) => ({
    filename: readOptionalText(s, 'filename'),
    url: readOptionalText(s, 'url'),
    mime_type: readOptionalText(s, 'mime_type'),
    caption: readOptionalText(s, 'caption'),
    metadata: readOptionalJsonObject(s, 'metadata'),
  }),
  dependencies: () => [],
};

const mediaLink: KindDescriptor<'media_link'> = {
  kind: 'media_link',
  table: 'media_links',
  columns: ['media_id', 'entity_type', 'entity_id', 'role'],
  required: ['media_id', 'entity_type', 'entity_id'],
  immutable: ['media_id', 'entity_type', 'entity_id'],
  properties: { media_id: id, entity_type: linkTarget, entity_id: id, role: text },
  decode: (s) => ({
    media_id: readId(s, 'media_id'),
    entity_type: readEnum(s, 'entity_type', LINK_TARGET_KINDS),
    entity_id: readId(s, 'entity_id'),
    role: readOptionalText(s, 'role'),
  }),
  dependencies: (f) => [
    { entity_type: 'media', entity_id: f.media_id },
    { entity_type: f.entity_type, entity_id: f.entity_id },
  ],
};

const source: KindDescriptor<'source'> = {
  kind: 'source',
  table: 'sources',
  columns: ['title', 'url', 'citation_text'],
  required: [],
  immutable: [],
  properties: { title: text, url: text, citation_text: text },
  decode: (s) => ({
    title: readOptionalText(s, 'title'),
    url: readOptionalText(s, 'url'),
    citation_text: readOptionalText(s, 'citation_text'),
  }),
  dependencies: () => [],
};

const sourceLink: KindDescriptor<'source_link'> = {
  kind: 'source_link',
  table: 'source_links',
  columns: ['source_id', 'entity_type', 'entity_id', 'note'],
  required: ['source_id', 'entity_type', 'entity_id'],
  immutable: ['source_id', 'entity_type', 'entity_id'],
  properties: { source_id: id, entity_type: linkTarget, entity_id: id, note: text },
  decode: (s) => ({
    source_id: readId(s, 'source_id'),
    entity_type: readEnum(s, 'entity_type', LINK_TARGET_KINDS),
    entity_id: readId(s, 'entity_id'),
    note: readOptionalText(s, 'note'),
  }),
  dependencies: (f) => [
    { entity_type: 'source', entity_id: f.source_id },
    { entity_type: f.entity_type, entity_id: f.entity_id },
  ],
};

const KIND_DESCRIPTORS: { [K in EntityKind]: KindDescriptor<K> } = {
  person,
  relationship,
  event,
  event_person: eventPerson,
  media,
  media_link: mediaLink,
  source,
  source_link: sourceLink,
};

export function descriptorFor<K extends EntityKind>(kind: K): KindDescriptor<K> {
  return KIND_DESCRIPTORS[kind];
}

export function isEntityKind(value: unknown): value is EntityKind {
  return ENTITY_KINDS.some((kind) => kind === value);
}
