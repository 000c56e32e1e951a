import type { FieldPatch, JsonObject } from '../shared/types.js';

export const PRIVACY_LEVELS = ['public', 'private', 'restricted'] as const;
export type Privacy = (typeof PRIVACY_LEVELS)[number];

export const RELATIONSHIP_TYPES = [
  'parent',
  'spouse',
  'partner',
  'sibling',
  'guardian',
  'godparent',
] as const;
export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

/** Kinds a media or source link may point at. */
export const LINK_TARGET_KINDS = ['person', 'relationship', 'event'] as const;
export type LinkTargetKind = (typeof LINK_TARGET_KINDS)[number];

export type PersonFields = {
  given_name: string;
  family_name: string;
  other_names: string | null;
  gender: string | null;
  birth_date: string | null;
  death_date: string | null;
  birth_place: string | null;
  bio: string | null;
  privacy: Privacy;
  relation: string | null;
};

/** For `parent`, person1 is the parent of person2. */
export type RelationshipFields = {
  person1_id: number;
  person2_id: number;
  type: RelationshipType;
  details: string | null;
  start_date: string | null;
  end_date: string | null;
};

export type EventFields = {
  title: string | null;
  event_date: string | null;
  place: string | null;
  description: string | null;
  created_by: number | null;
};

export type EventPersonFields = {
  event_id: number;
  person_id: number;
  role: string | null;
};

export type MediaFields = {
  filename: string | null;
  url: string | null;
  mime_type: string | null;
  caption: string | null;
  metadata: JsonObject | null;
};

export type MediaLinkFields = {
  media_id: number;
  entity_type: LinkTargetKind;
  entity_id: number;
  role: string | null;
};

export type SourceFields = {
  title: string | null;
  url: string | null;
  citation_text: string | null;
};

export type SourceLinkFields = {
  source_id: number;
  entity_type: LinkTargetKind;
  entity_id: number;
  note: string | null;
};

export type EntityFieldMap = {
  person: PersonFields;
  relationship: RelationshipFields;
  event: EventFields;
  event_person: EventPersonFields;
  media: MediaFields;
  media_link: MediaLinkFields;
  source: SourceFields;
  source_link: SourceLinkFields;
};

export type EntityKind = keyof EntityFieldMap;

export const ENTITY_KINDS = [
  'person',
  'relationship',
  'event',
  'event_person',
  'media',
  'media_link',
  'source',
  'source_link',
] as const satisfies readonly EntityKind[];

export type FieldsOf<K extends EntityKind> = EntityFieldMap[K];

export interface EntityRecord<K extends EntityKind = EntityKind> {
  kind: K;
  id: number;
  account_id: number;
  version: number;
  is_deleted: boolean;
  created_at: Date;
  updated_at: Date;
  fields: FieldsOf<K>;
}

/** Non-owning pointer at an entity, used by links and the ledger. */
export interface EntityRef {
  entity_type: EntityKind;
  entity_id: number;
}

export interface RecordQuery {
  /** Column equality; `null` matches SQL NULL. */
  where?: FieldPatch;
  include_tombstoned?: boolean;
  after_id?: number;
  limit?: number;
}

export interface RecordPage<K extends EntityKind = EntityKind> {
  records: EntityRecord<K>[];
  has_more: boolean;
  next_after_id?: number;
}
