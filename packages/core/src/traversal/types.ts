import type { EntityRecord, Privacy } from '../entities/types.js';

export interface LineageOptions {
  /** Stop after this many generations; unbounded when omitted. */
  max_generations?: number;
}

export interface LineageEntry {
  /** 1 for parents (or children), 2 for grandparents, and so on. */
  generation: number;
  person: EntityRecord<'person'>;
}

export interface Neighborhood {
  parents: EntityRecord<'person'>[];
  children: EntityRecord<'person'>[];
  spouses: EntityRecord<'person'>[];
  partners: EntityRecord<'person'>[];
  siblings: EntityRecord<'person'>[];
  guardians: EntityRecord<'person'>[];
  wards: EntityRecord<'person'>[];
  godparents: EntityRecord<'person'>[];
  godchildren: EntityRecord<'person'>[];
}

export interface TimelineEntry {
  event: EntityRecord<'event'>;
  /** Roles from the person's participation links, in link id order. */
  roles: string[];
  created_by_person: boolean;
}

export interface ExportOptions {
  /** Keep only people carrying one of these tags. */
  privacy?: readonly Privacy[];
}

/** Every live record of one account, in export order. */
export interface GraphSnapshot {
  account_id: number;
  people: EntityRecord<'person'>[];
  relationships: EntityRecord<'relationship'>[];
  events: EntityRecord<'event'>[];
  event_people: EntityRecord<'event_person'>[];
  media: EntityRecord<'media'>[];
  media_links: EntityRecord<'media_link'>[];
  sources: EntityRecord<'source'>[];
  source_links: EntityRecord<'source_link'>[];
}
