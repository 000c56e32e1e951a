import { describe, it, expect } from 'vitest';
import type { EntityKind, EntityRecord, FieldsOf, PersonFields } from '../entities/types.js';
import { buildExportGraph, serializeProjection, toJsonProjection } from './export.js';
import { comparePeople, compareRelationships } from './ordering.js';
import type { GraphSnapshot } from './types.js';

const at = new Date('2024-01-01T00:00:00Z');

function record<K extends EntityKind>(kind: K, id: number, fields: FieldsOf<K>): EntityRecord<K> {
  return { kind, id, account_id: 1, version: 1, is_deleted: false, created_at: at, updated_at: at, fields };
}

function person(id: number, given: string, birth: string | null): EntityRecord<'person'> {
  const fields: PersonFields = {
    given_name: given,
    family_name: 'Reis',
    other_names: null,
    gender: null,
    birth_date: birth,
    death_date: null,
    birth_place: null,
    bio: null,
    privacy: 'private',
    relation: null,
  };
  return record('person', id, fields);
}

function edge(id: number, p1: number, p2: number, type: FieldsOf<'relationship'>['type']) {
  return record('relationship', id, { person1_id: p1, person2_id: p2, type, details: null, start_date: null, end_date: null });
}

function snapshot(): GraphSnapshot {
  return {
    account_id: 1,
    people: [person(1, 'Avo', '1900'), person(3, 'Mae', '1930'), person(2, 'Filho', null)],
    relationships: [edge(10, 1, 3, 'parent'), edge(11, 2, 3, 'godparent'), edge(12, 3, 2, 'parent')],
    events: [record('event', 20, { title: 'Census', event_date: '1940', place: null, description: null, created_by: 3 })],
    event_people: [record('event_person', 21, { event_id: 20, person_id: 3, role: 'head' })],
    media: [],
    media_links: [],
    sources: [record('source', 30, { title: 'Register', url: null, citation_text: null })],
    source_links: [record('source_link', 31, { source_id: 30, entity_type: 'person', entity_id: 3, note: null })],
  };
}

describe('Export ordering', () => {
  it('should sort people by birth date with undated people last', () => {
    const people = [person(5, 'E', null), person(4, 'D', '1950'), person(2, 'B', '1950'), person(3, 'C', null)];
    expect(people.sort(comparePeople).map((p) => p.id)).toEqual([2, 4, 3, 5]);
  });

  it('should sort relationships by endpoints, then type, then id', () => {
    const edges = [edge(4, 2, 3, 'sibling'), edge(3, 1, 5, 'parent'), edge(2, 2, 3, 'partner'), edge(1, 2, 3, 'partner')];
    expect(edges.sort(compareRelationships).map((r) => r.id)).toEqual([3, 1, 2, 4]);
  });
});

describe('buildExportGraph', () => {
  it('should centre kinship on each individual', () => {
    const graph = buildExportGraph(snapshot());
    const mae = graph.individuals.find((i) => i.id === 3);

    expect(mae).toMatchObject({
      parents: [1],
      children: [2],
      spouses: [],
      events: [{ event_id: 20, role: 'head' }],
      sources: [30],
    });
    expect(graph.individuals.map((i) => i.id)).toEqual([1, 3, 2]);
  });

  it('should keep godparent edges in relationships only', () => {
    const graph = buildExportGraph(snapshot());
    const filho = graph.individuals.find((i) => i.id === 2);

    expect(filho?.parents).toEqual([3]);
    expect(graph.relationships.map((r) => r.type)).toEqual(['parent', 'godparent', 'parent']);
  });

  it('should list event participants', () => {
    expect(buildExportGraph(snapshot()).events).toEqual([
      {
        id: 20,
        title: 'Census',
        event_date: '1940',
        place: null,
        description: null,
        created_by: 3,
        participants: [{ person_id: 3, role: 'head' }],
      },
    ]);
  });
});

describe('serializeProjection', () => {
  it('should write flat records with two-space indentation and a trailing newline', () => {
    const text = serializeProjection(toJsonProjection(snapshot()));

    expect(text.endsWith('\n')).toBe(true);
    expect(text.startsWith('{\n  "account_id": 1,\n  "people": [\n    {\n      "id": 1,\n      "given_name": "Avo",')).toBe(
      true,
    );
  });

  it('should be identical for identical snapshots', () => {
    expect(serializeProjection(toJsonProjection(snapshot()))).toBe(serializeProjection(toJsonProjection(snapshot())));
  });
});
