import { describe, it, expect } from 'vitest';
import { diffFields, foldRevisions, hasChanges } from './diff.js';
import type { Revision, RevisionAction, RevisionChanges } from './types.js';

function revision(id: number, action: RevisionAction, version: number, changes: RevisionChanges): Revision {
  return {
    id,
    account_id: 1,
    entity_type: 'person',
    entity_id: 10,
    entity_version: version,
    author: 'tester',
    action,
    changes,
    recorded_at: new Date(Date.UTC(2024, 0, 1, 0, 0, id)),
  };
}

describe('diffFields', () => {
  it('should keep only changed fields', () => {
    expect(diffFields({ given_name: 'Ana', bio: 'x' }, { given_name: 'Ana', bio: 'y', gender: null })).toEqual({
      bio: { before: 'x', after: 'y' },
    });
  });

  it('should treat a missing side as all nulls', () => {
    expect(diffFields(null, { given_name: 'Ana', bio: null })).toEqual({
      given_name: { before: null, after: 'Ana' },
    });
    expect(diffFields({ given_name: 'Ana' }, null)).toEqual({
      given_name: { before: 'Ana', after: null },
    });
  });

  it('should compare JSON values structurally', () => {
    const changes = diffFields({ metadata: { width: 640 } }, { metadata: { width: 640 } });
    expect(hasChanges(changes)).toBe(false);
  });

  it('should list changed fields in name order', () => {
    expect(Object.keys(diffFields({}, { title: 'x', caption: 'y' }))).toEqual(['caption', 'title']);
  });
});

describe('foldRevisions', () => {
  const history = [
    revision(1, 'create', 1, {
      given_name: { before: null, after: 'Ana' },
      is_deleted: { before: null, after: false },
    }),
    revision(2, 'update', 2, { bio: { before: null, after: 'Weaver' } }),
    revision(3, 'delete', 3, { is_deleted: { before: false, after: true } }),
  ];

  it('should rebuild the state after each prefix', () => {
    expect(foldRevisions(history.slice(0, 2))).toEqual({
      fields: { given_name: 'Ana', bio: 'Weaver' },
      is_deleted: false,
      version: 2,
      as_of: history[1].recorded_at,
    });
    expect(foldRevisions(history)).toMatchObject({ is_deleted: true, version: 3 });
  });

  it('should return null before the first revision and after a purge', () => {
    expect(foldRevisions([])).toBeNull();
    expect(
      foldRevisions([...history, revision(4, 'purge', 3, { given_name: { before: 'Ana', after: null } })]),
    ).toBeNull();
  });
});
