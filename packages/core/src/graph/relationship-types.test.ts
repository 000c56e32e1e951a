import { describe, it, expect } from 'vitest';
import { InvalidRelationshipError } from '../shared/errors.js';
import { isSymmetric, normalizeRelationshipInput, resolveRelationshipType } from './relationship-types.js';

describe('Relationship types', () => {
  it('should resolve canonical types and aliases case-insensitively', () => {
    expect(resolveRelationshipType('guardian')).toEqual({ type: 'guardian', swap: false });
    expect(resolveRelationshipType('Mother')).toEqual({ type: 'parent', swap: false });
    expect(resolveRelationshipType(' SON ')).toEqual({ type: 'parent', swap: true });
    expect(resolveRelationshipType('Sister')).toEqual({ type: 'sibling', swap: false });
  });

  it('should reject unknown words', () => {
    expect(() => resolveRelationshipType('cousin')).toThrow(InvalidRelationshipError);
    expect(() => resolveRelationshipType('toString')).toThrow(InvalidRelationshipError);
  });

  it('should know which types are symmetric', () => {
    expect(isSymmetric('spouse')).toBe(true);
    expect(isSymmetric('sibling')).toBe(true);
    expect(isSymmetric('parent')).toBe(false);
    expect(isSymmetric('godparent')).toBe(false);
  });
});

describe('normalizeRelationshipInput', () => {
  it('should store symmetric edges smaller id first', () => {
    expect(normalizeRelationshipInput({ person1_id: 9, person2_id: 4, type: 'wife' })).toEqual({
      person1_id: 4,
      person2_id: 9,
      type: 'spouse',
    });
  });

  it('should swap endpoints for aliases named from the child', () => {
    expect(normalizeRelationshipInput({ person1_id: 2, person2_id: 7, type: 'daughter', details: 'adopted' })).toEqual({
      person1_id: 7,
      person2_id: 2,
      type: 'parent',
      details: 'adopted',
    });
  });

  it('should leave directed edges in the given orientation', () => {
    expect(normalizeRelationshipInput({ person1_id: 9, person2_id: 4, type: 'guardian' })).toEqual({
      person1_id: 9,
      person2_id: 4,
      type: 'guardian',
    });
  });

  it('should require a type', () => {
    expect(() => normalizeRelationshipInput({ person1_id: 1, person2_id: 2 })).toThrow('Relationship type is required');
  });
});
