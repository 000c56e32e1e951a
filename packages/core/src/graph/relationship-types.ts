import { InvalidRelationshipError } from '../shared/errors.js';
import type { FieldPatch } from '../shared/types.js';
import { RELATIONSHIP_TYPES } from '../entities/types.js';
import type { RelationshipType } from '../entities/types.js';

export const SYMMETRIC_TYPES: ReadonlySet<RelationshipType> = new Set<RelationshipType>([
  'spouse',
  'partner',
  'sibling',
]);

interface TypeAlias {
  type: RelationshipType;
  /** The alias names the relation from the other end. */
  swap: boolean;
}

// Everyday relation words accepted on input and stored as canonical types.
const ALIASES: Readonly<Record<string, TypeAlias>> = {
  father: { type: 'parent', swap: false },
  mother: { type: 'parent', swap: false },
  child: { type: 'parent', swap: true },
  son: { type: 'parent', swap: true },
  daughter: { type: 'parent', swap: true },
  husband: { type: 'spouse', swap: false },
  wife: { type: 'spouse', swap: false },
  brother: { type: 'sibling', swap: false },
  sister: { type: 'sibling', swap: false },
};

export function isSymmetric(type: RelationshipType): boolean {
  return SYMMETRIC_TYPES.has(type);
}

export function resolveRelationshipType(raw: string): TypeAlias {
  const key = raw.trim().toLowerCase();
  const canonical = RELATIONSHIP_TYPES.find((type) => type === key);
  if (canonical) return { type: canonical, swap: false };

  const alias = Object.hasOwn(ALIASES, key) ? ALIASES[key] : undefined;
  if (!alias) {
    throw new InvalidRelationshipError(`Unknown relationship type "${raw}"`, 'malformed_type');
  }
  return alias;
}

/**
 * Rewrites a relationship create payload into canonical form: aliases become
 * canonical types (swapping endpoints where the alias reads backwards) and
 * symmetric edges are stored smaller person id first.
 */
export function normalizeRelationshipInput(input: FieldPatch): FieldPatch {
  const rawType = input.type;
  if (typeof rawType !== 'string') {
    throw new InvalidRelationshipError('Relationship type is required', 'malformed_type');
  }

  const { type, swap } = resolveRelationshipType(rawType);
  let first = input.person1_id;
  let second = input.person2_id;
  if (swap) [first, second] = [second, first];

  if (isSymmetric(type) && typeof first === 'number' && typeof second === 'number' && second < first) {
    [first, second] = [second, first];
  }

  return { ...input, type, person1_id: first, person2_id: second };
}
