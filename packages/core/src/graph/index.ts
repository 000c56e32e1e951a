export { GraphInvariantChecker, isAncestor } from './invariant-checker.js';
export type { ParentLookup } from './invariant-checker.js';
export {
  SYMMETRIC_TYPES,
  isSymmetric,
  resolveRelationshipType,
  normalizeRelationshipInput,
} from './relationship-types.js';
