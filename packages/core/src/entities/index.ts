export {
  PRIVACY_LEVELS,
  RELATIONSHIP_TYPES,
  LINK_TARGET_KINDS,
  ENTITY_KINDS,
} from './types.js';
export type {
  Privacy,
  RelationshipType,
  LinkTargetKind,
  PersonFields,
  RelationshipFields,
  EventFields,
  EventPersonFields,
  MediaFields,
  MediaLinkFields,
  SourceFields,
  SourceLinkFields,
  EntityFieldMap,
  EntityKind,
  FieldsOf,
  EntityRecord,
  EntityRef,
  RecordQuery,
  RecordPage,
} from './types.js';
export { descriptorFor, isEntityKind } from './kinds.js';
export type { KindDescriptor, JsonSchema } from './kinds.js';
export {
  PARTIAL_DATE_PATTERN,
  isPartialDate,
  comparePartialDates,
  compareOptionalDates,
  intervalsOverlap,
} from './dates.js';
export type { DateInterval } from './dates.js';
export {
  validateCreateInput,
  validatePatchInput,
  assertMutableFields,
  assertFieldConsistency,
} from './validation.js';
