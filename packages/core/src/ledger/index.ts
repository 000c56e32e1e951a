export { RevisionLedger } from './revision-ledger.js';
export { diffFields, hasChanges, foldRevisions } from './diff.js';
export type { ReplayState } from './diff.js';
export type {
  Revision,
  NewRevision,
  RevisionAction,
  RevisionChanges,
  FieldChange,
  RevisionQuery,
  RevisionPage,
  ReconstructedRecord,
} from './types.js';
