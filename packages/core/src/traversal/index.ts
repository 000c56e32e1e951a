export { GraphTraversal } from './graph-traversal.js';
export { buildExportGraph, toJsonProjection, serializeProjection } from './export.js';
export type {
  ExportGraph,
  ExportIndividual,
  ExportEvent,
  ExportParticipation,
  ExportRelationship,
  FlatRecord,
  JsonProjection,
} from './export.js';
export { byId, compareEvents, comparePeople, compareRelationships, sortedIds } from './ordering.js';
export type {
  ExportOptions,
  GraphSnapshot,
  LineageEntry,
  LineageOptions,
  Neighborhood,
  TimelineEntry,
} from './types.js';
