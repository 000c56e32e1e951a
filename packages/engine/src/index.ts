export { GenealogyEngine } from './genealogy-engine.js';
export { EntityStore } from './entity-store.js';
export { createWriteGuards } from './write-guards.js';
export type { GuardContext, WriteGuard, WriteGuards } from './write-guards.js';
export { runOperation, assertId, assertLimit } from './operation.js';
export type { OperationAttributes } from './operation.js';
export type {
  Clock,
  EngineOptions,
  GetOptions,
  ListOptions,
  ListResult,
  UpdateOptions,
} from './types.js';
