export {
  ERROR_CODES,
  DomainError,
  NotFoundError,
  InvalidRelationshipError,
  CycleDetectedError,
  DuplicateRelationshipError,
  ConflictError,
  ForbiddenError,
  ValidationError,
  StorageUnavailableError,
  GraphCorruptedError,
  RevisionLedgerError,
} from './errors.js';
export type { ErrorCode, InvalidRelationshipReason } from './errors.js';
export { isPlainObject, toJsonValue, toJsonObject, toFieldValue } from './types.js';
export type {
  JsonValue,
  JsonObject,
  FieldValue,
  FieldMap,
  FieldPatch,
  AccountContext,
  Account,
} from './types.js';
export { createPool, runMigrations, checkHealth, isTransientStorageError } from './database.js';
export type { DatabaseConfig, HealthReport } from './database.js';
export { createLogger, createSilentLogger, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel, LoggerOptions } from './logger.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { withStorageRetry, DEFAULT_RETRY } from './retry.js';
export type { RetryOptions } from './retry.js';
