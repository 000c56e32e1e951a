export const ERROR_CODES = {
  NOT_FOUND: 'NOT_FOUND',
  INVALID_RELATIONSHIP: 'INVALID_RELATIONSHIP',
  CYCLE_DETECTED: 'CYCLE_DETECTED',
  DUPLICATE_RELATIONSHIP: 'DUPLICATE_RELATIONSHIP',
  CONFLICT: 'CONFLICT',
  FORBIDDEN: 'FORBIDDEN',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  STORAGE_UNAVAILABLE: 'STORAGE_UNAVAILABLE',
  GRAPH_CORRUPTED: 'GRAPH_CORRUPTED',
  APPEND_FAILED: 'APPEND_FAILED',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Base class for every error the engine reports to its caller.
 * `code` is stable and safe to branch on; `message` is for humans.
 */
export abstract class DomainError extends Error {
  abstract readonly code: ErrorCode;
}

export class NotFoundError extends DomainError {
  readonly code = ERROR_CODES.NOT_FOUND;

  constructor(
    public readonly entityType: string,
    public readonly entityId: number,
  ) {
    super(`Entity not found: ${entityType}/${entityId}`);
    this.name = 'NotFoundError';
  }
}

export type InvalidRelationshipReason = 'self_loop' | 'cross_tenant' | 'malformed_type';

export class InvalidRelationshipError extends DomainError {
  readonly code = ERROR_CODES.INVALID_RELATIONSHIP;

  constructor(
    message: string,
    public readonly reason: InvalidRelationshipReason,
  ) {
    super(message);
    this.name = 'InvalidRelationshipError';
  }
}

export class CycleDetectedError extends DomainError {
  readonly code = ERROR_CODES.CYCLE_DETECTED;

  constructor(
    public readonly parentId: number,
    public readonly childId: number,
  ) {
    super(`Person ${childId} is already an ancestor of person ${parentId}; parent edge would create a cycle`);
    this.name = 'CycleDetectedError';
  }
}

export class DuplicateRelationshipError extends DomainError {
  readonly code = ERROR_CODES.DUPLICATE_RELATIONSHIP;

  constructor(public readonly existingRelationshipId: number) {
    super(`Relationship duplicates existing relationship ${existingRelationshipId} over an overlapping period`);
    this.name = 'DuplicateRelationshipError';
  }
}

export class ConflictError extends DomainError {
  readonly code = ERROR_CODES.CONFLICT;

  constructor(
    public readonly entityType: string,
    public readonly entityId: number,
    message: string,
  ) {
    super(`Conflict on ${entityType}/${entityId}: ${message}`);
    this.name = 'ConflictError';
  }
}

export class ForbiddenError extends DomainError {
  readonly code = ERROR_CODES.FORBIDDEN;

  constructor(
    public readonly entityType: string,
    public readonly entityId: number,
  ) {
    super(`Entity ${entityType}/${entityId} belongs to another account`);
    this.name = 'ForbiddenError';
  }
}

export class ValidationError extends DomainError {
  readonly code = ERROR_CODES.VALIDATION_ERROR;

  constructor(
    message: string,
    public readonly field?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class StorageUnavailableError extends DomainError {
  readonly code = ERROR_CODES.STORAGE_UNAVAILABLE;

  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(`Storage unavailable during ${operation} after ${attempts} attempt(s)`, { cause });
    this.name = 'StorageUnavailableError';
  }
}

export class GraphCorruptedError extends DomainError {
  readonly code = ERROR_CODES.GRAPH_CORRUPTED;

  constructor(
    message: string,
    public readonly accountId: number,
    public readonly personId: number,
  ) {
    super(message);
    this.name = 'GraphCorruptedError';
  }
}

export class RevisionLedgerError extends DomainError {
  readonly code = ERROR_CODES.APPEND_FAILED;

  constructor(
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'RevisionLedgerError';
  }
}
