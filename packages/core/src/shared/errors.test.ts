import { describe, it, expect } from 'vitest';
import {
  ConflictError,
  CycleDetectedError,
  DomainError,
  ERROR_CODES,
  ForbiddenError,
  InvalidRelationshipError,
  NotFoundError,
  StorageUnavailableError,
  ValidationError,
} from './errors.js';

describe('Domain errors', () => {
  it('should expose a stable code on every error', () => {
    const errors: DomainError[] = [
      new NotFoundError('person', 4),
      new InvalidRelationshipError('same person', 'self_loop'),
      new CycleDetectedError(1, 2),
      new ConflictError('person', 4, 'stale'),
      new ForbiddenError('person', 4),
      new ValidationError('bad', 'given_name'),
      new StorageUnavailableError('create', 3),
    ];

    expect(errors.map((e) => e.code)).toEqual([
      ERROR_CODES.NOT_FOUND,
      ERROR_CODES.INVALID_RELATIONSHIP,
      ERROR_CODES.CYCLE_DETECTED,
      ERROR_CODES.CONFLICT,
      ERROR_CODES.FORBIDDEN,
      ERROR_CODES.VALIDATION_ERROR,
      ERROR_CODES.STORAGE_UNAVAILABLE,
    ]);
    for (const error of errors) {
      expect(error).toBeInstanceOf(DomainError);
      expect(error).toBeInstanceOf(Error);
    }
  });

  it('should capture entity type and id', () => {
    const error = new NotFoundError('relationship', 42);

    expect(error.entityType).toBe('relationship');
    expect(error.entityId).toBe(42);
    expect(error.message).toBe('Entity not found: relationship/42');
    expect(error.name).toBe('NotFoundError');
  });

  it('should name both endpoints of a rejected parent edge', () => {
    const error = new CycleDetectedError(7, 3);

    expect(error.parentId).toBe(7);
    expect(error.childId).toBe(3);
    expect(error.message).toContain('Person 3 is already an ancestor of person 7');
  });

  it('should keep the last fault behind a storage outage', () => {
    const fault = Object.assign(new Error('reset'), { code: 'ECONNRESET' });
    const error = new StorageUnavailableError('update', 3, fault);

    expect(error.attempts).toBe(3);
    expect(error.cause).toBe(fault);
    expect(error.message).toBe('Storage unavailable during update after 3 attempt(s)');
  });
});
