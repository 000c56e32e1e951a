import { ValidationError } from '../shared/errors.js';
import { isPlainObject, toJsonObject } from '../shared/types.js';
import type { JsonObject } from '../shared/types.js';

export type Source = Readonly<Record<string, unknown>>;

export function readText(source: Source, key: string): string {
  const value = source[key];
  if (typeof value !== 'string') {
    throw new ValidationError(`${key} must be a string`, key);
  }
  return value;
}

export function readOptionalText(source: Source, key: string): string | null {
  const value = source[key];
  if (value === undefined || value === null) return null;
  return readText(source, key);
}

export function readId(source: Source, key: string): number {
  const value = source[key];
  const id = typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : value;
  if (typeof id !== 'number' || !Number.isSafeInteger(id) || id < 1) {
    throw new ValidationError(`${key} must be a positive integer id`, key);
  }
  return id;
}

export function readOptionalId(source: Source, key: string): number | null {
  const value = source[key];
  if (value === undefined || value === null) return null;
  return readId(source, key);
}

export function readBoolean(source: Source, key: string): boolean {
  const value = source[key];
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${key} must be a boolean`, key);
  }
  return value;
}

export function readDate(source: Source, key: string): Date {
  const value = source[key];
  const date = value instanceof Date ? value : typeof value === 'string' ? new Date(value) : undefined;
  if (!date || Number.isNaN(date.getTime())) {
    throw new ValidationError(`${key} must be a timestamp`, key);
  }
  return date;
}

export function readEnum<T extends string>(
  source: Source,
  key: string,
  allowed: readonly T[],
  fallback?: T,
): T {
  const value = source[key];
  if ((value === undefined || value === null) && fallback !== undefined) return fallback;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ValidationError(`${key} must be one of ${allowed.join(', ')}`, key);
  }
  return match;
}

export function readOptionalJsonObject(source: Source, key: string): JsonObject | null {
  const value = source[key];
  if (value === undefined || value === null) return null;
  if (!isPlainObject(value)) {
    throw new ValidationError(`${key} must be an object`, key);
  }
  return toJsonObject(value, key);
}
