import { ValidationError } from './errors.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** A single column value as the engine sees it. */
export type FieldValue = string | number | boolean | JsonObject | null;

export type FieldMap = Readonly<Record<string, FieldValue>>;

/** Field-level partial patch keyed by column name. */
export type FieldPatch = Record<string, FieldValue>;

/**
 * Authenticated caller context. Established upstream by the route layer;
 * every engine call is scoped to `account_id`.
 */
export interface AccountContext {
  account_id: number;
  author: string;
}

export interface Account {
  id: number;
  name: string;
  created_at: Date;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export function toJsonValue(value: unknown, path = '$'): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`Non-finite number at ${path}`, path);
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => toJsonValue(item, `${path}[${index}]`));
  }
  if (isPlainObject(value)) {
    return toJsonObject(value, path);
  }
  throw new ValidationError(`Value at ${path} is not JSON-serializable`, path);
}

export function toJsonObject(value: Record<string, unknown>, path = '$'): JsonObject {
  const result: JsonObject = {};
  for (const [key, item] of Object.entries(value)) {
    if (item === undefined) continue;
    result[key] = toJsonValue(item, `${path}.${key}`);
  }
  return result;
}

export function toFieldValue(value: unknown, field: string): FieldValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (isPlainObject(value)) return toJsonObject(value, field);
  throw new ValidationError(`Unsupported value for field ${field}`, field);
}
