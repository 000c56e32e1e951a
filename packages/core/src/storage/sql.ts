import { ValidationError } from '../shared/errors.js';
import { isPlainObject, toFieldValue } from '../shared/types.js';
import type { Account, FieldMap, FieldValue } from '../shared/types.js';
import { readBoolean, readDate, readEnum, readId, readText } from '../entities/decode.js';
import { descriptorFor, isEntityKind } from '../entities/kinds.js';
import type { EntityKind, EntityRecord, RecordQuery } from '../entities/types.js';
import type { Revision, RevisionAction, RevisionChanges, RevisionQuery } from '../ledger/types.js';
import type { NewRecord, RecordChange } from './types.js';

export type Row = Record<string, unknown>;

export interface SqlStatement {
  text: string;
  values: unknown[];
}

const REVISION_ACTIONS: readonly RevisionAction[] = ['create', 'update', 'delete', 'purge'];

function assertColumn(kind: EntityKind, column: string): void {
  if (!descriptorFor(kind).columns.includes(column)) {
    throw new ValidationError(`Unknown ${kind} field "${column}"`, column);
  }
}

function toSqlValue(value: FieldValue): unknown {
  return isPlainObject(value) ? JSON.stringify(value) : value;
}

export function buildInsert<K extends EntityKind>(kind: K, record: NewRecord<K>): SqlStatement {
  const descriptor = descriptorFor(kind);
  const fields: FieldMap = record.fields;
  const columns = descriptor.columns;
  const placeholders = columns.map((_, index) => `$${index + 3}`);

  return {
    text:
      `INSERT INTO ${descriptor.table} (account_id, version, is_deleted, created_at, updated_at, ${columns.join(', ')}) ` +
      `VALUES ($1, 1, FALSE, $2, $2, ${placeholders.join(', ')}) RETURNING *`,
    values: [record.account_id, record.recorded_at, ...columns.map((column) => toSqlValue(fields[column] ?? null))],
  };
}

export function buildSelect(kind: EntityKind, accountId: number, query: RecordQuery = {}): SqlStatement {
  const descriptor = descriptorFor(kind);
  const clauses = ['account_id = $1'];
  const values: unknown[] = [accountId];

  for (const [column, value] of Object.entries(query.where ?? {}).sort(([a], [b]) => a.localeCompare(b))) {
    assertColumn(kind, column);
    if (value === null) {
      clauses.push(`${column} IS NULL`);
    } else {
      values.push(toSqlValue(value));
      clauses.push(`${column} = $${values.length}`);
    }
  }
  if (!query.include_tombstoned) {
    clauses.push('is_deleted = FALSE');
  }
  if (query.after_id !== undefined) {
    values.push(query.after_id);
    clauses.push(`id > $${values.length}`);
  }

  let text = `SELECT * FROM ${descriptor.table} WHERE ${clauses.join(' AND ')} ORDER BY id`;
  if (query.limit !== undefined) {
    values.push(query.limit);
    text += ` LIMIT $${values.length}`;
  }
  return { text, values };
}

export function buildCount(kind: EntityKind, accountId: number, includeTombstoned: boolean): SqlStatement {
  const table = descriptorFor(kind).table;
  return {
    text: includeTombstoned
      ? `SELECT COUNT(*)::int AS count FROM ${table} WHERE account_id = $1`
      : `SELECT COUNT(*)::int AS count FROM ${table} WHERE account_id = $1 AND is_deleted = FALSE`,
    values: [accountId],
  };
}

export function buildUpdate(kind: EntityKind, id: number, change: RecordChange): SqlStatement {
  const descriptor = descriptorFor(kind);
  const values: unknown[] = [id, change.expected_version, change.recorded_at];
  const assignments = ['version = version + 1', 'updated_at = $3'];

  for (const column of Object.keys(change.changes).sort()) {
    assertColumn(kind, column);
    values.push(toSqlValue(change.changes[column] ?? null));
    assignments.push(`${column} = $${values.length}`);
  }
  if (change.is_deleted !== undefined) {
    values.push(change.is_deleted);
    assignments.push(`is_deleted = $${values.length}`);
  }

  const guard = change.allow_tombstoned ? '' : ' AND is_deleted = FALSE';
  return {
    text: `UPDATE ${descriptor.table} SET ${assignments.join(', ')} WHERE id = $1 AND version = $2${guard} RETURNING *`,
    values,
  };
}

export function buildDelete(kind: EntityKind, id: number): SqlStatement {
  return { text: `DELETE FROM ${descriptorFor(kind).table} WHERE id = $1`, values: [id] };
}

export function buildFind(kind: EntityKind, id: number): SqlStatement {
  return { text: `SELECT * FROM ${descriptorFor(kind).table} WHERE id = $1`, values: [id] };
}

export function buildRevisionSelect(accountId: number, query: RevisionQuery): SqlStatement {
  const clauses = ['account_id = $1'];
  const values: unknown[] = [accountId];
  const add = (clause: (placeholder: string) => string, value: unknown) => {
    values.push(value);
    clauses.push(clause(`$${values.length}`));
  };

  if (query.entity_type !== undefined) add((p) => `entity_type = ${p}`, query.entity_type);
  if (query.entity_id !== undefined) add((p) => `entity_id = ${p}`, query.entity_id);
  if (query.from !== undefined) add((p) => `recorded_at >= ${p}`, query.from);
  if (query.to !== undefined) add((p) => `recorded_at <= ${p}`, query.to);
  if (query.after_id !== undefined) add((p) => `id > ${p}`, query.after_id);

  let text = `SELECT * FROM revisions WHERE ${clauses.join(' AND ')} ORDER BY id`;
  if (query.limit !== undefined) {
    values.push(query.limit);
    text += ` LIMIT $${values.length}`;
  }
  return { text, values };
}

export function rowToRecord<K extends EntityKind>(kind: K, row: Row): EntityRecord<K> {
  return {
    kind,
    id: readId(row, 'id'),
    account_id: readId(row, 'account_id'),
    version: readId(row, 'version'),
    is_deleted: readBoolean(row, 'is_deleted'),
    created_at: readDate(row, 'created_at'),
    updated_at: readDate(row, 'updated_at'),
    fields: descriptorFor(kind).decode(row),
  };
}

export function decodeChanges(value: unknown): RevisionChanges {
  if (!isPlainObject(value)) {
    throw new ValidationError('Revision changes must be an object', 'changes');
  }
  const changes: RevisionChanges = {};
  for (const [field, change] of Object.entries(value)) {
    if (!isPlainObject(change)) {
      throw new ValidationError(`Revision change for ${field} must be an object`, 'changes');
    }
    changes[field] = {
      before: toFieldValue(change.before, field),
      after: toFieldValue(change.after, field),
    };
  }
  return changes;
}

export function rowToRevision(row: Row): Revision {
  const entityType = row.entity_type;
  if (!isEntityKind(entityType)) {
    throw new ValidationError(`Unknown entity type in revision: ${String(entityType)}`, 'entity_type');
  }
  return {
    id: readId(row, 'id'),
    account_id: readId(row, 'account_id'),
    entity_type: entityType,
    entity_id: readId(row, 'entity_id'),
    entity_version: readId(row, 'entity_version'),
    author: readText(row, 'author'),
    action: readEnum(row, 'action', REVISION_ACTIONS),
    changes: decodeChanges(row.changes),
    recorded_at: readDate(row, 'recorded_at'),
  };
}

export function rowToAccount(row: Row): Account {
  return {
    id: readId(row, 'id'),
    name: readText(row, 'name'),
    created_at: readDate(row, 'created_at'),
  };
}
