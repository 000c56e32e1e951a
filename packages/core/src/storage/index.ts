export { PgGenealogyStorage } from './pg-storage.js';
export type { PgClient, PgPool, PgQueryResult } from './pg-storage.js';
export {
  buildInsert,
  buildSelect,
  buildUpdate,
  buildRevisionSelect,
  rowToRecord,
  rowToRevision,
  rowToAccount,
  decodeChanges,
} from './sql.js';
export type { Row, SqlStatement } from './sql.js';
export type { GenealogyStorage, StorageTransaction, NewRecord, RecordChange } from './types.js';
