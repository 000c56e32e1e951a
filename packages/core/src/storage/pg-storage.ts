import { NotFoundError } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import type { Account } from '../shared/types.js';
import type { EntityKind, EntityRecord, RecordQuery } from '../entities/types.js';
import type { NewRevision, Revision, RevisionQuery } from '../ledger/types.js';
import { QUERIES } from './storage.queries.js';
import {
  buildCount,
  buildDelete,
  buildFind,
  buildInsert,
  buildRevisionSelect,
  buildSelect,
  buildUpdate,
  rowToAccount,
  rowToRecord,
  rowToRevision,
} from './sql.js';
import type { SqlStatement } from './sql.js';
import type { GenealogyStorage, NewRecord, RecordChange, StorageTransaction } from './types.js';

export interface PgQueryResult {
  rows: Record<string, unknown>[];
  rowCount: number | null;
}

/** The part of a `pg.PoolClient` the storage talks to. */
export interface PgClient {
  query(text: string, values?: unknown[]): Promise<PgQueryResult>;
  release(error?: Error | boolean): void;
}

/** The part of a `pg.Pool` the storage talks to. */
export interface PgPool {
  connect(): Promise<PgClient>;
  query(text: string, values?: unknown[]): Promise<PgQueryResult>;
}

class PgStorageTransaction implements StorageTransaction {
  constructor(private readonly client: PgClient) {}

  private async run(statement: SqlStatement): Promise<Record<string, unknown>[]> {
    const { rows } = await this.client.query(statement.text, statement.values);
    return rows;
  }

  async lockAccount(accountId: number): Promise<void> {
    const { rows } = await this.client.query(QUERIES.LOCK_ACCOUNT, [accountId]);
    if (rows.length === 0) {
      throw new NotFoundError('account', accountId);
    }
  }

  async findAccount(accountId: number): Promise<Account | null> {
    const { rows } = await this.client.query(QUERIES.GET_ACCOUNT, [accountId]);
    return rows.length > 0 ? rowToAccount(rows[0]) : null;
  }

  async insertRecord<K extends EntityKind>(kind: K, record: NewRecord<K>): Promise<EntityRecord<K>> {
    const rows = await this.run(buildInsert(kind, record));
    return rowToRecord(kind, rows[0]);
  }

  async findRecord<K extends EntityKind>(kind: K, id: number): Promise<EntityRecord<K> | null> {
    const rows = await this.run(buildFind(kind, id));
    return rows.length > 0 ? rowToRecord(kind, rows[0]) : null;
  }

  async queryRecords<K extends EntityKind>(
    kind: K,
    accountId: number,
    query: RecordQuery = {},
  ): Promise<EntityRecord<K>[]> {
    const rows = await this.run(buildSelect(kind, accountId, query));
    return rows.map((row) => rowToRecord(kind, row));
  }

  async countRecords(kind: EntityKind, accountId: number, includeTombstoned: boolean): Promise<number> {
    const rows = await this.run(buildCount(kind, accountId, includeTombstoned));
    return Number(rows[0]?.count ?? 0);
  }

  async updateRecord<K extends EntityKind>(
    kind: K,
    id: number,
    change: RecordChange,
  ): Promise<EntityRecord<K> | null> {
    const rows = await this.run(buildUpdate(kind, id, change));
    return rows.length > 0 ? rowToRecord(kind, rows[0]) : null;
  }

  async deleteRecord(kind: EntityKind, id: number): Promise<boolean> {
    const statement = buildDelete(kind, id);
    const result = await this.client.query(statement.text, statement.values);
    return (result.rowCount ?? 0) > 0;
  }

  async appendRevision(revision: NewRevision): Promise<Revision> {
    const { rows } = await this.client.query(QUERIES.INSERT_REVISION, [
      revision.account_id,
      revision.entity_type,
      revision.entity_id,
      revision.entity_version,
      revision.author,
      revision.action,
      JSON.stringify(revision.changes),
      revision.recorded_at,
    ]);
    return rowToRevision(rows[0]);
  }

  async readRevisions(accountId: number, query: RevisionQuery): Promise<Revision[]> {
    const rows = await this.run(buildRevisionSelect(accountId, query));
    return rows.map(rowToRevision);
  }
}

/**
 * PostgreSQL-backed storage. Each `transaction` checks out one pooled
 * client and runs the work between BEGIN and COMMIT, rolling back on any
 * error. The work's own error is always the one rethrown; a client whose
 * ROLLBACK fails is handed back to the pool as broken and discarded.
 */
export class PgGenealogyStorage implements GenealogyStorage {
  constructor(
    private readonly pool: PgPool,
    private readonly logger?: Logger,
  ) {}

  async transaction<T>(work: (tx: StorageTransaction) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    let broken: Error | undefined;
    try {
      await client.query('BEGIN');
      const result = await work(new PgStorageTransaction(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      broken = await this.rollback(client);
      throw error;
    } finally {
      client.release(broken);
    }
  }

  private async rollback(client: PgClient): Promise<Error | undefined> {
    try {
      await client.query('ROLLBACK');
      return undefined;
    } catch (rollbackError) {
      this.logger?.warn({ err: rollbackError }, 'rollback failed, discarding connection');
      return rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
    }
  }

  async createAccount(name: string, createdAt: Date): Promise<Account> {
    const { rows } = await this.pool.query(QUERIES.INSERT_ACCOUNT, [name, createdAt]);
    return rowToAccount(rows[0]);
  }

  async findAccount(accountId: number): Promise<Account | null> {
    const { rows } = await this.pool.query(QUERIES.GET_ACCOUNT, [accountId]);
    return rows.length > 0 ? rowToAccount(rows[0]) : null;
  }
}
