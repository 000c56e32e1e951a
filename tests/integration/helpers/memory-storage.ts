import { isDeepStrictEqual } from 'node:util';
import { NotFoundError, ValidationError, descriptorFor } from '@lineage/core';
import type {
  Account,
  EntityKind,
  EntityRecord,
  FieldMap,
  GenealogyStorage,
  NewRecord,
  NewRevision,
  RecordChange,
  RecordQuery,
  Revision,
  RevisionQuery,
  StorageTransaction,
} from '@lineage/core';

type Tables = { [K in EntityKind]: Map<number, EntityRecord<K>> };

interface State {
  accounts: Map<number, Account>;
  tables: Tables;
  revisions: Revision[];
}

function emptyState(): State {
  return {
    accounts: new Map(),
    tables: {
      person: new Map(),
      relationship: new Map(),
      event: new Map(),
      event_person: new Map(),
      media: new Map(),
      media_link: new Map(),
      source: new Map(),
      source_link: new Map(),
    },
    revisions: [],
  };
}

/** Error shaped like a node-postgres failure, carrying a `code`. */
export class StorageFault extends Error {
  constructor(
    readonly code: string,
    message = `storage fault ${code}`,
  ) {
    super(message);
    this.name = 'StorageFault';
  }
}

class MemoryTransaction implements StorageTransaction {
  constructor(
    private readonly state: State,
    private readonly owner: MemoryStorage,
  ) {}

  async lockAccount(accountId: number): Promise<void> {
    // Transactions are already serialized; only the existence check remains.
    if (!this.state.accounts.has(accountId)) throw new NotFoundError('account', accountId);
  }

  async findAccount(accountId: number): Promise<Account | null> {
    return this.state.accounts.get(accountId) ?? null;
  }

  async insertRecord<K extends EntityKind>(kind: K, record: NewRecord<K>): Promise<EntityRecord<K>> {
    if (!this.state.accounts.has(record.account_id)) {
      throw new StorageFault('23503', `account ${record.account_id} does not exist`);
    }
    const stored: EntityRecord<K> = {
      kind,
      id: this.owner.nextId(kind),
      account_id: record.account_id,
      version: 1,
      is_deleted: false,
      created_at: record.recorded_at,
      updated_at: record.recorded_at,
      fields: descriptorFor(kind).decode(record.fields),
    };
    this.table(kind).set(stored.id, stored);
    return structuredClone(stored);
  }

  async findRecord<K extends EntityKind>(kind: K, id: number): Promise<EntityRecord<K> | null> {
    const record = this.table(kind).get(id);
    return record ? structuredClone(record) : null;
  }

  async queryRecords<K extends EntityKind>(
    kind: K,
    accountId: number,
    query: RecordQuery = {},
  ): Promise<EntityRecord<K>[]> {
    const where = Object.entries(query.where ?? {});
    for (const [column] of where) {
      if (!descriptorFor(kind).columns.includes(column)) {
        throw new ValidationError(`Unknown ${kind} field "${column}"`, column);
      }
    }

    const matches = [...this.table(kind).values()]
      .filter((record) => {
        if (record.account_id !== accountId) return false;
        if (!query.include_tombstoned && record.is_deleted) return false;
        if (query.after_id !== undefined && record.id <= query.after_id) return false;
        const values: FieldMap = record.fields;
        return where.every(([column, value]) => isDeepStrictEqual(values[column] ?? null, value));
      })
      .sort((a, b) => a.id - b.id);

    const limited = query.limit !== undefined ? matches.slice(0, query.limit) : matches;
    return limited.map((record) => structuredClone(record));
  }

  async countRecords(kind: EntityKind, accountId: number, includeTombstoned: boolean): Promise<number> {
    let count = 0;
    for (const record of this.table(kind).values()) {
      if (record.account_id === accountId && (includeTombstoned || !record.is_deleted)) count += 1;
    }
    return count;
  }

  async updateRecord<K extends EntityKind>(
    kind: K,
    id: number,
    change: RecordChange,
  ): Promise<EntityRecord<K> | null> {
    const current = this.table(kind).get(id);
    if (!current || current.version !== change.expected_version) return null;
    if (current.is_deleted && !change.allow_tombstoned) return null;

    const updated: EntityRecord<K> = {
      ...current,
      version: current.version + 1,
      is_deleted: change.is_deleted ?? current.is_deleted,
      updated_at: change.recorded_at,
      fields: descriptorFor(kind).decode({ ...current.fields, ...change.changes }),
    };
    this.table(kind).set(id, updated);
    return structuredClone(updated);
  }

  async deleteRecord(kind: EntityKind, id: number): Promise<boolean> {
    return this.state.tables[kind].delete(id);
  }

  async appendRevision(revision: NewRevision): Promise<Revision> {
    const fault = this.owner.takeAppendFault();
    if (fault) throw fault;
    const stored: Revision = { ...structuredClone(revision), id: this.owner.nextId('revision') };
    this.state.revisions.push(stored);
    return structuredClone(stored);
  }

  async readRevisions(accountId: number, query: RevisionQuery): Promise<Revision[]> {
    const matches = this.state.revisions.filter(
      (revision) =>
        revision.account_id === accountId &&
        (query.entity_type === undefined || revision.entity_type === query.entity_type) &&
        (query.entity_id === undefined || revision.entity_id === query.entity_id) &&
        (query.from === undefined || revision.recorded_at.getTime() >= query.from.getTime()) &&
        (query.to === undefined || revision.recorded_at.getTime() <= query.to.getTime()) &&
        (query.after_id === undefined || revision.id > query.after_id),
    );
    const limited = query.limit !== undefined ? matches.slice(0, query.limit) : matches;
    return limited.map((revision) => structuredClone(revision));
  }

  private table<K extends EntityKind>(kind: K): Map<number, EntityRecord<K>> {
    return this.state.tables[kind];
  }
}

/**
 * In-process stand-in for the PostgreSQL storage. Transactions run one at
 * a time against a private copy of the state, which replaces the committed
 * state only when the work succeeds. Identifiers come from counters that
 * survive rollbacks, as database sequences do.
 */
export class MemoryStorage implements GenealogyStorage {
  private state: State = emptyState();
  private readonly counters = new Map<string, number>();
  private queue: Promise<void> = Promise.resolve();
  private pendingFaults: StorageFault[] = [];
  private appendFault: Error | null = null;

  /** Transactions started, including failed attempts. */
  transactionsStarted = 0;
  transactionsCommitted = 0;

  async transaction<T>(work: (tx: StorageTransaction) => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      this.transactionsStarted += 1;
      const fault = this.pendingFaults.shift();
      if (fault) throw fault;

      const working = structuredClone(this.state);
      const result = await work(new MemoryTransaction(working, this));
      this.state = working;
      this.transactionsCommitted += 1;
      return result;
    } finally {
      release();
    }
  }

  async createAccount(name: string, createdAt: Date): Promise<Account> {
    const release = await this.acquire();
    try {
      const account: Account = { id: this.nextId('account'), name, created_at: createdAt };
      this.state.accounts.set(account.id, account);
      return { ...account };
    } finally {
      release();
    }
  }

  async findAccount(accountId: number): Promise<Account | null> {
    const account = this.state.accounts.get(accountId);
    return account ? { ...account } : null;
  }

  /** The next `count` transactions fail before doing any work. */
  failTransactions(count: number, code = 'ECONNRESET'): void {
    for (let i = 0; i < count; i++) this.pendingFaults.push(new StorageFault(code));
  }

  /** The next revision append throws `error`. */
  failNextRevisionAppend(error: Error = new Error('revisions table unavailable')): void {
    this.appendFault = error;
  }

  /**
   * Writes a row straight into committed state, skipping validation, the
   * invariant checker and the ledger. For simulating damaged data.
   */
  injectRecord<K extends EntityKind>(
    kind: K,
    accountId: number,
    fields: Record<string, unknown>,
    at: Date,
  ): EntityRecord<K> {
    const record: EntityRecord<K> = {
      kind,
      id: this.nextId(kind),
      account_id: accountId,
      version: 1,
      is_deleted: false,
      created_at: at,
      updated_at: at,
      fields: descriptorFor(kind).decode(fields),
    };
    this.state.tables[kind].set(record.id, record);
    return structuredClone(record);
  }

  /** Committed revisions of every account, in commit order. */
  allRevisions(): Revision[] {
    return structuredClone(this.state.revisions);
  }

  /** Committed row count of one kind across all accounts, tombstones included. */
  rowCount(kind: EntityKind): number {
    return this.state.tables[kind].size;
  }

  nextId(sequence: string): number {
    const next = (this.counters.get(sequence) ?? 0) + 1;
    this.counters.set(sequence, next);
    return next;
  }

  takeAppendFault(): Error | null {
    const fault = this.appendFault;
    this.appendFault = null;
    return fault;
  }

  private async acquire(): Promise<() => void> {
    const previous = this.queue;
    let release: () => void = () => undefined;
    this.queue = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;
    return release;
  }
}
