import {
  DEFAULT_RETRY,
  ForbiddenError,
  GraphInvariantChecker,
  GraphTraversal,
  PgGenealogyStorage,
  RevisionLedger,
  ValidationError,
  buildExportGraph,
  isEntityKind,
  serializeProjection,
  toJsonProjection,
} from '@lineage/core';
import type {
  Account,
  AccountContext,
  EntityKind,
  EntityRecord,
  ExportGraph,
  ExportOptions,
  GenealogyStorage,
  LineageEntry,
  LineageOptions,
  Logger,
  Neighborhood,
  PurgeReport,
  ReconstructedRecord,
  RecordPage,
  RetryOptions,
  RevisionPage,
  RevisionQuery,
  TimelineEntry,
} from '@lineage/core';
import type pg from 'pg';
import { EntityStore } from './entity-store.js';
import { assertDate, assertId, assertLimit, runOperation } from './operation.js';
import type { OperationAttributes } from './operation.js';
import type { Clock, EngineOptions, GetOptions, ListOptions, UpdateOptions } from './types.js';

const MAX_HISTORY_PAGE = 1000;

/**
 * Entry point for route handlers. Wires one storage handle into the
 * entity store, revision ledger, invariant checker and traversal, and
 * scopes every call to the caller's account.
 */
export class GenealogyEngine {
  readonly store: EntityStore;
  readonly ledger: RevisionLedger;
  readonly traversal: GraphTraversal;

  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly retry: RetryOptions;

  constructor(
    private readonly storage: GenealogyStorage,
    options: EngineOptions,
  ) {
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
    this.retry = options.retry ?? DEFAULT_RETRY;

    this.ledger = new RevisionLedger(storage);
    this.traversal = new GraphTraversal(storage);
    this.store = new EntityStore(storage, this.ledger, new GraphInvariantChecker(options.logger), {
      ...options,
      clock: this.clock,
      retry: this.retry,
    });
  }

  static fromPool(pool: pg.Pool, options: EngineOptions): GenealogyEngine {
    return new GenealogyEngine(new PgGenealogyStorage(pool, options.logger), options);
  }

  // ── Accounts ──────────────────────────────────────────────

  async createAccount(name: string): Promise<Account> {
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      throw new ValidationError('Account name is required', 'name');
    }
    return this.read('createAccount', {}, async (log) => {
      const account = await this.storage.createAccount(trimmed, this.clock());
      log.info({ account_id: account.id }, 'account created');
      return account;
    });
  }

  // ── Entities ──────────────────────────────────────────────

  create<K extends EntityKind>(ctx: AccountContext, kind: K, input: unknown): Promise<EntityRecord<K>> {
    return this.store.create(ctx, kind, input);
  }

  update<K extends EntityKind>(
    ctx: AccountContext,
    kind: K,
    id: number,
    patch: unknown,
    options?: UpdateOptions,
  ): Promise<EntityRecord<K>> {
    return this.store.update(ctx, kind, id, patch, options);
  }

  softDelete<K extends EntityKind>(ctx: AccountContext, kind: K, id: number): Promise<EntityRecord<K>> {
    return this.store.softDelete(ctx, kind, id);
  }

  get<K extends EntityKind>(ctx: AccountContext, kind: K, id: number, options?: GetOptions): Promise<EntityRecord<K>> {
    return this.store.get(ctx, kind, id, options);
  }

  list<K extends EntityKind>(ctx: AccountContext, kind: K, options?: ListOptions): Promise<RecordPage<K>> {
    return this.store.list(ctx, kind, options);
  }

  purgePerson(ctx: AccountContext, personId: number): Promise<PurgeReport> {
    return this.store.purgePerson(ctx, personId);
  }

  // ── Audit ─────────────────────────────────────────────────

  /** Revisions of the caller's account in commit order, optionally narrowed. */
  async history(ctx: AccountContext, query: RevisionQuery = {}): Promise<RevisionPage> {
    if (query.entity_type !== undefined && !isEntityKind(query.entity_type)) {
      throw new ValidationError(`Unknown entity type "${String(query.entity_type)}"`, 'entity_type');
    }
    if (query.entity_id !== undefined) assertId(query.entity_id, 'entity_id');
    if (query.after_id !== undefined) assertId(query.after_id, 'after_id');
    if (query.from !== undefined) assertDate(query.from, 'from');
    if (query.to !== undefined) assertDate(query.to, 'to');
    if (query.from !== undefined && query.to !== undefined && query.from.getTime() > query.to.getTime()) {
      throw new ValidationError('from must not be later than to', 'from');
    }
    const limit = assertLimit(query.limit, 100, MAX_HISTORY_PAGE);

    return this.read('history', { account_id: ctx.account_id }, async () => {
      if (query.entity_type !== undefined && query.entity_id !== undefined) {
        await this.assertNotForeign(ctx, query.entity_type, query.entity_id);
      }
      return this.ledger.history(ctx.account_id, { ...query, limit });
    });
  }

  /** Field values of an entity as of `at`; `null` if it did not exist then. */
  async reconstruct<K extends EntityKind>(
    ctx: AccountContext,
    kind: K,
    id: number,
    at: Date,
  ): Promise<ReconstructedRecord<K> | null> {
    assertId(id, 'id');
    assertDate(at, 'at');
    return this.read('reconstruct', { account_id: ctx.account_id, kind, id }, async () => {
      await this.assertNotForeign(ctx, kind, id);
      return this.ledger.reconstruct(ctx.account_id, kind, id, at);
    });
  }

  // ── Traversal ─────────────────────────────────────────────

  async ancestors(ctx: AccountContext, personId: number, options?: LineageOptions): Promise<LineageEntry[]> {
    assertId(personId, 'person_id');
    return this.read('ancestors', { account_id: ctx.account_id, id: personId }, () =>
      this.traversal.ancestors(ctx.account_id, personId, options),
    );
  }

  async descendants(ctx: AccountContext, personId: number, options?: LineageOptions): Promise<LineageEntry[]> {
    assertId(personId, 'person_id');
    return this.read('descendants', { account_id: ctx.account_id, id: personId }, () =>
      this.traversal.descendants(ctx.account_id, personId, options),
    );
  }

  async neighbors(ctx: AccountContext, personId: number): Promise<Neighborhood> {
    assertId(personId, 'person_id');
    return this.read('neighbors', { account_id: ctx.account_id, id: personId }, () =>
      this.traversal.neighbors(ctx.account_id, personId),
    );
  }

  async timeline(ctx: AccountContext, personId: number): Promise<TimelineEntry[]> {
    assertId(personId, 'person_id');
    return this.read('timeline', { account_id: ctx.account_id, id: personId }, () =>
      this.traversal.timeline(ctx.account_id, personId),
    );
  }

  // ── Export ────────────────────────────────────────────────

  exportGraph(ctx: AccountContext, options?: ExportOptions): Promise<ExportGraph> {
    return this.read('exportGraph', { account_id: ctx.account_id }, async () =>
      buildExportGraph(await this.traversal.snapshot(ctx.account_id, options)),
    );
  }

  exportJson(ctx: AccountContext, options?: ExportOptions): Promise<string> {
    return this.read('exportJson', { account_id: ctx.account_id }, async () =>
      serializeProjection(toJsonProjection(await this.traversal.snapshot(ctx.account_id, options))),
    );
  }

  /** Forbidden when the entity still exists under another account. */
  private async assertNotForeign(ctx: AccountContext, kind: EntityKind, id: number): Promise<void> {
    const record = await this.storage.transaction((tx) => tx.findRecord(kind, id));
    if (record && record.account_id !== ctx.account_id) {
      throw new ForbiddenError(kind, id);
    }
  }

  private read<T>(operation: string, attributes: OperationAttributes, work: (log: Logger) => Promise<T>): Promise<T> {
    return runOperation(operation, attributes, this.logger, this.retry, work);
  }
}
