import {
  ConflictError,
  DEFAULT_RETRY,
  ForbiddenError,
  NotFoundError,
  VisibilityResolver,
  assertFieldConsistency,
  assertMutableFields,
  descriptorFor,
  diffFields,
  hasChanges,
  planPersonPurge,
  summarizePurge,
  validateCreateInput,
  validatePatchInput,
} from '@lineage/core';
import type {
  AccountContext,
  EntityKind,
  EntityRecord,
  FieldMap,
  FieldPatch,
  GenealogyStorage,
  GraphInvariantChecker,
  Logger,
  PurgeReport,
  RecordPage,
  RetryOptions,
  RevisionChanges,
  RevisionLedger,
  StorageTransaction,
} from '@lineage/core';
import { assertId, assertLimit, runOperation } from './operation.js';
import type { OperationAttributes } from './operation.js';
import type { Clock, EngineOptions, GetOptions, ListOptions, UpdateOptions } from './types.js';
import { createWriteGuards } from './write-guards.js';
import type { WriteGuard, WriteGuards } from './write-guards.js';

const DEFAULT_LIST_LIMIT = 100;
const MAX_LIST_LIMIT = 1000;

function withTombstone(fields: FieldMap, isDeleted: boolean): FieldMap {
  return { ...fields, is_deleted: isDeleted };
}

function afterValues(changes: RevisionChanges): FieldPatch {
  return Object.fromEntries(Object.entries(changes).map(([field, change]) => [field, change.after]));
}

/**
 * Owns every entity mutation. Each call is one storage transaction in
 * which the write guard runs, the row changes and the revision is
 * appended; any failure rolls all three back.
 */
export class EntityStore {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly retry: RetryOptions;
  private readonly guards: WriteGuards;

  constructor(
    private readonly storage: GenealogyStorage,
    private readonly ledger: RevisionLedger,
    checker: GraphInvariantChecker,
    options: EngineOptions,
  ) {
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
    this.retry = options.retry ?? DEFAULT_RETRY;
    this.guards = createWriteGuards(checker);
  }

  async create<K extends EntityKind>(ctx: AccountContext, kind: K, input: unknown): Promise<EntityRecord<K>> {
    const guard = this.guardFor(kind);
    const validated = await validateCreateInput(kind, input);
    const fields = descriptorFor(kind).decode(guard.normalizeInput ? guard.normalizeInput(validated) : validated);
    assertFieldConsistency(kind, fields);

    return this.transact('create', ctx, { kind }, async (tx, log) => {
      if (guard.locksAccount) {
        await tx.lockAccount(ctx.account_id);
      } else if (!(await tx.findAccount(ctx.account_id))) {
        throw new NotFoundError('account', ctx.account_id);
      }
      await guard.checkCreate({ tx, account_id: ctx.account_id, resolver: new VisibilityResolver(tx) }, fields);

      const recordedAt = this.clock();
      const record = await tx.insertRecord(kind, {
        account_id: ctx.account_id,
        fields,
        recorded_at: recordedAt,
      });
      await this.ledger.append(tx, {
        account_id: ctx.account_id,
        entity_type: kind,
        entity_id: record.id,
        entity_version: record.version,
        author: ctx.author,
        action: 'create',
        changes: diffFields(null, withTombstone(record.fields, false)),
        recorded_at: recordedAt,
      });

      log.info({ id: record.id }, 'entity created');
      return record;
    });
  }

  async update<K extends EntityKind>(
    ctx: AccountContext,
    kind: K,
    id: number,
    input: unknown,
    options: UpdateOptions = {},
  ): Promise<EntityRecord<K>> {
    assertId(id, 'id');
    const guard = this.guardFor(kind);
    const patch = await validatePatchInput(kind, input);

    return this.transact('update', ctx, { kind, id }, async (tx, log) => {
      if (guard.locksAccount) await tx.lockAccount(ctx.account_id);

      const resolver = new VisibilityResolver(tx);
      const current = await this.requireOwned(tx, ctx, kind, id);
      if (current.is_deleted) {
        throw new ConflictError(kind, id, `${kind} ${id} has been deleted`);
      }
      if (!(await resolver.isRecordLive(current))) throw new NotFoundError(kind, id);
      if (options.expected_version !== undefined && options.expected_version !== current.version) {
        throw new ConflictError(
          kind,
          id,
          `Expected ${kind} ${id} at version ${options.expected_version}, found ${current.version}`,
        );
      }

      assertMutableFields(kind, current.fields, patch);
      const next = descriptorFor(kind).decode({ ...current.fields, ...patch });
      assertFieldConsistency(kind, next);

      const changes = diffFields(current.fields, next);
      if (!hasChanges(changes)) return current;

      await guard.checkUpdate({ tx, account_id: ctx.account_id, resolver }, current, next);

      const recordedAt = this.clock();
      const updated = await tx.updateRecord(kind, id, {
        changes: afterValues(changes),
        expected_version: current.version,
        recorded_at: recordedAt,
      });
      if (!updated) {
        throw new ConflictError(kind, id, `${kind} ${id} was modified concurrently`);
      }
      await this.ledger.append(tx, {
        account_id: ctx.account_id,
        entity_type: kind,
        entity_id: id,
        entity_version: updated.version,
        author: ctx.author,
        action: 'update',
        changes,
        recorded_at: recordedAt,
      });

      log.info({ version: updated.version, fields: Object.keys(changes) }, 'entity updated');
      return updated;
    });
  }

  /**
   * Tombstones one record. Dependants are left in place and drop out of
   * live reads until their dependency is gone for good.
   */
  async softDelete<K extends EntityKind>(ctx: AccountContext, kind: K, id: number): Promise<EntityRecord<K>> {
    assertId(id, 'id');
    const guard = this.guardFor(kind);

    return this.transact('softDelete', ctx, { kind, id }, async (tx, log) => {
      if (guard.locksAccount) await tx.lockAccount(ctx.account_id);

      const current = await this.requireOwned(tx, ctx, kind, id);
      if (current.is_deleted) throw new NotFoundError(kind, id);

      const recordedAt = this.clock();
      const deleted = await tx.updateRecord(kind, id, {
        changes: {},
        is_deleted: true,
        expected_version: current.version,
        recorded_at: recordedAt,
      });
      if (!deleted) {
        throw new ConflictError(kind, id, `${kind} ${id} was modified concurrently`);
      }
      await this.ledger.append(tx, {
        account_id: ctx.account_id,
        entity_type: kind,
        entity_id: id,
        entity_version: deleted.version,
        author: ctx.author,
        action: 'delete',
        changes: { is_deleted: { before: false, after: true } },
        recorded_at: recordedAt,
      });

      log.info({ version: deleted.version }, 'entity soft-deleted');
      return deleted;
    });
  }

  async get<K extends EntityKind>(
    ctx: AccountContext,
    kind: K,
    id: number,
    options: GetOptions = {},
  ): Promise<EntityRecord<K>> {
    assertId(id, 'id');
    return this.transact('get', ctx, { kind, id }, async (tx) => {
      const record = await this.requireOwned(tx, ctx, kind, id);
      if (!options.include_tombstoned && !(await new VisibilityResolver(tx).isRecordLive(record))) {
        throw new NotFoundError(kind, id);
      }
      return record;
    });
  }

  /** One page of the account's records of `kind`, in id order. */
  async list<K extends EntityKind>(
    ctx: AccountContext,
    kind: K,
    options: ListOptions = {},
  ): Promise<RecordPage<K>> {
    const limit = assertLimit(options.limit, DEFAULT_LIST_LIMIT, MAX_LIST_LIMIT);
    const where = options.where ? await validatePatchInput(kind, options.where) : undefined;
    if (options.after_id !== undefined) assertId(options.after_id, 'after_id');

    return this.transact('list', ctx, { kind }, async (tx) => {
      const resolver = new VisibilityResolver(tx);
      const collected: EntityRecord<K>[] = [];
      let cursor = options.after_id;

      // Dangling records are filtered after the fetch, so keep reading
      // batches until the page (plus one look-ahead row) is full.
      while (collected.length <= limit) {
        const batch = await tx.queryRecords(kind, ctx.account_id, {
          where,
          include_tombstoned: options.include_tombstoned,
          after_id: cursor,
          limit: limit + 1,
        });
        const visible = options.include_tombstoned ? batch : await resolver.filterLive(batch);
        collected.push(...visible);
        if (batch.length <= limit) break;
        cursor = batch[batch.length - 1].id;
      }

      const records = collected.slice(0, limit);
      const hasMore = collected.length > limit;
      return {
        records,
        has_more: hasMore,
        next_after_id: hasMore ? records[records.length - 1].id : undefined,
      };
    });
  }

  /**
   * Physically removes a person, live or tombstoned, together with every
   * row that references it. Each removed row gets a `purge` revision;
   * events the person created lose their `created_by`.
   */
  async purgePerson(ctx: AccountContext, personId: number): Promise<PurgeReport> {
    assertId(personId, 'person_id');

    return this.transact('purgePerson', ctx, { id: personId }, async (tx, log) => {
      await tx.lockAccount(ctx.account_id);
      const person = await this.requireOwned(tx, ctx, 'person', personId);
      const plan = await planPersonPurge(tx, person);
      const recordedAt = this.clock();

      const remove = async <K extends EntityKind>(record: EntityRecord<K>): Promise<void> => {
        await tx.deleteRecord(record.kind, record.id);
        await this.ledger.append(tx, {
          account_id: ctx.account_id,
          entity_type: record.kind,
          entity_id: record.id,
          entity_version: record.version,
          author: ctx.author,
          action: 'purge',
          changes: diffFields(withTombstone(record.fields, record.is_deleted), null),
          recorded_at: recordedAt,
        });
      };

      for (const link of plan.media_links) await remove(link);
      for (const link of plan.source_links) await remove(link);
      for (const participation of plan.event_people) await remove(participation);
      for (const relationship of plan.relationships) await remove(relationship);

      for (const event of plan.detached_events) {
        const detached = await tx.updateRecord('event', event.id, {
          changes: { created_by: null },
          expected_version: event.version,
          recorded_at: recordedAt,
          allow_tombstoned: true,
        });
        if (!detached) {
          throw new ConflictError('event', event.id, `event ${event.id} was modified concurrently`);
        }
        await this.ledger.append(tx, {
          account_id: ctx.account_id,
          entity_type: 'event',
          entity_id: event.id,
          entity_version: detached.version,
          author: ctx.author,
          action: 'update',
          changes: { created_by: { before: event.fields.created_by, after: null } },
          recorded_at: recordedAt,
        });
      }

      await remove(person);

      const report = summarizePurge(plan);
      log.warn({ ...report }, 'person purged');
      return report;
    });
  }

  private guardFor<K extends EntityKind>(kind: K): WriteGuard<K> {
    return this.guards[kind];
  }

  private async requireOwned<K extends EntityKind>(
    tx: StorageTransaction,
    ctx: AccountContext,
    kind: K,
    id: number,
  ): Promise<EntityRecord<K>> {
    const record = await tx.findRecord(kind, id);
    if (!record) throw new NotFoundError(kind, id);
    if (record.account_id !== ctx.account_id) throw new ForbiddenError(kind, id);
    return record;
  }

  private transact<T>(
    operation: string,
    ctx: AccountContext,
    attributes: OperationAttributes,
    work: (tx: StorageTransaction, log: Logger) => Promise<T>,
  ): Promise<T> {
    return runOperation(
      operation,
      { account_id: ctx.account_id, ...attributes },
      this.logger,
      this.retry,
      (log) => this.storage.transaction((tx) => work(tx, log)),
    );
  }
}
