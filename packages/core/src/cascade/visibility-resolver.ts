import { ForbiddenError, NotFoundError } from '../shared/errors.js';
import { descriptorFor } from '../entities/kinds.js';
import type { EntityKind, EntityRecord, EntityRef } from '../entities/types.js';
import type { StorageTransaction } from '../storage/types.js';

/**
 * Decides what normal reads may see. A record is live when it is not
 * tombstoned and everything it depends on is live; records whose own row
 * is intact but whose dependencies are gone ("dangling-soft") stay in
 * storage and in the ledger but drop out of live queries.
 *
 * Results are memoized, so use one resolver per transaction.
 */
export class VisibilityResolver {
  private readonly cache = new Map<string, boolean>();

  constructor(private readonly tx: StorageTransaction) {}

  async isLive(ref: EntityRef): Promise<boolean> {
    const key = `${ref.entity_type}:${ref.entity_id}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;

    const record = await this.tx.findRecord(ref.entity_type, ref.entity_id);
    const live = record !== null && (await this.isRecordLive(record));
    this.cache.set(key, live);
    return live;
  }

  async isRecordLive<K extends EntityKind>(record: EntityRecord<K>): Promise<boolean> {
    if (record.is_deleted) return false;
    for (const dependency of descriptorFor(record.kind).dependencies(record.fields)) {
      if (!(await this.isLive(dependency))) return false;
    }
    return true;
  }

  async filterLive<K extends EntityKind>(records: EntityRecord<K>[]): Promise<EntityRecord<K>[]> {
    const live: EntityRecord<K>[] = [];
    for (const record of records) {
      if (await this.isRecordLive(record)) live.push(record);
    }
    return live;
  }

  /**
   * Resolves a reference a new write wants to point at. The target must
   * exist in the caller's account and be live.
   */
  async requireLiveTarget<K extends EntityKind>(
    kind: K,
    id: number,
    accountId: number,
  ): Promise<EntityRecord<K>> {
    const record = await this.tx.findRecord(kind, id);
    if (!record) throw new NotFoundError(kind, id);
    if (record.account_id !== accountId) throw new ForbiddenError(kind, id);
    if (!(await this.isRecordLive(record))) throw new NotFoundError(kind, id);
    return record;
  }
}
