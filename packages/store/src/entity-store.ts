/**
 * @ordergrid/store: Generic entity store.
 *
 * One instance per entity type. Owns its collection exclusively: every
 * write goes through create/update, serialized per key by a KeyLock, and
 * every entity leaves the store with freshly generated links.
 */

import { randomUUID } from "node:crypto";
import type { ResourceLinks } from "@ordergrid/types";
import type {
  CommitListener,
  EntityDefinition,
  KeyedRepository,
  Linked,
  ListQuery,
  ListResult,
  StoredEntity,
} from "./types.js";
import { StoreError } from "./types.js";
import { InMemoryRepository } from "./in-memory-repository.js";
import { KeyLock } from "./key-lock.js";
import { MonotonicClock } from "./clock.js";
import type { Clock } from "./clock.js";
import { runQuery } from "./query.js";

export interface EntityStoreOptions<TRecord, TEntity> {
  readonly repository?: KeyedRepository<TRecord> | undefined;
  readonly clock?: Clock | undefined;
  readonly generateId?: (() => string) | undefined;
  readonly onCommit?: CommitListener<TEntity> | undefined;
}

/**
 * Runs against the current entity inside the key's critical section,
 * before an update is applied. Throwing aborts the update.
 */
export type UpdateGuard<TEntity> = (current: TEntity) => void;

export class EntityStore<
  TRecord extends StoredEntity,
  TLinks extends ResourceLinks,
  TKey,
  TInput,
  TPatch,
> {
  private readonly _definition: EntityDefinition<TRecord, TLinks, TKey, TInput, TPatch>;
  private readonly _repository: KeyedRepository<TRecord>;
  private readonly _clock: Clock;
  private readonly _generateId: () => string;
  private readonly _onCommit: CommitListener<Linked<TRecord, TLinks>> | undefined;
  private readonly _lock = new KeyLock();

  constructor(
    definition: EntityDefinition<TRecord, TLinks, TKey, TInput, TPatch>,
    options: EntityStoreOptions<TRecord, Linked<TRecord, TLinks>> = {},
  ) {
    this._definition = definition;
    this._repository = options.repository ?? new InMemoryRepository<TRecord>();
    this._clock = options.clock ?? new MonotonicClock();
    this._generateId = options.generateId ?? randomUUID;
    this._onCommit = options.onCommit;
  }

  get label(): string {
    return this._definition.label;
  }

  // ─── Create ─────────────────────────────────────────────────────────

  /**
   * Store a new entity. An entity with a natural key replaces whatever
   * was stored under that key.
   */
  async create(input: TInput): Promise<Linked<TRecord, TLinks>> {
    const record = this._definition.create(input, {
      id: this._generateId(),
      now: this._clock.now(),
    });
    const key = this._encode(this._definition.keyOf(record));

    await this._lock.run(key, () => this._repository.put(key, record));

    const entity = this.present(record);
    this._onCommit?.({ kind: "created", entity });
    return entity;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  async get(key: TKey): Promise<Linked<TRecord, TLinks>> {
    const encoded = this._encode(key);
    return this.present(await this._require(encoded));
  }

  async list(query?: ListQuery): Promise<ListResult<Linked<TRecord, TLinks>>> {
    const records = await this._repository.values();
    const { items, total } = runQuery(records, this._definition, query);
    return { items: items.map((r) => this.present(r)), total };
  }

  // ─── Update ─────────────────────────────────────────────────────────

  async update(
    key: TKey,
    patch: TPatch,
    guard?: UpdateGuard<Linked<TRecord, TLinks>>,
  ): Promise<Linked<TRecord, TLinks>> {
    const encoded = this._encode(key);

    const entity = await this._lock.run(encoded, async () => {
      const current = await this._require(encoded);
      guard?.(this.present(current));

      const patched = this._definition.applyPatch(current, patch);
      const next: TRecord = {
        ...patched,
        created_at: current.created_at,
        updated_at: this._clock.now(),
      };

      await this._repository.put(encoded, next);
      return this.present(next);
    });

    this._onCommit?.({ kind: "updated", entity });
    return entity;
  }

  // ─── Delete ─────────────────────────────────────────────────────────

  /**
   * Reserved. Deletion semantics (hard or soft) are not defined yet.
   */
  async delete(key: TKey): Promise<never> {
    const encoded = this._encode(key);
    throw new StoreError(
      "NOT_IMPLEMENTED",
      `Deleting ${this._definition.label.toLowerCase()}s is not implemented`,
      encoded,
    );
  }

  // ─── Links ──────────────────────────────────────────────────────────

  /**
   * Attach links to a stored record. Links are always regenerated from
   * identity, so a record stored with missing or empty links still
   * leaves the store fully linked.
   */
  present(record: TRecord): Linked<TRecord, TLinks> {
    return { ...record, links: this._definition.links(record) };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _encode(key: TKey): string {
    return this._definition.encodeKey(key);
  }

  private async _require(encoded: string): Promise<TRecord> {
    const record = await this._repository.get(encoded);
    if (record === undefined) {
      throw new StoreError(
        "NOT_FOUND",
        `${this._definition.label} '${encoded}' not found`,
        encoded,
      );
    }
    return record;
  }
}
