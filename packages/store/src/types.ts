/**
 * @ordergrid/store: Core types.
 *
 * Defines the repository port, the per-entity definition consumed by
 * EntityStore, and the list query shape.
 *
 * Design principles:
 * - The store is the only writer of its collection
 * - Writes to one key are serialized; writes to different keys are not
 * - Identity fields and created_at never change after create
 * - Links are derived on every read, never trusted from storage
 * - Delete is reserved and always reports NOT_IMPLEMENTED
 */

import type { ResourceLinks } from "@ordergrid/types";

// =============================================================================
// Repository Port
// =============================================================================

/**
 * Key/value persistence behind an EntityStore.
 *
 * Keys are the entity definition's string encoding of the identity.
 * Iteration order of `values()` is insertion order.
 */
export interface KeyedRepository<V> {
  get(key: string): Promise<V | undefined>;
  put(key: string, value: V): Promise<void>;
  values(): Promise<readonly V[]>;
}

// =============================================================================
// Entities
// =============================================================================

/**
 * Fields every stored entity carries.
 */
export interface StoredEntity {
  readonly created_at: string;
  readonly updated_at: string;
  readonly links?: ResourceLinks;
}

/**
 * An entity with its links attached.
 */
export type Linked<TRecord extends StoredEntity, TLinks extends ResourceLinks> =
  TRecord & { readonly links: TLinks };

export interface CreateContext {
  /** Fresh synthetic id (ignored by entities with natural keys) */
  readonly id: string;
  /** Timestamp to use for created_at and updated_at */
  readonly now: string;
}

/**
 * Kind of a queryable field; decides how values are compared.
 *
 * - number: numeric order
 * - date: chronological order of ISO 8601 strings
 * - string: code-unit order
 */
export type FieldKind = "number" | "date" | "string";

export type FieldValue = string | number;

export interface FieldSpec<TRecord> {
  readonly kind: FieldKind;
  readonly get: (record: TRecord) => FieldValue;
}

/**
 * Everything EntityStore needs to know about one entity type.
 */
export interface EntityDefinition<
  TRecord extends StoredEntity,
  TLinks extends ResourceLinks,
  TKey,
  TInput,
  TPatch,
> {
  /** Human-readable name used in error messages ("Order") */
  readonly label: string;

  keyOf(record: TRecord): TKey;
  encodeKey(key: TKey): string;

  /** Build a new record from validated input */
  create(input: TInput, ctx: CreateContext): TRecord;

  /**
   * Overwrite the fields present in `patch`. Must leave identity fields
   * untouched; EntityStore sets updated_at and keeps created_at.
   */
  applyPatch(record: TRecord, patch: TPatch): TRecord;

  links(record: TRecord): TLinks;

  /** Fields that may appear in list queries, by name */
  readonly fields: Readonly<Record<string, FieldSpec<TRecord>>>;
  readonly equalityFields: readonly string[];
  readonly rangeFields: readonly string[];
  readonly sortFields: readonly string[];
}

// =============================================================================
// Query
// =============================================================================

export type SortOrder = "asc" | "desc";

export interface RangeBounds {
  /** Inclusive lower bound */
  readonly min?: FieldValue | undefined;
  /** Inclusive upper bound */
  readonly max?: FieldValue | undefined;
}

/**
 * A list query. Applied in fixed order: equality filters, range
 * filters, sort, offset, limit.
 */
export interface ListQuery {
  readonly equals?: Readonly<Record<string, FieldValue | undefined>> | undefined;
  readonly ranges?: Readonly<Record<string, RangeBounds | undefined>> | undefined;
  /** Unknown or non-sortable field names leave the order unchanged */
  readonly sortBy?: string | undefined;
  /** Default: "asc" */
  readonly order?: SortOrder | undefined;
  /** Default: 0 */
  readonly offset?: number | undefined;
  /** Default: unbounded */
  readonly limit?: number | undefined;
}

export interface ListResult<T> {
  readonly items: readonly T[];
  /** Number of items that passed the filters, before offset/limit */
  readonly total: number;
}

// =============================================================================
// Commit Hook
// =============================================================================

export interface StoreChange<T> {
  readonly kind: "created" | "updated";
  readonly entity: T;
}

/**
 * Called after a write has been committed. Must not throw: the write has
 * already happened and cannot be rolled back.
 */
export type CommitListener<T> = (change: StoreChange<T>) => void;

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode = "NOT_FOUND" | "NOT_IMPLEMENTED";

/**
 * Error thrown by EntityStore operations.
 */
export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    public readonly key?: string,
  ) {
    super(message);
    this.name = "StoreError";
  }
}
