/**
 * @ordergrid/store: Keyed entity collections.
 *
 * Provides:
 * - KeyedRepository port and its in-memory implementation
 * - EntityStore: create/get/list/update over any entity definition
 * - KeyLock for per-key write serialization
 * - MonotonicClock for strictly increasing timestamps
 * - runQuery: filter → range → sort → paginate
 *
 * @packageDocumentation
 */

// Core types
export type {
  KeyedRepository,
  StoredEntity,
  Linked,
  CreateContext,
  FieldKind,
  FieldValue,
  FieldSpec,
  EntityDefinition,
  SortOrder,
  RangeBounds,
  ListQuery,
  ListResult,
  StoreChange,
  CommitListener,
  StoreErrorCode,
} from "./types.js";
export { StoreError } from "./types.js";

// Implementations
export { InMemoryRepository } from "./in-memory-repository.js";
export { EntityStore } from "./entity-store.js";
export type { EntityStoreOptions, UpdateGuard } from "./entity-store.js";
export { KeyLock } from "./key-lock.js";
export { MonotonicClock } from "./clock.js";
export type { Clock } from "./clock.js";
export { runQuery, compareValues } from "./query.js";
export type { QuerySchema } from "./query.js";
