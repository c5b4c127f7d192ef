/**
 * @ordergrid/store: In-memory KeyedRepository.
 *
 * Map-backed. Suitable for:
 * - Unit and integration tests
 * - Single-process deployments where losing state on restart is acceptable
 *
 * Values are frozen on write so a reader can never observe (or cause)
 * a partially-updated entity.
 */

import type { KeyedRepository } from "./types.js";

export class InMemoryRepository<V extends object> implements KeyedRepository<V> {
  private readonly _items = new Map<string, V>();

  constructor(seed?: Iterable<readonly [string, V]>) {
    if (seed !== undefined) {
      for (const [key, value] of seed) {
        this._items.set(key, Object.freeze(value));
      }
    }
  }

  async get(key: string): Promise<V | undefined> {
    return this._items.get(key);
  }

  async put(key: string, value: V): Promise<void> {
    this._items.set(key, Object.freeze(value));
  }

  async values(): Promise<readonly V[]> {
    return [...this._items.values()];
  }

  get size(): number {
    return this._items.size;
  }
}
