/**
 * @ordergrid/store: Per-key mutual exclusion.
 *
 * Operations submitted for the same key run one after another in
 * submission order. Operations on different keys never wait on each other.
 *
 * A failed operation releases the key like a successful one.
 */

export class KeyLock {
  /** Tail of the queue per key; always settles, never rejects */
  private readonly _tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier operation on `key` has settled.
   */
  async run<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const previous = this._tails.get(key) ?? Promise.resolve();
    const current = previous.then(fn);
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this._tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this._tails.get(key) === tail) {
        this._tails.delete(key);
      }
    }
  }

  /**
   * Number of keys with queued or running operations.
   */
  get heldKeys(): number {
    return this._tails.size;
  }
}
