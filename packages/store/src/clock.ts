/**
 * @ordergrid/store: Timestamp source.
 *
 * MonotonicClock never hands out the same instant twice: if the wall
 * clock has not advanced (or went backwards) since the last call, the
 * previous instant plus one millisecond is used. Every write therefore
 * gets a strictly later updated_at, and a changed representation.
 */

export interface Clock {
  /** ISO 8601 UTC timestamp */
  now(): string;
}

export class MonotonicClock implements Clock {
  private _last = Number.NEGATIVE_INFINITY;

  constructor(private readonly _source: () => number = Date.now) {}

  now(): string {
    let ms = this._source();
    if (ms <= this._last) {
      ms = this._last + 1;
    }
    this._last = ms;
    return new Date(ms).toISOString();
  }
}
