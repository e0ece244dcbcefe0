import { INTERNAL_OWNER } from "./internal-owner.js";

/**
 * Bounded memoizing cache with least-recently-used eviction.
 *
 * `get` returns the cached value for a key, computing and storing it on a
 * miss. Map insertion order doubles as recency order: a hit re-inserts the
 * key at the tail, and overflow evicts from the head. `undefined` values are
 * never treated as cached.
 */
export class MemoizingMRUCache<K, V> {
  static readonly [INTERNAL_OWNER] = true;

  private readonly entries = new Map<K, V>();

  constructor(
    private readonly calculate: (key: K) => V,
    readonly maxSize: number,
  ) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError("MemoizingMRUCache maxSize must be a positive integer");
    }
  }

  get(key: K): V {
    const cached = this.tryGet(key);
    if (cached !== undefined) return cached;

    // A throwing calculation leaves the cache untouched
    const value = this.calculate(key);
    this.entries.set(key, value);
    if (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    return value;
  }

  /** Return the cached value without computing one; a hit counts as a use. */
  tryGet(key: K): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) return undefined;
    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Keys from least to most recently used. */
  keys(): K[] {
    return [...this.entries.keys()];
  }
}
