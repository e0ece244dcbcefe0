import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { MemoizingMRUCache } from "./memoizing-mru-cache.js";

describe("MemoizingMRUCache property tests", () => {
  it("never holds more than maxSize entries", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 8 }),
        fc.array(fc.integer({ min: 0, max: 20 }), { maxLength: 100 }),
        (maxSize, keys) => {
          const cache = new MemoizingMRUCache((k: number) => k * 2, maxSize);
          for (const key of keys) {
            expect(cache.get(key)).toBe(key * 2);
            expect(cache.size).toBeLessThanOrEqual(maxSize);
          }
        },
      ),
    );
  });

  it("retains exactly the most recently used distinct keys", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 8 }),
        fc.array(fc.integer({ min: 0, max: 20 }), { maxLength: 100 }),
        (maxSize, keys) => {
          const cache = new MemoizingMRUCache((k: number) => String(k), maxSize);
          for (const key of keys) cache.get(key);

          // Reference model: distinct keys ordered by last use
          const recency: number[] = [];
          for (const key of keys) {
            const at = recency.indexOf(key);
            if (at !== -1) recency.splice(at, 1);
            recency.push(key);
          }
          expect(cache.keys()).toEqual(recency.slice(-maxSize));
        },
      ),
    );
  });
});
