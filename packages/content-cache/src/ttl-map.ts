/**
 * Map of expiring entries with oldest-first eviction
 */

export type CacheEntry<T> = {
  value: T;
  cachedAt: number;
  expiresAt: number;
};

export type TtlMap<T> = {
  /** The entry's value if `at < expiresAt`; an expired entry is removed */
  get: (key: string, at: number) => T | undefined;
  /**
   * Insert or replace. When the map holds `capacity` entries and `key` is
   * new, the oldest quarter by `cachedAt` (at least one) is evicted first.
   * Returns the number of evicted entries.
   */
  set: (key: string, value: T, at: number, ttlMs: number) => number;
  delete: (key: string) => boolean;
  clear: () => void;
  /** Remove every expired entry; returns how many were removed */
  sweep: (at: number) => number;
  size: () => number;
};

export const createTtlMap = <T>(capacity: number): TtlMap<T> => {
  const entries = new Map<string, CacheEntry<T>>();

  const evictOldest = (): number => {
    const count = Math.max(1, Math.floor(entries.size / 4));
    // Stable sort: equal timestamps keep insertion order
    const oldest = [...entries.entries()]
      .sort(([, a], [, b]) => a.cachedAt - b.cachedAt)
      .slice(0, count);
    for (const [key] of oldest) entries.delete(key);
    return oldest.length;
  };

  return {
    get(key, at) {
      const entry = entries.get(key);
      if (!entry) return undefined;
      if (at >= entry.expiresAt) {
        entries.delete(key);
        return undefined;
      }
      return entry.value;
    },

    set(key, value, at, ttlMs) {
      const evicted = entries.size >= capacity && !entries.has(key) ? evictOldest() : 0;
      entries.set(key, { value, cachedAt: at, expiresAt: at + ttlMs });
      return evicted;
    },

    delete: (key) => entries.delete(key),

    clear: () => entries.clear(),

    sweep(at) {
      let removed = 0;
      for (const [key, entry] of entries) {
        if (at >= entry.expiresAt) {
          entries.delete(key);
          removed++;
        }
      }
      return removed;
    },

    size: () => entries.size,
  };
};
