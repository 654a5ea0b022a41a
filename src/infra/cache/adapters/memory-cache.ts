/**
 * In-memory LRU cache with TTL expiration.
 */

import { ok } from 'neverthrow';

import type { CacheEntry, CachePort, CacheSetOptions, CacheStats, Clock } from '../ports.js';

interface StoredEntry<T> {
  value: T;
  /** Storage timestamp (ms since epoch) */
  fetchedAt: number;
  ttlMs: number;
}

export interface MemoryCacheOptions {
  /** Maximum number of entries. Default: 1000 */
  maxEntries?: number;
  /** Default TTL in milliseconds. Default: 3600000 (1 hour) */
  defaultTtlMs?: number;
  /** Time source. Default: Date.now */
  now?: Clock;
}

/**
 * Create an in-memory LRU cache with TTL.
 */
export const createMemoryCache = <T>(options: MemoryCacheOptions = {}): CachePort<T> => {
  const maxEntries = options.maxEntries ?? 1000;
  const defaultTtlMs = options.defaultTtlMs ?? 3600000;
  const now = options.now ?? Date.now;

  // Map maintains insertion order, enabling LRU eviction
  const store = new Map<string, StoredEntry<T>>();

  let hits = 0;
  let misses = 0;

  const isExpired = (entry: StoredEntry<T>): boolean => {
    return now() - entry.fetchedAt > entry.ttlMs;
  };

  const evictLru = (): void => {
    const lruKey = store.keys().next().value;
    if (lruKey !== undefined) {
      store.delete(lruKey);
    }
  };

  const refreshLru = (key: string, entry: StoredEntry<T>): void => {
    store.delete(key);
    store.set(key, entry);
  };

  const toEntry = (entry: StoredEntry<T>): CacheEntry<T> => ({
    value: entry.value,
    fetchedAt: entry.fetchedAt,
    ttlMs: entry.ttlMs,
    expired: isExpired(entry),
  });

  return {
    get(key: string) {
      const entry = store.get(key);

      if (entry === undefined) {
        misses++;
        return Promise.resolve(ok(undefined));
      }

      const result = toEntry(entry);
      if (result.expired) {
        misses++;
      } else {
        hits++;
        refreshLru(key, entry);
      }

      return Promise.resolve(ok(result));
    },

    set(key: string, value: T, setOptions?: CacheSetOptions) {
      const ttlMs = setOptions?.ttlMs ?? defaultTtlMs;

      // Remove existing entry if present (for LRU refresh)
      if (store.has(key)) {
        store.delete(key);
      } else if (store.size >= maxEntries) {
        evictLru();
      }

      store.set(key, { value, fetchedAt: now(), ttlMs });

      return Promise.resolve(ok(undefined));
    },

    delete(key: string) {
      return Promise.resolve(ok(store.delete(key)));
    },

    clearByPrefix(prefix: string) {
      let count = 0;
      for (const key of [...store.keys()]) {
        if (key.startsWith(prefix)) {
          store.delete(key);
          count++;
        }
      }
      return Promise.resolve(ok(count));
    },

    clear() {
      const count = store.size;
      store.clear();
      hits = 0;
      misses = 0;
      return Promise.resolve(ok(count));
    },

    stats(): Promise<CacheStats> {
      return Promise.resolve({ hits, misses, size: store.size });
    },
  };
};
