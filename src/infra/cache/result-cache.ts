/**
 * Get-or-load cache for Result-returning loaders.
 *
 * - Fresh entries are returned by reference without calling the loader.
 * - Concurrent misses for one key share a single in-flight load.
 * - Only successful results are stored; a failed load leaves the previous entry in place.
 * - Invalidation also detaches in-flight loads, so their results are not stored.
 */

import { ok, type Result } from 'neverthrow';

import type { CacheEntry, CachePort, CacheStats } from './ports.js';
import type { Logger } from 'pino';

export interface GetOrLoadOptions {
  /** TTL in milliseconds for a newly stored payload. Defaults to the cache default. */
  ttlMs?: number;
}

export interface ResultCacheStats extends CacheStats {
  inFlight: number;
}

export interface ResultCache<T, E> {
  getOrLoad(
    key: string,
    loader: () => Promise<Result<T, E>>,
    options?: GetOrLoadOptions
  ): Promise<Result<T, E>>;

  /** @returns true if an entry or an in-flight load was removed */
  invalidate(key: string): Promise<boolean>;

  /** @returns Number of stored entries removed */
  invalidateByPrefix(prefix: string): Promise<number>;

  /** @returns Number of stored entries removed */
  invalidateAll(): Promise<number>;

  stats(): Promise<ResultCacheStats>;
}

export interface ResultCacheOptions<T> {
  store: CachePort<T>;
  defaultTtlMs: number;
  /** Return an expired entry when the loader fails. Default: false */
  serveStaleOnError?: boolean;
  logger: Logger;
}

interface InFlightLoad<T, E> {
  promise: Promise<Result<T, E>>;
}

export const createResultCache = <T, E>(options: ResultCacheOptions<T>): ResultCache<T, E> => {
  const { store, defaultTtlMs, logger } = options;
  const serveStaleOnError = options.serveStaleOnError ?? false;

  const inFlight = new Map<string, InFlightLoad<T, E>>();

  // Store failures degrade to misses; they never fail the caller.
  const readEntry = async (key: string): Promise<CacheEntry<T> | undefined> => {
    const result = await store.get(key);
    if (result.isErr()) {
      logger.warn({ err: result.error, key }, `[Cache] Get failed: ${result.error.message}`);
      return undefined;
    }
    return result.value;
  };

  const writeEntry = async (key: string, value: T, ttlMs: number): Promise<void> => {
    const result = await store.set(key, value, { ttlMs });
    if (result.isErr()) {
      logger.warn({ err: result.error, key }, `[Cache] Set failed: ${result.error.message}`);
    }
  };

  return {
    getOrLoad(key, loader, loadOptions = {}) {
      const pending = inFlight.get(key);
      if (pending !== undefined) {
        logger.debug({ key }, '[Cache] Joining in-flight load');
        return pending.promise;
      }

      const ttlMs = loadOptions.ttlMs ?? defaultTtlMs;
      let current: InFlightLoad<T, E> | undefined;
      const isCurrent = (): boolean => current !== undefined && inFlight.get(key) === current;

      const run = async (): Promise<Result<T, E>> => {
        try {
          const cached = await readEntry(key);
          if (cached !== undefined && !cached.expired) {
            logger.debug({ key }, '[Cache] Hit');
            return ok(cached.value);
          }

          logger.debug({ key, stale: cached !== undefined }, '[Cache] Miss');
          const result = await loader();

          if (result.isOk()) {
            if (isCurrent()) {
              await writeEntry(key, result.value, ttlMs);
            } else {
              logger.debug({ key }, '[Cache] Invalidated during load, result not stored');
            }
            return result;
          }

          if (serveStaleOnError && cached !== undefined && isCurrent()) {
            logger.warn(
              { key, err: result.error, fetchedAt: new Date(cached.fetchedAt).toISOString() },
              '[Cache] Load failed, serving expired entry'
            );
            return ok(cached.value);
          }

          return result;
        } finally {
          if (isCurrent()) {
            inFlight.delete(key);
          }
        }
      };

      current = { promise: run() };
      inFlight.set(key, current);
      return current.promise;
    },

    async invalidate(key) {
      const detached = inFlight.delete(key);
      const result = await store.delete(key);
      if (result.isErr()) {
        logger.warn({ err: result.error, key }, `[Cache] Delete failed: ${result.error.message}`);
        return detached;
      }
      logger.info({ key, removed: result.value }, '[Cache] Invalidated key');
      return detached || result.value;
    },

    async invalidateByPrefix(prefix) {
      for (const key of [...inFlight.keys()]) {
        if (key.startsWith(prefix)) {
          inFlight.delete(key);
        }
      }
      const result = await store.clearByPrefix(prefix);
      if (result.isErr()) {
        logger.warn(
          { err: result.error, prefix },
          `[Cache] ClearByPrefix failed: ${result.error.message}`
        );
        return 0;
      }
      logger.info({ prefix, removed: result.value }, '[Cache] Invalidated prefix');
      return result.value;
    },

    async invalidateAll() {
      inFlight.clear();
      const result = await store.clear();
      if (result.isErr()) {
        logger.warn({ err: result.error }, `[Cache] Clear failed: ${result.error.message}`);
        return 0;
      }
      logger.info({ removed: result.value }, '[Cache] Invalidated all entries');
      return result.value;
    },

    async stats() {
      const base = await store.stats();
      return { ...base, inFlight: inFlight.size };
    },
  };
};
