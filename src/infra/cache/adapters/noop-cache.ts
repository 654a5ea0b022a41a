/**
 * Store behind `CACHE_BACKEND=disabled`: writes are accepted and forgotten,
 * so every lookup is a miss and the loader runs on each request.
 */

import { ok, type Result } from 'neverthrow';

import type { CacheError, CachePort } from '../ports.js';

const resolved = <V>(value: V): Promise<Result<V, CacheError>> => Promise.resolve(ok(value));

export const createNoopCache = <T>(): CachePort<T> => {
  let lookups = 0;

  return {
    get: () => {
      lookups++;
      return resolved(undefined);
    },
    set: () => resolved(undefined),
    delete: () => resolved(false),
    clearByPrefix: () => resolved(0),
    clear: () => resolved(0),
    stats: () => Promise.resolve({ hits: 0, misses: lookups, size: 0 }),
  };
};
