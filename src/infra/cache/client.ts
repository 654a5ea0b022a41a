/**
 * Cache client factory - creates and configures cache instances.
 */

import { createMemoryCache, createNoopCache } from './adapters/index.js';
import { createKeyBuilder, type KeyBuilder } from './key-builder.js';
import { createResultCache, type ResultCache } from './result-cache.js';

import type { CachePort, Clock } from './ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Types
// ─────────────────────────────────────────────────────────────────────────────

export type CacheBackend = 'disabled' | 'memory';

export interface CacheConfig {
  backend: CacheBackend;
  /** Entry lifetime in milliseconds */
  ttlMs: number;
  /** Max entries per memory store */
  maxEntries: number;
  /** Key prefix for all cache keys */
  keyPrefix: string;
  serveStaleOnError: boolean;
}

export interface InitCacheOptions {
  config: CacheConfig;
  logger: Logger;
  /** Time source shared by every store. Default: Date.now */
  now?: Clock;
}

/**
 * Factory for typed result caches sharing one configuration and key builder.
 */
export interface CacheClient {
  keyBuilder: KeyBuilder;
  createCache<T, E>(name: string): ResultCache<T, E>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Cache Initialization
// ─────────────────────────────────────────────────────────────────────────────

export const initCache = (options: InitCacheOptions): CacheClient => {
  const { config, logger } = options;
  const now = options.now ?? Date.now;

  const keyBuilder = createKeyBuilder({ globalPrefix: config.keyPrefix });

  if (config.backend === 'disabled') {
    logger.info('[Cache] Using NoOp cache (disabled)');
  } else {
    logger.info(
      { maxEntries: config.maxEntries, ttlMs: config.ttlMs },
      '[Cache] Using in-memory LRU cache'
    );
  }

  const createStore = <T>(): CachePort<T> =>
    config.backend === 'disabled'
      ? createNoopCache<T>()
      : createMemoryCache<T>({
          maxEntries: config.maxEntries,
          defaultTtlMs: config.ttlMs,
          now,
        });

  return {
    keyBuilder,
    createCache<T, E>(name: string): ResultCache<T, E> {
      return createResultCache<T, E>({
        store: createStore<T>(),
        defaultTtlMs: config.ttlMs,
        serveStaleOnError: config.serveStaleOnError,
        logger: logger.child({ cache: name }),
      });
    },
  };
};
