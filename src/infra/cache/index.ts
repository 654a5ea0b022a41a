/**
 * Cache Infrastructure
 *
 * Typed get-or-load caches over pluggable stores.
 * Store failures degrade to cache misses and never fail a request.
 *
 * @example
 * ```typescript
 * import { initCache, CacheNamespace } from '@/infra/cache/index.js';
 *
 * const { createCache, keyBuilder } = initCache({ config: appConfig.cache, logger });
 * const seriesCache = createCache<ReducedSeries, IndicatorsError>('series');
 *
 * const key = keyBuilder.fromFilter(CacheNamespace.SERIES_LATEST, { indicator_id: 'SP.POP.TOTL' });
 * const result = await seriesCache.getOrLoad(key, () => loadLatestSeries(deps, input));
 * ```
 */

// Ports (interfaces)
export type {
  CacheError,
  CachePort,
  CacheEntry,
  CacheSetOptions,
  CacheStats,
  Clock,
} from './ports.js';

// Key generation
export {
  CacheNamespace,
  createKeyBuilder,
  type KeyBuilder,
  type KeyBuilderOptions,
} from './key-builder.js';

// Adapters
export { createNoopCache, createMemoryCache, type MemoryCacheOptions } from './adapters/index.js';

// Get-or-load
export {
  createResultCache,
  type ResultCache,
  type ResultCacheOptions,
  type ResultCacheStats,
  type GetOrLoadOptions,
} from './result-cache.js';

// Client factory
export {
  initCache,
  type CacheBackend,
  type CacheConfig,
  type CacheClient,
  type InitCacheOptions,
} from './client.js';
