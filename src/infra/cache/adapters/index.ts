export { createMemoryCache, type MemoryCacheOptions } from './memory-cache.js';
export { createNoopCache } from './noop-cache.js';
