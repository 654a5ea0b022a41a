/**
 * Cache key generation with namespaces for targeted invalidation.
 */

import { createHash } from 'node:crypto';

// ─────────────────────────────────────────────────────────────────────────────
// Namespaces
// ─────────────────────────────────────────────────────────────────────────────

export const CacheNamespace = {
  /** Reference entity catalog (countries and their classifications) */
  REF_ENTITIES: 'ref:entities',
  /** Indicator series reduced to the latest value per entity */
  SERIES_LATEST: 'series:latest',
} as const;

export type CacheNamespace = (typeof CacheNamespace)[keyof typeof CacheNamespace];

// ─────────────────────────────────────────────────────────────────────────────
// Key Builder Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface KeyBuilder {
  /**
   * Build a cache key from namespace and identifier.
   * Format: `{globalPrefix}:{namespace}:{identifier}`
   */
  build(namespace: CacheNamespace, identifier: string): string;

  /**
   * Build a key from a parameter object by hashing it.
   * Produces deterministic keys for identical parameters.
   */
  fromFilter(namespace: CacheNamespace, filter: Record<string, unknown>): string;

  /**
   * Get the prefix for a namespace (for invalidation).
   * Format: `{globalPrefix}:{namespace}:`
   */
  getPrefix(namespace: CacheNamespace): string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

/**
 * Recursively sorts all keys in an object for deterministic serialization.
 */
const sortObjectKeys = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(sortObjectKeys);
  }

  if (!isPlainObject(value)) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    result[key] = sortObjectKeys(value[key]);
  }
  return result;
};

/**
 * Hash a parameter object into a deterministic identifier.
 * SHA-256, truncated to 16 characters.
 */
const hashFilter = (filter: Record<string, unknown>): string => {
  const normalized = JSON.stringify(sortObjectKeys(filter));
  return createHash('sha256').update(normalized).digest('hex').substring(0, 16);
};

export interface KeyBuilderOptions {
  /** Global prefix for all keys. Defaults to 'latest-indicators'. */
  globalPrefix?: string;
}

export const createKeyBuilder = (options: KeyBuilderOptions = {}): KeyBuilder => {
  const globalPrefix = options.globalPrefix ?? 'latest-indicators';

  return {
    build(namespace: CacheNamespace, identifier: string): string {
      return `${globalPrefix}:${namespace}:${identifier}`;
    },

    fromFilter(namespace: CacheNamespace, filter: Record<string, unknown>): string {
      return `${globalPrefix}:${namespace}:${hashFilter(filter)}`;
    },

    getPrefix(namespace: CacheNamespace): string {
      return `${globalPrefix}:${namespace}:`;
    },
  };
};
