/**
 * Cache port interfaces using Result pattern for explicit error handling.
 */

import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

export type CacheError =
  | { type: 'ConnectionError'; message: string; cause?: unknown }
  | { type: 'TimeoutError'; message: string; cause?: unknown };

// ─────────────────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────────────────

export interface CacheSetOptions {
  /** TTL in milliseconds. If undefined, uses adapter default. */
  ttlMs?: number;
}

/** Milliseconds since epoch. */
export type Clock = () => number;

// ─────────────────────────────────────────────────────────────────────────────
// Entries & Statistics
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A stored payload. Values are kept by reference, so a hit returns the exact
 * object that was stored.
 */
export interface CacheEntry<T> {
  value: T;
  /** When the payload was stored (ms since epoch) */
  fetchedAt: number;
  ttlMs: number;
  /** True once `now - fetchedAt > ttlMs` */
  expired: boolean;
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// CachePort (Low-Level / Adapter Interface)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Low-level cache interface for implementing backends.
 */
export interface CachePort<T = unknown> {
  /**
   * Retrieve an entry by key, expired or not.
   * Expired entries stay readable until they are replaced, deleted or evicted.
   * @returns Ok(entry) if present, Ok(undefined) if not, Err on failure
   */
  get(key: string): Promise<Result<CacheEntry<T> | undefined, CacheError>>;

  /**
   * Store a value with optional TTL.
   */
  set(key: string, value: T, options?: CacheSetOptions): Promise<Result<void, CacheError>>;

  /**
   * Delete a specific key.
   * @returns Ok(true) if deleted, Ok(false) if key didn't exist
   */
  delete(key: string): Promise<Result<boolean, CacheError>>;

  /**
   * Delete all keys matching a prefix.
   * @returns Number of keys deleted
   */
  clearByPrefix(prefix: string): Promise<Result<number, CacheError>>;

  /**
   * Delete all cache entries.
   * @returns Number of keys deleted
   */
  clear(): Promise<Result<number, CacheError>>;

  stats(): Promise<CacheStats>;
}
