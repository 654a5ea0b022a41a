/**
 * Port interfaces for the indicators module.
 */

import type { FetchError, IndicatorsError } from './errors.js';
import type {
  CacheInvalidationTarget,
  Entity,
  LoadLatestSeriesInput,
  PageRequest,
  ReducedSeries,
} from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Statistics API
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Fetches one page of a paginated endpoint and returns the parsed JSON body.
 * Interpreting the body is left to the caller.
 */
export interface StatsApiClient {
  getPage(request: PageRequest, page: number): Promise<Result<unknown, FetchError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Data Source
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The two independent inputs of a dataset build.
 * Implemented directly over the API client, and again with caching on top.
 */
export interface IndicatorDataSource {
  loadCatalog(): Promise<Result<readonly Entity[], IndicatorsError>>;

  loadLatestSeries(input: LoadLatestSeriesInput): Promise<Result<ReducedSeries, IndicatorsError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Cache Control
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Manual invalidation of cached catalog and series payloads.
 */
export interface DatasetCacheControl {
  /** @returns Number of stored entries removed */
  invalidate(target: CacheInvalidationTarget): Promise<number>;
}
