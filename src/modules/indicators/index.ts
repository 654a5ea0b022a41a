/**
 * Indicators Module - Public API
 *
 * Latest value of one statistical indicator per entity, joined with the
 * entity catalog, served over REST.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  Entity,
  Observation,
  ReducedSeries,
  ReducedSeriesRow,
  JoinedRow,
  JoinedRowFilter,
  LoadLatestSeriesInput,
  BuildDatasetInput,
  CatalogFacets,
  CacheInvalidationTarget,
  PageRequest,
  PageEnvelope,
  PaginationOptions,
} from './core/types.js';

export {
  AGGREGATE_GROUP_ID,
  DEFAULT_CATALOG_PAGE_SIZE,
  DEFAULT_SERIES_PAGE_SIZE,
  DEFAULT_MAX_PAGES,
  JOINED_ROW_COLUMNS,
  CATALOG_PATH,
  seriesPath,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  IndicatorsError,
  FetchError,
  FetchErrorKind,
  TransportError,
  MalformedResponseError,
  TimeoutError,
  InvalidInputError,
} from './core/errors.js';

export {
  createTransportError,
  createMalformedResponseError,
  createTimeoutError,
  createInvalidInputError,
  isFetchError,
  INDICATORS_ERROR_HTTP_STATUS,
  getHttpStatusForError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { StatsApiClient, IndicatorDataSource, DatasetCacheControl } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export { fetchAllPages, type FetchAllPagesDeps } from './core/paginator.js';
export { reduceToLatest } from './core/reduce.js';
export { joinCatalogWithSeries } from './core/join.js';
export { filterJoinedRows, collectCatalogFacets } from './core/filter.js';
export { withDeadline } from './core/deadline.js';
export { loadCatalog } from './core/usecases/load-catalog.js';
export { loadLatestSeries } from './core/usecases/load-latest-series.js';
export { buildDataset, type BuiltDataset } from './core/usecases/build-dataset.js';
export { listCatalogFacets } from './core/usecases/list-catalog-facets.js';
export { invalidateDatasetCache } from './core/usecases/invalidate-dataset-cache.js';
export { validateSeriesInput } from './core/usecases/validate-series-input.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export { makeWorldBankClient, type WorldBankClientOptions } from './shell/http/world-bank-client.js';
export { withRetry, type RetryOptions } from './shell/http/retry.js';
export { makeIndicatorDataSource } from './shell/data-source.js';
export { makeDatasetCache, type DatasetCache } from './shell/cache/dataset-cache.js';
export { formatJoinedRowsAsCsv, csvFileName } from './shell/export/csv.js';
export { makeIndicatorRoutes, type MakeIndicatorRoutesDeps } from './shell/rest/routes.js';
