/**
 * Domain types for the indicators module.
 *
 * Field names are snake_case: joined rows are exported as-is, and their keys are
 * the export column names.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Group id the upstream catalog uses for aggregates (regions, income groups, …). */
export const AGGREGATE_GROUP_ID = 'NA';

export const DEFAULT_CATALOG_PAGE_SIZE = 300;
export const DEFAULT_SERIES_PAGE_SIZE = 20_000;
export const DEFAULT_MAX_PAGES = 500;

/** Export column order for joined rows. */
export const JOINED_ROW_COLUMNS = [
  'entity_key',
  'display_name',
  'group_id',
  'group_name',
  'tier',
  'period',
  'value',
] as const;

export const CATALOG_PATH = 'country';

export const seriesPath = (indicatorId: string): string =>
  `country/all/indicator/${encodeURIComponent(indicatorId)}`;

// ─────────────────────────────────────────────────────────────────────────────
// Pagination
// ─────────────────────────────────────────────────────────────────────────────

export interface PageRequest {
  /** Endpoint path relative to the API base URL */
  path: string;
  /** Fixed query parameters sent with every page */
  query: Readonly<Record<string, string>>;
  pageSize: number;
}

export interface PaginationOptions {
  pageSize: number;
  /** Hard ceiling on pages fetched for one request */
  maxPages: number;
}

/** A two-element `[metadata, records]` page. */
export interface PageEnvelope {
  total: number;
  records: readonly unknown[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Entities & Observations
// ─────────────────────────────────────────────────────────────────────────────

export interface Entity {
  readonly key: string;
  readonly display_name: string;
  readonly group_id: string;
  readonly group_name: string;
  readonly tier: string;
}

export interface Observation {
  readonly entity_key: string;
  readonly period: number;
  readonly value: number | null;
}

export interface ReducedSeriesRow {
  readonly entity_key: string;
  readonly period: number;
  readonly value: number;
}

/** Latest valid observation per entity key. */
export type ReducedSeries = ReadonlyMap<string, ReducedSeriesRow>;

export interface JoinedRow {
  readonly entity_key: string;
  readonly display_name: string;
  readonly group_id: string;
  readonly group_name: string;
  readonly tier: string;
  readonly period: number | null;
  readonly value: number | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Inputs
// ─────────────────────────────────────────────────────────────────────────────

export interface LoadLatestSeriesInput {
  indicator_id: string;
  period_start: number;
  period_end: number;
}

export interface JoinedRowFilter {
  /** Keep rows whose group_name equals this value */
  group_name?: string;
  /** Keep rows whose tier equals this value */
  tier?: string;
}

export interface BuildDatasetInput extends LoadLatestSeriesInput {
  filter?: JoinedRowFilter;
}

export interface CatalogFacets {
  groups: string[];
  tiers: string[];
}

export type CacheInvalidationTarget =
  | { scope: 'all' }
  | { scope: 'catalog' }
  | { scope: 'series' }
  | { scope: 'series'; series: LoadLatestSeriesInput };
