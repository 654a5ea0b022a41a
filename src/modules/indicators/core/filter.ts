/**
 * Row filters and facet listing for the joined table.
 */

import type { CatalogFacets, Entity, JoinedRow, JoinedRowFilter } from './types.js';

export const filterJoinedRows = (rows: readonly JoinedRow[], filter: JoinedRowFilter): JoinedRow[] =>
  rows.filter(
    (row) =>
      (filter.group_name === undefined || row.group_name === filter.group_name) &&
      (filter.tier === undefined || row.tier === filter.tier)
  );

const sortedUnique = (values: Iterable<string>): string[] =>
  Array.from(new Set(values))
    .filter((value) => value !== '')
    .sort((left, right) => left.localeCompare(right));

/**
 * Distinct group names and tiers present in the catalog, sorted.
 */
export const collectCatalogFacets = (catalog: readonly Entity[]): CatalogFacets => ({
  groups: sortedUnique(catalog.map((entity) => entity.group_name)),
  tiers: sortedUnique(catalog.map((entity) => entity.tier)),
});
