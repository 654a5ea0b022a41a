/**
 * List the group names and tiers available as filters.
 */

import { err, ok, type Result } from 'neverthrow';

import { collectCatalogFacets } from '../filter.js';

import type { IndicatorsError } from '../errors.js';
import type { IndicatorDataSource } from '../ports.js';
import type { CatalogFacets } from '../types.js';

export interface ListCatalogFacetsDeps {
  dataSource: IndicatorDataSource;
}

export const listCatalogFacets = async (
  deps: ListCatalogFacetsDeps
): Promise<Result<CatalogFacets, IndicatorsError>> => {
  const catalog = await deps.dataSource.loadCatalog();
  if (catalog.isErr()) {
    return err(catalog.error);
  }
  return ok(collectCatalogFacets(catalog.value));
};
