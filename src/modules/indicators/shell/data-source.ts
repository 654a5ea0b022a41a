/**
 * IndicatorDataSource backed directly by the statistics API.
 */

import { loadCatalog } from '../core/usecases/load-catalog.js';
import { loadLatestSeries } from '../core/usecases/load-latest-series.js';

import type { IndicatorDataSource, StatsApiClient } from '../core/ports.js';
import type { PaginationOptions } from '../core/types.js';

export interface MakeIndicatorDataSourceDeps {
  client: StatsApiClient;
  catalogPagination: PaginationOptions;
  seriesPagination: PaginationOptions;
}

export const makeIndicatorDataSource = (deps: MakeIndicatorDataSourceDeps): IndicatorDataSource => {
  const { client, catalogPagination, seriesPagination } = deps;

  return {
    loadCatalog: () => loadCatalog({ client, pagination: catalogPagination }),
    loadLatestSeries: (input) => loadLatestSeries({ client, pagination: seriesPagination }, input),
  };
};
