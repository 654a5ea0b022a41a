/**
 * Cache wrapper factories for data sources.
 *
 * A wrapped source answers from the dataset cache while an entry is fresh and
 * falls through to the underlying source otherwise.
 */

import { err } from 'neverthrow';

import { validateSeriesInput } from '../modules/indicators/core/usecases/validate-series-input.js';

import type { IndicatorDataSource } from '../modules/indicators/core/ports.js';
import type { DatasetCache } from '../modules/indicators/shell/cache/dataset-cache.js';

export const wrapIndicatorDataSource = (
  source: IndicatorDataSource,
  cache: DatasetCache
): IndicatorDataSource => ({
  loadCatalog: () => cache.catalog.getOrLoad(cache.catalogKey(), () => source.loadCatalog()),

  loadLatestSeries: async (input) => {
    // Keys are built from normalized parameters so ' SP.POP.TOTL ' and 'SP.POP.TOTL' share one entry
    const validated = validateSeriesInput(input);
    if (validated.isErr()) {
      return err(validated.error);
    }

    const normalized = validated.value;
    return cache.series.getOrLoad(cache.seriesKey(normalized), () =>
      source.loadLatestSeries(normalized)
    );
  },
});
