/**
 * Caches for the two dataset inputs: the entity catalog and reduced series.
 */

import { CacheNamespace, type CacheClient, type ResultCache } from '../../../../infra/cache/index.js';

import type { IndicatorsError } from '../../core/errors.js';
import type { DatasetCacheControl } from '../../core/ports.js';
import type { Entity, LoadLatestSeriesInput, ReducedSeries } from '../../core/types.js';

export interface DatasetCache extends DatasetCacheControl {
  catalog: ResultCache<readonly Entity[], IndicatorsError>;
  series: ResultCache<ReducedSeries, IndicatorsError>;
  catalogKey(): string;
  seriesKey(input: LoadLatestSeriesInput): string;
}

export const makeDatasetCache = (client: CacheClient): DatasetCache => {
  const { keyBuilder } = client;
  const catalog = client.createCache<readonly Entity[], IndicatorsError>('catalog');
  const series = client.createCache<ReducedSeries, IndicatorsError>('series');

  const seriesKey = (input: LoadLatestSeriesInput): string =>
    keyBuilder.fromFilter(CacheNamespace.SERIES_LATEST, {
      indicator_id: input.indicator_id,
      period_start: input.period_start,
      period_end: input.period_end,
    });

  return {
    catalog,
    series,
    catalogKey: () => keyBuilder.build(CacheNamespace.REF_ENTITIES, 'catalog'),
    seriesKey,

    async invalidate(target) {
      switch (target.scope) {
        case 'all': {
          const removedCatalog = await catalog.invalidateAll();
          const removedSeries = await series.invalidateAll();
          return removedCatalog + removedSeries;
        }
        case 'catalog':
          return catalog.invalidateByPrefix(keyBuilder.getPrefix(CacheNamespace.REF_ENTITIES));
        case 'series':
          if ('series' in target) {
            return (await series.invalidate(seriesKey(target.series))) ? 1 : 0;
          }
          return series.invalidateByPrefix(keyBuilder.getPrefix(CacheNamespace.SERIES_LATEST));
      }
    },
  };
};
