/**
 * Reduction of an observation series to the latest valid value per entity.
 */

import type { Observation, ReducedSeries, ReducedSeriesRow } from './types.js';

/**
 * Keeps, for each entity, the observation with the greatest period among those
 * with a non-null value. On equal periods the first one seen wins.
 * Entities whose values are all null get no row.
 */
export const reduceToLatest = (observations: Iterable<Observation>): ReducedSeries => {
  const latest = new Map<string, ReducedSeriesRow>();

  for (const observation of observations) {
    const { entity_key, period, value } = observation;
    if (value === null) {
      continue;
    }

    const current = latest.get(entity_key);
    if (current === undefined || period > current.period) {
      latest.set(entity_key, { entity_key, period, value });
    }
  }

  return latest;
};
