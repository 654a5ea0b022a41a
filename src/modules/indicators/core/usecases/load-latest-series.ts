/**
 * Load an indicator series and reduce it to the latest valid value per entity.
 */

import { err, ok, type Result } from 'neverthrow';

import { validateSeriesInput } from './validate-series-input.js';
import { fetchAllPages } from '../paginator.js';
import { parseObservationRecord } from '../parsers.js';
import { reduceToLatest } from '../reduce.js';
import { seriesPath } from '../types.js';

import type { IndicatorsError } from '../errors.js';
import type { StatsApiClient } from '../ports.js';
import type {
  LoadLatestSeriesInput,
  Observation,
  PaginationOptions,
  ReducedSeries,
} from '../types.js';

export interface LoadLatestSeriesDeps {
  client: StatsApiClient;
  pagination: PaginationOptions;
}

export const loadLatestSeries = async (
  deps: LoadLatestSeriesDeps,
  input: LoadLatestSeriesInput
): Promise<Result<ReducedSeries, IndicatorsError>> => {
  const validated = validateSeriesInput(input);
  if (validated.isErr()) {
    return err(validated.error);
  }

  const { indicator_id, period_start, period_end } = validated.value;
  const { client, pagination } = deps;

  const fetched = await fetchAllPages(
    { client, maxPages: pagination.maxPages },
    {
      path: seriesPath(indicator_id),
      query: { date: `${String(period_start)}:${String(period_end)}` },
      pageSize: pagination.pageSize,
    }
  );
  if (fetched.isErr()) {
    return err(fetched.error);
  }

  const observations: Observation[] = [];
  for (const [index, record] of fetched.value.entries()) {
    const parsed = parseObservationRecord(record, index);
    if (parsed.isErr()) {
      return err(parsed.error);
    }
    if (parsed.value !== null) {
      observations.push(parsed.value);
    }
  }

  return ok(reduceToLatest(observations));
};
