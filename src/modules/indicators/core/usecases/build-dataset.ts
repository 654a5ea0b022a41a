/**
 * Build the joined table for one indicator.
 */

import { err, ok, type Result } from 'neverthrow';

import { validateSeriesInput } from './validate-series-input.js';
import { withDeadline } from '../deadline.js';
import { filterJoinedRows } from '../filter.js';
import { joinCatalogWithSeries } from '../join.js';

import type { IndicatorsError } from '../errors.js';
import type { IndicatorDataSource } from '../ports.js';
import type { BuildDatasetInput, JoinedRow } from '../types.js';

export interface BuildDatasetDeps {
  dataSource: IndicatorDataSource;
  /** Overall deadline for both loads; none when undefined */
  deadlineMs?: number;
}

export interface BuiltDataset {
  indicator_id: string;
  period_start: number;
  period_end: number;
  rows: JoinedRow[];
}

/**
 * Loads the catalog and the reduced series concurrently, then left-joins them.
 * A failure of either load fails the whole build.
 */
export const buildDataset = async (
  deps: BuildDatasetDeps,
  input: BuildDatasetInput
): Promise<Result<BuiltDataset, IndicatorsError>> => {
  const validated = validateSeriesInput(input);
  if (validated.isErr()) {
    return err(validated.error);
  }

  const seriesInput = validated.value;
  const { dataSource, deadlineMs } = deps;

  const loadAndJoin = async (): Promise<Result<JoinedRow[], IndicatorsError>> => {
    const [catalog, series] = await Promise.all([
      dataSource.loadCatalog(),
      dataSource.loadLatestSeries(seriesInput),
    ]);

    if (catalog.isErr()) {
      return err(catalog.error);
    }
    if (series.isErr()) {
      return err(series.error);
    }

    return ok(joinCatalogWithSeries(catalog.value, series.value));
  };

  const joined =
    deadlineMs !== undefined
      ? await withDeadline(
          loadAndJoin(),
          deadlineMs,
          `Dataset build for '${seriesInput.indicator_id}'`
        )
      : await loadAndJoin();

  if (joined.isErr()) {
    return err(joined.error);
  }

  const rows = input.filter !== undefined ? filterJoinedRows(joined.value, input.filter) : joined.value;

  return ok({
    indicator_id: seriesInput.indicator_id,
    period_start: seriesInput.period_start,
    period_end: seriesInput.period_end,
    rows,
  });
};
