/**
 * Manually invalidate cached catalog or series payloads.
 */

import { err, ok, type Result } from 'neverthrow';

import { validateSeriesInput } from './validate-series-input.js';

import type { InvalidInputError } from '../errors.js';
import type { DatasetCacheControl } from '../ports.js';
import type { CacheInvalidationTarget } from '../types.js';

export interface InvalidateDatasetCacheDeps {
  cache: DatasetCacheControl;
}

export const invalidateDatasetCache = async (
  deps: InvalidateDatasetCacheDeps,
  target: CacheInvalidationTarget
): Promise<Result<{ removed: number }, InvalidInputError>> => {
  if (target.scope === 'series' && 'series' in target) {
    const validated = validateSeriesInput(target.series);
    if (validated.isErr()) {
      return err(validated.error);
    }
    const removed = await deps.cache.invalidate({ scope: 'series', series: validated.value });
    return ok({ removed });
  }

  const removed = await deps.cache.invalidate(target);
  return ok({ removed });
};
