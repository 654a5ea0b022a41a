/**
 * Validation of series request parameters.
 */

import { err, ok, type Result } from 'neverthrow';

import { createInvalidInputError, type InvalidInputError } from '../errors.js';

import type { LoadLatestSeriesInput } from '../types.js';

const INDICATOR_ID_PATTERN = /^[A-Za-z0-9._]+$/;
const MAX_INDICATOR_ID_LENGTH = 64;

export const validateSeriesInput = (
  input: LoadLatestSeriesInput
): Result<LoadLatestSeriesInput, InvalidInputError> => {
  const indicatorId = input.indicator_id.trim();

  if (indicatorId === '') {
    return err(createInvalidInputError('indicator_id', 'Indicator id is required'));
  }

  if (indicatorId.length > MAX_INDICATOR_ID_LENGTH || !INDICATOR_ID_PATTERN.test(indicatorId)) {
    return err(
      createInvalidInputError(
        'indicator_id',
        `Indicator id '${indicatorId}' must be at most ${String(MAX_INDICATOR_ID_LENGTH)} letters, digits, dots or underscores`
      )
    );
  }

  if (!Number.isInteger(input.period_start)) {
    return err(createInvalidInputError('period_start', 'Period start must be an integer'));
  }

  if (!Number.isInteger(input.period_end)) {
    return err(createInvalidInputError('period_end', 'Period end must be an integer'));
  }

  if (input.period_start > input.period_end) {
    return err(
      createInvalidInputError(
        'period_start',
        `Period start ${String(input.period_start)} is after period end ${String(input.period_end)}`
      )
    );
  }

  return ok({
    indicator_id: indicatorId,
    period_start: input.period_start,
    period_end: input.period_end,
  });
};
