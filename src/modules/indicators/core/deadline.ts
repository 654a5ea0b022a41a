/**
 * Overall deadline for a Result-returning task.
 */

import { err, type Result } from 'neverthrow';

import { createTimeoutError, type TimeoutError } from './errors.js';

/**
 * Resolves with the task's result, or with a TimeoutError once `deadlineMs` has
 * passed. The task itself is not cancelled.
 */
export const withDeadline = async <T, E>(
  task: Promise<Result<T, E>>,
  deadlineMs: number,
  label: string
): Promise<Result<T, E | TimeoutError>> => {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<Result<T, TimeoutError>>((resolve) => {
    timer = setTimeout(() => {
      resolve(err(createTimeoutError(`${label} exceeded the ${String(deadlineMs)} ms deadline`)));
    }, deadlineMs);
  });

  try {
    return await Promise.race([task, deadline]);
  } finally {
    clearTimeout(timer);
  }
};
