/**
 * Retry decorator for StatsApiClient with exponential backoff.
 * Only errors flagged `retryable` are retried.
 */

import { setTimeout as sleepFor } from 'node:timers/promises';

import type { StatsApiClient } from '../../core/ports.js';
import type { Logger } from 'pino';

export interface RetryOptions {
  /** Total attempts, including the first. */
  maxAttempts: number;
  /** Delay before the second attempt; doubles on each further attempt. */
  baseDelayMs: number;
  /** Upper bound for a single delay. Default: 30000 */
  maxDelayMs?: number;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = async (ms: number): Promise<void> => {
  await sleepFor(ms);
};

export const backoffDelay = (attempt: number, baseDelayMs: number, maxDelayMs: number): number =>
  Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);

export const withRetry = (client: StatsApiClient, options: RetryOptions): StatsApiClient => {
  const { maxAttempts, baseDelayMs, logger } = options;
  const maxDelayMs = options.maxDelayMs ?? 30_000;
  const sleep = options.sleep ?? defaultSleep;

  return {
    async getPage(request, page) {
      for (let attempt = 1; ; attempt++) {
        const result = await client.getPage(request, page);
        if (result.isOk() || !result.error.retryable || attempt >= maxAttempts) {
          return result;
        }

        const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs);
        logger.warn(
          { path: request.path, page, attempt, delayMs, kind: result.error.kind },
          `Retrying page request: ${result.error.message}`
        );
        await sleep(delayMs);
      }
    },
  };
};
