/**
 * HTTP client for the World Bank v2 API (and API-compatible mirrors).
 *
 * Requests: `GET <base>/<path>?format=json&per_page=<N>&page=<P>[&<query>]`.
 * Returns each page's parsed JSON body; envelope interpretation lives in core.
 */

import { err, ok } from 'neverthrow';

import {
  createMalformedResponseError,
  createTimeoutError,
  createTransportError,
} from '../../core/errors.js';

import type { StatsApiClient } from '../../core/ports.js';
import type { PageRequest } from '../../core/types.js';
import type { Logger } from 'pino';

export interface WorldBankClientOptions {
  /** API root, e.g. `https://api.worldbank.org/v2` */
  baseUrl: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  logger: Logger;
  /** Fetch implementation. Default: global fetch */
  fetch?: typeof fetch;
}

export const buildPageUrl = (baseUrl: string, request: PageRequest, page: number): string => {
  const params = new URLSearchParams({
    format: 'json',
    per_page: String(request.pageSize),
    page: String(page),
  });
  for (const [name, value] of Object.entries(request.query)) {
    params.set(name, value);
  }

  const path = request.path.replace(/^\/+/, '');
  // `date=2010:2028` is sent with a literal colon, as the API documents it
  return `${baseUrl.replace(/\/+$/, '')}/${path}?${params.toString().replace(/%3A/gi, ':')}`;
};

const isTimeoutAbort = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const makeWorldBankClient = (options: WorldBankClientOptions): StatsApiClient => {
  const { baseUrl, timeoutMs } = options;
  const fetchFn = options.fetch ?? fetch;
  const log = options.logger;

  return {
    async getPage(request, page) {
      const url = buildPageUrl(baseUrl, request, page);
      log.debug({ url, page }, 'Fetching page');

      let response: Response;
      try {
        response = await fetchFn(url, {
          headers: { accept: 'application/json' },
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (error) {
        if (isTimeoutAbort(error)) {
          log.warn({ url, timeoutMs }, 'Page request timed out');
          return err(
            createTimeoutError(`Request to ${url} timed out after ${String(timeoutMs)} ms`, error)
          );
        }
        log.warn({ url, err: error }, 'Page request failed');
        return err(
          createTransportError(`Request to ${url} failed: ${errorMessage(error)}`, { cause: error })
        );
      }

      if (!response.ok) {
        log.warn({ url, status: response.status }, 'Page request rejected');
        return err(
          createTransportError(`Request to ${url} failed with HTTP ${String(response.status)}`, {
            status: response.status,
          })
        );
      }

      let text: string;
      try {
        text = await response.text();
      } catch (error) {
        if (isTimeoutAbort(error)) {
          return err(
            createTimeoutError(`Reading ${url} timed out after ${String(timeoutMs)} ms`, error)
          );
        }
        return err(
          createTransportError(`Reading ${url} failed: ${errorMessage(error)}`, { cause: error })
        );
      }

      try {
        const body: unknown = JSON.parse(text);
        return ok(body);
      } catch (error) {
        return err(createMalformedResponseError(`Response from ${url} is not valid JSON`, error));
      }
    },
  };
};
