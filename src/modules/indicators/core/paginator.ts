/**
 * Exhaustive pagination over a page-numbered endpoint.
 */

import { err, ok, type Result } from 'neverthrow';

import { createMalformedResponseError, type FetchError } from './errors.js';
import { parsePageEnvelope } from './parsers.js';

import type { StatsApiClient } from './ports.js';
import type { PageRequest } from './types.js';

export interface FetchAllPagesDeps {
  client: StatsApiClient;
  /** Hard ceiling on pages fetched for one request */
  maxPages: number;
}

/**
 * Fetches pages 1, 2, … and concatenates their records in page order.
 *
 * Stops once the collected count reaches the `total` declared by page 1, or when a
 * later page is not a `[metadata, records]` envelope.
 *
 * An incomplete collection is never returned as complete. These are errors:
 * - page 1 not being an envelope
 * - an empty page before the total is reached
 * - running past `maxPages` before the total is reached
 */
export const fetchAllPages = async (
  deps: FetchAllPagesDeps,
  request: PageRequest
): Promise<Result<unknown[], FetchError>> => {
  const { client, maxPages } = deps;
  const records: unknown[] = [];
  let total: number | undefined;

  for (let page = 1; ; page++) {
    if (page > maxPages) {
      return err(
        createMalformedResponseError(
          `Pagination of '${request.path}' stopped at the ${String(maxPages)}-page limit with ` +
            `${String(records.length)} of ${String(total ?? 0)} records`
        )
      );
    }

    const response = await client.getPage(request, page);
    if (response.isErr()) {
      return err(response.error);
    }

    const envelope = parsePageEnvelope(response.value);
    if (envelope.isErr()) {
      return err(envelope.error);
    }

    if (envelope.value === null) {
      if (page === 1) {
        return err(
          createMalformedResponseError(
            `First page of '${request.path}' is not a [metadata, records] envelope`,
            response.value
          )
        );
      }
      break;
    }

    if (total === undefined) {
      total = envelope.value.total;
    }
    if (records.length >= total) {
      break;
    }

    if (envelope.value.records.length === 0) {
      return err(
        createMalformedResponseError(
          `Pagination of '${request.path}' ended early: upstream declared ` +
            `${String(total)} records, returned ${String(records.length)}`
        )
      );
    }

    for (const record of envelope.value.records) {
      records.push(record);
    }

    if (records.length >= total) {
      break;
    }
  }

  return ok(records);
};
