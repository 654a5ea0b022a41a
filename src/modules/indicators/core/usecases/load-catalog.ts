/**
 * Load the entity catalog: every substantive entity, unique by key.
 */

import { err, ok, type Result } from 'neverthrow';

import { fetchAllPages } from '../paginator.js';
import { parseEntityRecord } from '../parsers.js';
import { AGGREGATE_GROUP_ID, CATALOG_PATH } from '../types.js';

import type { IndicatorsError } from '../errors.js';
import type { StatsApiClient } from '../ports.js';
import type { Entity, PaginationOptions } from '../types.js';

export interface LoadCatalogDeps {
  client: StatsApiClient;
  pagination: PaginationOptions;
}

/**
 * Aggregate entries (group id `AGGREGATE_GROUP_ID`) are dropped.
 * When a key repeats, the last record wins and keeps the position of the first.
 */
export const loadCatalog = async (
  deps: LoadCatalogDeps
): Promise<Result<Entity[], IndicatorsError>> => {
  const { client, pagination } = deps;

  const fetched = await fetchAllPages(
    { client, maxPages: pagination.maxPages },
    { path: CATALOG_PATH, query: {}, pageSize: pagination.pageSize }
  );
  if (fetched.isErr()) {
    return err(fetched.error);
  }

  const byKey = new Map<string, Entity>();
  for (const [index, record] of fetched.value.entries()) {
    const parsed = parseEntityRecord(record, index);
    if (parsed.isErr()) {
      return err(parsed.error);
    }

    if (parsed.value.group_id === AGGREGATE_GROUP_ID) {
      continue;
    }

    byKey.set(parsed.value.key, parsed.value);
  }

  return ok(Array.from(byKey.values()));
};
