/**
 * Left join of the entity catalog with a reduced series.
 */

import type { Entity, JoinedRow, ReducedSeries } from './types.js';

/**
 * One row per catalog entity, in catalog order. Entities without a series row
 * get null `period` and `value`.
 */
export const joinCatalogWithSeries = (
  catalog: readonly Entity[],
  series: ReducedSeries
): JoinedRow[] =>
  catalog.map((entity) => {
    const match = series.get(entity.key);
    return {
      entity_key: entity.key,
      display_name: entity.display_name,
      group_id: entity.group_id,
      group_name: entity.group_name,
      tier: entity.tier,
      period: match?.period ?? null,
      value: match?.value ?? null,
    };
  });
