/**
 * CSV rendering of joined rows.
 */

import { stringify } from 'csv-stringify/sync';

import { JOINED_ROW_COLUMNS, type JoinedRow } from '../../core/types.js';

/**
 * One header line, then one line per row in the export column order.
 * Missing periods and values are written as empty fields.
 */
export const formatJoinedRowsAsCsv = (rows: readonly JoinedRow[]): string =>
  stringify([...rows], {
    header: true,
    columns: [...JOINED_ROW_COLUMNS],
  });

export const csvFileName = (indicatorId: string): string =>
  `${indicatorId}_latest_by_entity.csv`;
