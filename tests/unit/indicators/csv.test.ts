import { describe, expect, it } from 'vitest';

import { csvFileName, formatJoinedRowsAsCsv } from '@/modules/indicators/shell/export/csv.js';

import type { JoinedRow } from '@/modules/indicators/core/types.js';

const row = (overrides: Partial<JoinedRow> = {}): JoinedRow => ({
  entity_key: 'ABC',
  display_name: 'Aland',
  group_id: 'R1',
  group_name: 'Region One',
  tier: 'High income',
  period: 2021,
  value: 100.5,
  ...overrides,
});

describe('formatJoinedRowsAsCsv', () => {
  it('writes the header in export column order', () => {
    const lines = formatJoinedRowsAsCsv([row()]).split('\n');

    expect(lines[0]).toBe('entity_key,display_name,group_id,group_name,tier,period,value');
    expect(lines[1]).toBe('ABC,Aland,R1,Region One,High income,2021,100.5');
  });

  it('writes missing periods and values as empty fields', () => {
    const lines = formatJoinedRowsAsCsv([row({ period: null, value: null })]).split('\n');

    expect(lines[1]).toBe('ABC,Aland,R1,Region One,High income,,');
  });

  it('quotes fields containing the delimiter', () => {
    const lines = formatJoinedRowsAsCsv([
      row({ display_name: 'Korea, Rep.', group_name: 'East Asia & Pacific' }),
    ]).split('\n');

    expect(lines[1]).toBe('ABC,"Korea, Rep.",R1,East Asia & Pacific,High income,2021,100.5');
  });
});

describe('csvFileName', () => {
  it('names the file after the indicator', () => {
    expect(csvFileName('SP.POP.TOTL')).toBe('SP.POP.TOTL_latest_by_entity.csv');
  });
});
