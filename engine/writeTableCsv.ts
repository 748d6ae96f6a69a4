// engine/writeTableCsv.ts
// TableRowResult[] → output CSV text (id,json,is_valid)

import { stringify } from 'csv-stringify/sync';
import { OUTPUT_COLUMNS, VALIDITY_TEXT } from './constants';
import type { TableRowResult } from './types';

export function toOutputRecord(row: TableRowResult): string[] {
  return [row.id, row.json, row.is_valid ? VALIDITY_TEXT.valid : VALIDITY_TEXT.invalid];
}

/**
 * The header is written on its own so an input with no data rows still
 * yields a header line. Fields are quoted only when they contain a comma,
 * quote or newline: `1,"[3,1,4,2]",true` but `3,[-5],true`.
 */
export function formatTableCsv(rows: TableRowResult[]): string {
  const header = stringify([[...OUTPUT_COLUMNS]]);
  if (rows.length === 0) return header;
  return header + stringify(rows.map(toOutputRecord));
}
