// engine/parseTableCsv.ts
//
// CSV text → TableRecordIn[]
//
// Expects a header row naming the id and json columns (any position, extra
// columns ignored). Only the header is fatal; short data rows are skipped.
// Fields are kept as written: the id is echoed to the output untouched.

import { parse } from 'csv-parse/sync';
import { DEFAULT_ROTATE_CONFIG, type CsvConfig } from './config';
import { ErrorCodes, type ErrorCode } from './errorCodes';
import type { SkippedRow, TableRecordIn } from './types';

export interface ParsedTableCsv {
  records: TableRecordIn[];
  skipped: SkippedRow[];
}

export interface TableColumns {
  idIndex: number;
  jsonIndex: number;
  minLength: number;
}

export type RowReadResult =
  | { ok: true; record: TableRecordIn }
  | { ok: false; skipped: SkippedRow };

/**
 * Input-level rejection (empty input, unusable header). Ends the run.
 */
export class TableCsvInputError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'TableCsvInputError';
    this.code = code;
  }
}

// Options shared by the sync parser and the streaming one.
export function csvParseOptions(csv: CsvConfig) {
  return {
    delimiter: csv.delimiter,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true
  };
}

function describeExpected(csv: CsvConfig): string {
  return `'${csv.idColumn}' and '${csv.jsonColumn}'`;
}

export function emptyInputError(csv: CsvConfig): TableCsvInputError {
  return new TableCsvInputError(
    ErrorCodes.EMPTY_INPUT,
    `Input CSV is empty. Expected a header row with ${describeExpected(csv)} columns.`
  );
}

export function resolveColumns(header: string[], csv: CsvConfig): TableColumns {
  const idIndex = header.indexOf(csv.idColumn);
  const jsonIndex = header.indexOf(csv.jsonColumn);

  if (idIndex === -1 || jsonIndex === -1) {
    throw new TableCsvInputError(
      ErrorCodes.INVALID_HEADER,
      `Input CSV must have ${describeExpected(csv)} columns. Found: ${header.join(', ') || '(none)'}.`
    );
  }

  return { idIndex, jsonIndex, minLength: Math.max(idIndex, jsonIndex) + 1 };
}

export function readRecord(row: string[], row_id: number, columns: TableColumns): RowReadResult {
  if (row.length < columns.minLength) {
    return {
      ok: false,
      skipped: {
        row_id,
        reason: `Row has ${row.length} field(s); expected at least ${columns.minLength}.`,
        error_code: ErrorCodes.MISSING_FIELDS
      }
    };
  }

  return {
    ok: true,
    record: { row_id, id: row[columns.idIndex], json: row[columns.jsonIndex] }
  };
}

export function parseTableCsv(
  csvText: string,
  csv: CsvConfig = DEFAULT_ROTATE_CONFIG.csv
): ParsedTableCsv {
  const rows: string[][] = parse(csvText, csvParseOptions(csv));

  if (rows.length === 0) {
    throw emptyInputError(csv);
  }

  const [header, ...dataRows] = rows;
  const columns = resolveColumns(header, csv);

  const records: TableRecordIn[] = [];
  const skipped: SkippedRow[] = [];

  dataRows.forEach((row, index) => {
    const read = readRecord(row, index + 1, columns);
    if (read.ok) {
      records.push(read.record);
    } else {
      skipped.push(read.skipped);
    }
  });

  return { records, skipped };
}
