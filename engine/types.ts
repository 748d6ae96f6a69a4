// engine/types.ts
// Shared TypeScript interfaces for the table rotation engine
import type { ErrorCode } from './errorCodes';

/**
 * TableRecordIn – one data row read from the input CSV.
 * `json` is the raw text of the json column; decoding happens later.
 */
export interface TableRecordIn {
  row_id: number; // 1-based data row, header excluded
  id: string;
  json: string;
}

/**
 * SkippedRow – a CSV row that could not be turned into a TableRecordIn.
 * Skipped rows produce no output row.
 */
export interface SkippedRow {
  row_id: number;
  reason: string;
  error_code: ErrorCode;
}

/**
 * ProcessedTable – outcome of decoding, validating and rotating one json field.
 * On failure `json` is always '[]' and `error_codes` holds at least one code.
 */
export interface ProcessedTable {
  json: string;
  is_valid: boolean;
  error_codes: ErrorCode[];
}

export interface TableRowResult extends ProcessedTable {
  row_id: number;
  id: string;
}

export interface RotateSummary {
  row_count: number;
  valid_count: number;
  invalid_count: number;
  error_code_counts: Partial<Record<ErrorCode, number>>;
}
