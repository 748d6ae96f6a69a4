// engine/processBatch.ts
//
// Runs every record through processTableJson. One record failing, even with
// an unexpected exception, never stops the rest of the batch.

import { ErrorCodeDescriptions, ErrorCodes, errorMessage } from './errorCodes';
import { invalidTable, processTableJson } from './processRecord';
import { silentLogger, type Logger } from './logger';
import type { ProcessedTable, RotateSummary, TableRecordIn, TableRowResult } from './types';

export interface BatchResult {
  rows: TableRowResult[];
  summary: RotateSummary;
}

export function createSummary(): RotateSummary {
  return { row_count: 0, valid_count: 0, invalid_count: 0, error_code_counts: {} };
}

// Running counts; shared by the in-memory batch and the CSV stream.
export function tallyRow(summary: RotateSummary, row: TableRowResult): void {
  summary.row_count += 1;
  if (row.is_valid) {
    summary.valid_count += 1;
    return;
  }
  summary.invalid_count += 1;
  for (const code of row.error_codes) {
    summary.error_code_counts[code] = (summary.error_code_counts[code] ?? 0) + 1;
  }
}

export function rotateRecord(record: TableRecordIn, logger: Logger = silentLogger): TableRowResult {
  let processed: ProcessedTable;
  try {
    processed = processTableJson(record.json);
  } catch (err) {
    logger.error('record_processing_failed', {
      row_id: record.row_id,
      id: record.id,
      message: errorMessage(err)
    });
    processed = invalidTable(ErrorCodes.INTERNAL_ERROR);
  }

  if (!processed.is_valid) {
    logger.debug('record_rejected', {
      row_id: record.row_id,
      id: record.id,
      error_codes: processed.error_codes,
      reasons: processed.error_codes.map((code) => ErrorCodeDescriptions[code])
    });
  }

  return { row_id: record.row_id, id: record.id, ...processed };
}

export function rotateTableRecords(
  records: TableRecordIn[],
  logger: Logger = silentLogger
): BatchResult {
  const rows: TableRowResult[] = [];
  const summary = createSummary();

  for (const record of records) {
    const row = rotateRecord(record, logger);
    tallyRow(summary, row);
    rows.push(row);
  }

  return { rows, summary };
}
