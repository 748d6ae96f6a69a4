// engine/rotateCsvStream.ts
//
// Streaming counterpart of parseTableCsv → rotateTableRecords → formatTableCsv.
// Each record is rotated and written as soon as csv-parse yields it; only the
// summary counts are kept.

import { Transform, Writable, type Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { parse } from 'csv-parse';
import { stringify } from 'csv-stringify';

import { DEFAULT_ROTATE_CONFIG, type CsvConfig } from './config';
import { OUTPUT_COLUMNS } from './constants';
import { errorMessage } from './errorCodes';
import { silentLogger, type Logger } from './logger';
import {
  csvParseOptions,
  emptyInputError,
  readRecord,
  resolveColumns,
  type TableColumns
} from './parseTableCsv';
import { createSummary, rotateRecord, tallyRow } from './processBatch';
import type { RotateSummary } from './types';
import { toOutputRecord } from './writeTableCsv';

export interface CsvStreamOptions {
  csv?: CsvConfig;
  logger?: Logger;
}

export interface CsvStreamResult {
  summary: RotateSummary;
  skipped_count: number;
}

/**
 * Pipe `input` (id,json CSV) through the rotation and hand every output chunk
 * to `write`. Rejects with TableCsvInputError for an empty input or a bad
 * header, or with the csv-parse error for malformed CSV; rows already written
 * stay written.
 */
export async function rotateCsvStream(
  input: Readable,
  write: (chunk: string) => void,
  options: CsvStreamOptions = {}
): Promise<CsvStreamResult> {
  const csv = options.csv ?? DEFAULT_ROTATE_CONFIG.csv;
  const logger = options.logger ?? silentLogger;

  const summary = createSummary();
  let skipped_count = 0;
  let columns: TableColumns | null = null;
  let row_id = 0;

  const rotator = new Transform({
    objectMode: true,
    transform(row: string[], _encoding, callback) {
      try {
        if (columns === null) {
          columns = resolveColumns(row, csv);
          callback(null, [...OUTPUT_COLUMNS]);
          return;
        }

        row_id += 1;
        const read = readRecord(row, row_id, columns);
        if (!read.ok) {
          skipped_count += 1;
          logger.warn('row_skipped', { ...read.skipped });
          callback();
          return;
        }

        const result = rotateRecord(read.record, logger);
        tallyRow(summary, result);
        callback(null, toOutputRecord(result));
      } catch (err) {
        callback(err instanceof Error ? err : new Error(errorMessage(err)));
      }
    },
    flush(callback) {
      callback(columns === null ? emptyInputError(csv) : null);
    }
  });

  const sink = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      write(chunk.toString());
      callback();
    }
  });

  await pipeline(input, parse(csvParseOptions(csv)), rotator, stringify(), sink);

  return { summary, skipped_count };
}
