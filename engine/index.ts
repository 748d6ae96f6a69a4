// engine/index.ts
// Public surface of the table rotation engine.

export { squareLen } from './squareLen';
export { rotateRight, ringLength, ringIndices, type RotationResult } from './rotateRight';
export { isValidNumber, validateNumberArray, type TableValidationResult } from './validateTable';
export { processTableJson } from './processRecord';
export { rotateTableRecords, type BatchResult } from './processBatch';
export { parseTableCsv, TableCsvInputError, type ParsedTableCsv } from './parseTableCsv';
export { rotateCsvStream, type CsvStreamOptions, type CsvStreamResult } from './rotateCsvStream';
export { formatTableCsv } from './writeTableCsv';
export {
  DEFAULT_ROTATE_CONFIG,
  resolveRotateConfig,
  type RotateConfig,
  type CsvConfig,
  type LogLevel
} from './config';
export { createLogger, type Logger } from './logger';
export {
  ErrorCodes,
  ErrorCodeDescriptions,
  errorMessage,
  hasErrorCode,
  type ErrorCode,
  type RotationFailureCode
} from './errorCodes';
export type {
  TableRecordIn,
  TableRowResult,
  ProcessedTable,
  RotateSummary,
  SkippedRow
} from './types';
