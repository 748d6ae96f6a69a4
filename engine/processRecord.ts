// engine/processRecord.ts
// json field → rotated json field + validity

import { ErrorCodes, addErrorCode, type ErrorCode } from './errorCodes';
import type { ProcessedTable } from './types';
import { INVALID_TABLE_JSON } from './constants';
import { validateNumberArray } from './validateTable';
import { rotateRight } from './rotateRight';

export function invalidTable(code: ErrorCode): ProcessedTable {
  const error_codes: ErrorCode[] = [];
  addErrorCode(error_codes, code);
  return { json: INVALID_TABLE_JSON, is_valid: false, error_codes };
}

/**
 * Decode the json column, run the domain gate, then rotate.
 *
 * Every failure (bad JSON, non-numeric entries, empty or non-square arrays)
 * degrades to `[]` / false with the matching error code. Empty arrays are
 * always invalid even though 0 is a perfect square.
 */
export function processTableJson(jsonText: string): ProcessedTable {
  let decoded: unknown;
  try {
    decoded = JSON.parse(jsonText);
  } catch {
    return invalidTable(ErrorCodes.INVALID_JSON_TEXT);
  }

  const validation = validateNumberArray(decoded);
  if (!validation.ok) {
    return invalidTable(validation.code);
  }

  const numbers = validation.values;
  const rotation = rotateRight(numbers);
  if (!rotation.ok) {
    return invalidTable(rotation.code);
  }

  return {
    json: JSON.stringify(numbers),
    is_valid: true,
    error_codes: []
  };
}
