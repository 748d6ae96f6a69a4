// engine/validateTable.ts
// Numeric domain gate for decoded tables.
//
// Responsibilities:
//  - Decide whether a decoded JSON value is an array of finite numbers
//  - Reject the whole array on the first bad element (no partial tables)
//  - Do NOT check the table shape; rotateRight owns EmptyArray / NotSquare

import { ErrorCodes, type ErrorCode } from './errorCodes';

export type TableValidationResult =
  | { ok: true; values: number[] }
  | { ok: false; code: ErrorCode; index?: number };

/**
 * A table entry is a finite number. Booleans fail on their type, so `true`
 * never slips through as 1.
 */
export function isValidNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function rejectionCode(value: unknown): ErrorCode {
  if (typeof value === 'boolean') return ErrorCodes.BOOLEAN_ENTRY;
  if (typeof value === 'number') return ErrorCodes.NON_FINITE_ENTRY;
  return ErrorCodes.NON_NUMERIC_ENTRY;
}

export function validateNumberArray(value: unknown): TableValidationResult {
  if (!Array.isArray(value)) {
    return { ok: false, code: ErrorCodes.NOT_AN_ARRAY };
  }

  const values: number[] = [];
  for (let index = 0; index < value.length; index++) {
    const item: unknown = value[index];
    if (!isValidNumber(item)) {
      return { ok: false, code: rejectionCode(item), index };
    }
    values.push(item);
  }

  return { ok: true, values };
}
