// engine/errorCodes.ts
// Canonical error codes for the table rotation engine
//
// Code ranges:
//
//  E100–E199 → Table shape (rotation core)
//  E300–E399 → Numeric domain gate (array contents)
//  E600–E699 → CSV / JSON structural issues and internal failures

// NOTE:
// - Every code marks the record invalid; the output row is always [] / false.
// - Codes never abort a batch. Only input-level problems (bad header, unreadable file) end a run.

export const ErrorCodes = {
  // 1xx – Table shape
  EMPTY_ARRAY: 'E101',
  NOT_SQUARE: 'E102',

  // 3xx – Domain gate
  NOT_AN_ARRAY: 'E301',
  NON_NUMERIC_ENTRY: 'E302',
  NON_FINITE_ENTRY: 'E303',
  BOOLEAN_ENTRY: 'E304',

  // 6xx – Structural
  INVALID_JSON_TEXT: 'E601',
  MISSING_FIELDS: 'E602',      // CSV row too short for the id/json columns
  INVALID_HEADER: 'E603',      // header lacks the id or json column
  EMPTY_INPUT: 'E604',         // no header row at all
  INTERNAL_ERROR: 'E699'
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// Failures the rotation core can report on its own.
export type RotationFailureCode =
  | typeof ErrorCodes.EMPTY_ARRAY
  | typeof ErrorCodes.NOT_SQUARE;

// Human-readable descriptions (for logs)
export const ErrorCodeDescriptions: Record<ErrorCode, string> = {
  [ErrorCodes.EMPTY_ARRAY]: 'Array is empty.',
  [ErrorCodes.NOT_SQUARE]: 'Array length is not a perfect square.',

  [ErrorCodes.NOT_AN_ARRAY]: 'JSON value is not an array.',
  [ErrorCodes.NON_NUMERIC_ENTRY]: 'Array contains a non-numeric entry.',
  [ErrorCodes.NON_FINITE_ENTRY]: 'Array contains a non-finite number.',
  [ErrorCodes.BOOLEAN_ENTRY]: 'Array contains a boolean entry.',

  [ErrorCodes.INVALID_JSON_TEXT]: 'Field is not valid JSON.',
  [ErrorCodes.MISSING_FIELDS]: 'Row is missing the id or json field.',
  [ErrorCodes.INVALID_HEADER]: 'Header row is missing the id or json column.',
  [ErrorCodes.EMPTY_INPUT]: 'Input CSV is empty.',
  [ErrorCodes.INTERNAL_ERROR]: 'Internal failure while processing the record.'
};

// Helper: add an error code only once, preserving insertion order
export function addErrorCode(list: ErrorCode[], code: ErrorCode): void {
  if (!list.includes(code)) {
    list.push(code);
  }
}

// Errors may come from another realm (fs under a test runner), so these
// helpers check shape instead of `instanceof Error`.
export function errorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
