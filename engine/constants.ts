// engine/constants.ts
// Canonical constants for the table rotation engine.

import { DEFAULT_ROTATE_CONFIG } from './config';

export const TOOL_NAME = 'table-rotate';
export const TOOL_VERSION = '1.0.0';

// Service name stamped on every log line
export const LOG_SERVICE = DEFAULT_ROTATE_CONFIG.name;

// ------------------------------------------------------------
// CSV shape
// ------------------------------------------------------------

export const OUTPUT_COLUMNS = ['id', 'json', 'is_valid'] as const;

// Written in place of the table for every invalid record
export const INVALID_TABLE_JSON = '[]';

export const VALIDITY_TEXT = {
  valid: 'true',
  invalid: 'false'
} as const;
