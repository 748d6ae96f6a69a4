// engine/config.ts
// Canonical config for the table rotation engine

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CsvConfig {
  delimiter: string;   // single character, input only
  idColumn: string;    // header name of the identifier column
  jsonColumn: string;  // header name of the JSON array column
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface RotateConfig {
  name: string;
  csv: CsvConfig;
  logging: LoggingConfig;
}

export interface RotateConfigOverrides {
  delimiter?: string;
  logLevel?: LogLevel;
}

export const DEFAULT_ROTATE_CONFIG: RotateConfig = {
  name: 'table-rotate',
  csv: {
    delimiter: ',',
    idColumn: 'id',
    jsonColumn: 'json'
  },
  logging: {
    level: 'warn'
  }
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

function normalizeDelimiter(raw: string, source: string): string {
  if (raw.length !== 1 || raw === '"' || raw === '\n' || raw === '\r') {
    throw new Error(
      `Invalid CSV delimiter from ${source}: ${JSON.stringify(raw)}. Expected a single character other than a quote or newline.`
    );
  }
  return raw;
}

/**
 * Build the effective config: defaults, then environment, then explicit overrides.
 *
 * Environment:
 *  - ROTATE_LOG_LEVEL      debug | info | warn | error | silent (unknown → default)
 *  - ROTATE_CSV_DELIMITER  single character
 */
export function resolveRotateConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: RotateConfigOverrides = {}
): RotateConfig {
  const envLevel = (env.ROTATE_LOG_LEVEL ?? '').trim().toLowerCase();
  let level: LogLevel = isLogLevel(envLevel) ? envLevel : DEFAULT_ROTATE_CONFIG.logging.level;

  let delimiter = DEFAULT_ROTATE_CONFIG.csv.delimiter;
  const envDelimiter = env.ROTATE_CSV_DELIMITER;
  if (envDelimiter !== undefined && envDelimiter !== '') {
    delimiter = normalizeDelimiter(envDelimiter, 'ROTATE_CSV_DELIMITER');
  }

  if (overrides.delimiter !== undefined) {
    delimiter = normalizeDelimiter(overrides.delimiter, '--delimiter');
  }
  if (overrides.logLevel !== undefined) {
    level = overrides.logLevel;
  }

  return {
    name: DEFAULT_ROTATE_CONFIG.name,
    csv: { ...DEFAULT_ROTATE_CONFIG.csv, delimiter },
    logging: { level }
  };
}
