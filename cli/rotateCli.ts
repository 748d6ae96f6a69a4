// cli/rotateCli.ts
// table-rotate command line entrypoint
//
// Reads an id,json CSV from a file (or stdin), rotates every square table one
// step clockwise, and writes id,json,is_valid CSV to stdout. Logs go to stderr.

import { createReadStream } from 'node:fs';
import { once } from 'node:events';
import type { Readable } from 'node:stream';
import { parseArgs } from 'node:util';

import { isLogLevel, resolveRotateConfig, type LogLevel, type RotateConfig } from '../engine/config';
import { TOOL_NAME, TOOL_VERSION } from '../engine/constants';
import { errorMessage, hasErrorCode } from '../engine/errorCodes';
import { createLogger, type Logger } from '../engine/logger';
import { TableCsvInputError } from '../engine/parseTableCsv';
import { rotateCsvStream } from '../engine/rotateCsvStream';

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  stdin: () => Readable;
}

export const processIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  stdin: () => process.stdin
};

export const USAGE = `${TOOL_NAME} ${TOOL_VERSION}
Rotate square tables inside a CSV file by one step clockwise.

USAGE:
    ${TOOL_NAME} [options] [input.csv]

    Reads stdin when no input file (or "-") is given.
    Input CSV must have columns 'id' and 'json'.
    Output CSV has columns 'id', 'json' and 'is_valid'.

OPTIONS:
    -d, --delimiter <char>   Input field delimiter (default ",")
    -l, --log-level <level>  debug | info | warn | error | silent
    -h, --help               Show this help message
    -v, --version            Show the version

ENVIRONMENT:
    ROTATE_LOG_LEVEL         debug | info | warn | error | silent (default warn)
    ROTATE_CSV_DELIMITER     Input field delimiter
`;

interface CliOptions {
  help: boolean;
  version: boolean;
  delimiter?: string;
  logLevel?: LogLevel;
  inputPath: string | null;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
      delimiter: { type: 'string', short: 'd' },
      'log-level': { type: 'string', short: 'l' }
    }
  });

  if (positionals.length > 1) {
    throw new Error(`Expected at most one input file, got ${positionals.length}.`);
  }

  const rawLevel = values['log-level'];
  let logLevel: LogLevel | undefined;
  if (rawLevel !== undefined) {
    const level = rawLevel.trim().toLowerCase();
    if (!isLogLevel(level)) {
      throw new Error(`Invalid log level: ${JSON.stringify(rawLevel)}.`);
    }
    logLevel = level;
  }

  const [input] = positionals;

  return {
    help: values.help === true,
    version: values.version === true,
    delimiter: values.delimiter,
    logLevel,
    inputPath: input === undefined || input === '-' ? null : input
  };
}

async function openInput(inputPath: string | null, io: CliIo, logger: Logger): Promise<Readable | null> {
  if (inputPath === null) {
    return io.stdin();
  }

  const stream = createReadStream(inputPath);
  try {
    await once(stream, 'open');
    return stream;
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) {
      logger.error('input_not_found', { path: inputPath, message: `File '${inputPath}' not found` });
    } else {
      logger.error('input_read_failed', { path: inputPath, message: errorMessage(err) });
    }
    return null;
  }
}

/**
 * Run the CLI and resolve to the process exit code.
 * Invalid records still exit 0; only unusable input or arguments exit 1.
 * Output rows are written as each record is read.
 */
export async function runRotateCli(
  argv: string[],
  io: CliIo = processIo,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  let options: CliOptions;
  let config: RotateConfig;
  try {
    options = parseCliArgs(argv);
    config = resolveRotateConfig(env, { delimiter: options.delimiter, logLevel: options.logLevel });
  } catch (err) {
    io.stderr(`Error: ${errorMessage(err)}\n\n${USAGE}`);
    return 1;
  }

  if (options.help) {
    io.stdout(USAGE);
    return 0;
  }
  if (options.version) {
    io.stdout(`${TOOL_VERSION}\n`);
    return 0;
  }

  const logger = createLogger(config.logging.level, (line) => io.stderr(`${line}\n`));

  const input = await openInput(options.inputPath, io, logger);
  if (input === null) {
    return 1;
  }

  try {
    const { summary, skipped_count } = await rotateCsvStream(input, io.stdout, {
      csv: config.csv,
      logger
    });

    logger.info('rotate_completed', {
      input: options.inputPath ?? 'stdin',
      ...summary,
      skipped_count
    });

    return 0;
  } catch (err) {
    if (err instanceof TableCsvInputError) {
      logger.error('input_rejected', { error_code: err.code, message: err.message });
    } else {
      logger.error('input_read_failed', {
        path: options.inputPath ?? 'stdin',
        message: errorMessage(err)
      });
    }
    return 1;
  }
}
