#!/usr/bin/env node
// cli/index.ts

import { createLogger } from '../engine/logger';
import { runRotateCli } from './rotateCli';

runRotateCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    createLogger('error').error('cli_unhandled_exception', {
      message: err instanceof Error ? err.message : String(err)
    });
    process.exitCode = 1;
  }
);
