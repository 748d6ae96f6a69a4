// engine/logger.ts
// Structured JSON logging: one object per line, filtered by level.
// Every line goes to stderr; stdout carries the CSV output.

import type { LogLevel } from './config';
import { LOG_SERVICE } from './constants';

type EmittingLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export type LogSink = (line: string) => void;

export interface Logger {
  debug(event: string, ctx?: Record<string, unknown>): void;
  info(event: string, ctx?: Record<string, unknown>): void;
  warn(event: string, ctx?: Record<string, unknown>): void;
  error(event: string, ctx?: Record<string, unknown>): void;
}

const stderrSink: LogSink = (line) => {
  console.error(line);
};

export function createLogger(level: LogLevel, sink: LogSink = stderrSink): Logger {
  const threshold = LEVEL_RANK[level];

  const emit = (lineLevel: EmittingLevel, event: string, ctx: Record<string, unknown>) => {
    if (LEVEL_RANK[lineLevel] < threshold) return;
    sink(JSON.stringify({ level: lineLevel, service: LOG_SERVICE, event, ...ctx }));
  };

  return {
    debug: (event, ctx = {}) => emit('debug', event, ctx),
    info: (event, ctx = {}) => emit('info', event, ctx),
    warn: (event, ctx = {}) => emit('warn', event, ctx),
    error: (event, ctx = {}) => emit('error', event, ctx)
  };
}

export const silentLogger: Logger = createLogger('silent');
