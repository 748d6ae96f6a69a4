import { describe, expect, it } from '@jest/globals';
import { createLogger } from '../logger';

function capture(level: Parameters<typeof createLogger>[0]) {
  const lines: string[] = [];
  const logger = createLogger(level, (line) => lines.push(line));
  return { lines, logger };
}

describe('createLogger', () => {
  it('writes one JSON object per event', () => {
    const { lines, logger } = capture('info');
    logger.info('rotate_completed', { row_count: 2 });
    expect(lines).toEqual([
      '{"level":"info","service":"table-rotate","event":"rotate_completed","row_count":2}'
    ]);
  });

  it('drops events below the configured level', () => {
    const { lines, logger } = capture('warn');
    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');
    expect(lines.map((line) => JSON.parse(line).event)).toEqual(['c', 'd']);
  });

  it('emits nothing when silent', () => {
    const { lines, logger } = capture('silent');
    logger.error('x', { message: 'ignored' });
    expect(lines).toEqual([]);
  });
});
