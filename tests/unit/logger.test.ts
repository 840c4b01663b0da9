import { describe, expect, it } from 'vitest';

import { createLogger, resolveLogLevel } from '../../src/core/logger.js';

describe('logger', () => {
  it('writes JSON lines at or above the configured level', () => {
    const lines: string[] = [];
    const logger = createLogger({
      level: 'info',
      sink: (line) => lines.push(line),
      now: () => new Date('2026-01-02T03:04:05.000Z')
    });

    logger.debug('hidden');
    logger.info('shown', { files: 2 });
    logger.error('failed');

    expect(lines).toEqual([
      '{"t":"2026-01-02T03:04:05.000Z","level":"info","msg":"shown","meta":{"files":2}}',
      '{"t":"2026-01-02T03:04:05.000Z","level":"error","msg":"failed"}'
    ]);
  });

  it('defaults to warn', () => {
    const lines: string[] = [];
    const logger = createLogger({ sink: (line) => lines.push(line) });

    logger.info('quiet');

    expect(logger.level).toBe('warn');
    expect(lines).toEqual([]);
  });

  it('narrows level names from the environment', () => {
    expect(resolveLogLevel(' DEBUG ')).toBe('debug');
    expect(resolveLogLevel('loud')).toBe('warn');
    expect(resolveLogLevel(undefined, 'error')).toBe('error');
  });
});
