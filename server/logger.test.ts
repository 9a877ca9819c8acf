import { describe, it, expect } from 'vitest';
import type { LogLevel } from './config.ts';
import { createLogger, describeError, formatLogLine } from './logger.ts';

describe('logger', () => {
  it('formats lines with timestamp, level and module', () => {
    const at = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6));
    expect(formatLogLine('info', 'sim', 'paused', at)).toBe(
      '2024-01-02T03:04:05.006Z | info | sim | paused'
    );
  });

  it('drops messages below the threshold', () => {
    const lines: Array<[LogLevel, string]> = [];
    const logger = createLogger('warn', (level, line) => lines.push([level, line]));
    logger.debug('sim', 'debug');
    logger.info('sim', 'info');
    logger.warn('sim', 'careful');
    logger.error('http', 'broken');
    expect(lines.map(([level]) => level)).toEqual(['warn', 'error']);
    expect(lines[0]?.[1].endsWith(' | warn | sim | careful')).toBe(true);
    expect(lines[1]?.[1].endsWith(' | error | http | broken')).toBe(true);
  });

  it('describes thrown values', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });
});
