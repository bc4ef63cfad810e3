/**
 * Tests for logger.mts
 */
import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { createPinoLogger, maskHeaders, noopLogger } from '../src/logger.mjs';

function captureLogs() {
  const lines: Array<Record<string, unknown>> = [];
  const stream = {
    write(line: string) {
      lines.push(JSON.parse(line));
    },
  };
  return { lines, instance: pino({ level: 'debug', base: null, timestamp: false }, stream) };
}

describe('createPinoLogger', () => {
  it('should pass metadata as the merging object', () => {
    const { lines, instance } = captureLogs();
    const logger = createPinoLogger(instance);

    logger.warn('Rate limited, retrying', { attempt: 1, delayMs: 2000 });

    expect(lines).toEqual([{ level: 40, attempt: 1, delayMs: 2000, msg: 'Rate limited, retrying' }]);
  });

  it('should map every level', () => {
    const { lines, instance } = captureLogs();
    const logger = createPinoLogger(instance);

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(lines.map((line) => [line.level, line.msg])).toEqual([
      [20, 'd'],
      [30, 'i'],
      [40, 'w'],
      [50, 'e'],
    ]);
  });
});

describe('noopLogger', () => {
  it('should accept calls without output', () => {
    expect(noopLogger.warn('ignored', { a: 1 })).toBeUndefined();
  });
});

describe('maskHeaders', () => {
  it('should keep the first 10 characters of long secrets', () => {
    expect(maskHeaders({ authorization: 'Bearer test-secret' })).toEqual({
      authorization: 'Bearer tes********',
    });
  });

  it('should fully mask short secrets', () => {
    expect(maskHeaders({ 'X-API-Key': 'short' })).toEqual({ 'X-API-Key': '*****' });
  });

  it('should leave other headers untouched', () => {
    const headers = { accept: 'application/json', authorization: 'Bearer test-secret' };
    const masked = maskHeaders(headers);
    expect(masked.accept).toBe('application/json');
    expect(headers.authorization).toBe('Bearer test-secret');
  });
});
