import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createLogger, serializeError, type LogLevel } from '../src';

type Captured = { level: LogLevel; line: string };

function capture(): { entries: Captured[]; sink: (level: LogLevel, line: string) => void } {
  const entries: Captured[] = [];
  return {
    entries,
    sink: (level, line) => {
      entries.push({ level, line });
    },
  };
}

describe('createLogger', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('writes one JSON line with base and call fields', () => {
    const { entries, sink } = capture();
    const logger = createLogger({ service: 'api', base: { region: 'eu' }, sink });

    logger.info('hello', { requestId: 'r1', skipped: undefined });

    expect(entries).toEqual([{
      level: 'info',
      line: '{"timestamp":"2026-01-02T03:04:05.000Z","level":"info","service":"api","message":"hello","region":"eu","requestId":"r1"}',
    }]);
  });

  it('drops entries below the configured level', () => {
    const { entries, sink } = capture();
    const logger = createLogger({ service: 'api', level: 'warn', sink });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(entries.map((entry) => entry.level)).toEqual(['warn', 'error']);
  });

  it('skips debug by default', () => {
    const { entries, sink } = capture();
    const logger = createLogger({ service: 'api', sink });

    logger.debug('hidden');

    expect(entries).toEqual([]);
  });

  it('merges child fields over the parent base and keeps the sink and level', () => {
    const { entries, sink } = capture();
    const logger = createLogger({ service: 'api', base: { region: 'eu', zone: 'a' }, level: 'warn', sink });

    const child = logger.child({ zone: 'b', requestId: 'r2' });
    child.info('not written');
    child.warn('careful');

    expect(entries).toHaveLength(1);
    expect(JSON.parse(entries[0]?.line ?? '{}')).toEqual({
      timestamp: '2026-01-02T03:04:05.000Z',
      level: 'warn',
      service: 'api',
      message: 'careful',
      region: 'eu',
      zone: 'b',
      requestId: 'r2',
    });
  });

  it('routes levels to the matching console method without a sink', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger({ service: 'api' });

    logger.info('a');
    logger.warn('b');
    logger.error('c');

    expect(log).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe('serializeError', () => {
  it('extracts name, message and stack from errors', () => {
    const error = new TypeError('bad input');

    expect(serializeError(error)).toEqual({
      errorName: 'TypeError',
      errorMessage: 'bad input',
      errorStack: error.stack,
    });
  });

  it('stringifies anything else', () => {
    expect(serializeError(42)).toEqual({ errorMessage: '42' });
  });
});
