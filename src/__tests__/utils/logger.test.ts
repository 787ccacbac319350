/**
 * Unit tests for the tagged logger and its history.
 */

import { createLogger, isAtLeast, logger } from '../../utils/logger';
import type { LogEvent } from '../../utils/logger';

describe('createLogger', () => {
  it('delivers events to subscribers until they unsubscribe', () => {
    const log = createLogger();
    const seen: LogEvent[] = [];
    const unsubscribe = log.subscribe(event => seen.push(event));

    log.warn('test', 'first', { n: 1 });
    unsubscribe();
    log.info('test', 'second');

    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({ level: 'warn', tag: 'test', message: 'first', data: { n: 1 } });
  });

  it('keeps only the newest events up to its capacity', () => {
    const log = createLogger({ capacity: 5 });
    for (let i = 0; i < 8; i++) log.info('test', `event ${i}`);

    expect(log.recent().map(e => e.message)).toEqual(['event 3', 'event 4', 'event 5', 'event 6', 'event 7']);
  });

  it('filters the history by level and limit', () => {
    const log = createLogger();
    log.info('pipeline', 'Started');
    log.warn('pipeline', 'Queue full, dropped block #0');
    log.info('capture', 'Microphone open');
    log.error('pipeline', 'Block #3 failed');
    log.warn('capture', 'Input track ended');

    expect(log.recent('warn').map(e => e.message)).toEqual([
      'Queue full, dropped block #0',
      'Block #3 failed',
      'Input track ended',
    ]);
    expect(log.recent('warn', 2).map(e => e.message)).toEqual(['Block #3 failed', 'Input track ended']);
    expect(log.recent('error').map(e => e.message)).toEqual(['Block #3 failed']);
    expect(log.recent('info', 0)).toEqual([]);
  });

  it('numbers events in order and freezes them', () => {
    const log = createLogger();
    const a = log.error('test', 'a');
    const b = log.error('test', 'b');
    expect(b.seq).toBe(a.seq + 1);
    expect(Object.isFrozen(a)).toBe(true);
  });

  it('echoes to the console only when asked to', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    try {
      createLogger().warn('capture', 'quiet');
      expect(warn).not.toHaveBeenCalled();

      createLogger({ echo: true }).warn('capture', 'Input track ended');
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(expect.stringMatching(/ \[capture\] Input track ended$/));
    } finally {
      warn.mockRestore();
    }
  });
});

describe('isAtLeast', () => {
  it('ranks info below warn below error', () => {
    const warning = createLogger().warn('test', 'w');
    expect(isAtLeast(warning, 'info')).toBe(true);
    expect(isAtLeast(warning, 'warn')).toBe(true);
    expect(isAtLeast(warning, 'error')).toBe(false);
  });
});

describe('logger', () => {
  it('stays off the console under the test runner', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    try {
      logger.info('test', 'silent');
      expect(log).not.toHaveBeenCalled();
    } finally {
      log.mockRestore();
    }
  });
});
