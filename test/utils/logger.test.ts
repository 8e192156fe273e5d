/**
 * Tests for the stderr logger.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  createLogger,
  formatEntry,
  getLogLevel,
  isLogLevel,
  LOG_LEVELS,
  setJsonMode,
  setLogLevel,
} from '../../src/utils/logger.js';

describe('logger', () => {
  const savedLevel = getLogLevel();

  beforeEach(() => {
    setJsonMode(false);
  });

  afterEach(() => {
    setLogLevel(savedLevel);
    setJsonMode(false);
    vi.restoreAllMocks();
  });

  describe('isLogLevel', () => {
    it('recognizes level names only', () => {
      expect(isLogLevel('debug')).toBe(true);
      expect(isLogLevel('silent')).toBe(true);
      expect(isLogLevel('verbose')).toBe(false);
      expect(isLogLevel('toString')).toBe(false);
      expect(isLogLevel(undefined)).toBe(false);
    });

    it('lists levels from least to most severe', () => {
      expect(LOG_LEVELS).toEqual(['debug', 'info', 'warn', 'error', 'silent']);
    });
  });

  describe('formatEntry', () => {
    it('formats time, level, message and meta', () => {
      const line = formatEntry({
        timestamp: '2026-01-02T03:04:05.678Z',
        level: 'info',
        message: 'hello',
        meta: { a: 1, b: { c: 2 } },
      });

      expect(line).toBe('[03:04:05] INFO  hello (a=1 b={"c":2})');
    });

    it('omits empty meta', () => {
      const line = formatEntry({
        timestamp: '2026-01-02T03:04:05.678Z',
        level: 'error',
        message: 'boom',
        meta: {},
      });

      expect(line).toBe('[03:04:05] ERROR boom');
    });

    it('emits JSON in JSON mode', () => {
      setJsonMode(true);
      const entry = {
        timestamp: '2026-01-02T03:04:05.678Z',
        level: 'warn' as const,
        message: 'careful',
      };

      expect(formatEntry(entry)).toBe(JSON.stringify(entry));
    });
  });

  describe('levels', () => {
    it('drops entries below the current level', () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const log = createLogger('levels');
      setLogLevel('warn');

      log.debug('hidden');
      log.info('hidden');
      log.warn('shown');
      log.error('also shown');

      expect(write).toHaveBeenCalledTimes(2);
      expect(String(write.mock.calls[0][0])).toMatch(/ WARN  \[levels\] shown\n$/);
      expect(String(write.mock.calls[1][0])).toMatch(/ ERROR \[levels\] also shown\n$/);
    });

    it('silent drops everything', () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      setLogLevel('silent');

      createLogger('levels').error('nothing');

      expect(write).not.toHaveBeenCalled();
    });

    it('createLogger prefixes messages', () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      setLogLevel('debug');

      createLogger('pairing-heap').debug('absorbed', { moved: 3 });

      expect(String(write.mock.calls[0][0])).toMatch(/ DEBUG \[pairing-heap\] absorbed \(moved=3\)\n$/);
    });
  });
});
