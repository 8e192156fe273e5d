/**
 * Tests for config/loader.ts: defaults, environment, overrides and validation.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  configure,
  DEFAULT_CONFIG,
  getConfig,
  loadConfig,
  resetConfig,
  validateConfig,
} from '../../src/config/loader.js';
import { PairingHeap } from '../../src/heap/pairing-heap.js';
import { ConfigError } from '../../src/utils/errors.js';
import { getLogLevel, setLogLevel } from '../../src/utils/logger.js';

describe('loadConfig', () => {
  const savedLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(savedLevel);
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    resetConfig();
  });

  describe('defaults', () => {
    it('returns default values when no sources are given', () => {
      const config = loadConfig({ skipEnv: true });

      expect(config).toEqual({ checkInvariants: false, logLevel: 'warn' });
      expect(config).not.toBe(DEFAULT_CONFIG);
    });

    it('DEFAULT_CONFIG is frozen', () => {
      expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
    });
  });

  describe('environment variable overrides', () => {
    it('reads MELDHEAP_* variables', () => {
      const config = loadConfig({
        env: { MELDHEAP_CHECK_INVARIANTS: 'true', MELDHEAP_LOG_LEVEL: 'debug' },
      });

      expect(config.checkInvariants).toBe(true);
      expect(config.logLevel).toBe('debug');
    });

    it('accepts 0 and 1 as flags', () => {
      expect(loadConfig({ env: { MELDHEAP_CHECK_INVARIANTS: '1' } }).checkInvariants).toBe(true);
      expect(loadConfig({ env: { MELDHEAP_CHECK_INVARIANTS: '0' } }).checkInvariants).toBe(false);
    });

    it('ignores invalid values with a warning', () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      setLogLevel('warn');

      const config = loadConfig({
        env: { MELDHEAP_CHECK_INVARIANTS: 'sometimes', MELDHEAP_LOG_LEVEL: 'loud' },
      });

      expect(config).toEqual({ checkInvariants: false, logLevel: 'warn' });
      expect(write).toHaveBeenCalledTimes(2);
      expect(String(write.mock.calls[0][0])).toContain('Ignoring MELDHEAP_CHECK_INVARIANTS');
      expect(String(write.mock.calls[1][0])).toContain('Ignoring MELDHEAP_LOG_LEVEL');
    });

    it('skipEnv ignores the environment', () => {
      const config = loadConfig({ skipEnv: true, env: { MELDHEAP_CHECK_INVARIANTS: 'true' } });

      expect(config.checkInvariants).toBe(false);
    });
  });

  describe('overrides', () => {
    it('take priority over the environment', () => {
      const config = loadConfig({
        env: { MELDHEAP_CHECK_INVARIANTS: 'true', MELDHEAP_LOG_LEVEL: 'debug' },
        overrides: { checkInvariants: false },
      });

      expect(config.checkInvariants).toBe(false);
      expect(config.logLevel).toBe('debug');
    });

    it('throw CONFIG_INVALID when malformed', () => {
      const overrides = JSON.parse('{"logLevel":"loud"}');

      expect(() => loadConfig({ skipEnv: true, overrides })).toThrow(ConfigError);
      expect(() => loadConfig({ skipEnv: true, overrides })).toThrow(
        'Invalid heap config: logLevel must be one of debug, info, warn, error, silent',
      );
    });
  });

  describe('validateConfig', () => {
    it('accepts valid and partial configs', () => {
      expect(validateConfig({})).toEqual([]);
      expect(validateConfig({ checkInvariants: true, logLevel: 'silent' })).toEqual([]);
    });

    it('reports each invalid field', () => {
      const config = JSON.parse('{"checkInvariants":"yes","logLevel":3}');

      expect(validateConfig(config)).toEqual([
        'checkInvariants must be a boolean',
        'logLevel must be one of debug, info, warn, error, silent',
      ]);
    });
  });

  describe('configure', () => {
    it('applies the resolved log level', () => {
      const config = configure({ skipEnv: true, overrides: { logLevel: 'error' } });

      expect(config.logLevel).toBe('error');
      expect(getLogLevel()).toBe('error');
    });
  });

  describe('getConfig', () => {
    it('reads the environment once for every heap built after it', () => {
      vi.stubEnv('MELDHEAP_CHECK_INVARIANTS', 'sometimes');
      vi.stubEnv('MELDHEAP_LOG_LEVEL', '');
      resetConfig();
      setLogLevel('warn');
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

      new PairingHeap<number, string>();
      new PairingHeap<number, string>();
      new PairingHeap<number, string>();

      expect(write).toHaveBeenCalledTimes(1);
      expect(String(write.mock.calls[0][0])).toContain('Ignoring MELDHEAP_CHECK_INVARIANTS');
      expect(getConfig().checkInvariants).toBe(false);
    });

    it('resetConfig makes the next call read the environment again', () => {
      vi.stubEnv('MELDHEAP_CHECK_INVARIANTS', 'false');
      resetConfig();
      expect(getConfig().checkInvariants).toBe(false);

      vi.stubEnv('MELDHEAP_CHECK_INVARIANTS', 'true');
      expect(getConfig().checkInvariants).toBe(false);

      resetConfig();
      expect(getConfig().checkInvariants).toBe(true);
    });

    it('configure replaces the active config', () => {
      const config = configure({
        skipEnv: true,
        overrides: { checkInvariants: true, logLevel: 'error' },
      });

      expect(getConfig()).toBe(config);
    });
  });
});
