/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. Explicit overrides (passed directly)
 * 2. Environment variables (MELDHEAP_*)
 * 3. Built-in defaults
 */

import { ConfigError } from '../utils/errors.js';
import { createLogger, isLogLevel, LOG_LEVELS, setLogLevel, type LogLevel } from '../utils/logger.js';

const log = createLogger('config-loader');

/** Library-wide settings */
export interface HeapConfig {
  /** Run the structural validator after every mutating heap operation. Default: false */
  checkInvariants: boolean;
  /** Minimum level written to stderr. Default: 'warn' */
  logLevel: LogLevel;
}

/** Default config values */
export const DEFAULT_CONFIG: Readonly<HeapConfig> = Object.freeze({
  checkInvariants: false,
  logLevel: 'warn',
});

/**
 * Parse a boolean environment flag. Returns undefined for anything else.
 */
function parseFlag(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return undefined;
}

/**
 * Load config from environment variables.
 * Examples:
 *   MELDHEAP_CHECK_INVARIANTS=true
 *   MELDHEAP_LOG_LEVEL=debug
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): Partial<HeapConfig> {
  const config: Partial<HeapConfig> = {};

  const check = env.MELDHEAP_CHECK_INVARIANTS;
  if (check) {
    const flag = parseFlag(check);
    if (flag === undefined) {
      log.warn('Ignoring MELDHEAP_CHECK_INVARIANTS', { value: check });
    } else {
      config.checkInvariants = flag;
    }
  }

  const level = env.MELDHEAP_LOG_LEVEL;
  if (level) {
    if (isLogLevel(level)) {
      config.logLevel = level;
    } else {
      log.warn('Ignoring MELDHEAP_LOG_LEVEL', { value: level });
    }
  }

  return config;
}

/**
 * Validate a config structure.
 * Checks runtime types too, since overrides may come from untyped callers.
 */
export function validateConfig(config: Partial<HeapConfig>): string[] {
  const errors: string[] = [];

  if (config.checkInvariants !== undefined && typeof config.checkInvariants !== 'boolean') {
    errors.push('checkInvariants must be a boolean');
  }
  if (config.logLevel !== undefined && !isLogLevel(config.logLevel)) {
    errors.push(`logLevel must be one of ${LOG_LEVELS.join(', ')}`);
  }

  return errors;
}

export interface LoadConfigOptions {
  /** Explicit overrides (highest priority) */
  overrides?: Partial<HeapConfig>;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Environment to read instead of process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration with priority-based resolution.
 * Throws a ConfigError (CONFIG_INVALID) when the overrides fail validation.
 */
export function loadConfig(options: LoadConfigOptions = {}): HeapConfig {
  let config: HeapConfig = { ...DEFAULT_CONFIG };

  // 2. Environment variables
  if (!options.skipEnv) {
    config = { ...config, ...loadEnvConfig(options.env ?? process.env) };
  }

  // 1. Explicit overrides
  if (options.overrides) {
    const errors = validateConfig(options.overrides);
    if (errors.length > 0) {
      throw new ConfigError(`Invalid heap config: ${errors.join('; ')}`, 'CONFIG_INVALID');
    }
    const { checkInvariants, logLevel } = options.overrides;
    if (checkInvariants !== undefined) config.checkInvariants = checkInvariants;
    if (logLevel !== undefined) config.logLevel = logLevel;
  }

  return config;
}

// Process-wide config, resolved on first use.
let active: HeapConfig | undefined;

/**
 * The config heaps fall back to for options they are not given.
 * Environment variables are read once, on the first call.
 */
export function getConfig(): HeapConfig {
  active ??= loadConfig();
  return active;
}

/**
 * Forget the active config; the next getConfig() reads the environment again.
 */
export function resetConfig(): void {
  active = undefined;
}

/**
 * Load configuration, make it the active config, and apply its log level
 * to the shared logger.
 */
export function configure(options: LoadConfigOptions = {}): HeapConfig {
  const config = loadConfig(options);
  active = config;
  setLogLevel(config.logLevel);
  log.info('Configuration applied', { ...config });
  return config;
}
