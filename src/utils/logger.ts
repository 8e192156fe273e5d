/**
 * Leveled stderr logging for meldheap.
 *
 * Output goes to stderr so a host program's stdout stays untouched.
 * The level starts from MELDHEAP_LOG_LEVEL (default 'warn') and can be
 * changed with setLogLevel() or config.configure().
 */

/** Log levels, least severe first. 'silent' drops everything. */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type EntryLevel = Exclude<LogLevel, 'silent'>;

/** Log entry structure */
export interface LogEntry {
  timestamp: string;
  level: EntryLevel;
  message: string;
  meta?: Record<string, unknown>;
}

/** Logger interface */
export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function severity(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

const envLevel = process.env.MELDHEAP_LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'warn';

// JSON output mode (for machine parsing)
let jsonMode = process.env.MELDHEAP_LOG_JSON === 'true';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

/**
 * Format a log entry as one line: `[HH:MM:SS] LEVEL message (k=v ...)`,
 * or as JSON in JSON mode.
 */
export function formatEntry(entry: LogEntry): string {
  if (jsonMode) {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, meta } = entry;
  const time = timestamp.slice(11, 19);
  let output = `[${time}] ${level.toUpperCase().padEnd(5)} ${message}`;

  if (meta && Object.keys(meta).length > 0) {
    const fields = Object.entries(meta).map(
      ([k, v]) => `${k}=${typeof v === 'object' ? JSON.stringify(v) : String(v)}`,
    );
    output += ` (${fields.join(' ')})`;
  }

  return output;
}

function write(level: EntryLevel, message: string, meta?: Record<string, unknown>): void {
  if (severity(level) < severity(currentLevel)) return;
  const entry: LogEntry = { timestamp: new Date().toISOString(), level, message, meta };
  process.stderr.write(formatEntry(entry) + '\n');
}

/**
 * Create a logger whose messages carry a `[prefix]` tag naming the module.
 */
export function createLogger(prefix: string): Logger {
  const emit =
    (level: EntryLevel) =>
    (msg: string, meta?: Record<string, unknown>): void =>
      write(level, `[${prefix}] ${msg}`, meta);
  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}
