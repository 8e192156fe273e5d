/**
 * meldheap
 *
 * Addressable, mergeable priority queue built on a pairing heap.
 *
 * @packageDocumentation
 */

// Heap
export { PairingHeap } from './heap/pairing-heap.js';
export { HeapHandle } from './heap/handle.js';
export { unwrap } from './heap/result.js';
export { naturalOrder, ascending, descending, byKey } from './heap/comparators.js';
export type { Comparator, HeapElement, HeapResult, PairingHeapOptions } from './heap/types.js';

// Configuration
export {
  loadConfig,
  getConfig,
  resetConfig,
  configure,
  validateConfig,
  DEFAULT_CONFIG,
} from './config/loader.js';
export type { HeapConfig, LoadConfigOptions } from './config/loader.js';

// Utils
export {
  MeldError,
  HeapError,
  ConfigError,
  isErrorWithCode,
  isHeapError,
  isConfigError,
  wrapError,
} from './utils/errors.js';
export type { HeapErrorCode } from './utils/errors.js';
export { createLogger, setLogLevel, getLogLevel, setJsonMode, LOG_LEVELS } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
