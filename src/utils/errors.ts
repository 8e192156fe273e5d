/**
 * Standardized error types for meldheap.
 *
 * All errors extend from MeldError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 * - Consistent error messages
 *
 * Expected heap failures (empty heap, stale handle) are not thrown. They are
 * returned inside a `HeapResult` and only thrown when the caller unwraps it.
 *
 * ## Usage
 *
 * ```typescript
 * import { HeapError, isErrorWithCode } from './errors.js';
 *
 * const result = heap.deleteMin();
 * if (!result.ok && isErrorWithCode(result.error, 'EMPTY_HEAP')) {
 *   // nothing queued
 * }
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all meldheap errors.
 *
 * Provides:
 * - `code`: Programmatic error identifier (e.g., 'INVALID_HANDLE')
 * - `cause`: Original error that caused this one (for chaining)
 * - `name`: Error class name (e.g., 'HeapError')
 */
export class MeldError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    // Normalize cause to Error
    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    // Capture stack trace (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof MeldError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Heap Errors
// ─────────────────────────────────────────────────────────────────────────────

/** Codes carried by {@link HeapError}. */
export type HeapErrorCode =
  | 'EMPTY_HEAP'
  | 'INVALID_HANDLE'
  | 'INCOMPARABLE_KEYS'
  | 'INVARIANT_VIOLATION';

/**
 * Errors from heap operations.
 *
 * Codes:
 * - `EMPTY_HEAP`: findMin/deleteMin on a heap with no elements
 * - `INVALID_HANDLE`: handle was removed, cleared, or never issued by this heap
 * - `INCOMPARABLE_KEYS`: the default comparator got keys it cannot order
 * - `INVARIANT_VIOLATION`: checked mode found a broken heap structure
 */
export class HeapError extends MeldError {
  declare readonly code: HeapErrorCode;

  constructor(message: string, code: HeapErrorCode, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_INVALID`: Configuration validation failed
 */
export class ConfigError extends MeldError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a meldheap error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof MeldError && error.code === code;
}

/**
 * Check if an error is a specific type of meldheap error.
 */
export function isHeapError(error: unknown): error is HeapError {
  return error instanceof HeapError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Wrap an unknown error in a MeldError.
 *
 * If the error is already a MeldError, returns it unchanged.
 * Otherwise wraps it in a new MeldError with UNKNOWN code.
 */
export function wrapError(error: unknown, message?: string): MeldError {
  if (error instanceof MeldError) {
    return error;
  }

  const errorMessage = message ?? (error instanceof Error ? error.message : String(error));
  return new MeldError(errorMessage, 'UNKNOWN', error);
}
