import type { HeapError } from '../utils/errors.js';
import type { HeapResult } from './types.js';

export function ok<T>(value: T): HeapResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: HeapError): HeapResult<T> {
  return { ok: false, error };
}

/**
 * Return the value of a successful result, or throw its error.
 */
export function unwrap<T>(result: HeapResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
