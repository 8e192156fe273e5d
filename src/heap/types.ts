/**
 * Shared types for the pairing heap.
 */

import type { HeapError } from '../utils/errors.js';

/**
 * Orders two keys. Negative when `a` comes first, positive when `b` does,
 * zero when they tie. Must be a strict total order over the keys in use.
 */
export type Comparator<K> = (a: K, b: K) => number;

/** A key and its opaque payload. */
export interface HeapElement<K, P> {
  readonly key: K;
  readonly payload: P;
}

/** Outcome of an operation that can fail without corrupting the heap. */
export type HeapResult<T> = { ok: true; value: T } | { ok: false; error: HeapError };

export interface PairingHeapOptions<K> {
  /** Key order. Defaults to {@link naturalOrder}. */
  compare?: Comparator<K>;
  /**
   * Validate the whole structure after every mutation.
   * Falls back to `checkInvariants` from the loaded config.
   */
  checkInvariants?: boolean;
}

/** Slot reference meaning "no node". */
export const NIL = -1;
