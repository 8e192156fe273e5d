/**
 * Ready-made key orders.
 */

import { HeapError } from '../utils/errors.js';
import type { Comparator } from './types.js';

function compareOrdered<T extends number | bigint | string>(a: T, b: T): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Ascending order for numbers, bigints and strings.
 * Mixed or other key types throw a HeapError with code INCOMPARABLE_KEYS.
 */
export function naturalOrder<K>(a: K, b: K): number {
  if (typeof a === 'number' && typeof b === 'number') return compareOrdered(a, b);
  if (typeof a === 'bigint' && typeof b === 'bigint') return compareOrdered(a, b);
  if (typeof a === 'string' && typeof b === 'string') return compareOrdered(a, b);
  throw new HeapError(
    `No natural order between ${typeof a} and ${typeof b}; pass a compare option`,
    'INCOMPARABLE_KEYS',
  );
}

/** Ascending order over numbers (min-priority). */
export const ascending: Comparator<number> = (a, b) => compareOrdered(a, b);

/**
 * Reverse an order, e.g. `descending(ascending)` for a max-priority queue.
 */
export function descending<K>(compare: Comparator<K>): Comparator<K> {
  return (a, b) => compare(b, a);
}

/**
 * Order composite keys by a selected field.
 */
export function byKey<K, F>(select: (key: K) => F, compare: Comparator<F>): Comparator<K> {
  return (a, b) => compare(select(a), select(b));
}
