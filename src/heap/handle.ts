/**
 * Stable reference to one element of a pairing heap.
 */

import { relocate, type NodeArena } from './node-arena.js';
import { NIL } from './types.js';

/**
 * Issued by `insert`. Immutable; stays valid until its element is removed or
 * its heap is cleared, including after the heap is merged into another.
 */
export class HeapHandle<K, P> {
  /** @internal */
  readonly arena: NodeArena<K, P>;
  /** @internal */
  readonly index: number;
  /** @internal */
  readonly generation: number;

  constructor(arena: NodeArena<K, P>, index: number, generation: number) {
    this.arena = arena;
    this.index = index;
    this.generation = generation;
    Object.freeze(this);
  }

  /**
   * Whether two handles denote the same node, across arena moves.
   */
  equals(other: HeapHandle<K, P>): boolean {
    const a = relocate({ arena: this.arena, index: this.index, token: NIL });
    const b = relocate({ arena: other.arena, index: other.index, token: NIL });
    return a.arena === b.arena && a.index === b.index && this.generation === other.generation;
  }
}
