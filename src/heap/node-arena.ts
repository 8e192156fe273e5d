/**
 * Slot storage for pairing heap nodes.
 *
 * Nodes never hold object references to each other: every link is a slot
 * index into the arena, and every slot carries a generation counter that is
 * bumped when the slot is released. A handle remembers the generation it was
 * issued with, so a handle to a removed node can never alias the node that
 * later reuses its slot.
 */

import { HeapError } from '../utils/errors.js';
import { OwnerSet } from './owner-set.js';
import { NIL, type HeapElement } from './types.js';

/**
 * One node of the heap tree.
 *
 * `child` points at any one member of the child ring; `left`/`right` form a
 * circular doubly-linked ring over siblings (a self-loop for a lone node).
 */
export interface HeapNode<K, P> {
  key: K;
  readonly payload: P;
  parent: number;
  child: number;
  left: number;
  right: number;
  /** Owner token, resolved through the arena's {@link OwnerSet}. */
  owner: number;
}

/** Where an absorbed arena's slots and tokens now live. */
export interface ArenaForward<K, P> {
  target: NodeArena<K, P>;
  slotOffset: number;
  tokenOffset: number;
}

/** A slot index and owner token pinned to a specific arena. */
export interface ArenaLocation<K, P> {
  arena: NodeArena<K, P>;
  index: number;
  token: number;
}

/**
 * Generation-tagged arena of heap nodes.
 * Several heaps may share one arena; ownership is tracked per slot by token.
 */
export class NodeArena<K, P> {
  readonly owners = new OwnerSet();
  private nodes: Array<HeapNode<K, P> | null> = [];
  private generations: number[] = [];
  private freeSlots: number[] = [];
  private live = 0;
  private forwardTo: ArenaForward<K, P> | null = null;

  /**
   * Set once this arena has been absorbed by another. A forwarded arena is empty.
   */
  get forward(): ArenaForward<K, P> | null {
    return this.forwardTo;
  }

  /**
   * Number of slots, live or free.
   */
  get capacity(): number {
    return this.nodes.length;
  }

  /**
   * Number of live nodes across every heap sharing this arena.
   */
  get liveCount(): number {
    return this.live;
  }

  /**
   * Create a detached singleton node and return its slot.
   */
  allocate(key: K, payload: P, owner: number): number {
    const index = this.freeSlots.pop() ?? this.nodes.length;
    this.nodes[index] = {
      key,
      payload,
      parent: NIL,
      child: NIL,
      left: index,
      right: index,
      owner,
    };
    if (index === this.generations.length) {
      this.generations.push(0);
    }
    this.live++;
    return index;
  }

  /**
   * Free a slot. Its generation moves on, invalidating outstanding handles.
   */
  release(index: number): void {
    this.node(index);
    this.nodes[index] = null;
    this.generations[index]++;
    this.freeSlots.push(index);
    this.live--;
  }

  /**
   * Get the live node at a slot.
   * Throws INVARIANT_VIOLATION for a free or out-of-range slot.
   */
  node(index: number): HeapNode<K, P> {
    const node = index >= 0 && index < this.nodes.length ? this.nodes[index] : null;
    if (node === null) {
      throw new HeapError(`Slot ${index} holds no live node`, 'INVARIANT_VIOLATION');
    }
    return node;
  }

  generationOf(index: number): number {
    return this.generations[index];
  }

  /**
   * Whether the slot holds a node issued under `generation`.
   */
  isLive(index: number, generation: number): boolean {
    return (
      index >= 0 &&
      index < this.nodes.length &&
      this.nodes[index] !== null &&
      this.generations[index] === generation
    );
  }

  /**
   * Read-only copy of a node's element.
   */
  elementOf(index: number): HeapElement<K, P> {
    const { key, payload } = this.node(index);
    return Object.freeze({ key, payload });
  }

  /**
   * Move every slot and owner token of `other` into this arena.
   *
   * Slots are appended in order with all links shifted by the old capacity, so
   * generations and free slots carry over unchanged. `other` is left empty and
   * forwards to this arena.
   */
  absorb(other: NodeArena<K, P>): ArenaForward<K, P> {
    if (other === this || other.forwardTo !== null || this.forwardTo !== null) {
      throw new HeapError('Arena absorb needs two distinct, unforwarded arenas', 'INVARIANT_VIOLATION');
    }

    const slotOffset = this.nodes.length;
    const tokenOffset = this.owners.absorb(other.owners);
    const shift = (index: number): number => (index === NIL ? NIL : index + slotOffset);

    for (let i = 0; i < other.nodes.length; i++) {
      const node = other.nodes[i];
      if (node === null) {
        this.freeSlots.push(i + slotOffset);
      } else {
        node.parent = shift(node.parent);
        node.child = shift(node.child);
        node.left = shift(node.left);
        node.right = shift(node.right);
        node.owner += tokenOffset;
      }
      this.nodes.push(node);
      this.generations.push(other.generations[i]);
    }
    this.live += other.live;

    other.nodes = [];
    other.generations = [];
    other.freeSlots = [];
    other.live = 0;
    other.forwardTo = { target: this, slotOffset, tokenOffset };
    return other.forwardTo;
  }
}

/**
 * Follow forward pointers until reaching a live arena, shifting the slot and
 * token on the way. NIL values stay NIL.
 */
export function relocate<K, P>(location: ArenaLocation<K, P>): ArenaLocation<K, P> {
  let { arena, index, token } = location;
  for (let fwd = arena.forward; fwd !== null; fwd = arena.forward) {
    if (index !== NIL) index += fwd.slotOffset;
    if (token !== NIL) token += fwd.tokenOffset;
    arena = fwd.target;
  }
  return { arena, index, token };
}
