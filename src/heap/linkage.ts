/**
 * Structural primitives of the pairing heap: merge, two-pass sibling
 * combination, and cut. Every public heap operation is composed from these.
 */

import type { NodeArena } from './node-arena.js';
import { NIL, type Comparator } from './types.js';

/**
 * Make a node a detached singleton root: no parent, self-loop ring.
 */
export function detach<K, P>(arena: NodeArena<K, P>, index: number): void {
  const node = arena.node(index);
  node.parent = NIL;
  node.left = index;
  node.right = index;
}

/**
 * Merge two detached roots and return the winner.
 *
 * The strictly smaller key wins; on a tie `x` wins. The loser is spliced into
 * the winner's child ring and becomes the designated child.
 */
export function merge<K, P>(
  arena: NodeArena<K, P>,
  compare: Comparator<K>,
  x: number,
  y: number,
): number {
  let winner = x;
  let loser = y;
  if (compare(arena.node(y).key, arena.node(x).key) < 0) {
    winner = y;
    loser = x;
  }

  const w = arena.node(winner);
  const l = arena.node(loser);
  l.parent = winner;

  if (w.child !== NIL) {
    const child = arena.node(w.child);
    const before = child.left;
    l.left = before;
    l.right = w.child;
    arena.node(before).right = loser;
    child.left = loser;
  }
  w.child = loser;

  return winner;
}

/**
 * Restore a single root from the sibling ring containing `first`.
 *
 * Pass 1 walks the ring left to right, detaching nodes and merging them in
 * pairs; an odd last node passes through. Pass 2 folds the winners right to
 * left, accumulated result first. Returns NIL for an empty ring.
 */
export function combineSiblings<K, P>(
  arena: NodeArena<K, P>,
  compare: Comparator<K>,
  first: number,
): number {
  if (first === NIL) {
    return NIL;
  }

  const winners: number[] = [];
  let cur = first;
  do {
    const a = cur;
    const b = arena.node(a).right;
    detach(arena, a);
    if (b === first) {
      winners.push(a);
      break;
    }
    cur = arena.node(b).right;
    detach(arena, b);
    winners.push(merge(arena, compare, a, b));
  } while (cur !== first);

  let root = winners[winners.length - 1];
  for (let i = winners.length - 2; i >= 0; i--) {
    root = merge(arena, compare, root, winners[i]);
  }
  return root;
}

/**
 * Detach a non-root node from its parent's child ring. O(1).
 * Its own children stay attached to it.
 */
export function cut<K, P>(arena: NodeArena<K, P>, index: number): void {
  const node = arena.node(index);
  const parent = arena.node(node.parent);

  if (node.left === index) {
    parent.child = NIL;
  } else {
    if (parent.child === index) {
      parent.child = node.left;
    }
    arena.node(node.left).right = node.right;
    arena.node(node.right).left = node.left;
  }

  detach(arena, index);
}
