/**
 * Structural validation of a heap tree.
 * Used by checked mode and by the test suites.
 */

import type { NodeArena } from './node-arena.js';
import { NIL, type Comparator } from './types.js';

export interface HeapShape<K, P> {
  arena: NodeArena<K, P>;
  compare: Comparator<K>;
  root: number;
  token: number;
  size: number;
}

/**
 * Check every structural invariant reachable from `root`.
 * Returns a list of problems; empty when the tree is sound.
 */
export function validateHeap<K, P>(shape: HeapShape<K, P>): string[] {
  const { arena, compare, root, token, size } = shape;
  const errors: string[] = [];

  if (root === NIL) {
    if (size !== 0) {
      errors.push(`empty root but size is ${size}`);
    }
    return errors;
  }

  const top = arena.node(root);
  if (top.parent !== NIL) {
    errors.push(`root ${root} has parent ${top.parent}`);
  }
  if (top.left !== root || top.right !== root) {
    errors.push(`root ${root} has siblings`);
  }

  const seen = new Set<number>([root]);
  const stack = [root];
  const owner = arena.owners.find(token);

  for (let index = stack.pop(); index !== undefined; index = stack.pop()) {
    const node = arena.node(index);
    if (arena.owners.find(node.owner) !== owner) {
      errors.push(`node ${index} belongs to another heap`);
    }
    if (node.child === NIL) continue;

    let sibling = node.child;
    do {
      if (seen.has(sibling)) {
        errors.push(`node ${sibling} reached twice`);
        return errors;
      }
      seen.add(sibling);
      stack.push(sibling);

      const s = arena.node(sibling);
      if (s.parent !== index) {
        errors.push(`node ${sibling} has parent ${s.parent}, expected ${index}`);
      }
      if (arena.node(s.right).left !== sibling || arena.node(s.left).right !== sibling) {
        errors.push(`sibling ring broken at node ${sibling}`);
      }
      if (compare(node.key, s.key) > 0) {
        errors.push(`heap order violated between ${index} and child ${sibling}`);
      }
      sibling = s.right;
    } while (sibling !== node.child);
  }

  if (seen.size !== size) {
    errors.push(`reached ${seen.size} nodes but size is ${size}`);
  }

  return errors;
}
