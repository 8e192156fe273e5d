/**
 * Addressable, mergeable min-priority queue backed by a pairing heap.
 *
 * Amortized costs: insert, findMin and merge O(1); deleteMin and remove
 * O(log n); decreaseKey between O(log log n) and O(log n).
 *
 * Not thread-safe. All operations are synchronous and run to completion.
 */

import { getConfig } from '../config/loader.js';
import { HeapError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { naturalOrder } from './comparators.js';
import { HeapHandle } from './handle.js';
import { validateHeap } from './invariants.js';
import { combineSiblings, cut, merge } from './linkage.js';
import { NodeArena, relocate } from './node-arena.js';
import { fail, ok } from './result.js';
import { NIL, type Comparator, type HeapElement, type HeapResult, type PairingHeapOptions } from './types.js';

const log = createLogger('pairing-heap');

function emptyHeap(operation: string): HeapError {
  return new HeapError(`${operation} on an empty heap`, 'EMPTY_HEAP');
}

function invalidHandle(operation: string): HeapError {
  return new HeapError(`${operation} got a handle that is not live in this heap`, 'INVALID_HANDLE');
}

/**
 * Pairing heap of (key, payload) elements.
 *
 * The root node is the minimum element according to `compare`. Every insert
 * returns a {@link HeapHandle} that addresses the element for `remove`,
 * `decreaseKey` and `getKey`.
 */
export class PairingHeap<K, P> {
  readonly compare: Comparator<K>;
  private readonly checked: boolean;
  private arena: NodeArena<K, P>;
  private token: number;
  private root = NIL;
  private count = 0;

  constructor(options: PairingHeapOptions<K> = {}) {
    this.compare = options.compare ?? naturalOrder;
    this.checked = options.checkInvariants ?? getConfig().checkInvariants;
    this.arena = new NodeArena<K, P>();
    this.token = this.arena.owners.add();
  }

  /**
   * Build a heap from [key, payload] pairs.
   */
  static from<K, P>(
    entries: Iterable<readonly [K, P]>,
    options?: PairingHeapOptions<K>,
  ): PairingHeap<K, P> {
    const heap = new PairingHeap<K, P>(options);
    for (const [key, payload] of entries) {
      heap.insert(key, payload);
    }
    return heap;
  }

  /**
   * Number of elements in the heap.
   */
  get size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  /**
   * Insert an element and return its handle.
   */
  insert(key: K, payload: P): HeapHandle<K, P> {
    const arena = this.sync();
    const index = arena.allocate(key, payload, this.token);
    if (this.root === NIL) {
      this.root = index;
    } else {
      try {
        this.root = merge(arena, this.compare, this.root, index);
      } catch (err) {
        // The comparator threw before any link changed.
        arena.release(index);
        throw err;
      }
    }
    this.count++;
    this.verify('insert');
    return new HeapHandle(arena, index, arena.generationOf(index));
  }

  /**
   * Get the minimum element without removing it.
   */
  findMin(): HeapResult<HeapElement<K, P>> {
    const arena = this.sync();
    if (this.root === NIL) {
      return fail(emptyHeap('findMin'));
    }
    return ok(arena.elementOf(this.root));
  }

  /**
   * Remove and return the minimum element.
   */
  deleteMin(): HeapResult<HeapElement<K, P>> {
    const arena = this.sync();
    if (this.root === NIL) {
      return fail(emptyHeap('deleteMin'));
    }
    const element = this.extractRoot(arena);
    this.verify('deleteMin');
    return ok(element);
  }

  /**
   * Remove and return the element a handle points at.
   * The handle is invalid afterwards.
   */
  remove(handle: HeapHandle<K, P>): HeapResult<HeapElement<K, P>> {
    const index = this.locate(handle);
    if (index === NIL) {
      return fail(invalidHandle('remove'));
    }

    const arena = this.arena;
    if (index === this.root) {
      const element = this.extractRoot(arena);
      this.verify('remove');
      return ok(element);
    }

    cut(arena, index);
    const element = arena.elementOf(index);
    const children = arena.node(index).child;
    arena.release(index);
    this.count--;

    const subRoot = combineSiblings(arena, this.compare, children);
    if (subRoot !== NIL) {
      this.root = merge(arena, this.compare, this.root, subRoot);
    }
    this.verify('remove');
    return ok(element);
  }

  /**
   * Lower the key of an element.
   *
   * Yields `true` when the key changed and `false` when `newKey` is not
   * strictly smaller than the current key, in which case nothing changes.
   * A decreased key that ties the current minimum becomes the new root.
   */
  decreaseKey(handle: HeapHandle<K, P>, newKey: K): HeapResult<boolean> {
    const index = this.locate(handle);
    if (index === NIL) {
      return fail(invalidHandle('decreaseKey'));
    }

    const arena = this.arena;
    const node = arena.node(index);
    if (this.compare(newKey, node.key) >= 0) {
      return ok(false);
    }

    if (index === this.root) {
      node.key = newKey;
    } else {
      cut(arena, index);
      node.key = newKey;
      // Decreased node goes first so it wins a tie with the old minimum.
      this.root = merge(arena, this.compare, index, this.root);
    }
    this.verify('decreaseKey');
    return ok(true);
  }

  /**
   * Move every element of `other` into this heap.
   *
   * `other` is left empty and usable. Handles it issued keep working, now
   * against this heap. Merging a heap with itself does nothing.
   */
  merge(other: PairingHeap<K, P>): void {
    if (other === this) {
      return;
    }
    if (other.compare !== this.compare) {
      log.warn('Merging heaps built with different comparators; keeping this heap\'s order', {
        size: this.count,
        otherSize: other.count,
      });
    }

    let arena = this.sync();
    const otherArena = other.sync();
    if (otherArena !== arena) {
      // Smaller arena moves.
      const [big, small] =
        otherArena.capacity > arena.capacity ? [otherArena, arena] : [arena, otherArena];
      const moved = small.capacity;
      const { slotOffset } = big.absorb(small);
      log.debug('Absorbed arena', { moved, slotOffset });
      arena = this.sync();
      other.sync();
    }

    // A throwing comparator must leave both heaps as they were.
    let root = this.root === NIL ? other.root : this.root;
    if (this.root !== NIL && other.root !== NIL) {
      root = merge(arena, this.compare, this.root, other.root);
    }

    arena.owners.redirect(other.token, this.token);
    this.root = root;
    this.count += other.count;
    other.root = NIL;
    other.count = 0;
    other.token = arena.owners.add();
    this.verify('merge');
  }

  /**
   * Whether a handle denotes a live element of this heap.
   */
  contains(handle: HeapHandle<K, P>): boolean {
    return this.locate(handle) !== NIL;
  }

  /**
   * Get the current key of an element.
   */
  getKey(handle: HeapHandle<K, P>): HeapResult<K> {
    const index = this.locate(handle);
    if (index === NIL) {
      return fail(invalidHandle('getKey'));
    }
    return ok(this.arena.node(index).key);
  }

  /**
   * Returns a new iterator over the elements in heap (not sorted) order.
   * The heap must not be modified while iterating.
   */
  *entries(): IterableIterator<HeapElement<K, P>> {
    const arena = this.sync();
    const stack: number[] = this.root === NIL ? [] : [this.root];
    for (let index = stack.pop(); index !== undefined; index = stack.pop()) {
      yield arena.elementOf(index);
      const first = arena.node(index).child;
      if (first === NIL) continue;
      let child = first;
      do {
        stack.push(child);
        child = arena.node(child).right;
      } while (child !== first);
    }
  }

  [Symbol.iterator](): IterableIterator<HeapElement<K, P>> {
    return this.entries();
  }

  /**
   * Returns a new iterator that removes elements in ascending order as it goes.
   */
  *drain(): IterableIterator<HeapElement<K, P>> {
    for (let next = this.deleteMin(); next.ok; next = this.deleteMin()) {
      yield next.value;
    }
  }

  /**
   * Release every node. All outstanding handles become invalid.
   * Uses an explicit worklist, so tree depth does not grow the call stack.
   */
  clear(): void {
    const arena = this.sync();
    const worklist: number[] = this.root === NIL ? [] : [this.root];
    let released = 0;
    for (let index = worklist.pop(); index !== undefined; index = worklist.pop()) {
      const first = arena.node(index).child;
      if (first !== NIL) {
        let child = first;
        do {
          worklist.push(child);
          child = arena.node(child).right;
        } while (child !== first);
      }
      arena.release(index);
      released++;
    }
    log.debug('Cleared heap', { released });
    this.root = NIL;
    this.count = 0;
  }

  /**
   * Run the structural validator now, regardless of checked mode.
   */
  validate(): string[] {
    const arena = this.sync();
    return validateHeap({
      arena,
      compare: this.compare,
      root: this.root,
      token: this.token,
      size: this.count,
    });
  }

  /**
   * Remove the root and recombine its children.
   */
  private extractRoot(arena: NodeArena<K, P>): HeapElement<K, P> {
    const root = this.root;
    const element = arena.elementOf(root);
    const children = arena.node(root).child;
    arena.release(root);
    this.count--;
    this.root = combineSiblings(arena, this.compare, children);
    return element;
  }

  /**
   * Resolve a handle to a slot in this heap's arena, or NIL.
   */
  private locate(handle: HeapHandle<K, P>): number {
    const arena = this.sync();
    const { arena: target, index } = relocate({
      arena: handle.arena,
      index: handle.index,
      token: NIL,
    });
    if (target !== arena || !arena.isLive(index, handle.generation)) {
      return NIL;
    }
    return arena.owners.find(arena.node(index).owner) === arena.owners.find(this.token)
      ? index
      : NIL;
  }

  /**
   * Catch up with any arena absorption that happened since the last call.
   */
  private sync(): NodeArena<K, P> {
    if (this.arena.forward !== null) {
      const moved = relocate({ arena: this.arena, index: this.root, token: this.token });
      this.arena = moved.arena;
      this.root = moved.index;
      this.token = moved.token;
    }
    return this.arena;
  }

  private verify(operation: string): void {
    if (!this.checked) return;
    const errors = this.validate();
    if (errors.length > 0) {
      log.error(`Heap invariants broken after ${operation}`, { errors });
      throw new HeapError(
        `Heap invariants broken after ${operation}: ${errors.join('; ')}`,
        'INVARIANT_VIOLATION',
      );
    }
  }
}
