/**
 * Pairing heap performance benchmark.
 * Times the main workloads at increasing sizes.
 *
 * Usage: tsx scripts/benchmarks/heap-benchmark.ts
 */

import { PairingHeap } from '../../src/heap/pairing-heap.js';
import { ascending } from '../../src/heap/comparators.js';
import type { HeapHandle } from '../../src/heap/handle.js';

function randomKeys(n: number): number[] {
  return Array.from({ length: n }, () => Math.random() * n);
}

function benchmarkFn<T>(fn: () => T): { ms: number; value: T } {
  const start = performance.now();
  const value = fn();
  const ms = performance.now() - start;
  return { ms: Math.round(ms), value };
}

function insertThenDrain(keys: number[]): number {
  const heap = new PairingHeap<number, number>({ compare: ascending, checkInvariants: false });
  keys.forEach((key, i) => heap.insert(key, i));
  let drained = 0;
  for (const _ of heap.drain()) drained++;
  return drained;
}

function decreaseKeys(keys: number[]): number {
  const heap = new PairingHeap<number, number>({ compare: ascending, checkInvariants: false });
  const handles: HeapHandle<number, number>[] = keys.map((key, i) => heap.insert(key, i));
  let decreased = 0;
  for (const handle of handles) {
    const key = heap.getKey(handle);
    if (key.ok && heap.decreaseKey(handle, key.value / 2).ok) decreased++;
  }
  heap.clear();
  return decreased;
}

function mergeMany(keys: number[], parts: number): number {
  const heaps = Array.from(
    { length: parts },
    () => new PairingHeap<number, number>({ compare: ascending, checkInvariants: false }),
  );
  keys.forEach((key, i) => heaps[i % parts].insert(key, i));
  const [first, ...rest] = heaps;
  for (const heap of rest) first.merge(heap);
  return first.size;
}

function runBenchmarks(): void {
  console.log('Pairing Heap Benchmark');
  console.log('======================\n');

  const sizes = [1_000, 10_000, 100_000, 500_000];

  console.log('| Size    | insert+drain | decreaseKey | merge (64 heaps) |');
  console.log('|---------|--------------|-------------|------------------|');

  for (const size of sizes) {
    const keys = randomKeys(size);
    const drain = benchmarkFn(() => insertThenDrain(keys));
    const decrease = benchmarkFn(() => decreaseKeys(keys));
    const merged = benchmarkFn(() => mergeMany(keys, 64));

    console.log(
      `| ${size.toString().padEnd(7)} | ${String(drain.ms).padEnd(10)}ms | ${String(decrease.ms).padEnd(9)}ms | ${String(merged.ms).padEnd(14)}ms |`,
    );
  }

  console.log('\n--- Sorted input (deep trees) ---');
  const sorted = Array.from({ length: 200_000 }, (_, i) => i);
  const sortedResult = benchmarkFn(() => insertThenDrain(sorted.reverse()));
  console.log(`Descending insert then drain of ${sortedResult.value}: ${sortedResult.ms}ms`);
}

runBenchmarks();
