/**
 * NewsPulse — Retention
 *
 * Bounded selection of the newest items, used both to trim the store after
 * a refresh cycle and to answer top-K queries.
 *
 * Order: `published` descending, ties broken by identity ascending.
 */

import type { Item } from '../types';

/**
 * Comparator for newest-first order. Negative when `a` ranks before `b`.
 */
export function compareNewestFirst(a: Item, b: Item): number {
  const diff = b.published.getTime() - a.published.getTime();
  if (diff !== 0) return diff;
  if (a.identity === b.identity) return 0;
  return a.identity < b.identity ? -1 : 1;
}

/**
 * Binary min-heap under newest-first order: the root is the item that
 * ranks last among those held.
 */
class OldestOnTopHeap {
  private readonly heap: Item[] = [];

  get size(): number {
    return this.heap.length;
  }

  peek(): Item | undefined {
    return this.heap[0];
  }

  push(item: Item): void {
    this.heap.push(item);
    this.siftUp(this.heap.length - 1);
  }

  replaceTop(item: Item): void {
    this.heap[0] = item;
    this.siftDown(0);
  }

  toArray(): Item[] {
    return this.heap.slice();
  }

  // true when a should sit above b (a ranks later)
  private above(a: Item, b: Item): boolean {
    return compareNewestFirst(a, b) > 0;
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.above(this.heap[i], this.heap[parent])) break;
      [this.heap[i], this.heap[parent]] = [this.heap[parent], this.heap[i]];
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const n = this.heap.length;
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let top = i;
      if (left < n && this.above(this.heap[left], this.heap[top])) top = left;
      if (right < n && this.above(this.heap[right], this.heap[top])) top = right;
      if (top === i) break;
      [this.heap[i], this.heap[top]] = [this.heap[top], this.heap[i]];
      i = top;
    }
  }
}

/**
 * Return the `limit` newest items, newest first. O(n log limit).
 */
export function selectNewest(items: Iterable<Item>, limit: number): Item[] {
  if (limit <= 0) return [];

  const heap = new OldestOnTopHeap();

  for (const item of items) {
    if (heap.size < limit) {
      heap.push(item);
      continue;
    }
    const oldest = heap.peek();
    if (oldest && compareNewestFirst(item, oldest) < 0) {
      heap.replaceTop(item);
    }
  }

  return heap.toArray().sort(compareNewestFirst);
}

/**
 * Reduce the map to its `maxItems` newest entries in place.
 * Returns the number of evicted items.
 */
export function trimToNewest(target: Map<string, Item>, maxItems: number): number {
  if (target.size <= maxItems) return 0;

  const keep = selectNewest(target.values(), maxItems);
  const before = target.size;

  target.clear();
  for (const item of keep) {
    target.set(item.identity, item);
  }

  return before - target.size;
}
