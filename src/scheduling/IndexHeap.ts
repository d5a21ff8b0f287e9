/**
 * Binary min-heap over process table indices
 *
 * Ordering comes entirely from the injected comparator, so the same heap
 * serves the static-burst SJF ranking and the live-remaining SRTF ranking.
 * The comparator is a total order over distinct indices, so no insertion
 * sequence number is needed for stability.
 */

import type { IndexComparator } from './ordering.js';

export class IndexHeap {
  private readonly items: number[] = [];

  constructor(private readonly compare: IndexComparator) {}

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  push(index: number): void {
    this.items.push(index);
    this.siftUp(this.items.length - 1);
  }

  /**
   * Smallest index under the comparator, or undefined when empty
   */
  peek(): number | undefined {
    return this.items[0];
  }

  pop(): number | undefined {
    const top = this.items[0];
    const last = this.items.pop();
    if (top === undefined || last === undefined) {
      return undefined;
    }

    if (this.items.length > 0) {
      this.items[0] = last;
      this.siftDown(0);
    }

    return top;
  }

  private less(i: number, j: number): boolean {
    return this.compare(this.items[i], this.items[j]) < 0;
  }

  private swap(i: number, j: number): void {
    const tmp = this.items[i];
    this.items[i] = this.items[j];
    this.items[j] = tmp;
  }

  private siftUp(idx: number): void {
    while (idx > 0) {
      const parent = (idx - 1) >> 1;
      if (!this.less(idx, parent)) break;
      this.swap(idx, parent);
      idx = parent;
    }
  }

  private siftDown(idx: number): void {
    const len = this.items.length;
    while (true) {
      let smallest = idx;
      const left = 2 * idx + 1;
      const right = left + 1;

      if (left < len && this.less(left, smallest)) smallest = left;
      if (right < len && this.less(right, smallest)) smallest = right;
      if (smallest === idx) break;

      this.swap(idx, smallest);
      idx = smallest;
    }
  }
}
