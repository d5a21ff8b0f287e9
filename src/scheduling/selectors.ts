/**
 * Ready-set selectors
 *
 * Index-based structures the drivers pull from. None of them copy process
 * data; ranks are read through comparators at comparison time.
 *
 * Drivers only insert indices whose arrival is <= the current clock, and
 * each incomplete process holds at most one live entry.
 */

import type { ProcessTable } from '../types/scheduling.js';
import { IndexHeap } from './IndexHeap.js';
import { compareByRank, sortByArrival } from './ordering.js';

/**
 * Table indices in arrival order with an admission cursor.
 */
export class AdmissionList {
  private readonly order: number[];
  private cursor = 0;

  constructor(private readonly table: ProcessTable) {
    this.order = sortByArrival(table);
  }

  /**
   * Admit, in arrival order, every pending index with arrival <= clock
   */
  admitUpTo(clock: number): number[] {
    const admitted: number[] = [];
    while (this.cursor < this.order.length && this.table[this.order[this.cursor]].arrival <= clock) {
      admitted.push(this.order[this.cursor]);
      this.cursor++;
    }
    return admitted;
  }

  /**
   * Arrival time of the next pending index, or Infinity when none remain
   */
  nextArrival(): number {
    return this.cursor < this.order.length ? this.table[this.order[this.cursor]].arrival : Infinity;
  }
}

/**
 * SJF selector: ranks by static burst, then arrival, then pid.
 */
export class SjfSelector {
  private readonly heap: IndexHeap;

  constructor(table: ProcessTable) {
    this.heap = new IndexHeap(compareByRank(table, (index) => table[index].burst));
  }

  insert(index: number): void {
    this.heap.push(index);
  }

  extractMin(): number | undefined {
    return this.heap.pop();
  }

  isEmpty(): boolean {
    return this.heap.isEmpty();
  }

  get size(): number {
    return this.heap.size;
  }
}

/**
 * SRTF selector: ranks by the live `remaining[index]`, then arrival, then pid.
 *
 * Keys change after every dispatch. A resident entry must not have its key
 * mutated in place: pop it, update `remaining`, then `insert` it again.
 */
export class SrtfSelector {
  private readonly heap: IndexHeap;

  constructor(table: ProcessTable, remaining: readonly number[]) {
    this.heap = new IndexHeap(compareByRank(table, (index) => remaining[index]));
  }

  insert(index: number): void {
    this.heap.push(index);
  }

  peekMin(): number | undefined {
    return this.heap.peek();
  }

  extractMin(): number | undefined {
    return this.heap.pop();
  }

  isEmpty(): boolean {
    return this.heap.isEmpty();
  }

  get size(): number {
    return this.heap.size;
  }
}

/**
 * FIFO ready queue for Round-Robin.
 *
 * Growable; consumed slots are compacted once they make up half the backing
 * array.
 */
export class ReadyQueue {
  private items: number[] = [];
  private head = 0;

  enqueue(index: number): void {
    this.items.push(index);
  }

  dequeue(): number | undefined {
    if (this.head >= this.items.length) {
      return undefined;
    }

    const index = this.items[this.head];
    this.head++;

    if (this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return index;
  }

  isEmpty(): boolean {
    return this.head >= this.items.length;
  }

  get size(): number {
    return this.items.length - this.head;
  }
}
