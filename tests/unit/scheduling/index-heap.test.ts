import { describe, it, expect } from 'vitest';
import { IndexHeap } from '../../../src/scheduling/IndexHeap.js';

describe('IndexHeap', () => {
  const keys = [50, 10, 40, 20, 30, 60, 0];
  const byKey = (a: number, b: number): number => keys[a] - keys[b];

  it('should return undefined from peek and pop when empty', () => {
    const heap = new IndexHeap(byKey);
    expect(heap.isEmpty()).toBe(true);
    expect(heap.peek()).toBeUndefined();
    expect(heap.pop()).toBeUndefined();
  });

  it('should pop indices in comparator order', () => {
    const heap = new IndexHeap(byKey);
    for (let i = 0; i < keys.length; i++) heap.push(i);

    const popped: number[] = [];
    while (!heap.isEmpty()) {
      const index = heap.pop();
      if (index !== undefined) popped.push(index);
    }

    expect(popped).toEqual([6, 1, 3, 4, 2, 0, 5]);
  });

  it('should peek without removing', () => {
    const heap = new IndexHeap(byKey);
    heap.push(0);
    heap.push(3);
    expect(heap.peek()).toBe(3);
    expect(heap.size).toBe(2);
  });

  it('should support interleaved push and pop', () => {
    const heap = new IndexHeap(byKey);
    heap.push(0);
    heap.push(2);
    expect(heap.pop()).toBe(2);
    heap.push(1);
    heap.push(5);
    expect(heap.pop()).toBe(1);
    expect(heap.pop()).toBe(0);
    expect(heap.pop()).toBe(5);
    expect(heap.size).toBe(0);
  });

  it('should see key changes only after pop and push', () => {
    const live = [5, 3];
    const heap = new IndexHeap((a, b) => live[a] - live[b]);
    heap.push(0);
    heap.push(1);

    const top = heap.pop();
    expect(top).toBe(1);
    live[1] = 9;
    heap.push(1);

    expect(heap.peek()).toBe(0);
    expect(heap.size).toBe(2);
  });
});
