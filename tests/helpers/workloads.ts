/**
 * Shared process tables and timeline assertions for scheduling tests
 */

import { expect } from 'vitest';
import type { DriverResult, Process, ProcessTable, Segment } from '../../src/types/scheduling.js';
import { IDLE } from '../../src/types/scheduling.js';

export const p = (pid: number, arrival: number, burst: number): Process => ({ pid, arrival, burst });

/** Three processes, quantum 2: the Round-Robin golden trace */
export const THREE_STAGGERED: ProcessTable = [p(1, 0, 5), p(2, 1, 3), p(3, 2, 1)];

/** Classic SRTF example with preemption at every arrival */
export const SRTF_CLASSIC: ProcessTable = [p(1, 0, 7), p(2, 2, 4), p(3, 4, 1), p(4, 5, 4)];

/** A single late process: leading idle gap */
export const LATE_SINGLE: ProcessTable = [p(1, 5, 3)];

/** Non-contiguous pids, negative pid, table not in arrival order, idle gap in the middle */
export const SCATTERED_PIDS: ProcessTable = [p(42, 3, 2), p(7, 0, 1), p(-1, 3, 2)];

/**
 * Deterministic pseudo-random table (LCG) for property checks
 */
export function generateTable(count: number, seed: number): Process[] {
  let state = seed >>> 0;
  const next = (): number => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };

  const table: Process[] = [];
  for (let i = 0; i < count; i++) {
    table.push(p(100 + ((i * 37) % count), Math.floor(next() * 40), 1 + Math.floor(next() * 9)));
  }
  return table;
}

export function seg(owner: number | typeof IDLE, start: number, end: number): Segment {
  return { owner, start, end };
}

/**
 * Structural timeline invariants every driver must satisfy
 */
export function expectWellFormedTimeline(segments: readonly Segment[]): void {
  expect(segments.length).toBeGreaterThan(0);
  expect(segments[0].start).toBe(0);

  segments.forEach((segment, k) => {
    expect(segment.start).toBeLessThan(segment.end);
    if (k > 0) {
      expect(segment.start).toBe(segments[k - 1].end);
      expect(segment.owner).not.toBe(segments[k - 1].owner);
    }
  });
}

/**
 * Total CPU time each table index received on the timeline
 */
export function cpuTimeByIndex(table: ProcessTable, result: DriverResult): number[] {
  return table.map((process) =>
    result.segments
      .filter((segment) => segment.owner === process.pid)
      .reduce((acc, segment) => acc + segment.end - segment.start, 0)
  );
}
