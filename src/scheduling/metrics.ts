/**
 * Metrics reducer
 *
 * Converts per-run Start/End arrays into response, waiting and turnaround
 * per process, plus averages and whole-timeline statistics. All three
 * per-process metrics are derived independently from Start/End/burst; for
 * preemptive runs response and waiting generally differ.
 */

import type {
  AverageMetrics,
  ProcessMetrics,
  ProcessTable,
  Segment,
  TimelineStats,
} from '../types/scheduling.js';
import { IDLE } from '../types/scheduling.js';
import { roundTo, safeAverage, safeDivide } from '../utils/math-helpers.js';

/** Decimal places for reported averages */
export const METRIC_PRECISION = 2;

export function computeProcessMetrics(
  table: ProcessTable,
  start: readonly number[],
  end: readonly number[]
): ProcessMetrics[] {
  return table.map((process, index) => {
    const turnaround = end[index] - process.arrival;
    return {
      pid: process.pid,
      arrival: process.arrival,
      burst: process.burst,
      start: start[index],
      end: end[index],
      response: start[index] - process.arrival,
      waiting: turnaround - process.burst,
      turnaround,
    };
  });
}

export function computeAverages(rows: readonly ProcessMetrics[]): AverageMetrics {
  return {
    response: roundTo(safeAverage(rows.map((row) => row.response)), METRIC_PRECISION),
    waiting: roundTo(safeAverage(rows.map((row) => row.waiting)), METRIC_PRECISION),
    turnaround: roundTo(safeAverage(rows.map((row) => row.turnaround)), METRIC_PRECISION),
  };
}

/**
 * Fixed two-decimal rendering of an average
 */
export function formatAverage(value: number): string {
  return value.toFixed(METRIC_PRECISION);
}

export function computeTimelineStats(segments: readonly Segment[], completed: number): TimelineStats {
  let busyTime = 0;
  let idleTime = 0;
  let contextSwitches = 0;
  let previousOwner: number | undefined;

  for (const segment of segments) {
    const length = segment.end - segment.start;
    if (segment.owner === IDLE) {
      idleTime += length;
      continue;
    }

    busyTime += length;
    if (previousOwner !== undefined && previousOwner !== segment.owner) {
      contextSwitches++;
    }
    previousOwner = segment.owner;
  }

  const makespan = segments.length > 0 ? segments[segments.length - 1].end : 0;

  return {
    busyTime,
    idleTime,
    makespan,
    cpuUtilization: roundTo(safeDivide(busyTime * 100, makespan), 2),
    throughput: roundTo(safeDivide(completed, makespan), 4),
    contextSwitches,
  };
}
