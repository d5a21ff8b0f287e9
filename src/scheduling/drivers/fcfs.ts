/**
 * First-Come-First-Served (non-preemptive)
 *
 * Dispatches in fixed arrival order; each process runs to completion.
 * Idle gaps are jumped, never stepped through.
 */

import type { DriverOptions, DriverResult, ProcessTable } from '../../types/scheduling.js';
import { sortByArrival } from '../ordering.js';
import { DriverRun } from './DriverRun.js';

export function runFcfs(table: ProcessTable, options: DriverOptions = {}): DriverResult {
  const run = new DriverRun('fcfs', table, options);
  const order = sortByArrival(table);

  // Count of entries in `order` that have arrived by the current clock
  let admitted = 0;

  order.forEach((index, position) => {
    const process = table[index];
    if (run.clock < process.arrival) {
      run.idleUntil(process.arrival, 0);
    }

    while (admitted < order.length && table[order[admitted]].arrival <= run.clock) {
      admitted++;
    }

    // Arrived entries after this one are waiting
    run.dispatch(index, admitted - position - 1);
    run.advance(process.burst);
    run.complete(index);
  });

  return run.finish();
}
