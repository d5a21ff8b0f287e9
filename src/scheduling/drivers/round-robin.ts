/**
 * Round-Robin (preemptive, fixed quantum)
 *
 * FIFO ready queue. Processes arriving during a slice, i.e. in
 * (sliceStart, sliceEnd], are enqueued before the preempted process goes
 * back to the tail.
 */

import type { DriverOptions, DriverResult, ProcessTable } from '../../types/scheduling.js';
import { AdmissionList, ReadyQueue } from '../selectors.js';
import { DriverRun } from './DriverRun.js';

export function runRoundRobin(
  table: ProcessTable,
  quantum: number,
  options: DriverOptions = {}
): DriverResult {
  const run = new DriverRun('rr', table, options);
  const admission = new AdmissionList(table);
  const queue = new ReadyQueue();
  const remaining = table.map((process) => process.burst);

  const admit = (): void => {
    for (const index of admission.admitUpTo(run.clock)) {
      queue.enqueue(index);
    }
  };

  admit();

  while (run.incomplete > 0) {
    const index = queue.dequeue();
    if (index === undefined) {
      run.idleUntil(admission.nextArrival(), 0);
      admit();
      continue;
    }

    run.dispatch(index, queue.size);

    const slice = Math.min(remaining[index], quantum);
    run.advance(slice);
    remaining[index] -= slice;

    admit();

    if (remaining[index] === 0) {
      run.complete(index);
    } else {
      queue.enqueue(index);
    }
  }

  return run.finish();
}
