/**
 * Shortest-Remaining-Time-First (preemptive)
 *
 * Preemption can only happen when a new process arrives, so each decision
 * runs the best-ranked process either to completion or up to the next
 * arrival, whichever comes first. Ties keep the arrival-then-pid order.
 */

import type { DriverOptions, DriverResult, ProcessTable } from '../../types/scheduling.js';
import { AdmissionList, SrtfSelector } from '../selectors.js';
import { DriverRun } from './DriverRun.js';

export function runSrtf(table: ProcessTable, options: DriverOptions = {}): DriverResult {
  const run = new DriverRun('srtf', table, options);
  const admission = new AdmissionList(table);
  const remaining = table.map((process) => process.burst);
  const selector = new SrtfSelector(table, remaining);

  while (run.incomplete > 0) {
    for (const index of admission.admitUpTo(run.clock)) {
      selector.insert(index);
    }

    const index = selector.peekMin();
    if (index === undefined) {
      run.idleUntil(admission.nextArrival(), 0);
      continue;
    }

    const finishTime = run.clock + remaining[index];
    const nextArrival = admission.nextArrival();

    // Key changes go through pop/mutate/push; the heap never sees an
    // in-place update of a resident key.
    selector.extractMin();
    run.dispatch(index, selector.size);

    if (finishTime <= nextArrival) {
      run.advance(remaining[index]);
      remaining[index] = 0;
      run.complete(index);
    } else {
      const slice = nextArrival - run.clock;
      run.advance(slice);
      remaining[index] -= slice;
      selector.insert(index);
    }
  }

  return run.finish();
}
