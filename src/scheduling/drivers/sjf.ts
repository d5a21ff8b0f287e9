/**
 * Shortest-Job-First (non-preemptive)
 *
 * Among arrived processes, picks the smallest burst (ties: arrival, then
 * pid) and runs it to completion.
 */

import type { DriverOptions, DriverResult, ProcessTable } from '../../types/scheduling.js';
import { AdmissionList, SjfSelector } from '../selectors.js';
import { DriverRun } from './DriverRun.js';

export function runSjf(table: ProcessTable, options: DriverOptions = {}): DriverResult {
  const run = new DriverRun('sjf', table, options);
  const admission = new AdmissionList(table);
  const selector = new SjfSelector(table);

  while (run.incomplete > 0) {
    for (const index of admission.admitUpTo(run.clock)) {
      selector.insert(index);
    }

    const index = selector.extractMin();
    if (index === undefined) {
      run.idleUntil(admission.nextArrival(), 0);
      continue;
    }

    run.dispatch(index, selector.size);
    run.advance(table[index].burst);
    run.complete(index);
  }

  return run.finish();
}
