/**
 * Ordering & tie-break rules
 *
 * Every algorithm ranks table indices through one of two total orders:
 *
 * - Arrival order: arrival ascending, then pid ascending
 * - Rank order: rank ascending, then arrival, then pid
 *
 * Comparators are plain values handed to sort and heap code; nothing here
 * reads shared state.
 */

import type { ProcessTable } from '../types/scheduling.js';

/**
 * Comparator over process table indices
 */
export type IndexComparator = (a: number, b: number) => number;

/**
 * Rank key lookup for an index (static burst for SJF, live remaining for SRTF)
 */
export type RankOf = (index: number) => number;

function byArrivalThenPid(table: ProcessTable, a: number, b: number): number {
  const pa = table[a];
  const pb = table[b];
  if (pa.arrival !== pb.arrival) return pa.arrival - pb.arrival;
  return pa.pid - pb.pid;
}

export function compareByArrival(table: ProcessTable): IndexComparator {
  return (a, b) => byArrivalThenPid(table, a, b);
}

export function compareByRank(table: ProcessTable, rankOf: RankOf): IndexComparator {
  return (a, b) => {
    const ra = rankOf(a);
    const rb = rankOf(b);
    if (ra !== rb) return ra - rb;
    return byArrivalThenPid(table, a, b);
  };
}

/**
 * Table indices in arrival order. The table itself is never reordered.
 */
export function sortByArrival(table: ProcessTable): number[] {
  return table.map((_, index) => index).sort(compareByArrival(table));
}
