/**
 * CSV export of per-process metrics
 *
 * One row per (algorithm, process) in algorithm run order, then table order.
 */

import { writeFile } from 'node:fs/promises';
import { toSimulationError } from '../api/errors.js';
import type { SimulationReport } from '../types/scheduling.js';

export const CSV_HEADER = [
  'algorithm',
  'pid',
  'arrival',
  'burst',
  'start',
  'end',
  'response',
  'waiting',
  'turnaround',
] as const;

export function toCsv(report: SimulationReport): string {
  const lines: string[] = [CSV_HEADER.join(',')];

  for (const entry of report.algorithms) {
    for (const row of entry.rows) {
      lines.push(
        [
          entry.algorithm,
          row.pid,
          row.arrival,
          row.burst,
          row.start,
          row.end,
          row.response,
          row.waiting,
          row.turnaround,
        ].join(',')
      );
    }
  }

  return `${lines.join('\n')}\n`;
}

/**
 * @throws SimulationError(IoError) when the file cannot be written
 */
export async function writeCsv(path: string, report: SimulationReport): Promise<void> {
  try {
    await writeFile(path, toCsv(report), 'utf8');
  } catch (error) {
    throw toSimulationError(error, 'IoError');
  }
}
