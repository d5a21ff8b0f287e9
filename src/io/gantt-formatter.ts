/**
 * Text rendering for simulation reports
 *
 * Gantt chart plus per-algorithm summary in the classic
 * "Average Response Time: x.xx" layout.
 */

import { formatAverage } from '../scheduling/metrics.js';
import type { AlgorithmReport, Segment, SegmentOwner, SimulationReport } from '../types/scheduling.js';
import { IDLE } from '../types/scheduling.js';

export interface FormatOptions {
  /** Include the two-line Gantt chart under each summary */
  gantt?: boolean;
}

export function ownerLabel(owner: SegmentOwner): string {
  return owner === IDLE ? IDLE : `P${owner}`;
}

function center(text: string, width: number): string {
  const left = Math.floor((width - text.length) / 2);
  const right = width - text.length - left;
  return `${' '.repeat(left)}${text}${' '.repeat(right)}`;
}

/**
 * Two-line ASCII Gantt chart.
 *
 * @example
 * ```
 * | P1 | P2 |
 * 0    2    4
 * ```
 */
export function formatGantt(segments: readonly Segment[]): string {
  if (segments.length === 0) {
    return '';
  }

  let bar = '|';
  let times = String(segments[0].start);

  for (const segment of segments) {
    const label = ownerLabel(segment.owner);
    bar += `${center(label, Math.max(label.length, 2) + 2)}|`;

    const column = bar.length - 1;
    times = times.length < column ? times.padEnd(column, ' ') : `${times} `;
    times += String(segment.end);
  }

  return `${bar}\n${times}`;
}

export function formatAlgorithmSummary(report: AlgorithmReport, options: FormatOptions = {}): string {
  const orderLabel = report.preemptive ? 'Context switches' : 'Execution order';
  const lines = [
    `${report.label} Scheduling =>`,
    `${orderLabel}: ${report.dispatchOrder.join(' ')}`,
  ];

  if (options.gantt) {
    lines.push(formatGantt(report.segments));
  }

  lines.push(
    `Average Response Time: ${formatAverage(report.averages.response)}`,
    `Average Waiting Time : ${formatAverage(report.averages.waiting)}`,
    `Average Turnaround   : ${formatAverage(report.averages.turnaround)}`
  );

  return lines.join('\n');
}

export function formatReport(report: SimulationReport, options: FormatOptions = {}): string {
  return `${report.algorithms.map((entry) => formatAlgorithmSummary(entry, options)).join('\n\n')}\n`;
}
