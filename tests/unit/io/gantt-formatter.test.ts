import { describe, it, expect } from 'vitest';
import { formatAlgorithmSummary, formatGantt, formatReport, ownerLabel } from '../../../src/io/gantt-formatter.js';
import { Simulator } from '../../../src/simulator/Simulator.js';
import { IDLE } from '../../../src/types/scheduling.js';
import { LATE_SINGLE, seg, THREE_STAGGERED } from '../../helpers/workloads.js';

describe('Gantt Formatter', () => {
  describe('ownerLabel', () => {
    it('should prefix pids and keep IDLE', () => {
      expect(ownerLabel(3)).toBe('P3');
      expect(ownerLabel(-1)).toBe('P-1');
      expect(ownerLabel(IDLE)).toBe('IDLE');
    });
  });

  describe('formatGantt', () => {
    it('should align boundary times under the bars', () => {
      expect(formatGantt([seg(IDLE, 0, 5), seg(1, 5, 8)])).toBe('| IDLE | P1 |\n0      5    8');
    });

    it('should widen for multi-digit times', () => {
      expect(formatGantt([seg(1, 0, 10), seg(2, 10, 100)])).toBe('| P1 | P2 |\n0    10   100');
    });

    it('should separate times that overrun their column', () => {
      expect(formatGantt([seg(1, 0, 10000), seg(2, 10000, 10001)])).toBe('| P1 | P2 |\n0    10000 10001');
    });

    it('should render nothing for an empty timeline', () => {
      expect(formatGantt([])).toBe('');
    });
  });

  describe('formatAlgorithmSummary', () => {
    it('should print context switches for Round Robin', () => {
      const report = new Simulator({ algorithms: ['rr'] }).run({ processes: THREE_STAGGERED, quantum: 2 });

      expect(formatAlgorithmSummary(report.algorithms[0])).toBe(
        [
          'Round Robin (q=2) Scheduling =>',
          'Context switches: 1 2 3 1 2 1',
          'Average Response Time: 1.00',
          'Average Waiting Time : 3.33',
          'Average Turnaround   : 6.33',
        ].join('\n')
      );
    });

    it('should print execution order and the chart for FCFS', () => {
      const report = new Simulator({ algorithms: ['fcfs'] }).run({ processes: THREE_STAGGERED, quantum: 2 });

      expect(formatAlgorithmSummary(report.algorithms[0], { gantt: true })).toBe(
        [
          'FCFS (FIFO) Scheduling =>',
          'Execution order: 1 2 3',
          '| P1 | P2 | P3 |',
          '0    5    8    9',
          'Average Response Time: 3.33',
          'Average Waiting Time : 3.33',
          'Average Turnaround   : 6.33',
        ].join('\n')
      );
    });
  });

  describe('formatReport', () => {
    it('should separate algorithms with a blank line', () => {
      const report = new Simulator({ algorithms: ['fcfs', 'sjf'] }).run({ processes: LATE_SINGLE, quantum: 2 });

      expect(formatReport(report)).toBe(
        [
          'FCFS (FIFO) Scheduling =>',
          'Execution order: 1',
          'Average Response Time: 0.00',
          'Average Waiting Time : 0.00',
          'Average Turnaround   : 3.00',
          '',
          'SJF (Non-preemptive) Scheduling =>',
          'Execution order: 1',
          'Average Response Time: 0.00',
          'Average Waiting Time : 0.00',
          'Average Turnaround   : 3.00',
          '',
        ].join('\n')
      );
    });
  });
});
