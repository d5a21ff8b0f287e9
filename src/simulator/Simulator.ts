/**
 * Simulator
 *
 * Validates input once, then runs each selected discipline against the same
 * read-only process table and reduces every run into an AlgorithmReport.
 * Runs are independent: each driver owns its Remaining/Start/End/Segment
 * state.
 *
 * Events:
 * - `algorithm:start` before each driver runs
 * - `decision` at every dispatch decision (forwarded driver observer)
 * - `algorithm:complete` with the finished report
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { isFatal, toSimulationError } from '../api/errors.js';
import { assertValidInput } from '../api/validators.js';
import { runFcfs, runRoundRobin, runSjf, runSrtf } from '../scheduling/drivers/index.js';
import { computeAverages, computeProcessMetrics, computeTimelineStats } from '../scheduling/metrics.js';
import type {
  AlgorithmName,
  AlgorithmReport,
  DecisionSnapshot,
  DriverOptions,
  DriverResult,
  SimulationInput,
  SimulationReport,
} from '../types/scheduling.js';
import { ALGORITHMS } from '../types/scheduling.js';

export const ALGORITHM_LABELS: Record<AlgorithmName, string> = {
  fcfs: 'FCFS (FIFO)',
  sjf: 'SJF (Non-preemptive)',
  srtf: 'SRTF (Preemptive SJF)',
  rr: 'Round Robin',
};

export function algorithmLabel(algorithm: AlgorithmName, quantum: number): string {
  return algorithm === 'rr' ? `${ALGORITHM_LABELS.rr} (q=${quantum})` : ALGORITHM_LABELS[algorithm];
}

const PREEMPTIVE: Record<AlgorithmName, boolean> = {
  fcfs: false,
  sjf: false,
  srtf: true,
  rr: true,
};

export interface SimulatorEvents {
  'algorithm:start': (algorithm: AlgorithmName) => void;
  decision: (snapshot: DecisionSnapshot) => void;
  'algorithm:complete': (report: AlgorithmReport) => void;
}

export interface SimulatorOptions {
  logger?: Logger;
  /**
   * Disciplines to run; always executed in canonical order
   * @default ['fcfs', 'sjf', 'srtf', 'rr']
   */
  algorithms?: readonly AlgorithmName[];
}

export class Simulator extends EventEmitter<SimulatorEvents> {
  private readonly logger?: Logger;
  private readonly algorithms: AlgorithmName[];

  constructor(options: SimulatorOptions = {}) {
    super();
    this.logger = options.logger;
    const selected = new Set(options.algorithms ?? ALGORITHMS);
    this.algorithms = ALGORITHMS.filter((algorithm) => selected.has(algorithm));
  }

  get selectedAlgorithms(): readonly AlgorithmName[] {
    return this.algorithms;
  }

  /**
   * Run every selected discipline.
   *
   * @throws SimulationError on invalid input (before any driver runs) or on
   * a fatal driver failure
   */
  public run(input: SimulationInput): SimulationReport {
    const validated = assertValidInput(input);
    const { processes, quantum } = validated;

    this.logger?.info(
      { processes: processes.length, quantum, algorithms: this.algorithms },
      'Simulation started'
    );

    const reports = this.algorithms.map((algorithm) => {
      this.emit('algorithm:start', algorithm);

      const driverOptions: DriverOptions = {
        logger: this.logger,
        observer: (snapshot) => this.emit('decision', snapshot),
      };

      let result: DriverResult;
      try {
        result = this.dispatch(algorithm, validated, driverOptions);
      } catch (error) {
        const simError = toSimulationError(error, 'InternalInvariantViolation');
        if (isFatal(simError.code)) {
          this.logger?.error({ algorithm, code: simError.code, details: simError.details }, simError.message);
        }
        throw simError;
      }

      const report = this.toReport(validated, result);
      this.emit('algorithm:complete', report);

      this.logger?.info(
        { algorithm, averages: report.averages, makespan: report.timeline.makespan },
        'Algorithm complete'
      );

      return report;
    });

    return {
      processes,
      quantum,
      algorithms: reports,
    };
  }

  private dispatch(
    algorithm: AlgorithmName,
    input: SimulationInput,
    options: DriverOptions
  ): DriverResult {
    switch (algorithm) {
      case 'fcfs':
        return runFcfs(input.processes, options);
      case 'sjf':
        return runSjf(input.processes, options);
      case 'srtf':
        return runSrtf(input.processes, options);
      case 'rr':
        return runRoundRobin(input.processes, input.quantum, options);
    }
  }

  private toReport(input: SimulationInput, result: DriverResult): AlgorithmReport {
    const rows = computeProcessMetrics(input.processes, result.start, result.end);

    return {
      algorithm: result.algorithm,
      label: algorithmLabel(result.algorithm, input.quantum),
      preemptive: PREEMPTIVE[result.algorithm],
      segments: result.segments,
      dispatchOrder: result.dispatchOrder,
      rows,
      averages: computeAverages(rows),
      timeline: computeTimelineStats(result.segments, rows.length),
    };
  }
}
