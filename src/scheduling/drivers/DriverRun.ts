/**
 * Per-run driver state shared by the four disciplines
 *
 * Owns the clock, Start/End arrays, the segment builder and the dispatch
 * order for one algorithm run. Created fresh per run; nothing survives
 * into the next algorithm.
 */

import type { Logger } from 'pino';
import { createInvariantViolation } from '../../api/errors.js';
import type {
  AlgorithmName,
  DecisionObserver,
  DriverOptions,
  DriverResult,
  ProcessTable,
  SegmentOwner,
} from '../../types/scheduling.js';
import { IDLE } from '../../types/scheduling.js';
import { lazyLog } from '../../utils/logger-helpers.js';
import { SegmentBuilder } from '../SegmentBuilder.js';

export class DriverRun {
  clock = 0;
  incomplete: number;

  readonly start: number[];
  readonly end: number[];

  private readonly segments = new SegmentBuilder();
  private readonly dispatchOrder: number[] = [];
  private lastDispatched = -1;
  private readonly logger?: Logger;
  private readonly observer?: DecisionObserver;

  constructor(
    readonly algorithm: AlgorithmName,
    private readonly table: ProcessTable,
    options: DriverOptions
  ) {
    this.incomplete = table.length;
    this.start = new Array<number>(table.length).fill(-1);
    this.end = new Array<number>(table.length).fill(-1);
    this.logger = options.logger;
    this.observer = options.observer;
  }

  /**
   * Open an IDLE segment at the current clock and jump to `time`.
   *
   * @throws SimulationError(InternalInvariantViolation) when no future
   * arrival exists, which would otherwise stall the run
   */
  idleUntil(time: number, readySize: number): void {
    if (!Number.isFinite(time) || time <= this.clock) {
      throw createInvariantViolation(this.algorithm, this.clock, this.incomplete);
    }

    this.notify(IDLE, readySize);
    this.segments.dispatch(IDLE, this.clock);
    lazyLog(this.logger, 'debug', () => ({ algorithm: this.algorithm, from: this.clock, to: time }), 'CPU idle');
    this.clock = time;
  }

  /**
   * Give the CPU to table index `index` at the current clock.
   *
   * @param readySize - entries still waiting, excluding `index`
   */
  dispatch(index: number, readySize: number): void {
    const pid = this.table[index].pid;

    if (this.start[index] === -1) {
      this.start[index] = this.clock;
    }

    if (this.lastDispatched !== index) {
      this.dispatchOrder.push(pid);
      this.lastDispatched = index;
    }

    this.notify(pid, readySize);
    this.segments.dispatch(pid, this.clock);
    lazyLog(
      this.logger,
      'debug',
      () => ({ algorithm: this.algorithm, clock: this.clock, pid, readySize }),
      'Dispatch'
    );
  }

  advance(units: number): void {
    this.clock += units;
  }

  complete(index: number): void {
    this.end[index] = this.clock;
    this.incomplete--;
  }

  finish(): DriverResult {
    const segments = this.segments.finish(this.clock);

    lazyLog(
      this.logger,
      'debug',
      () => ({
        algorithm: this.algorithm,
        segments: segments.length,
        makespan: this.clock,
        dispatches: this.dispatchOrder.length,
      }),
      'Run complete'
    );

    return {
      algorithm: this.algorithm,
      segments,
      start: this.start,
      end: this.end,
      dispatchOrder: this.dispatchOrder,
    };
  }

  private notify(pid: SegmentOwner, readySize: number): void {
    this.observer?.({
      algorithm: this.algorithm,
      clock: this.clock,
      pid,
      readySize,
      incomplete: this.incomplete,
    });
  }
}
