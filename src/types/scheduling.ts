/**
 * Scheduling types for the CPU scheduling simulator
 *
 * Defines the immutable process table, timeline segments, per-run driver
 * output, and the report shapes handed to presentation code.
 */

import type { Logger } from 'pino';

/**
 * Owner of a timeline segment when no process holds the CPU
 */
export const IDLE = 'IDLE' as const;

export type Idle = typeof IDLE;

/**
 * A process as submitted to the simulator.
 *
 * `pid` is arbitrary: it need not be contiguous, sorted, or 1-based.
 * Drivers address processes by table index, never by pid.
 */
export interface Process {
  readonly pid: number;
  /** Simulated time at which the process becomes eligible for dispatch */
  readonly arrival: number;
  /** Total CPU time required to complete */
  readonly burst: number;
}

/**
 * Process table shared read-only by every algorithm run
 */
export type ProcessTable = readonly Process[];

/**
 * Supported scheduling disciplines
 */
export type AlgorithmName = 'fcfs' | 'sjf' | 'srtf' | 'rr';

/**
 * Canonical run order for a full simulation
 */
export const ALGORITHMS: readonly AlgorithmName[] = ['fcfs', 'sjf', 'srtf', 'rr'];

export type SegmentOwner = number | Idle;

/**
 * A maximal contiguous interval `[start, end)` with a single owner
 */
export interface Segment {
  readonly owner: SegmentOwner;
  readonly start: number;
  readonly end: number;
}

/**
 * Snapshot passed to a decision observer at every dispatch decision
 */
export interface DecisionSnapshot {
  algorithm: AlgorithmName;
  /** Simulated clock at the decision point */
  clock: number;
  /** Dispatched pid, or IDLE when the clock jumps through a gap */
  pid: SegmentOwner;
  /** Entries resident in the ready structure after the decision */
  readySize: number;
  /** Processes not yet complete, including the dispatched one */
  incomplete: number;
}

export type DecisionObserver = (snapshot: DecisionSnapshot) => void;

/**
 * Options accepted by every simulation driver
 */
export interface DriverOptions {
  /** Debug logging of dispatch decisions */
  logger?: Logger;
  /** Called at every decision point */
  observer?: DecisionObserver;
}

/**
 * Raw output of one driver run
 *
 * `start` and `end` are indexed like the process table; `-1` means unset.
 */
export interface DriverResult {
  algorithm: AlgorithmName;
  segments: Segment[];
  start: number[];
  end: number[];
  /** Pid of every dispatch that changed the running process */
  dispatchOrder: number[];
}

/**
 * Per-process timing row (also the CSV row shape)
 */
export interface ProcessMetrics {
  pid: number;
  arrival: number;
  burst: number;
  start: number;
  end: number;
  /** start - arrival */
  response: number;
  /** turnaround - burst */
  waiting: number;
  /** end - arrival */
  turnaround: number;
}

/**
 * Averages over all processes, rounded to two decimals
 */
export interface AverageMetrics {
  response: number;
  waiting: number;
  turnaround: number;
}

/**
 * Whole-timeline statistics
 */
export interface TimelineStats {
  busyTime: number;
  idleTime: number;
  /** End of the last segment */
  makespan: number;
  /** Busy share of the makespan, percent */
  cpuUtilization: number;
  /** Completed processes per time unit */
  throughput: number;
  /** Transitions between two different processes (idle gaps excluded) */
  contextSwitches: number;
}

export interface AlgorithmReport {
  algorithm: AlgorithmName;
  label: string;
  preemptive: boolean;
  segments: Segment[];
  dispatchOrder: number[];
  rows: ProcessMetrics[];
  averages: AverageMetrics;
  timeline: TimelineStats;
}

/**
 * Validated input handed to the simulator
 */
export interface SimulationInput {
  processes: ProcessTable;
  /** Round-Robin time quantum */
  quantum: number;
}

export interface SimulationReport {
  processes: ProcessTable;
  quantum: number;
  algorithms: AlgorithmReport[];
}
