export { Simulator, ALGORITHM_LABELS, algorithmLabel } from './simulator/Simulator.js';
export type { SimulatorEvents, SimulatorOptions } from './simulator/Simulator.js';

// Drivers and building blocks
export { runFcfs, runSjf, runSrtf, runRoundRobin } from './scheduling/drivers/index.js';
export { compareByArrival, compareByRank, sortByArrival } from './scheduling/ordering.js';
export type { IndexComparator, RankOf } from './scheduling/ordering.js';
export { IndexHeap } from './scheduling/IndexHeap.js';
export { AdmissionList, SjfSelector, SrtfSelector, ReadyQueue } from './scheduling/selectors.js';
export { SegmentBuilder } from './scheduling/SegmentBuilder.js';
export {
  computeProcessMetrics,
  computeAverages,
  computeTimelineStats,
  formatAverage,
  METRIC_PRECISION,
} from './scheduling/metrics.js';

// Errors and validation
export {
  SimulationError,
  toSimulationError,
  zodErrorToSimulationError,
  isFatal,
  type SimulationErrorCode,
  type SimulationErrorShape,
} from './api/errors.js';
export * from './api/validators.js';

// Input/output collaborators
export * from './io/process-reader.js';
export * from './io/gantt-formatter.js';
export * from './io/csv-writer.js';

// Configuration
export {
  loadConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  toSimulatorSettings,
  getDefaultConfig,
  type Config,
  type SimulatorSettings,
} from './config/loader.js';

export { createLogger } from './utils/logger.js';

export * from './types/scheduling.js';
export * from './types/schemas/index.js';
