/**
 * Default Configuration Constants
 *
 * Fallbacks used when no configuration file is available (library use
 * without the packaged config/simulator.yaml).
 */

import { ALGORITHMS } from '../types/scheduling.js';

/**
 * Simulation Configuration
 */
export const SIMULATION = {
  /** Round-Robin quantum when the input carries none */
  DEFAULT_QUANTUM: 2,

  /** Disciplines run by default */
  ALGORITHMS,
} as const;

/**
 * Output Configuration
 */
export const OUTPUT = {
  GANTT: true,
  CSV_PATH: null,
} as const;

/**
 * Logging Configuration
 */
export const LOGGING = {
  /** Overridden by CPUSIM_LOG_LEVEL */
  LEVEL: 'info',
} as const;

export const CONFIG_FILE = 'config/simulator.yaml';
