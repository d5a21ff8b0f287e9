/**
 * Simulator Configuration Schemas
 *
 * Zod schemas for validating simulator.yaml configuration.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { AlgorithmNameSchema, LogLevelSchema, PositiveInteger } from './common.js';

/**
 * Simulation Configuration
 */
export const SimulationSectionSchema = z.object({
  default_quantum: PositiveInteger,
  algorithms: z
    .array(AlgorithmNameSchema)
    .min(1, 'At least one algorithm must be enabled')
    .refine((list) => new Set(list).size === list.length, {
      message: 'Algorithms must not repeat',
    }),
});

/**
 * Output Configuration
 */
export const OutputSectionSchema = z.object({
  gantt: z.boolean(),
  csv_path: z.string().min(1, 'CSV path cannot be empty').nullable(),
});

/**
 * Logging Configuration
 */
export const LoggingSectionSchema = z.object({
  level: LogLevelSchema,
});

/**
 * Complete Simulator Configuration Schema
 */
export const SimulatorConfigSchema = z.object({
  simulation: SimulationSectionSchema,
  output: OutputSectionSchema,
  logging: LoggingSectionSchema,
});

export type SimulatorConfigShape = z.infer<typeof SimulatorConfigSchema>;
