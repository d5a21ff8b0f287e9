/**
 * Process Input Schemas
 *
 * Zod schemas for the process table and Round-Robin quantum. Field names in
 * the issue paths (`arrival`, `burst`) drive the error-code mapping in
 * api/validators.ts, so keep them aligned with the Process interface.
 *
 * @module schemas/process
 */

import { z } from 'zod';
import { Integer } from './common.js';

export const ProcessSchema = z.object({
  pid: Integer,
  arrival: z.number().int('Arrival must be an integer').min(0, 'Arrival must be >= 0'),
  burst: z.number().int('Burst must be an integer').positive('Burst must be > 0'),
});

export const ProcessTableSchema = z
  .array(ProcessSchema)
  .min(1, 'Number of processes must be positive');

export const QuantumSchema = z
  .number()
  .int('Quantum must be an integer')
  .positive('Quantum must be > 0');

export const SimulationInputSchema = z.object({
  processes: ProcessTableSchema,
  quantum: QuantumSchema,
});

/**
 * Process document (YAML/JSON input file); quantum may come from config
 */
export const ProcessDocumentSchema = z.object({
  quantum: z.number().optional(),
  processes: z.array(
    z.object({
      pid: z.number(),
      arrival: z.number(),
      burst: z.number(),
    })
  ),
});

export type ProcessDocument = z.infer<typeof ProcessDocumentSchema>;
