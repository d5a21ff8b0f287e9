/**
 * Common Zod schema primitives for cpusim
 */

import { z } from 'zod';

/**
 * Any integer (pids may be negative or zero)
 */
export const Integer = z.number().int('Must be an integer');

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Non-negative integer validator
 */
export const NonNegativeInteger = z
  .number()
  .int('Must be an integer')
  .min(0, 'Must be non-negative');

/**
 * Algorithm name enum
 */
export const AlgorithmNameSchema = z.enum(['fcfs', 'sjf', 'srtf', 'rr']);

/**
 * Log level enum (pino levels plus silent)
 */
export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;
