/**
 * Input validators for cpusim
 *
 * All input problems are caught here, before any driver runs. Drivers assume
 * a validated table and never re-check it.
 */

import type { ZodIssue } from 'zod';
import { SimulationInputSchema } from '../types/schemas/process.js';
import type { SimulationInput } from '../types/scheduling.js';
import { SimulationError, zodErrorToSimulationError } from './errors.js';
import type { SimulationErrorCode } from './errors.js';

/**
 * Validation result type
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Map a zod issue to the taxonomy code for the offending field.
 *
 * Wrong types (a string where a number belongs, a missing field) are plain
 * ValidationErrors; out-of-range values get the field-specific code.
 */
export function issueToErrorCode(issue: ZodIssue): SimulationErrorCode {
  const [head, , field] = issue.path;

  if (issue.code === 'invalid_type') {
    return 'ValidationError';
  }

  if (head === 'quantum') {
    return 'InvalidQuantum';
  }

  if (head === 'processes') {
    if (issue.path.length === 1 && issue.code === 'too_small') {
      return 'InvalidProcessCount';
    }
    if (field === 'arrival') return 'InvalidArrival';
    if (field === 'burst') return 'InvalidBurst';
  }

  return 'ValidationError';
}

function describeIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : 'input';
  return `${path}: ${issue.message}`;
}

/**
 * Validate a simulation input, collecting every problem.
 *
 * @example
 * ```typescript
 * validateSimulationInput({ processes: [], quantum: 2 });
 * // => { valid: false, errors: ['processes: Number of processes must be positive'] }
 * ```
 */
export function validateSimulationInput(input: unknown): ValidationResult {
  const result = SimulationInputSchema.safeParse(input);
  if (result.success) {
    return { valid: true, errors: [] };
  }

  return {
    valid: false,
    errors: result.error.issues.map(describeIssue),
  };
}

/**
 * Validate and return a typed simulation input.
 *
 * @throws SimulationError carrying the code of the first failing field
 */
export function assertValidInput(input: unknown): SimulationInput {
  const result = SimulationInputSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const firstIssue = result.error.issues[0];
  const code = firstIssue ? issueToErrorCode(firstIssue) : 'ValidationError';
  const error = zodErrorToSimulationError(result.error, code);

  throw new SimulationError(code, firstIssue ? describeIssue(firstIssue) : error.message, error.details);
}
