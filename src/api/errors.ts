/**
 * Simulation error utilities.
 *
 * Provides a consistent error type for every public surface and helpers
 * to convert lower-level failures (zod issues, filesystem errors,
 * allocation failures) into SimulationError instances.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to callers.
 *
 * The first six form the core taxonomy; the rest cover readers, config,
 * and anything that escapes classification.
 */
export type SimulationErrorCode =
  | 'InvalidProcessCount'
  | 'InvalidArrival'
  | 'InvalidBurst'
  | 'InvalidQuantum'
  | 'OutOfMemory'
  | 'InternalInvariantViolation'
  | 'ValidationError'
  | 'ParseError'
  | 'ConfigError'
  | 'IoError'
  | 'UnknownError';

/**
 * Plain error shape for JSON output
 */
export interface SimulationErrorShape {
  code: SimulationErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class SimulationError extends Error implements SimulationErrorShape {
  public readonly code: SimulationErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: SimulationErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SimulationError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for JSON output/logging).
   */
  public toObject(): SimulationErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

const FATAL_CODES: ReadonlySet<SimulationErrorCode> = new Set<SimulationErrorCode>([
  'OutOfMemory',
  'InternalInvariantViolation',
]);

/**
 * Fatal codes indicate a defect or exhausted runtime, not bad input.
 */
export function isFatal(code: SimulationErrorCode): boolean {
  return FATAL_CODES.has(code);
}

function isErrnoException(error: Error): error is NodeJS.ErrnoException {
  return 'code' in error && typeof error.code === 'string';
}

/**
 * Map unknown errors into SimulationError instances.
 *
 * @param error - Error thrown by a reader, driver, or the runtime
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toSimulationError(
  error: unknown,
  fallbackCode: SimulationErrorCode = 'UnknownError'
): SimulationError {
  if (error instanceof SimulationError) {
    return error;
  }

  if (error instanceof RangeError && /allocation|array length|heap/i.test(error.message)) {
    return new SimulationError('OutOfMemory', error.message);
  }

  if (error instanceof Error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'EACCES' || error.code === 'EISDIR')) {
      return new SimulationError('IoError', error.message, {
        errno: error.code,
        path: error.path,
      });
    }

    return new SimulationError(fallbackCode, error.message);
  }

  return new SimulationError(fallbackCode, 'Unknown simulation error');
}

/**
 * Convert a zod validation error to SimulationError
 *
 * Only the first issue is surfaced in the message; every issue is kept in
 * `details.issues`.
 *
 * @example
 * ```typescript
 * const result = QuantumSchema.safeParse(0);
 * if (!result.success) {
 *   throw zodErrorToSimulationError(result.error, 'InvalidQuantum');
 * }
 * // Throws: "Validation error on field 'root': Quantum must be > 0"
 * ```
 */
export function zodErrorToSimulationError(
  error: ZodError,
  code: SimulationErrorCode = 'ValidationError'
): SimulationError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = firstIssue
    ? `Validation error on field '${field}': ${firstIssue.message}`
    : 'Validation error';

  return new SimulationError(code, message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  });
}

/**
 * Convenience helper for driver invariant failures.
 */
export function createInvariantViolation(
  algorithm: string,
  clock: number,
  incomplete: number
): SimulationError {
  return new SimulationError(
    'InternalInvariantViolation',
    `${algorithm}: no ready process and no future arrival at t=${clock} with ${incomplete} incomplete`,
    { algorithm, clock, incomplete }
  );
}
