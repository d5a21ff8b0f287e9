import { describe, it, expect } from 'vitest';
import { assertValidInput, issueToErrorCode, validateSimulationInput } from '../../../src/api/validators.js';
import { SimulationError } from '../../../src/api/errors.js';
import { THREE_STAGGERED } from '../../helpers/workloads.js';

function captureError(input: unknown): SimulationError {
  try {
    assertValidInput(input);
  } catch (error) {
    if (error instanceof SimulationError) return error;
    throw error;
  }
  throw new Error('expected a SimulationError');
}

describe('API Validators', () => {
  describe('validateSimulationInput', () => {
    it('should validate correct input', () => {
      expect(validateSimulationInput({ processes: THREE_STAGGERED, quantum: 2 })).toEqual({
        valid: true,
        errors: [],
      });
    });

    it('should reject an empty process table', () => {
      expect(validateSimulationInput({ processes: [], quantum: 2 })).toEqual({
        valid: false,
        errors: ['processes: Number of processes must be positive'],
      });
    });

    it('should collect every problem', () => {
      const result = validateSimulationInput({
        processes: [
          { pid: 1, arrival: 0, burst: 0 },
          { pid: 2, arrival: -1, burst: 3 },
        ],
        quantum: 0,
      });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'processes.0.burst: Burst must be > 0',
        'processes.1.arrival: Arrival must be >= 0',
        'quantum: Quantum must be > 0',
      ]);
    });

    it('should accept negative and zero pids', () => {
      const result = validateSimulationInput({
        processes: [
          { pid: -4, arrival: 0, burst: 1 },
          { pid: 0, arrival: 0, burst: 1 },
        ],
        quantum: 1,
      });

      expect(result.valid).toBe(true);
    });
  });

  describe('assertValidInput', () => {
    it('should return the validated input', () => {
      expect(assertValidInput({ processes: THREE_STAGGERED, quantum: 2 })).toEqual({
        processes: THREE_STAGGERED,
        quantum: 2,
      });
    });

    it('should map an empty table to InvalidProcessCount', () => {
      const error = captureError({ processes: [], quantum: 2 });

      expect(error.code).toBe('InvalidProcessCount');
      expect(error.message).toBe('processes: Number of processes must be positive');
    });

    it('should map a negative arrival to InvalidArrival', () => {
      const error = captureError({ processes: [{ pid: 1, arrival: -1, burst: 2 }], quantum: 2 });

      expect(error.code).toBe('InvalidArrival');
      expect(error.message).toBe('processes.0.arrival: Arrival must be >= 0');
      expect(error.details?.field).toBe('processes.0.arrival');
    });

    it('should map a zero burst to InvalidBurst', () => {
      const error = captureError({ processes: [{ pid: 1, arrival: 0, burst: 0 }], quantum: 2 });

      expect(error.code).toBe('InvalidBurst');
      expect(error.message).toBe('processes.0.burst: Burst must be > 0');
    });

    it('should map a non-positive quantum to InvalidQuantum', () => {
      const error = captureError({ processes: THREE_STAGGERED, quantum: -3 });

      expect(error.code).toBe('InvalidQuantum');
      expect(error.message).toBe('quantum: Quantum must be > 0');
    });

    it('should report wrong types as ValidationError', () => {
      expect(captureError({ processes: [{ pid: 1, arrival: 0.5, burst: 2 }], quantum: 2 }).code).toBe(
        'ValidationError'
      );
      expect(captureError({ processes: THREE_STAGGERED }).code).toBe('ValidationError');
      expect(captureError(null).code).toBe('ValidationError');
    });
  });

  describe('issueToErrorCode', () => {
    it('should map field paths to codes', () => {
      expect(
        issueToErrorCode({
          code: 'too_small',
          minimum: 0,
          inclusive: false,
          type: 'number',
          path: ['processes', 3, 'burst'],
          message: 'Burst must be > 0',
        })
      ).toBe('InvalidBurst');

      expect(
        issueToErrorCode({
          code: 'too_small',
          minimum: 1,
          inclusive: true,
          type: 'array',
          path: ['processes'],
          message: 'Number of processes must be positive',
        })
      ).toBe('InvalidProcessCount');
    });
  });
});
