/**
 * Zod schema exports for cpusim input and configuration validation
 *
 * @example
 * ```typescript
 * import { ProcessTableSchema } from 'cpusim';
 *
 * const result = ProcessTableSchema.safeParse([{ pid: 1, arrival: 0, burst: 3 }]);
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Process table schemas
export * from './process.js';

// Config schemas
export * from './config.js';
