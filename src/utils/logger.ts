/**
 * Logger factory
 *
 * Log level can be controlled via the CPUSIM_LOG_LEVEL environment variable.
 */

import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';

const LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

/**
 * Resolve the effective level: explicit option, then env, then default
 */
export function resolveLogLevel(level?: string): LevelWithSilent {
  const candidate = (level ?? process.env.CPUSIM_LOG_LEVEL ?? DEFAULT_LOG_LEVEL).toLowerCase();
  return isLevel(candidate) ? candidate : DEFAULT_LOG_LEVEL;
}

export interface CreateLoggerOptions {
  level?: string;
  name?: string;
  /** Write to stderr so stdout stays free for reports (CLI) */
  stderr?: boolean;
}

/**
 * Create a pino logger instance
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: 'simulator', level: 'debug' });
 * logger.info({ processes: 4 }, 'Simulation started');
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = resolveLogLevel(options.level);
  const base = { name: options.name ?? 'cpusim', level };

  if (options.stderr) {
    return pino(base, pino.destination(2));
  }

  return pino(base);
}
