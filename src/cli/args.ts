/**
 * Command-line argument parsing for cpusim
 */

import { SimulationError } from '../api/errors.js';
import { AlgorithmNameSchema, LogLevelSchema } from '../types/schemas/common.js';
import type { AlgorithmName } from '../types/scheduling.js';
import type { LogLevel } from '../types/schemas/common.js';

export interface CLIArgs {
  _: string[];
  quantum?: string;
  algorithms?: string;
  csv?: string;
  config?: string;
  'log-level'?: string;
  json?: boolean;
  gantt?: boolean;
  help?: boolean;
  version?: boolean;
}

type ValueOption = 'quantum' | 'algorithms' | 'csv' | 'config' | 'log-level';
type FlagOption = 'json' | 'help' | 'version';

const VALUE_OPTIONS: readonly ValueOption[] = ['quantum', 'algorithms', 'csv', 'config', 'log-level'];
const FLAG_OPTIONS: readonly FlagOption[] = ['json', 'help', 'version'];

function isValueOption(key: string): key is ValueOption {
  return VALUE_OPTIONS.some((option) => option === key);
}

function isFlagOption(key: string): key is FlagOption {
  return FLAG_OPTIONS.some((option) => option === key);
}

/**
 * Parse argv (without the node and script entries).
 *
 * `--key value` and `--key=value` are both accepted for value options;
 * `--no-gantt` turns the chart off.
 *
 * @throws SimulationError(ValidationError) on unknown options or missing values
 */
export function parseArgs(args: readonly string[]): CLIArgs {
  const result: CLIArgs = { _: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '-h') {
      result.help = true;
      continue;
    }

    if (!arg.startsWith('--')) {
      result._.push(arg);
      continue;
    }

    const body = arg.slice(2);
    const eq = body.indexOf('=');
    const key = eq === -1 ? body : body.slice(0, eq);
    const inlineValue: string | undefined = eq === -1 ? undefined : body.slice(eq + 1);

    if (key === 'no-gantt') {
      result.gantt = false;
    } else if (key === 'gantt') {
      result.gantt = true;
    } else if (isFlagOption(key)) {
      result[key] = true;
    } else if (isValueOption(key)) {
      const next: string | undefined = args[i + 1];
      const value = inlineValue ?? next;
      if (value === undefined || (inlineValue === undefined && value.startsWith('--'))) {
        throw new SimulationError('ValidationError', `Option --${key} requires a value`, { option: key });
      }
      if (inlineValue === undefined) i++;
      result[key] = value;
    } else {
      throw new SimulationError('ValidationError', `Unknown option: --${key}`, { option: key });
    }
  }

  return result;
}

/**
 * Parse a comma-separated algorithm list such as "srtf,rr"
 */
export function parseAlgorithmList(list: string): AlgorithmName[] {
  const names = list
    .split(',')
    .map((name) => name.trim().toLowerCase())
    .filter((name) => name.length > 0);

  if (names.length === 0) {
    throw new SimulationError('ValidationError', 'Algorithm list cannot be empty');
  }

  return names.map((name) => {
    const parsed = AlgorithmNameSchema.safeParse(name);
    if (!parsed.success) {
      throw new SimulationError(
        'ValidationError',
        `Unknown algorithm '${name}' (expected one of: ${AlgorithmNameSchema.options.join(', ')})`,
        { algorithm: name }
      );
    }
    return parsed.data;
  });
}

/**
 * Parse a --quantum value; range checks happen in input validation
 */
export function parseQuantum(value: string): number {
  if (!/^[+-]?\d+$/.test(value.trim())) {
    throw new SimulationError('InvalidQuantum', `Quantum must be an integer: '${value}'`, { value });
  }
  return Number.parseInt(value, 10);
}

/**
 * Parse a --log-level value (case-insensitive)
 */
export function parseLogLevel(value: string): LogLevel {
  const parsed = LogLevelSchema.safeParse(value.trim().toLowerCase());
  if (!parsed.success) {
    throw new SimulationError(
      'ValidationError',
      `Unknown log level '${value}' (expected one of: ${LogLevelSchema.options.join(', ')})`,
      { level: value }
    );
  }
  return parsed.data;
}
