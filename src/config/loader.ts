/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { SimulationError, toSimulationError } from '../api/errors.js';
import type { AlgorithmName } from '../types/scheduling.js';
import { SimulatorConfigSchema } from '../types/schemas/config.js';
import type { SimulatorConfigShape } from '../types/schemas/config.js';
import { CONFIG_FILE, LOGGING, OUTPUT, SIMULATION } from './defaults.js';

export type Environment = 'production' | 'development' | 'test';

/**
 * Configuration Schema (matches simulator.yaml structure)
 */
export interface Config extends SimulatorConfigShape {
  environments?: Partial<Record<Environment, DeepPartial<SimulatorConfigShape>>>;
}

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

/**
 * camelCase view of the configuration consumed by the CLI
 */
export interface SimulatorSettings {
  defaultQuantum: number;
  algorithms: AlgorithmName[];
  gantt: boolean;
  csvPath: string | null;
  logLevel: string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge plain objects; arrays and scalars from `source` replace
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
export function getPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

export function getDefaultConfigPath(): string {
  return join(getPackageRoot(), CONFIG_FILE);
}

/**
 * Built-in configuration, used when the packaged YAML file is absent
 */
export function getDefaultConfig(): Config {
  return {
    simulation: {
      default_quantum: SIMULATION.DEFAULT_QUANTUM,
      algorithms: [...SIMULATION.ALGORITHMS],
    },
    output: {
      gantt: OUTPUT.GANTT,
      csv_path: OUTPUT.CSV_PATH,
    },
    logging: {
      level: LOGGING.LEVEL,
    },
  };
}

function resolveEnvironment(environment?: Environment): Environment {
  if (environment) return environment;
  const env = process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Load configuration from YAML file
 *
 * With no explicit path, the packaged config/simulator.yaml is used, falling
 * back to built-in defaults when it is missing. An explicit path must exist.
 *
 * The result is merged but not validated; see validateConfig.
 */
export function loadConfig(configPath?: string, environment?: Environment): Record<string, unknown> {
  const finalPath = configPath ?? getDefaultConfigPath();

  if (!configPath && !existsSync(finalPath)) {
    return { ...getDefaultConfig() };
  }

  let baseConfig: unknown;
  try {
    baseConfig = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    const cause = toSimulationError(error);
    if (cause.code === 'IoError') {
      throw new SimulationError('ConfigError', `Configuration file not found: ${finalPath}`, {
        path: finalPath,
      });
    }
    throw new SimulationError('ConfigError', `Failed to load configuration: ${cause.message}`, {
      path: finalPath,
    });
  }

  if (!isPlainObject(baseConfig)) {
    throw new SimulationError('ConfigError', `Configuration must be a mapping: ${finalPath}`, {
      path: finalPath,
    });
  }

  const env = resolveEnvironment(environment);
  const { environments, ...base } = baseConfig;

  let finalConfig: Record<string, unknown> = base;
  if (isPlainObject(environments)) {
    const envConfig = environments[env];
    if (isPlainObject(envConfig)) {
      finalConfig = deepMerge(base, envConfig);
    }
  }

  return finalConfig;
}

/**
 * Validate configuration values
 */
export function validateConfig(config: unknown): Config {
  const parseResult = SimulatorConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new SimulationError('ConfigError', `Configuration validation failed:\n${errors.join('\n')}`, {
      errors,
    });
  }

  return parseResult.data;
}

/**
 * Global configuration instance
 */
let globalConfig: Config | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: Environment): Config {
  globalConfig = validateConfig(loadConfig(configPath, environment));
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): Config {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

/**
 * Convert YAML config (snake_case) to SimulatorSettings (camelCase)
 */
export function toSimulatorSettings(config: Config = getConfig()): SimulatorSettings {
  return {
    defaultQuantum: config.simulation.default_quantum,
    algorithms: [...config.simulation.algorithms],
    gantt: config.output.gantt,
    csvPath: config.output.csv_path,
    logLevel: config.logging.level,
  };
}
