/**
 * cpusim command implementation
 *
 * Kept separate from the executable entry so tests can drive it with
 * captured output and an in-memory stdin.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import { toSimulationError } from '../api/errors.js';
import { getPackageRoot, loadConfig, toSimulatorSettings, validateConfig } from '../config/loader.js';
import { writeCsv } from '../io/csv-writer.js';
import { formatReport } from '../io/gantt-formatter.js';
import { parseProcessText, readProcessFile } from '../io/process-reader.js';
import { Simulator } from '../simulator/Simulator.js';
import type { SimulationInput } from '../types/scheduling.js';
import { createLogger } from '../utils/logger.js';
import { parseAlgorithmList, parseArgs, parseLogLevel, parseQuantum } from './args.js';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readStdin: () => Promise<string>;
  /** Injected logger; defaults to a pino logger on stderr */
  logger?: Logger;
}

export const HELP_TEXT = `
cpusim - CPU scheduling simulator (FCFS, SJF, SRTF, Round Robin)

USAGE:
  cpusim [file] [options]

INPUT:
  [file]                     Process file. .yaml/.yml/.json documents:
                               quantum: 2
                               processes: [{ pid: 1, arrival: 0, burst: 5 }]
                             Any other file, or stdin when omitted, is read as
                             whitespace-separated integers:
                               n, then n lines of "pid arrival burst", then quantum

OPTIONS:
  --quantum <n>              Round-Robin time quantum (overrides the input)
  --algorithms <list>        Comma-separated subset of fcfs,sjf,srtf,rr
  --csv <path>               Write per-process metrics as CSV
  --json                     Print the full report as JSON
  --no-gantt                 Omit Gantt charts from the text report
  --config <path>            Configuration file (default: config/simulator.yaml)
  --log-level <level>        trace|debug|info|warn|error|fatal|silent
  --help                     Show this help message
  --version                  Show version

ENVIRONMENT VARIABLES:
  CPUSIM_LOG_LEVEL           Log level when --log-level is not given (overrides the config)
  NODE_ENV                   Selects the config environment override
`;

const PackageJsonSchema = z.object({ version: z.string() });

export function readPackageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(join(getPackageRoot(), 'package.json'), 'utf8'));
  return PackageJsonSchema.parse(raw).version;
}

/**
 * Effective CLI log level: --log-level, then CPUSIM_LOG_LEVEL, then the
 * configured `logging.level`
 *
 * @throws SimulationError(ValidationError) on an unknown --log-level
 */
export function resolveCliLogLevel(
  flag: string | undefined,
  configured: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (flag !== undefined) {
    return parseLogLevel(flag);
  }
  return env.CPUSIM_LOG_LEVEL ?? configured;
}

/**
 * Run cpusim with the given argv; resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  try {
    const args = parseArgs(argv);

    if (args.help) {
      io.stdout(HELP_TEXT);
      return 0;
    }

    if (args.version) {
      io.stdout(`cpusim v${readPackageVersion()}\n`);
      return 0;
    }

    const settings = toSimulatorSettings(validateConfig(loadConfig(args.config)));
    const level = resolveCliLogLevel(args['log-level'], settings.logLevel);
    const logger = io.logger ?? createLogger({ level, stderr: true });

    const file = args._[0];
    const readOptions = { defaultQuantum: settings.defaultQuantum };
    const parsed = file
      ? await readProcessFile(file, readOptions)
      : parseProcessText(await io.readStdin(), readOptions);

    const input: SimulationInput = {
      processes: parsed.processes,
      quantum: args.quantum !== undefined ? parseQuantum(args.quantum) : parsed.quantum,
    };

    const simulator = new Simulator({
      logger,
      algorithms: args.algorithms !== undefined ? parseAlgorithmList(args.algorithms) : settings.algorithms,
    });
    const report = simulator.run(input);

    if (args.json) {
      io.stdout(`${JSON.stringify(report, null, 2)}\n`);
    } else {
      io.stdout(formatReport(report, { gantt: args.gantt ?? settings.gantt }));
    }

    const csvPath = args.csv ?? settings.csvPath;
    if (csvPath) {
      await writeCsv(csvPath, report);
      logger.info({ path: csvPath, rows: report.algorithms.length * report.processes.length }, 'CSV written');
    }

    return 0;
  } catch (error) {
    const simError = toSimulationError(error);
    io.stderr(`Error [${simError.code}]: ${simError.message}\n`);
    return 1;
  }
}
