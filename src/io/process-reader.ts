/**
 * Process input readers
 *
 * Two formats are accepted:
 *
 * - Plain text: whitespace-separated integers `n`, then `n` triples of
 *   `pid arrival burst`, then the Round-Robin quantum.
 * - Document (YAML or JSON): `{ quantum?, processes: [{ pid, arrival, burst }] }`.
 *
 * Readers only parse. Range checks (arrival >= 0, burst > 0, quantum > 0)
 * belong to api/validators.ts and run before the simulator starts.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import * as yaml from 'js-yaml';
import { SimulationError, toSimulationError, zodErrorToSimulationError } from '../api/errors.js';
import { ProcessDocumentSchema } from '../types/schemas/process.js';
import type { Process, SimulationInput } from '../types/scheduling.js';

export interface ReadOptions {
  /** Quantum used when the input does not carry one */
  defaultQuantum?: number;
}

const DOCUMENT_EXTENSIONS = new Set(['.yaml', '.yml', '.json']);

class TokenStream {
  private position = 0;

  constructor(private readonly tokens: string[]) {}

  get exhausted(): boolean {
    return this.position >= this.tokens.length;
  }

  readInt(label: string): number {
    const token = this.tokens[this.position];
    if (token === undefined || !/^[+-]?\d+$/.test(token)) {
      throw new SimulationError('ParseError', `Failed to read ${label}.`, {
        label,
        token: token ?? null,
        position: this.position,
      });
    }
    this.position++;
    return Number.parseInt(token, 10);
  }
}

function resolveQuantum(quantum: number | undefined, options: ReadOptions): number {
  const resolved = quantum ?? options.defaultQuantum;
  if (resolved === undefined) {
    throw new SimulationError('ParseError', 'Failed to read Quantum.', { label: 'Quantum' });
  }
  return resolved;
}

/**
 * Parse the plain-text format.
 *
 * @example
 * ```typescript
 * parseProcessText('3\n1 0 5\n2 1 3\n3 2 1\n2');
 * // => { processes: [{ pid: 1, arrival: 0, burst: 5 }, ...], quantum: 2 }
 * ```
 */
export function parseProcessText(text: string, options: ReadOptions = {}): SimulationInput {
  const stream = new TokenStream(text.split(/\s+/).filter((token) => token.length > 0));

  const count = stream.readInt('number of processes');
  if (count <= 0) {
    throw new SimulationError('InvalidProcessCount', 'Number of processes must be positive.', { count });
  }

  const processes: Process[] = [];
  for (let i = 0; i < count; i++) {
    const pid = stream.readInt('PID');
    const arrival = stream.readInt('Arrival');
    const burst = stream.readInt('Burst');
    processes.push({ pid, arrival, burst });
  }

  const quantum = stream.exhausted ? undefined : stream.readInt('Quantum');

  return { processes, quantum: resolveQuantum(quantum, options) };
}

/**
 * Parse a YAML or JSON process document.
 */
export function parseProcessDocument(text: string, options: ReadOptions = {}): SimulationInput {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    throw new SimulationError('ParseError', `Invalid process document: ${toSimulationError(error).message}`);
  }

  const parsed = ProcessDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw zodErrorToSimulationError(parsed.error, 'ParseError');
  }

  return {
    processes: parsed.data.processes.map(({ pid, arrival, burst }) => ({ pid, arrival, burst })),
    quantum: resolveQuantum(parsed.data.quantum, options),
  };
}

/**
 * Parse by format: documents for .yaml/.yml/.json, plain text otherwise
 */
export function parseProcessInput(text: string, format: 'text' | 'document', options: ReadOptions = {}): SimulationInput {
  return format === 'document' ? parseProcessDocument(text, options) : parseProcessText(text, options);
}

export function formatForPath(path: string): 'text' | 'document' {
  return DOCUMENT_EXTENSIONS.has(extname(path).toLowerCase()) ? 'document' : 'text';
}

/**
 * Read and parse a process file.
 *
 * @throws SimulationError(IoError) when the file cannot be read
 */
export async function readProcessFile(path: string, options: ReadOptions = {}): Promise<SimulationInput> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw toSimulationError(error, 'IoError');
  }

  return parseProcessInput(text, formatForPath(path), options);
}
