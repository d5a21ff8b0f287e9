import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pino } from 'pino';
import { HELP_TEXT, resolveCliLogLevel, runCli } from '../../../src/cli/run.js';
import type { CliIO } from '../../../src/cli/run.js';

const STDIN = '3\n1 0 5\n2 1 3\n3 2 1\n2';

interface Captured {
  io: CliIO;
  stdout: () => string;
  stderr: () => string;
}

function capture(stdin = STDIN): Captured {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: {
      stdout: (text) => out.push(text),
      stderr: (text) => err.push(text),
      readStdin: () => Promise.resolve(stdin),
      logger: pino({ level: 'silent' }),
    },
    stdout: () => out.join(''),
    stderr: () => err.join(''),
  };
}

describe('runCli', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'cpusim-cli-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should print the Round-Robin summary from stdin', async () => {
    const run = capture();

    const code = await runCli(['--algorithms', 'rr', '--no-gantt'], run.io);

    expect(code).toBe(0);
    expect(run.stderr()).toBe('');
    expect(run.stdout()).toBe(
      [
        'Round Robin (q=2) Scheduling =>',
        'Context switches: 1 2 3 1 2 1',
        'Average Response Time: 1.00',
        'Average Waiting Time : 3.33',
        'Average Turnaround   : 6.33',
        '',
      ].join('\n')
    );
  });

  it('should override the quantum from the command line', async () => {
    const run = capture();

    await runCli(['--algorithms', 'rr', '--quantum', '5', '--no-gantt'], run.io);

    expect(run.stdout().split('\n')[0]).toBe('Round Robin (q=5) Scheduling =>');
    expect(run.stdout().split('\n')[1]).toBe('Context switches: 1 2 3');
  });

  it('should include Gantt charts by default', async () => {
    const run = capture();

    await runCli(['--algorithms', 'fcfs'], run.io);

    expect(run.stdout().split('\n').slice(2, 4)).toEqual(['| P1 | P2 | P3 |', '0    5    8    9']);
  });

  it('should print the report as JSON', async () => {
    const run = capture();

    const code = await runCli(['--json'], run.io);

    expect(code).toBe(0);
    const report: unknown = JSON.parse(run.stdout());
    expect(report).toMatchObject({
      quantum: 2,
      algorithms: [
        { algorithm: 'fcfs' },
        { algorithm: 'sjf' },
        { algorithm: 'srtf' },
        { algorithm: 'rr', averages: { response: 1, waiting: 3.33, turnaround: 6.33 } },
      ],
    });
  });

  it('should read a YAML file and write CSV', async () => {
    const inputPath = join(dir, 'late.yaml');
    const csvPath = join(dir, 'late.csv');
    writeFileSync(inputPath, 'quantum: 2\nprocesses:\n  - { pid: 1, arrival: 5, burst: 3 }\n');
    const run = capture('');

    const code = await runCli([inputPath, '--algorithms', 'fcfs', '--csv', csvPath, '--no-gantt'], run.io);

    expect(code).toBe(0);
    expect(readFileSync(csvPath, 'utf8')).toBe(
      'algorithm,pid,arrival,burst,start,end,response,waiting,turnaround\nfcfs,1,5,3,5,8,0,0,3\n'
    );
  });

  it('should report invalid input with its error code', async () => {
    const run = capture('1\n1 0 0\n2');

    const code = await runCli([], run.io);

    expect(code).toBe(1);
    expect(run.stdout()).toBe('');
    expect(run.stderr()).toBe('Error [InvalidBurst]: processes.0.burst: Burst must be > 0\n');
  });

  it('should report parse failures', async () => {
    const run = capture('2\n1 0 5\n');

    expect(await runCli([], run.io)).toBe(1);
    expect(run.stderr()).toBe('Error [ParseError]: Failed to read PID.\n');
  });

  it('should report a non-positive quantum override', async () => {
    const run = capture();

    expect(await runCli(['--quantum', '0'], run.io)).toBe(1);
    expect(run.stderr()).toBe('Error [InvalidQuantum]: quantum: Quantum must be > 0\n');
  });

  it('should report unknown options', async () => {
    const run = capture();

    expect(await runCli(['--fast'], run.io)).toBe(1);
    expect(run.stderr()).toBe('Error [ValidationError]: Unknown option: --fast\n');
  });

  it('should reject an unknown --log-level', async () => {
    const run = capture();

    expect(await runCli(['--log-level', 'loud'], run.io)).toBe(1);
    expect(run.stderr()).toBe(
      "Error [ValidationError]: Unknown log level 'loud' (expected one of: trace, debug, info, warn, error, fatal, silent)\n"
    );
    expect(run.stdout()).toBe('');
  });

  it('should report a missing input file as IoError', async () => {
    const run = capture();

    expect(await runCli([join(dir, 'missing.txt')], run.io)).toBe(1);
    expect(run.stderr().startsWith('Error [IoError]: ')).toBe(true);
  });

  it('should print help and version', async () => {
    const help = capture();
    expect(await runCli(['--help'], help.io)).toBe(0);
    expect(help.stdout()).toBe(HELP_TEXT);

    const version = capture();
    expect(await runCli(['--version'], version.io)).toBe(0);
    expect(version.stdout()).toBe('cpusim v0.1.0\n');
  });
});

describe('resolveCliLogLevel', () => {
  it('should prefer --log-level over the environment and config', () => {
    expect(resolveCliLogLevel('WARN', 'info', { CPUSIM_LOG_LEVEL: 'debug' })).toBe('warn');
  });

  it('should fall back to CPUSIM_LOG_LEVEL when no flag is given', () => {
    expect(resolveCliLogLevel(undefined, 'info', { CPUSIM_LOG_LEVEL: 'debug' })).toBe('debug');
  });

  it('should use the configured level when neither flag nor environment is set', () => {
    expect(resolveCliLogLevel(undefined, 'error', {})).toBe('error');
  });
});
