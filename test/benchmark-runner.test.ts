/**
 * Benchmark Runner Tests
 *
 * The external tool is replaced by a scripted executor that writes canned
 * reports to the scratch file.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import { BenchmarkRunner } from '../src/benchmark/runner.js';
import { ConfigurationError } from '../src/benchmark/errors.js';
import type {
  CommandExecutor,
  CommandOutcome,
  CommandRequest,
} from '../src/benchmark/command-executor.js';
import { CSV_HEADER } from '../src/metrics/csv-sink.js';
import { PHASES, PhaseId } from '../src/types/index.js';

const FIXTURE = path.join(import.meta.dirname, 'fixtures', 'sample-report.txt');
const STARTED_AT = new Date(2025, 2, 7, 9, 5, 2);

type Step =
  | { report: string }
  | { fail: string }
  | { noReport: true }
  | { throws: string }
  | { occupyScratch: true };

/**
 * Executor that plays back one step per iteration
 */
class ScriptedExecutor implements CommandExecutor {
  readonly requests: CommandRequest[] = [];

  constructor(private readonly steps: Step[]) {}

  async execute(request: CommandRequest): Promise<CommandOutcome> {
    this.requests.push(request);
    const step = this.steps[request.iteration - 1];
    if (!step) {
      throw new Error(`No step scripted for iteration ${request.iteration}`);
    }

    if ('throws' in step) {
      throw new Error(step.throws);
    }
    if ('occupyScratch' in step) {
      // A directory at the scratch path makes the summary write fail
      await fs.rm(request.scratchPath, { force: true });
      await fs.mkdir(request.scratchPath);
      return { ok: false, reason: 'Command exited with code 1', exitCode: 1, timedOut: false, durationMs: 5 };
    }
    if ('fail' in step) {
      return { ok: false, reason: step.fail, exitCode: 1, timedOut: false, durationMs: 5 };
    }
    if ('report' in step) {
      await fs.writeFile(request.scratchPath, step.report, 'utf-8');
    }
    return { ok: true, durationMs: 5 };
  }
}

function inferenceReport(wallClock: string, maxRss = 40960): string {
  return [
    '==== Inference Metrics ====',
    `Wall Clock Time: ${wallClock}`,
    'User time: 10.000 ms',
    'System time: 2.000 ms',
    'CPU Usage: 96.00',
    `Max RSS: ${maxRss}`,
    '=======================================',
    '',
  ].join('\n');
}

describe('BenchmarkRunner', () => {
  let tempDir: string;
  let runPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wasmbench-run-'));
    runPath = path.join(tempDir, '2025_03_07', '09_05_02');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function createRunner(executor: CommandExecutor): BenchmarkRunner {
    return new BenchmarkRunner({ outputDir: tempDir, executor, now: () => STARTED_AT });
  }

  async function readCsvRows(file: string): Promise<string[]> {
    const content = await fs.readFile(path.join(runPath, file), 'utf-8');
    return content.split('\n').filter((line) => line !== '');
  }

  it('should name the run folder after the start time', async () => {
    const result = await createRunner(new ScriptedExecutor([{ report: '' }])).run(1, {
      stackTrace: false,
    });

    expect(result.runDir.path).toBe(runPath);
    expect(result.runDir.summaryPath).toBe(path.join(runPath, 'stats_summary.txt'));
  });

  it('should record a single inference block', async () => {
    const executor = new ScriptedExecutor([{ report: inferenceReport('12.500 ms') }]);

    const result = await createRunner(executor).run(1, { stackTrace: false });

    expect(await readCsvRows('inference.csv')).toEqual([
      CSV_HEADER,
      '10.000,2.000,96.00%,12.500,40960',
    ]);
    expect(await readCsvRows('total.csv')).toEqual([CSV_HEADER]);

    const inference = result.phases.find((p) => p.phase.id === PhaseId.INFERENCE);
    expect(inference?.average).toEqual({
      wallClock: 12.5,
      userTime: 10,
      systemTime: 2,
      cpuUsage: 96,
      maxRss: 40960,
      count: 1,
    });
    expect(result.iterations).toEqual([
      { iteration: 1, status: 'completed', samples: 1, discarded: 0, durationMs: 5 },
    ]);
  });

  it('should average samples across iterations', async () => {
    const executor = new ScriptedExecutor([
      { report: inferenceReport('10ms', 5) },
      { report: inferenceReport('20ms', 6) },
    ]);

    const result = await createRunner(executor).run(2, { stackTrace: false });

    const inference = result.phases.find((p) => p.phase.id === PhaseId.INFERENCE);
    expect(inference?.average.wallClock).toBe(15);
    expect(inference?.average.maxRss).toBe(5);
    expect(inference?.average.count).toBe(2);
  });

  it('should create one CSV file per phase', async () => {
    await createRunner(new ScriptedExecutor([{ report: '' }])).run(1, { stackTrace: false });

    const files = await fs.readdir(runPath);

    expect(files.sort()).toEqual(
      [...PHASES.map((p) => p.csvFile), 'stats_summary.txt'].sort()
    );
  });

  it('should continue after a failed iteration', async () => {
    const report = await fs.readFile(FIXTURE, 'utf-8');
    const executor = new ScriptedExecutor([
      { report },
      { report },
      { fail: 'Command exited with code 1' },
      { report },
      { report },
    ]);

    const result = await createRunner(executor).run(5, { stackTrace: false });

    expect(executor.requests).toHaveLength(5);
    expect(result.iterations.map((o) => o.status)).toEqual([
      'completed',
      'completed',
      'failed',
      'completed',
      'completed',
    ]);
    for (const phase of PHASES) {
      expect(await readCsvRows(phase.csvFile)).toHaveLength(5);
    }
    expect(result.phases.every((p) => p.average.count === 4)).toBe(true);
  });

  it('should record an executor error as a failed iteration and continue', async () => {
    const executor = new ScriptedExecutor([
      { throws: 'ENOENT: no such file or directory' },
      { report: inferenceReport('10ms') },
    ]);

    const result = await createRunner(executor).run(2, { stackTrace: false });

    expect(result.iterations[0]).toEqual({
      iteration: 1,
      status: 'failed',
      reason: 'Command execution failed: ENOENT: no such file or directory',
      durationMs: 0,
    });
    expect(result.iterations[1]?.status).toBe('completed');
    expect(result.summarySaved).toBe(true);
    expect(await readCsvRows('inference.csv')).toHaveLength(2);
  });

  it('should return the result when the summary cannot be written', async () => {
    const executor = new ScriptedExecutor([
      { report: inferenceReport('10ms') },
      { occupyScratch: true },
    ]);

    const result = await createRunner(executor).run(2, { stackTrace: false });

    expect(result.summarySaved).toBe(false);
    expect(result.iterations.map((o) => o.status)).toEqual(['completed', 'failed']);
    expect(await readCsvRows('inference.csv')).toEqual([
      CSV_HEADER,
      '10.000,2.000,96.00%,10.000,40960',
    ]);
  });

  it('should exclude incomplete blocks', async () => {
    const incomplete = [
      '==== Inference Metrics ====',
      'Wall Clock Time: 99ms',
      'User time: 99ms',
      'System time: 99ms',
      'CPU Usage: 99',
      '=======================================',
    ].join('\n');
    const executor = new ScriptedExecutor([
      { report: inferenceReport('10ms') },
      { report: incomplete },
    ]);

    const result = await createRunner(executor).run(2, { stackTrace: false });

    const inference = result.phases.find((p) => p.phase.id === PhaseId.INFERENCE);
    expect(inference?.average.wallClock).toBe(10);
    expect(inference?.average.count).toBe(1);
    expect(await readCsvRows('inference.csv')).toHaveLength(2);
    expect(result.iterations[1]).toEqual({
      iteration: 2,
      status: 'completed',
      samples: 0,
      discarded: 1,
      durationMs: 5,
    });
  });

  it('should skip an iteration whose report file is missing', async () => {
    const executor = new ScriptedExecutor([{ noReport: true }]);

    const result = await createRunner(executor).run(1, { stackTrace: false });

    expect(result.iterations[0]?.status).toBe('skipped');
    expect(result.phases.every((p) => p.average.count === 0)).toBe(true);
  });

  it('should reject a zero iteration count without creating anything', async () => {
    const executor = new ScriptedExecutor([]);

    await expect(createRunner(executor).run(0, { stackTrace: false })).rejects.toThrow(
      ConfigurationError
    );
    expect(await fs.readdir(tempDir)).toEqual([]);
    expect(executor.requests).toHaveLength(0);
  });

  it('should pass the stack trace flag to every iteration', async () => {
    const executor = new ScriptedExecutor([{ report: '' }, { report: '' }]);

    await createRunner(executor).run(2, { stackTrace: true });

    expect(executor.requests.map((r) => r.stackTrace)).toEqual([true, true]);
    expect(executor.requests.map((r) => r.scratchPath)).toEqual([
      path.join(runPath, 'stats_summary.txt'),
      path.join(runPath, 'stats_summary.txt'),
    ]);
  });

  it('should overwrite the scratch file with the summary', async () => {
    const executor = new ScriptedExecutor([{ report: inferenceReport('12.500 ms') }]);

    await createRunner(executor).run(1, { stackTrace: false });

    const summary = await fs.readFile(path.join(runPath, 'stats_summary.txt'), 'utf-8');
    expect(summary.startsWith('====Load Model Metrics====\n')).toBe(true);
    expect(summary).toContain(
      [
        '====Inference Metrics====',
        'Average Wall Clock Time: 12.500 ms',
        'Average User Time: 10.000 ms',
        'Average System Time: 2.000 ms',
        'Average Cpu Usage: 96.00 %',
        'Average Max RSS: 40960',
        '',
        '',
      ].join('\n')
    );
  });
});
