/**
 * Benchmark runner.
 * Runs the external tool N times, one iteration after the other, and feeds
 * each captured report through parsing, averaging and CSV output.
 */

import { readFile } from 'node:fs/promises';
import { PHASES, type PhaseDefinition } from '../types/index.js';
import { TextReportParser, type ReportParser } from '../metrics/report-parser.js';
import { AggregationContext, type PhaseResult, type PhaseSample } from './aggregation-context.js';
import type { CommandExecutor, CommandOutcome } from './command-executor.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { createRunDirectory, type RunDirectory } from './run-directory.js';
import { saveSummary } from './summary.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('runner');

export type IterationOutcome =
  | {
      iteration: number;
      status: 'completed';
      /** Well-formed blocks merged */
      samples: number;
      /** Incomplete blocks dropped */
      discarded: number;
      durationMs: number;
    }
  | { iteration: number; status: 'failed'; reason: string; durationMs: number }
  | { iteration: number; status: 'skipped'; reason: string };

export interface BenchmarkResult {
  runDir: RunDirectory;
  iterations: IterationOutcome[];
  phases: PhaseResult[];
  /** False when the summary file could not be written; the CSV files stand */
  summarySaved: boolean;
}

export interface BenchmarkRunnerOptions {
  /** Directory under which the dated run folder is created */
  outputDir: string;
  executor: CommandExecutor;
  parser?: ReportParser;
  phases?: readonly PhaseDefinition[];
  /** Clock used to name the run folder */
  now?: () => Date;
}

export interface RunOptions {
  stackTrace: boolean;
}

/**
 * Validate the requested iteration count
 */
export function assertIterationCount(numIterations: number): void {
  if (!Number.isInteger(numIterations) || numIterations <= 0) {
    throw new ConfigurationError(
      `Number of iterations must be a positive integer, got ${numIterations}`
    );
  }
}

export class BenchmarkRunner {
  private readonly outputDir: string;
  private readonly executor: CommandExecutor;
  private readonly parser: ReportParser;
  private readonly phases: readonly PhaseDefinition[];
  private readonly now: () => Date;

  constructor(options: BenchmarkRunnerOptions) {
    this.outputDir = options.outputDir;
    this.executor = options.executor;
    this.phases = options.phases ?? PHASES;
    this.parser = options.parser ?? new TextReportParser(this.phases);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run the benchmark. Fails with a ConfigurationError before anything is
   * executed when the count is invalid or the output files cannot be
   * created. Failed iterations are recorded and skipped.
   */
  async run(numIterations: number, options: RunOptions): Promise<BenchmarkResult> {
    assertIterationCount(numIterations);

    const runDir = await createRunDirectory(this.outputDir, this.now());
    const context = await AggregationContext.open(runDir, this.phases);
    const iterations: IterationOutcome[] = [];

    log.info({ runDir: runDir.path, numIterations }, 'Starting benchmark');

    try {
      for (let i = 1; i <= numIterations; i++) {
        iterations.push(await this.runIteration(i, runDir, context, options));
      }
    } finally {
      await context.close();
    }

    const phases = context.results();
    let summarySaved = true;
    try {
      await saveSummary(runDir.summaryPath, phases);
    } catch (error) {
      summarySaved = false;
      log.error({ path: runDir.summaryPath, error }, 'Failed to write summary file');
    }

    const completed = iterations.filter((o) => o.status === 'completed').length;
    log.info(
      { runDir: runDir.path, completed, skipped: numIterations - completed },
      'Benchmark completed'
    );

    return { runDir, iterations, phases, summarySaved };
  }

  private async runIteration(
    iteration: number,
    runDir: RunDirectory,
    context: AggregationContext,
    options: RunOptions
  ): Promise<IterationOutcome> {
    log.info({ iteration }, 'Running iteration');

    let outcome: CommandOutcome;
    try {
      outcome = await this.executor.execute({
        iteration,
        scratchPath: runDir.summaryPath,
        stackTrace: options.stackTrace,
      });
    } catch (error) {
      const reason = `Command execution failed: ${errorMessage(error)}`;
      log.warn({ iteration, error }, 'Command execution failed, skipping iteration');
      return { iteration, status: 'failed', reason, durationMs: 0 };
    }

    if (!outcome.ok) {
      log.warn({ iteration, reason: outcome.reason }, 'Command failed, skipping iteration');
      return { iteration, status: 'failed', reason: outcome.reason, durationMs: outcome.durationMs };
    }

    let report: string;
    try {
      report = await readFile(runDir.summaryPath, 'utf-8');
    } catch (error) {
      const reason = `No stats summary file found: ${errorMessage(error)}`;
      log.warn({ iteration, path: runDir.summaryPath }, reason);
      return { iteration, status: 'skipped', reason };
    }

    const blocks = this.parser.parse(report);
    const samples: PhaseSample[] = [];
    let discarded = 0;

    for (const block of blocks) {
      if (block.sample) {
        samples.push({ phase: block.phase, sample: block.sample });
      } else {
        discarded++;
        log.debug(
          { iteration, phase: block.phase.id, line: block.headerLine, missing: block.missing },
          'Discarded incomplete metric block'
        );
      }
    }

    await context.merge(samples);

    return {
      iteration,
      status: 'completed',
      samples: samples.length,
      discarded,
      durationMs: outcome.durationMs,
    };
  }
}
