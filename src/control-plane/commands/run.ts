import type { Command } from 'commander';
import { loadConfig, type BenchConfig } from '../../config/index.js';
import {
  BenchmarkRunner,
  ExecaCommandExecutor,
  errorMessage,
  formatConsoleSummary,
  type BenchmarkResult,
  type CommandExecutor,
} from '../../benchmark/index.js';
import { parseIterationCount, parseStackTraceFlag } from '../validators.js';
import { print, printError, formatError, formatWarning, formatRunOutcome, dim } from '../formatter.js';

export interface RunCommandOptions {
  command?: string;
  cwd?: string;
  outputDir?: string;
  timeout?: string;
}

export type ExecutorFactory = (config: BenchConfig) => CommandExecutor;

const defaultExecutorFactory: ExecutorFactory = (config) =>
  new ExecaCommandExecutor({
    command: config.command,
    cwd: config.cwd,
    timeoutMs: config.timeoutMs,
    stackTraceVar: config.stackTraceVar,
  });

/**
 * Attach the benchmark arguments, options and action to the root program.
 */
export function configureRunCommand(
  program: Command,
  createExecutor: ExecutorFactory = defaultExecutorFactory
): Command {
  return program
    .argument('<num_iterations>', 'Number of times to run the benchmarked command')
    .argument('<enable_stack_trace>', 'Nonzero to run the command with stack traces enabled')
    .option('--command <cmd>', 'Command to benchmark (env: WASMBENCH_COMMAND)')
    .option('--cwd <dir>', 'Working directory for the command (env: WASMBENCH_CWD)')
    .option('--output-dir <dir>', 'Where run folders are created (env: WASMBENCH_OUTPUT_DIR)')
    .option('--timeout <ms>', 'Per-iteration timeout, 0 for none (env: WASMBENCH_TIMEOUT_MS)')
    // Signed operands such as `-1` look like options; let them through to the
    // argument validators, which reject anything that is not an integer.
    .allowUnknownOption()
    .action(async (numIterations: string, stackTrace: string, options: RunCommandOptions) => {
      try {
        await executeRun(numIterations, stackTrace, options, createExecutor);
      } catch (error) {
        printError(formatError(errorMessage(error)));
        process.exitCode = 1;
      }
    });
}

/**
 * Execute a benchmark run and print the console summary.
 * Arguments are validated before anything touches the filesystem.
 */
export async function executeRun(
  numIterationsArg: string,
  stackTraceArg: string,
  options: RunCommandOptions,
  createExecutor: ExecutorFactory = defaultExecutorFactory
): Promise<BenchmarkResult> {
  const numIterations = parseIterationCount(numIterationsArg);
  const stackTrace = parseStackTraceFlag(stackTraceArg);

  const config = loadConfig({
    command: options.command,
    cwd: options.cwd,
    outputDir: options.outputDir,
    timeoutMs: options.timeout,
  });

  const runner = new BenchmarkRunner({
    outputDir: config.outputDir,
    executor: createExecutor(config),
  });

  const result = await runner.run(numIterations, { stackTrace });

  print(formatRunOutcome(result.iterations));
  print(formatConsoleSummary(result.phases));
  if (!result.summarySaved) {
    printError(formatWarning(`Failed to write summary file ${result.runDir.summaryPath}`));
  }
  print(dim(`Results written to ${result.runDir.path}`));

  return result;
}
