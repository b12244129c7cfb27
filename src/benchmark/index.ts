export {
  BenchmarkRunner,
  assertIterationCount,
  type BenchmarkResult,
  type BenchmarkRunnerOptions,
  type IterationOutcome,
  type RunOptions,
} from './runner.js';
export {
  AggregationContext,
  type PhaseResult,
  type PhaseSample,
} from './aggregation-context.js';
export {
  ExecaCommandExecutor,
  type CommandExecutor,
  type CommandOutcome,
  type CommandRequest,
  type ExecaExecutorOptions,
} from './command-executor.js';
export {
  createRunDirectory,
  formatRunFolders,
  getCsvPath,
  SUMMARY_FILE,
  type RunDirectory,
} from './run-directory.js';
export {
  formatPhaseAverage,
  formatConsoleSummary,
  formatSummaryFile,
  saveSummary,
} from './summary.js';
export { ConfigurationError, errorMessage } from './errors.js';
