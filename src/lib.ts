/**
 * wasmbench Library API
 *
 * Exports all public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Benchmark runner (main entry point)
export {
  BenchmarkRunner,
  ExecaCommandExecutor,
  AggregationContext,
  ConfigurationError,
  type BenchmarkResult,
  type BenchmarkRunnerOptions,
  type IterationOutcome,
  type CommandExecutor,
  type CommandOutcome,
  type CommandRequest,
  type PhaseResult,
} from './benchmark/index.js';

// Report parsing, averages, CSV output
export * as metrics from './metrics/index.js';

// Summary rendering
export { formatPhaseAverage, formatConsoleSummary, formatSummaryFile } from './benchmark/index.js';

// Configuration
export { loadConfig, type BenchConfig } from './config/index.js';

// Utilities
export { createLogger, logger } from './utils/logger.js';
