/**
 * Summary reporter.
 * Renders final per-phase averages for the console and the summary file.
 */

import { writeFile } from 'node:fs/promises';
import type { PhaseAverage } from '../types/index.js';
import type { PhaseResult } from './aggregation-context.js';

/**
 * Render one phase's averages as a block of lines, without trailing newline
 */
export function formatPhaseAverage(label: string, average: PhaseAverage): string {
  return [
    `====${label} Metrics====`,
    `Average Wall Clock Time: ${average.wallClock.toFixed(3)} ms`,
    `Average User Time: ${average.userTime.toFixed(3)} ms`,
    `Average System Time: ${average.systemTime.toFixed(3)} ms`,
    `Average Cpu Usage: ${average.cpuUsage.toFixed(2)} %`,
    `Average Max RSS: ${Math.trunc(average.maxRss)}`,
  ].join('\n');
}

/**
 * Console report: only phases with a console label, under that label
 */
export function formatConsoleSummary(results: readonly PhaseResult[]): string {
  return results
    .flatMap(({ phase, average }) =>
      phase.consoleLabel === null ? [] : [formatPhaseAverage(phase.consoleLabel, average)]
    )
    .join('\n');
}

/**
 * Persisted report: every phase under its full name, each block followed by
 * a blank line
 */
export function formatSummaryFile(results: readonly PhaseResult[]): string {
  return results.map(({ phase, average }) => `${formatPhaseAverage(phase.name, average)}\n\n`).join('');
}

/**
 * Overwrite the summary file with the aggregate report
 */
export async function saveSummary(path: string, results: readonly PhaseResult[]): Promise<void> {
  await writeFile(path, formatSummaryFile(results), 'utf-8');
}
