import type { ReportBlock } from '../metrics/report-parser.js';
import type { IterationOutcome } from '../benchmark/runner.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  // Respect FORCE_COLOR environment variable
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

/**
 * Apply color to text if colors are enabled.
 */
function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

/**
 * Truncate a string to a maximum length.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

/**
 * Table column definition.
 */
export interface TableColumn<T> {
  header: string;
  width: number;
  align?: 'left' | 'right';
  value: (item: T) => string;
}

/**
 * Format data as a table.
 */
export function formatTable<T>(items: readonly T[], columns: TableColumn<T>[]): string {
  const lines: string[] = [];

  const headerRow = columns
    .map(col => {
      const header = col.align === 'right'
        ? col.header.padStart(col.width)
        : col.header.padEnd(col.width);
      return bold(header);
    })
    .join('  ');
  lines.push(headerRow);

  const separator = columns.map(col => '-'.repeat(col.width)).join('  ');
  lines.push(dim(separator));

  for (const item of items) {
    const row = columns
      .map(col => {
        const value = truncate(col.value(item), col.width);
        return col.align === 'right' ? value.padStart(col.width) : value.padEnd(col.width);
      })
      .join('  ');
    lines.push(row);
  }

  return lines.join('\n');
}

/**
 * Format the blocks found in a captured report as a table.
 */
export function formatReportBlocks(blocks: readonly ReportBlock[]): string {
  if (blocks.length === 0) {
    return dim('No metric blocks found.');
  }

  return formatTable(blocks, [
    { header: 'LINE', width: 6, align: 'right', value: b => String(b.headerLine) },
    { header: 'PHASE', width: 22, value: b => b.phase.name },
    { header: 'STATUS', width: 9, value: b => (b.sample ? 'ok' : 'discarded') },
    { header: 'WALL (ms)', width: 12, align: 'right', value: b => b.sample?.wallClock.toFixed(3) ?? '-' },
    { header: 'USER (ms)', width: 12, align: 'right', value: b => b.sample?.userTime.toFixed(3) ?? '-' },
    { header: 'SYS (ms)', width: 12, align: 'right', value: b => b.sample?.systemTime.toFixed(3) ?? '-' },
    { header: 'CPU %', width: 8, align: 'right', value: b => b.sample?.cpuUsage.toFixed(2) ?? '-' },
    { header: 'MAX RSS', width: 12, align: 'right', value: b => b.sample?.maxRss.toString() ?? '-' },
    { header: 'MISSING', width: 40, value: b => b.missing.join(', ') },
  ]);
}

/**
 * One-line account of a finished run.
 */
export function formatRunOutcome(iterations: readonly IterationOutcome[]): string {
  const completed = iterations.filter(i => i.status === 'completed').length;
  const message = `Benchmarking completed. ${completed} of ${iterations.length} iterations recorded, CSV files generated.`;
  return completed === iterations.length ? formatSuccess(message) : formatWarning(message);
}

/**
 * Format success message.
 */
export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

/**
 * Format error message.
 */
export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

/**
 * Format warning message.
 */
export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

/**
 * Format JSON output.
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}
