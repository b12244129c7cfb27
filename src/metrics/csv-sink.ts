/**
 * CSV sink for per-iteration phase samples.
 */

import { open, type FileHandle } from 'node:fs/promises';
import type { MetricSample } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('csv-sink');

export const CSV_HEADER = 'user_time,system_time,cpu_percent,wallclock_time,max_rss';

/**
 * Render a sample as one CSV row, without line ending
 */
export function formatCsvRow(sample: MetricSample): string {
  return [
    sample.userTime.toFixed(3),
    sample.systemTime.toFixed(3),
    `${sample.cpuUsage.toFixed(2)}%`,
    sample.wallClock.toFixed(3),
    Math.trunc(sample.maxRss).toString(),
  ].join(',');
}

/**
 * Append-only CSV file, open for the lifetime of a run
 */
export class CsvSink {
  private handle: FileHandle | null;
  private rows = 0;

  private constructor(
    readonly path: string,
    handle: FileHandle
  ) {
    this.handle = handle;
  }

  /**
   * Open (or create) the file in append mode
   */
  static async open(path: string): Promise<CsvSink> {
    const handle = await open(path, 'a');
    log.debug({ path }, 'Opened CSV sink');
    return new CsvSink(path, handle);
  }

  async writeHeader(): Promise<void> {
    await this.writeLine(CSV_HEADER);
  }

  /**
   * Append one sample as a complete row
   */
  async append(sample: MetricSample): Promise<void> {
    await this.writeLine(formatCsvRow(sample));
    this.rows++;
  }

  /** Rows appended through this sink, header excluded */
  get rowCount(): number {
    return this.rows;
  }

  async close(): Promise<void> {
    if (!this.handle) {
      return;
    }
    const handle = this.handle;
    this.handle = null;
    await handle.close();
    log.debug({ path: this.path, rows: this.rows }, 'Closed CSV sink');
  }

  private async writeLine(line: string): Promise<void> {
    if (!this.handle) {
      throw new Error(`CSV sink is closed: ${this.path}`);
    }
    await this.handle.write(`${line}\n`);
  }
}
