/**
 * Aggregation Context Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import { AggregationContext } from '../src/benchmark/aggregation-context.js';
import { ConfigurationError } from '../src/benchmark/errors.js';
import type { RunDirectory } from '../src/benchmark/run-directory.js';
import { CSV_HEADER, CsvSink } from '../src/metrics/csv-sink.js';
import { PHASES, PhaseId, type MetricSample, type PhaseDefinition } from '../src/types/index.js';

const SAMPLE: MetricSample = {
  wallClock: 12.5,
  userTime: 10,
  systemTime: 2,
  cpuUsage: 96,
  maxRss: 40960,
};

function phase(id: PhaseId): PhaseDefinition {
  const found = PHASES.find((p) => p.id === id);
  if (!found) {
    throw new Error(`Unknown phase ${id}`);
  }
  return found;
}

describe('AggregationContext', () => {
  let tempDir: string;
  let runDir: RunDirectory;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wasmbench-agg-'));
    runDir = { path: tempDir, summaryPath: path.join(tempDir, 'stats_summary.txt') };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should write a header to every phase file on open', async () => {
    const context = await AggregationContext.open(runDir);
    await context.close();

    for (const { csvFile } of PHASES) {
      expect(await fs.readFile(path.join(tempDir, csvFile), 'utf-8')).toBe(`${CSV_HEADER}\n`);
    }
  });

  it('should average and record merged samples per phase', async () => {
    const context = await AggregationContext.open(runDir);
    await context.merge([{ phase: phase(PhaseId.INFERENCE), sample: SAMPLE }]);
    await context.merge([
      { phase: phase(PhaseId.INFERENCE), sample: { ...SAMPLE, wallClock: 17.5 } },
    ]);
    await context.close();

    expect(context.average(PhaseId.INFERENCE)).toEqual({ ...SAMPLE, wallClock: 15, count: 2 });
    expect(context.average(PhaseId.TOTAL).count).toBe(0);
    expect(await fs.readFile(path.join(tempDir, 'inference.csv'), 'utf-8')).toBe(
      `${CSV_HEADER}\n10.000,2.000,96.00%,12.500,40960\n10.000,2.000,96.00%,17.500,40960\n`
    );
  });

  it('should not average a sample whose row could not be written', async () => {
    const context = await AggregationContext.open(runDir);
    vi.spyOn(CsvSink.prototype, 'append').mockRejectedValueOnce(new Error('disk full'));

    await expect(
      context.merge([{ phase: phase(PhaseId.INFERENCE), sample: SAMPLE }])
    ).rejects.toThrow('disk full');
    await context.close();

    expect(context.average(PhaseId.INFERENCE).count).toBe(0);
    expect(await fs.readFile(path.join(tempDir, 'inference.csv'), 'utf-8')).toBe(`${CSV_HEADER}\n`);
  });

  it('should only know the phases it was opened with', async () => {
    const context = await AggregationContext.open(runDir, [phase(PhaseId.INFERENCE)]);
    await context.close();

    expect(() => context.average(PhaseId.TOTAL)).toThrow('Unknown phase: total');
    expect(context.results().map((r) => r.phase.id)).toEqual([PhaseId.INFERENCE]);
  });

  it('should reject merges after close', async () => {
    const context = await AggregationContext.open(runDir);
    await context.close();

    await expect(
      context.merge([{ phase: phase(PhaseId.INFERENCE), sample: SAMPLE }])
    ).rejects.toThrow('Aggregation context is closed');
  });

  it('should raise a configuration error when a file cannot be opened', async () => {
    const missing: RunDirectory = {
      path: path.join(tempDir, 'missing'),
      summaryPath: path.join(tempDir, 'missing', 'stats_summary.txt'),
    };

    await expect(AggregationContext.open(missing)).rejects.toThrow(ConfigurationError);
  });
});
