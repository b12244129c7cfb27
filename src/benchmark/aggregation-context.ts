/**
 * Aggregation context for a benchmark run.
 * Owns one running average and one CSV sink per phase.
 */

import { PHASES, type MetricSample, type PhaseAverage, type PhaseDefinition, type PhaseId } from '../types/index.js';
import { CsvSink } from '../metrics/csv-sink.js';
import { RunningAverage } from '../metrics/running-average.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { getCsvPath, type RunDirectory } from './run-directory.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('aggregation');

interface PhaseSlot {
  phase: PhaseDefinition;
  accumulator: RunningAverage;
  sink: CsvSink;
}

/** A sample tagged with the phase it belongs to */
export interface PhaseSample {
  phase: PhaseDefinition;
  sample: MetricSample;
}

/** Final figures for one phase */
export interface PhaseResult {
  phase: PhaseDefinition;
  average: PhaseAverage;
}

export class AggregationContext {
  private closed = false;

  private constructor(private readonly slots: ReadonlyMap<PhaseId, PhaseSlot>) {}

  /**
   * Open a sink per phase inside the run folder and write the CSV headers.
   * If any file fails, the sinks opened so far are closed again.
   */
  static async open(
    runDir: RunDirectory,
    phases: readonly PhaseDefinition[] = PHASES
  ): Promise<AggregationContext> {
    const slots = new Map<PhaseId, PhaseSlot>();

    try {
      for (const phase of phases) {
        const path = getCsvPath(runDir, phase);
        let sink: CsvSink;
        try {
          sink = await CsvSink.open(path);
        } catch (error) {
          throw new ConfigurationError(`Failed to open CSV file ${path}: ${errorMessage(error)}`, {
            path,
            cause: error,
          });
        }
        slots.set(phase.id, { phase, accumulator: new RunningAverage(), sink });
        await sink.writeHeader();
      }
    } catch (error) {
      await closeSinks([...slots.values()]);
      throw error;
    }

    return new AggregationContext(slots);
  }

  /**
   * Merge one iteration's samples: each is appended to its phase's CSV file,
   * then counted in that phase's average. A sample whose write fails is not
   * averaged.
   */
  async merge(samples: readonly PhaseSample[]): Promise<void> {
    if (this.closed) {
      throw new Error('Aggregation context is closed');
    }

    for (const { phase, sample } of samples) {
      const slot = this.slots.get(phase.id);
      if (!slot) {
        throw new Error(`Unknown phase: ${phase.id}`);
      }
      await slot.sink.append(sample);
      slot.accumulator.add(sample);
    }
  }

  average(id: PhaseId): PhaseAverage {
    const slot = this.slots.get(id);
    if (!slot) {
      throw new Error(`Unknown phase: ${id}`);
    }
    return slot.accumulator.value;
  }

  /**
   * Current averages of all phases, in phase order
   */
  results(): PhaseResult[] {
    return [...this.slots.values()].map(({ phase, accumulator }) => ({
      phase,
      average: accumulator.value,
    }));
  }

  /**
   * Close every sink. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await closeSinks([...this.slots.values()]);
  }
}

async function closeSinks(slots: readonly PhaseSlot[]): Promise<void> {
  for (const { sink } of slots) {
    try {
      await sink.close();
    } catch (error) {
      log.warn({ path: sink.path, error }, 'Failed to close CSV sink');
    }
  }
}
