/**
 * Running average accumulator.
 * Keeps a per-phase mean of every metric field without storing history.
 */

import { EMPTY_AVERAGE, type MetricSample, type PhaseAverage } from '../types/index.js';

/**
 * Online mean update for a floating-point field.
 * `count` is the 1-based index of the value being merged.
 */
export function nextMean(average: number, count: number, value: number): number {
  if (count === 1) {
    return value;
  }
  return ((count - 1) * average + value) / count;
}

/**
 * Online mean update for an integer field. Division truncates toward zero,
 * matching the report format the CSV and summary files have always used.
 */
export function nextIntegerMean(average: number, count: number, value: number): number {
  if (count === 1) {
    return value;
  }
  const total = BigInt(count - 1) * BigInt(average) + BigInt(value);
  return Number(total / BigInt(count));
}

/**
 * Merge one sample into an average. Every field is updated independently.
 */
export function updateAverage(
  current: PhaseAverage,
  count: number,
  sample: MetricSample
): PhaseAverage {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`Sample count must be a positive integer, got ${count}`);
  }

  return Object.freeze({
    userTime: nextMean(current.userTime, count, sample.userTime),
    systemTime: nextMean(current.systemTime, count, sample.systemTime),
    cpuUsage: nextMean(current.cpuUsage, count, sample.cpuUsage),
    wallClock: nextMean(current.wallClock, count, sample.wallClock),
    maxRss: nextIntegerMean(current.maxRss, count, sample.maxRss),
    count,
  });
}

/**
 * Accumulator for one phase. Lives for the whole benchmark run.
 */
export class RunningAverage {
  private current: PhaseAverage = EMPTY_AVERAGE;

  /**
   * Merge a sample and return the updated average
   */
  add(sample: MetricSample): PhaseAverage {
    this.current = updateAverage(this.current, this.current.count + 1, sample);
    return this.current;
  }

  get value(): PhaseAverage {
    return this.current;
  }

  get count(): number {
    return this.current.count;
  }
}
