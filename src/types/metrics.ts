import { z } from 'zod';

// ============================================================================
// Metric Fields
// ============================================================================

/**
 * Fields reported by the benchmarked tool for every phase block
 */
export const MetricField = {
  WALL_CLOCK: 'wallClock',
  USER_TIME: 'userTime',
  SYSTEM_TIME: 'systemTime',
  CPU_USAGE: 'cpuUsage',
  MAX_RSS: 'maxRss',
} as const;

export type MetricField = (typeof MetricField)[keyof typeof MetricField];

export const METRIC_FIELDS: readonly MetricField[] = Object.values(MetricField);

// ============================================================================
// Metric Sample
// ============================================================================

/**
 * One observation for one phase in one iteration
 */
export const metricSampleSchema = z.object({
  /** User CPU time in milliseconds */
  userTime: z.number().finite(),
  /** System CPU time in milliseconds */
  systemTime: z.number().finite(),
  /** CPU usage in percent */
  cpuUsage: z.number().finite(),
  /** Wall clock time in milliseconds */
  wallClock: z.number().finite(),
  /** Maximum resident set size, in the tool's native units */
  maxRss: z.number().int(),
});

export type MetricSample = Readonly<z.infer<typeof metricSampleSchema>>;

// ============================================================================
// Phase Average
// ============================================================================

/**
 * Running mean of all samples merged for a phase
 */
export interface PhaseAverage extends MetricSample {
  /** Number of samples merged so far */
  readonly count: number;
}

export const EMPTY_AVERAGE: PhaseAverage = Object.freeze({
  userTime: 0,
  systemTime: 0,
  cpuUsage: 0,
  wallClock: 0,
  maxRss: 0,
  count: 0,
});
