// Metric Types
export {
  MetricField,
  METRIC_FIELDS,
  metricSampleSchema,
  EMPTY_AVERAGE,
  type MetricSample,
  type PhaseAverage,
} from './metrics.js';

// Phase Types
export {
  PhaseId,
  PHASES,
  matchPhaseHeader,
  type PhaseDefinition,
} from './phase.js';
