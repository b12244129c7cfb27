// ============================================================================
// Phase Definitions
// ============================================================================

/**
 * Stable identifiers of the benchmarked workload's phases
 */
export const PhaseId = {
  LOAD_MODEL: 'loadmodel',
  READ_IMAGE: 'readimg',
  RED_BOX: 'redbox',
  READ_IMAGE_GREEN_BOX: 'readimgGreenbox',
  INFERENCE: 'inference',
  POSTPROCESSING: 'postprocessing',
  GREEN_BOX: 'greenbox',
  TOTAL: 'total',
} as const;

export type PhaseId = (typeof PhaseId)[keyof typeof PhaseId];

/**
 * How a phase shows up in the tool's report and in the run folder
 */
export interface PhaseDefinition {
  id: PhaseId;
  /** Name used in the persisted summary */
  name: string;
  /** Substring identifying the phase's header line in the report */
  header: string;
  /** CSV file name inside the run folder */
  csvFile: string;
  /** Label for the console summary, null when the phase is not printed */
  consoleLabel: string | null;
}

/**
 * All phases in report order. A line matching several headers belongs to
 * the first phase listed here.
 */
export const PHASES: readonly PhaseDefinition[] = [
  {
    id: PhaseId.LOAD_MODEL,
    name: 'Load Model',
    header: 'loadmodel Metrics',
    csvFile: 'loadmodel.csv',
    consoleLabel: 'Load Model',
  },
  {
    id: PhaseId.READ_IMAGE,
    name: 'Read Image (Red Box)',
    header: 'readimg Metrics',
    csvFile: 'readimg.csv',
    consoleLabel: 'Read Image',
  },
  {
    id: PhaseId.RED_BOX,
    name: 'Red Box',
    header: 'RED BOX Phase Metrics',
    csvFile: 'redbox.csv',
    consoleLabel: null,
  },
  {
    id: PhaseId.READ_IMAGE_GREEN_BOX,
    name: 'Read Image (Green Box)',
    header: 'Pre-processing Metrics',
    csvFile: 'readimg_greenbox.csv',
    consoleLabel: 'Pre Processing',
  },
  {
    id: PhaseId.INFERENCE,
    name: 'Inference',
    header: 'Inference Metrics',
    csvFile: 'inference.csv',
    consoleLabel: 'Inference',
  },
  {
    id: PhaseId.POSTPROCESSING,
    name: 'Postprocessing',
    header: 'Post-processing Metrics',
    csvFile: 'postprocessing.csv',
    consoleLabel: 'Post Processing',
  },
  {
    id: PhaseId.GREEN_BOX,
    name: 'Green Box',
    header: 'GREEN BOX Phase Metrics',
    csvFile: 'greenbox.csv',
    consoleLabel: null,
  },
  {
    id: PhaseId.TOTAL,
    name: 'Total',
    header: 'Total Metrics',
    csvFile: 'total.csv',
    consoleLabel: null,
  },
];

/**
 * Find the phase whose header appears in a report line
 */
export function matchPhaseHeader(
  line: string,
  phases: readonly PhaseDefinition[] = PHASES
): PhaseDefinition | null {
  return phases.find((phase) => line.includes(phase.header)) ?? null;
}
