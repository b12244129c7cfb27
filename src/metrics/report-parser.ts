/**
 * Report Parser Module
 *
 * Scans a captured report for phase headers and hands each block to the
 * block parser. This is the only place that knows the report's text layout;
 * aggregation and CSV output only see `ReportBlock`s.
 */

import { PHASES, matchPhaseHeader, type MetricField, type MetricSample, type PhaseDefinition } from '../types/index.js';
import { LineCursor, parseMetricBlock } from './block-parser.js';

/** One phase block found in a report */
export interface ReportBlock {
  phase: PhaseDefinition;
  /** 1-based line number of the block's header */
  headerLine: number;
  /** Parsed sample, null when the block was incomplete */
  sample: MetricSample | null;
  /** Fields the block lacked */
  missing: MetricField[];
}

/**
 * Turns the tool's captured output into phase blocks
 */
export interface ReportParser {
  parse(content: string): ReportBlock[];
}

/**
 * Parser for the plain-text report printed by the benchmarked tool
 */
export class TextReportParser implements ReportParser {
  constructor(private readonly phases: readonly PhaseDefinition[] = PHASES) {}

  /**
   * Parse report content top to bottom. Blocks are returned in report order,
   * including incomplete ones, so callers can tell discarded blocks apart
   * from absent phases.
   */
  parse(content: string): ReportBlock[] {
    const cursor = LineCursor.fromText(content);
    const blocks: ReportBlock[] = [];

    for (;;) {
      const line = cursor.next();
      if (line === null) {
        break;
      }

      const phase = matchPhaseHeader(line, this.phases);
      if (!phase) {
        continue;
      }

      const headerLine = cursor.lineNumber;
      const { sample, missing } = parseMetricBlock(cursor);
      blocks.push({ phase, headerLine, sample, missing });
    }

    return blocks;
  }
}
