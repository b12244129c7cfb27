/**
 * Metric Block Parser
 *
 * Extracts the five metric fields from one phase block of the benchmarked
 * tool's report. A block starts on the line after a phase header and runs
 * until a row of `=` characters or the end of the report.
 */

import { MetricField, METRIC_FIELDS, metricSampleSchema, type MetricSample } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

/** Outcome of parsing one block */
export interface BlockParseResult {
  /** The sample, or null when any field is missing */
  sample: MetricSample | null;
  /** Fields that were not found or whose value did not parse */
  missing: MetricField[];
}

type FieldValueParser = (text: string) => number | null;

interface FieldLabel {
  field: MetricField;
  prefix: string;
  parse: FieldValueParser;
}

// ============================================================================
// Line Cursor
// ============================================================================

/**
 * Forward-only reader over report lines, shared between the header scan and
 * the block parser so that a parsed block is not scanned again for headers.
 */
export class LineCursor {
  private index = 0;

  constructor(private readonly lines: readonly string[]) {}

  static fromText(text: string): LineCursor {
    return new LineCursor(text.split(/\r?\n/));
  }

  /**
   * Return the next line, or null at the end of input
   */
  next(): string | null {
    if (this.index >= this.lines.length) {
      return null;
    }
    const line = this.lines[this.index] ?? '';
    this.index++;
    return line;
  }

  /** 1-based number of the line most recently returned */
  get lineNumber(): number {
    return this.index;
  }
}

// ============================================================================
// Patterns
// ============================================================================

const PATTERNS = {
  /** Leading decimal number, optionally signed, with optional exponent */
  NUMBER: /^\s*([+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?)/,
  /** Unit glued to or spaced from the number: 12.5ms, 1.2 s */
  UNIT: /^\s*([A-Za-zÂµμ]+)/,
  /** Leading integer */
  INTEGER: /^\s*([+-]?\d+)/,
  /** Block terminator: a line made only of `=` */
  TERMINATOR: /^\s*={3,}\s*$/,
};

/** Conversions to milliseconds; units not listed are taken as milliseconds */
const UNIT_TO_MS: Readonly<Record<string, (value: number) => number>> = {
  s: (v) => v * 1000,
  sec: (v) => v * 1000,
  'µs': (v) => v / 1000,
  'μs': (v) => v / 1000,
  // UTF-8 µ decoded as Latin-1
  'Âµs': (v) => v / 1000,
  us: (v) => v / 1000,
  microseconds: (v) => v / 1000,
  ns: (v) => v / 1_000_000,
  nanoseconds: (v) => v / 1_000_000,
};

// ============================================================================
// Value Parsers
// ============================================================================

/**
 * Parse a number followed by an optional time unit, normalized to ms
 */
export function parseDuration(text: string): number | null {
  const numberMatch = PATTERNS.NUMBER.exec(text);
  if (!numberMatch?.[1]) {
    return null;
  }

  const value = Number.parseFloat(numberMatch[1]);
  const unit = PATTERNS.UNIT.exec(text.slice(numberMatch[0].length))?.[1];
  const toMs = unit === undefined ? undefined : UNIT_TO_MS[unit];

  return toMs ? toMs(value) : value;
}

/**
 * Parse a bare number, ignoring anything after it (such as a `%` sign)
 */
export function parsePlainNumber(text: string): number | null {
  const match = PATTERNS.NUMBER.exec(text);
  return match?.[1] ? Number.parseFloat(match[1]) : null;
}

/**
 * Parse a bare integer, ignoring anything after it (such as `bytes`)
 */
export function parseInteger(text: string): number | null {
  const match = PATTERNS.INTEGER.exec(text);
  return match?.[1] ? Number.parseInt(match[1], 10) : null;
}

/** Labels in the order they are checked on each line */
const FIELD_LABELS: readonly FieldLabel[] = [
  { field: MetricField.WALL_CLOCK, prefix: 'Wall Clock Time:', parse: parseDuration },
  { field: MetricField.USER_TIME, prefix: 'User time:', parse: parseDuration },
  { field: MetricField.SYSTEM_TIME, prefix: 'System time:', parse: parseDuration },
  { field: MetricField.CPU_USAGE, prefix: 'CPU Usage:', parse: parsePlainNumber },
  { field: MetricField.MAX_RSS, prefix: 'Max RSS:', parse: parseInteger },
];

// ============================================================================
// Block Parser
// ============================================================================

/**
 * Whether a line closes a metric block
 */
export function isBlockTerminator(line: string): boolean {
  return PATTERNS.TERMINATOR.test(line);
}

/**
 * Consume one block from the cursor and extract its metric fields.
 *
 * Lines without a known label are skipped. When a label appears twice the
 * later value wins. The sample is only produced when all five fields were
 * found and pass `metricSampleSchema`; an overflowing value such as `1e999`
 * counts as missing.
 */
export function parseMetricBlock(cursor: LineCursor): BlockParseResult {
  const values: Partial<Record<MetricField, number>> = {};

  for (;;) {
    const line = cursor.next();
    if (line === null || isBlockTerminator(line)) {
      break;
    }

    const label = FIELD_LABELS.find((l) => line.includes(l.prefix));
    if (!label) {
      continue;
    }

    const rest = line.slice(line.indexOf(label.prefix) + label.prefix.length);
    const value = label.parse(rest);
    if (value !== null) {
      values[label.field] = value;
    }
  }

  const result = metricSampleSchema.safeParse(values);
  if (!result.success) {
    const invalid = new Set(result.error.issues.map((issue) => issue.path[0]));
    return { sample: null, missing: METRIC_FIELDS.filter((field) => invalid.has(field)) };
  }

  return { sample: Object.freeze(result.data), missing: [] };
}
