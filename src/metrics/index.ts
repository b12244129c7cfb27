/**
 * Metrics module.
 * Report parsing, running averages and CSV output.
 */

// Block parser
export {
  LineCursor,
  parseMetricBlock,
  parseDuration,
  parsePlainNumber,
  parseInteger,
  isBlockTerminator,
  type BlockParseResult,
} from './block-parser.js';

// Report parser
export { TextReportParser, type ReportParser, type ReportBlock } from './report-parser.js';

// Running averages
export { RunningAverage, updateAverage, nextMean, nextIntegerMean } from './running-average.js';

// CSV output
export { CsvSink, CSV_HEADER, formatCsvRow } from './csv-sink.js';
