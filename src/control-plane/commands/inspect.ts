import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import { TextReportParser, type ReportBlock } from '../../metrics/report-parser.js';
import { errorMessage } from '../../benchmark/errors.js';
import { print, printError, formatError, formatJson, formatReportBlocks } from '../formatter.js';

interface InspectOptions {
  json?: boolean;
}

/**
 * Create the inspect command.
 */
export function createInspectCommand(): Command {
  const command = new Command('inspect')
    .description('Parse a captured report and show the metric blocks it contains')
    .argument('<report-file>', 'File holding the output of one run of the benchmarked command')
    .option('-j, --json', 'Output result as JSON', false)
    .action(async (reportFile: string, options: InspectOptions) => {
      try {
        await executeInspect(reportFile, options);
      } catch (error) {
        printError(formatError(errorMessage(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the inspect command.
 */
export async function executeInspect(
  reportFile: string,
  options: InspectOptions
): Promise<ReportBlock[]> {
  const content = await readFile(reportFile, 'utf-8');
  const blocks = new TextReportParser().parse(content);

  if (options.json) {
    print(
      formatJson(
        blocks.map(block => ({
          phase: block.phase.id,
          name: block.phase.name,
          headerLine: block.headerLine,
          status: block.sample ? 'ok' : 'discarded',
          sample: block.sample,
          missing: block.missing,
        }))
      )
    );
  } else {
    print(formatReportBlocks(blocks));
  }

  return blocks;
}
