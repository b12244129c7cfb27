import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { PhaseDefinition } from '../types/index.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('run-directory');

export const SUMMARY_FILE = 'stats_summary.txt';

export interface RunDirectory {
  /** `<outputDir>/<YYYY_MM_DD>/<HH_MM_SS>` */
  path: string;
  /** Scratch file during the run, aggregate summary afterwards */
  summaryPath: string;
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Folder names for a run started at `date`, in local time
 */
export function formatRunFolders(date: Date): { day: string; time: string } {
  return {
    day: `${date.getFullYear()}_${pad(date.getMonth() + 1)}_${pad(date.getDate())}`,
    time: `${pad(date.getHours())}_${pad(date.getMinutes())}_${pad(date.getSeconds())}`,
  };
}

export function getCsvPath(runDir: RunDirectory, phase: PhaseDefinition): string {
  return join(runDir.path, phase.csvFile);
}

/**
 * Create the dated run folder. Existing folders are reused.
 */
export async function createRunDirectory(
  outputDir: string,
  startedAt: Date = new Date()
): Promise<RunDirectory> {
  const { day, time } = formatRunFolders(startedAt);
  const path = join(outputDir, day, time);

  try {
    await mkdir(path, { recursive: true });
  } catch (error) {
    throw new ConfigurationError(`Failed to create run directory ${path}: ${errorMessage(error)}`, {
      path,
      cause: error,
    });
  }

  log.debug({ path }, 'Created run directory');
  return { path, summaryPath: join(path, SUMMARY_FILE) };
}
