/**
 * Runs the benchmarked tool once and captures its report.
 */

import { rm, writeFile } from 'node:fs/promises';
import { execa } from 'execa';
import { errorMessage } from './errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('command-executor');

export interface CommandRequest {
  /** 1-based iteration number, for logging */
  iteration: number;
  /** File that receives the combined stdout/stderr */
  scratchPath: string;
  /** Whether to set the stack-trace environment variable */
  stackTrace: boolean;
}

export type CommandOutcome =
  | { ok: true; durationMs: number }
  | {
      ok: false;
      reason: string;
      exitCode: number | null;
      timedOut: boolean;
      durationMs: number;
    };

/**
 * Executes one iteration of the external tool. On success the scratch file
 * holds the tool's report; on failure it does not exist.
 */
export interface CommandExecutor {
  execute(request: CommandRequest): Promise<CommandOutcome>;
}

export interface ExecaExecutorOptions {
  /** Executable followed by its arguments */
  command: readonly string[];
  cwd: string;
  /** 0 disables the timeout */
  timeoutMs: number;
  stackTraceVar: string;
}

export class ExecaCommandExecutor implements CommandExecutor {
  constructor(private readonly options: ExecaExecutorOptions) {}

  async execute(request: CommandRequest): Promise<CommandOutcome> {
    const [file, ...args] = this.options.command;
    if (file === undefined) {
      throw new Error('No command configured');
    }

    // A previous iteration's report must never be parsed as this one's
    try {
      await rm(request.scratchPath, { force: true });
    } catch (error) {
      log.error(
        { iteration: request.iteration, path: request.scratchPath, error },
        'Failed to remove report file'
      );
      return {
        ok: false,
        reason: `Failed to remove report file ${request.scratchPath}: ${errorMessage(error)}`,
        exitCode: null,
        timedOut: false,
        durationMs: 0,
      };
    }

    const env: Record<string, string> = request.stackTrace
      ? { [this.options.stackTraceVar]: '1' }
      : {};

    log.info(
      { iteration: request.iteration, command: this.options.command.join(' '), stackTrace: request.stackTrace },
      'Running command'
    );

    const startTime = Date.now();
    const result = await execa(file, args, {
      cwd: this.options.cwd,
      env,
      all: true,
      reject: false,
      stripFinalNewline: false,
      timeout: this.options.timeoutMs,
    });
    const durationMs = Date.now() - startTime;

    if (result.timedOut) {
      return {
        ok: false,
        reason: `Command timed out after ${this.options.timeoutMs}ms`,
        exitCode: null,
        timedOut: true,
        durationMs,
      };
    }

    if (result.failed || result.exitCode !== 0) {
      const exitCode = typeof result.exitCode === 'number' ? result.exitCode : null;
      return {
        ok: false,
        reason: describeFailure(exitCode, result.signal),
        exitCode,
        timedOut: false,
        durationMs,
      };
    }

    try {
      await writeFile(request.scratchPath, result.all ?? '', 'utf-8');
    } catch (error) {
      log.error(
        { iteration: request.iteration, path: request.scratchPath, error },
        'Failed to write report file'
      );
      return {
        ok: false,
        reason: `Failed to write report file ${request.scratchPath}: ${errorMessage(error)}`,
        exitCode: 0,
        timedOut: false,
        durationMs,
      };
    }

    log.debug({ iteration: request.iteration, durationMs }, 'Command completed');

    return { ok: true, durationMs };
  }
}

function describeFailure(exitCode: number | null, signal: string | undefined): string {
  if (exitCode !== null) {
    return `Command exited with code ${exitCode}`;
  }
  if (signal) {
    return `Command terminated by ${signal}`;
  }
  return 'Command failed to start';
}
