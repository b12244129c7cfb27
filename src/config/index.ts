/**
 * wasmbench Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults. CLI options are layered on top.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Split a command line into tokens on whitespace.
 * Quoting is not interpreted; paths with spaces belong in `--cwd`.
 */
export function splitCommandLine(commandLine: string): string[] {
  return commandLine.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  /** Executable and arguments of the benchmarked tool */
  command: z
    .string()
    .default('./wasmtime-test wasi-nn-module.wasm')
    .transform(splitCommandLine)
    .pipe(z.array(z.string()).min(1, 'Command must not be empty')),

  /** Working directory the tool is started from */
  cwd: z.string().min(1).default('.'),

  /** Directory under which the dated run folders are created */
  outputDir: z.string().min(1).default('.'),

  /** Per-iteration timeout in milliseconds, 0 disables it */
  timeoutMs: z.coerce.number().int().min(0).max(86_400_000).default(0),

  /** Environment variable set to 1 when stack traces are requested */
  stackTraceVar: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Must be a valid environment variable name')
    .default('RUST_BACKTRACE'),
});

export type BenchConfig = z.infer<typeof configSchema>;

/**
 * Raw configuration values as read from the environment or the CLI.
 */
export interface RawConfig {
  command?: string | undefined;
  cwd?: string | undefined;
  outputDir?: string | undefined;
  timeoutMs?: string | undefined;
  stackTraceVar?: string | undefined;
}

function readEnv(): RawConfig {
  return {
    command: process.env['WASMBENCH_COMMAND'],
    cwd: process.env['WASMBENCH_CWD'],
    outputDir: process.env['WASMBENCH_OUTPUT_DIR'],
    timeoutMs: process.env['WASMBENCH_TIMEOUT_MS'],
    stackTraceVar: process.env['WASMBENCH_STACK_TRACE_VAR'],
  };
}

function parseConfig(raw: RawConfig): BenchConfig {
  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  return result.data;
}

/**
 * Load configuration from environment variables. Defined CLI values in
 * `overrides` take precedence over the environment.
 */
export function loadConfig(overrides: RawConfig = {}): BenchConfig {
  const raw = readEnv();
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined && isRawConfigKey(key)) {
      raw[key] = value;
    }
  }

  const config = parseConfig(raw);

  log.debug(
    {
      command: config.command,
      cwd: config.cwd,
      outputDir: config.outputDir,
      timeoutMs: config.timeoutMs,
    },
    'Configuration loaded'
  );

  return config;
}

const RAW_CONFIG_KEYS: ReadonlyArray<keyof RawConfig> = [
  'command',
  'cwd',
  'outputDir',
  'timeoutMs',
  'stackTraceVar',
];

function isRawConfigKey(key: string): key is keyof RawConfig {
  return RAW_CONFIG_KEYS.some((known) => known === key);
}
