import { pino, destination, type Logger, type LoggerOptions } from 'pino';

const env = process.env['NODE_ENV'];
const isDev = env !== 'production' && env !== 'test';

// stdout carries the benchmark report, so log lines go to stderr
const STDERR_FD = 2;

// Build options conditionally to satisfy exactOptionalPropertyTypes
const options: LoggerOptions = {
  level: process.env['WASMBENCH_LOG_LEVEL'] ?? (isDev ? 'debug' : 'info'),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// Only add transport in dev mode
if (isDev) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: STDERR_FD,
    },
  };
}

export const logger: Logger = isDev
  ? pino(options)
  : pino(options, destination(STDERR_FD));

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
