/**
 * Custom error types for the benchmark runner.
 */

/**
 * Error thrown when a run cannot start: bad arguments, or a run folder or
 * CSV file that cannot be created. Nothing has been executed when it is
 * thrown.
 */
export class ConfigurationError extends Error {
  readonly name = 'ConfigurationError';
  readonly path: string | null;

  constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.path = options.path ?? null;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Describe an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
