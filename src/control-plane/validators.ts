import { z, type ZodError, type ZodType, type ZodTypeDef } from 'zod';
import { ConfigurationError } from '../benchmark/errors.js';

/**
 * Validation result type.
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] };

/**
 * Individual validation error.
 */
export interface ValidationError {
  path: string;
  message: string;
  code: string;
}

/**
 * Convert Zod errors to our ValidationError format.
 */
function formatZodErrors(error: ZodError): ValidationError[] {
  return error.errors.map(e => ({
    path: e.path.join('.'),
    message: e.message,
    code: e.code,
  }));
}

/**
 * Generic validation function for Zod schemas.
 */
export function validate<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatZodErrors(result.error) };
}

/**
 * Validate and throw a ConfigurationError on failure.
 */
export function validateOrThrow<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  data: unknown,
  label: string
): T {
  const result = validate(schema, data);

  if (!result.success) {
    const errorMessages = result.errors
      .map(e => `${e.path ? `${e.path}: ` : ''}${e.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid ${label}: ${errorMessages}`);
  }

  return result.data;
}

const integerString = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, 'Must be an integer');

/**
 * `<num_iterations>`: a positive decimal integer.
 */
export const iterationCountSchema = integerString
  .transform(value => Number.parseInt(value, 10))
  .pipe(z.number().int().positive('Number of iterations must be a positive integer'));

/**
 * `<enable_stack_trace>`: an integer flag, nonzero enables it.
 */
export const stackTraceFlagSchema = integerString.transform(value => Number.parseInt(value, 10) !== 0);

export function parseIterationCount(value: string): number {
  return validateOrThrow(iterationCountSchema, value, 'number of iterations');
}

export function parseStackTraceFlag(value: string): boolean {
  return validateOrThrow(stackTraceFlagSchema, value, 'stack trace flag');
}
