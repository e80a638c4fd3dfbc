/**
 * Zod validation schemas for console reporting options
 */

import { toConfigError } from '@gsearch/core';
import { z } from 'zod';

import type { Verbosity } from '../reporter/types.js';

const VERBOSITY_LEVELS = [0, 1, 2, 3, 4] as const;

function isVerbosity(value: number): value is Verbosity {
  return VERBOSITY_LEVELS.some((level) => level === value);
}

/**
 * Verbosity schema (integer 0-4)
 */
export const verbositySchema = z
  .number()
  .refine(isVerbosity, { message: 'Verbosity must be an integer from 0 to 4' });

const functionSchema = z.custom<(...args: never[]) => unknown>(
  (value) => typeof value === 'function',
  { message: 'Expected a function' },
);

/**
 * Console reporter options schema
 */
export const reporterOptionsSchema = z
  .object({
    verbosity: verbositySchema.optional(),
    color: z.boolean().optional(),
    write: functionSchema.optional(),
    formatState: functionSchema.optional(),
  })
  .passthrough();

/**
 * Validate a verbosity level
 * @throws SearchConfigError if validation fails
 */
export function validateVerbosity(value: unknown): Verbosity {
  const result = verbositySchema.safeParse(value);
  if (!result.success) {
    throw toConfigError(result.error, 'verbosity');
  }
  return result.data;
}

/**
 * Validate console reporter options
 * @throws SearchConfigError if validation fails
 */
export function validateReporterOptions(options: unknown): void {
  const result = reporterOptionsSchema.safeParse(options);
  if (!result.success) {
    throw toConfigError(result.error, 'reporter');
  }
}
