/**
 * Zod validation schemas for search configuration
 */

import { z } from 'zod';

import { SearchConfigError } from '../errors.js';

import { DEFAULT_SEARCH_SETTINGS, type SearchSettings } from './defaults.js';

/**
 * Any callable value
 */
const functionSchema = z.custom<(...args: never[]) => unknown>(
  (value) => typeof value === 'function',
  { message: 'Expected a function' },
);

/**
 * Search problem schema (initial state is opaque and not checked)
 */
export const searchProblemSchema = z
  .object({
    nextStates: functionSchema,
    goalTest: functionSchema,
    heuristic: functionSchema.optional(),
    stateKey: functionSchema.optional(),
    initialCost: z.number().optional(),
  })
  .passthrough();

/**
 * Search options schema (strategy names are resolved separately)
 */
export const searchOptionsSchema = z
  .object({
    maxIterations: z.number().int().positive().optional(),
    trackChildren: z.boolean().optional(),
    eventSink: functionSchema.optional(),
    observer: z.object({}).passthrough().optional(),
    signal: z.instanceof(AbortSignal).optional(),
  })
  .passthrough();

/**
 * Convert a failed parse into a SearchConfigError
 */
export function toConfigError(error: z.ZodError, prefix?: string): SearchConfigError {
  const errors = error.issues.map((issue) => {
    const path = issue.path.join('.');
    return {
      path: prefix ? (path ? `${prefix}.${path}` : prefix) : path,
      message: issue.message,
    };
  });
  return new SearchConfigError(errors);
}

/**
 * Validate a search problem
 * @throws SearchConfigError if validation fails
 */
export function validateSearchProblem(problem: unknown): void {
  const result = searchProblemSchema.safeParse(problem);
  if (!result.success) {
    throw toConfigError(result.error, 'problem');
  }
}

/**
 * Validate search options and apply defaults to the scalar settings
 * @throws SearchConfigError if validation fails
 */
export function resolveSearchSettings(options: {
  maxIterations?: number;
  trackChildren?: boolean;
}): SearchSettings {
  const result = searchOptionsSchema.safeParse(options);
  if (!result.success) {
    throw toConfigError(result.error, 'options');
  }

  return {
    maxIterations: options.maxIterations ?? DEFAULT_SEARCH_SETTINGS.maxIterations,
    trackChildren: options.trackChildren ?? DEFAULT_SEARCH_SETTINGS.trackChildren,
  };
}
