/**
 * Chalk-backed color helpers
 */

import chalk from 'chalk';

import type { ColorFunctions } from './types.js';

/**
 * Create color functions, or identity functions when color is off
 */
export function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  // No colors - return text as-is
  const identity = (text: string): string => text;
  return {
    bold: identity,
    green: identity,
    red: identity,
    cyan: identity,
  };
}
