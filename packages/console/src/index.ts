/**
 * @gsearch/console
 *
 * Console reporting and interactive stepping for gsearch runs
 */

export {
  type ColorFn,
  type ColorFunctions,
  type LineWriter,
  type StateFormatter,
  type Verbosity,
  type ConsoleReporterOptions,
} from './reporter/types.js';

export { createColorFns } from './reporter/colors.js';

export {
  COMPACT_LIST_LIMIT,
  DETAILED_LIST_LIMIT,
  formatState,
  formatNumber,
  formatNodeInfo,
  formatHeader,
  formatExpandLine,
  formatCompactList,
  formatDetailedList,
  formatSolutionLine,
  formatFailureLine,
} from './reporter/formatters.js';

export { ConsoleReporter } from './reporter/console-reporter.js';

export {
  verbositySchema,
  reporterOptionsSchema,
  validateVerbosity,
  validateReporterOptions,
} from './config/validation.js';

export {
  DEFAULT_PROMPT,
  createPromptGate,
  type PromptGate,
  type PromptGateOptions,
} from './step-gate.js';

export { runSearch, type RunSearchOptions } from './run-search.js';
