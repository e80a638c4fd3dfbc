/**
 * Run a search with console reporting attached
 */

import {
  searchAsync,
  type AsyncSearchOptions,
  type EventSink,
  type SearchProblem,
  type SearchResult,
} from '@gsearch/core';

import { validateVerbosity } from './config/validation.js';
import { ConsoleReporter } from './reporter/console-reporter.js';
import type { ConsoleReporterOptions, LineWriter, StateFormatter } from './reporter/types.js';
import { createPromptGate, type PromptGate } from './step-gate.js';

/**
 * Options for runSearch
 */
export interface RunSearchOptions<S> {
  /** Strategy name or alias */
  strategy: string;
  /** Amount of console output, 0-4 (default: 0) */
  verbosity?: number;
  /** Receives edge batches for visualisation */
  eventSink?: EventSink<S>;
  /** Cooperative cancellation */
  signal?: AbortSignal;
  /** Stop after this many iterations */
  maxIterations?: number;
  /** Enable colored output (default: true) */
  color?: boolean;
  /** Line sink for the reporter (default: console.log) */
  write?: LineWriter;
  /** State renderer for the reporter */
  formatState?: StateFormatter<S>;
  /** Stream the step gate reads from at verbosity 4 (default: process.stdin) */
  input?: NodeJS.ReadableStream;
  /** Stream the step gate prompts on at verbosity 4 (default: process.stdout) */
  output?: NodeJS.WritableStream;
}

/**
 * Search for a path, printing progress according to the verbosity level
 *
 * Verbosity 1 and above attach a ConsoleReporter; verbosity 4 also pauses
 * for a line of input after each iteration.
 *
 * @throws SearchConfigError if the verbosity or other options are malformed
 */
export async function runSearch<S>(
  problem: SearchProblem<S>,
  options: RunSearchOptions<S>,
): Promise<SearchResult<S>> {
  const verbosity = validateVerbosity(options.verbosity ?? 0);

  const searchOptions: AsyncSearchOptions<S> = { strategy: options.strategy };
  if (options.eventSink) searchOptions.eventSink = options.eventSink;
  if (options.signal) searchOptions.signal = options.signal;
  if (options.maxIterations !== undefined) searchOptions.maxIterations = options.maxIterations;

  if (verbosity >= 1) {
    const reporterOptions: ConsoleReporterOptions<S> = { verbosity };
    if (options.color !== undefined) reporterOptions.color = options.color;
    if (options.write) reporterOptions.write = options.write;
    if (options.formatState) reporterOptions.formatState = options.formatState;
    searchOptions.observer = new ConsoleReporter(reporterOptions);
  }

  let prompt: PromptGate | undefined;
  if (verbosity >= 4) {
    prompt = createPromptGate({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout,
    });
    searchOptions.stepGate = prompt.gate;
  }

  try {
    return await searchAsync(problem, searchOptions);
  } finally {
    prompt?.close();
  }
}
