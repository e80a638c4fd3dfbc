/**
 * Console reporter
 *
 * Search observer that prints a trace of the run. The amount of output is
 * set by the verbosity level; see {@link Verbosity}.
 */

import type {
  OrderingPolicy,
  SearchNode,
  SearchObserver,
  SearchStats,
  ExpansionReport,
  StoppingReason,
} from '@gsearch/core';

import { validateReporterOptions, validateVerbosity } from '../config/validation.js';

import { createColorFns } from './colors.js';
import {
  formatCompactList,
  formatDetailedList,
  formatExpandLine,
  formatFailureLine,
  formatHeader,
  formatNodeInfo,
  formatSolutionLine,
  formatState,
} from './formatters.js';
import type {
  ColorFunctions,
  ConsoleReporterOptions,
  LineWriter,
  StateFormatter,
  Verbosity,
} from './types.js';

/**
 * Prints search progress to a line writer
 */
export class ConsoleReporter<S> implements SearchObserver<S> {
  readonly verbosity: Verbosity;

  private readonly write: LineWriter;
  private readonly renderState: StateFormatter<S>;
  private readonly c: ColorFunctions;
  private policy: OrderingPolicy | undefined;

  /**
   * @throws SearchConfigError if the options are malformed
   */
  constructor(options: ConsoleReporterOptions<S> = {}) {
    validateReporterOptions(options);
    this.verbosity = validateVerbosity(options.verbosity ?? 1);
    this.c = createColorFns(options.color ?? true);
    this.write = options.write ?? ((line: string): void => console.log(line));
    this.renderState = options.formatState ?? formatState;
  }

  onStart(policy: OrderingPolicy): void {
    this.policy = policy;
    if (this.verbosity < 2) return;

    this.write(this.c.bold(formatHeader(policy)));
    this.write('');
  }

  onExpand(iteration: number, node: SearchNode<S>): void {
    const policy = this.policy;
    if (this.verbosity < 2 || !policy) return;

    const info = formatNodeInfo(node, policy.strategy, this.renderState);
    this.write(this.c.cyan(formatExpandLine(iteration, info)));
  }

  onExpansion(_iteration: number, report: ExpansionReport<S>): void {
    const policy = this.policy;
    if (this.verbosity < 2 || !policy) return;

    this.printNodes('add', report.added, policy);
    if (report.discarded.length > 0) this.printNodes('discard', report.discarded, policy);
    if (report.exploredPruned.length > 0) {
      this.printNodes('expl. rm', report.exploredPruned, policy);
    }
    if (report.frontierPruned.length > 0) {
      this.printNodes('fron. rm', report.frontierPruned, policy);
    }
    this.printNodes('frontier', report.frontier, policy);

    // At verbosity 4 the step gate's prompt ends the iteration instead
    if (this.verbosity < 4) {
      this.write('');
    }
  }

  onSolution(path: SearchNode<S>[], stats: SearchStats): void {
    if (this.verbosity < 1) return;

    const goal = path[path.length - 1];
    this.write(this.c.green(formatSolutionLine(path.length, goal?.g ?? 0, stats)));
  }

  onFailure(reason: StoppingReason, stats: SearchStats): void {
    if (this.verbosity < 1) return;

    this.write(this.c.red(formatFailureLine(reason, stats)));
  }

  private printNodes(label: string, nodes: readonly SearchNode<S>[], policy: OrderingPolicy): void {
    if (this.verbosity === 2) {
      this.write(formatCompactList(label, nodes, policy));
      return;
    }
    for (const line of formatDetailedList(label, nodes, policy, this.renderState)) {
      this.write(line);
    }
  }
}
