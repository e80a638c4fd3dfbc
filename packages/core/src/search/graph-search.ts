/**
 * Graph Search
 *
 * Best-first graph search over opaque states. Repeatedly pops the best node
 * from the frontier, tests it against the goal and otherwise expands it
 * through the dominance/pruning engine.
 */

import { resolveSearchSettings, validateSearchProblem } from '../config/validation.js';
import type { SearchSettings } from '../config/defaults.js';
import { expandNode, type ExpansionContext } from '../dominance/expand.js';
import { MissingHeuristicError } from '../errors.js';
import {
  nodesToEdges,
  type EdgeStatus,
  type EventSink,
  type SearchObserver,
  type SearchStats,
} from '../events.js';
import { NodeStore } from '../nodes/node-store.js';
import type { SearchNode } from '../nodes/search-node.js';
import { getOrderingPolicy, type OrderingPolicy } from '../ordering/strategies.js';
import type { SearchProblem } from '../types.js';

import { pathStates, reconstructPath } from './path.js';
import { shouldStop, type StoppingReason } from './stopping-conditions.js';

/**
 * Search lifecycle status
 */
export type SearchStatus = 'running' | 'succeeded' | 'failed';

/**
 * Called between iterations (e.g. to pause for user input)
 */
export type StepGate = (iteration: number) => void;

/**
 * Step gate that may wait asynchronously
 */
export type AsyncStepGate = (iteration: number) => void | Promise<void>;

/**
 * Options for a search run
 */
export interface SearchOptions<S> {
  /** Strategy name or alias */
  strategy: string;

  /** Receives edge batches for visualisation */
  eventSink?: EventSink<S>;

  /** Receives lifecycle hooks for reporting */
  observer?: SearchObserver<S>;

  /** Cooperative cancellation, checked before each iteration */
  signal?: AbortSignal;

  /** Stop after this many iterations */
  maxIterations?: number;

  /** Maintain the node store's children index (default: true) */
  trackChildren?: boolean;
}

interface SearchOutcome<S> {
  /** Run counters */
  stats: SearchStats;

  /** Frontier when the search ended, in key order */
  frontier: SearchNode<S>[];

  /** Explored set when the search ended */
  explored: SearchNode<S>[];
}

/**
 * A goal was reached
 */
export interface SearchSuccess<S> extends SearchOutcome<S> {
  found: true;
  status: 'succeeded';

  /** States from the initial state to the goal */
  path: S[];

  /** Nodes from the root to the goal */
  nodes: SearchNode<S>[];

  /** Goal node */
  goal: SearchNode<S>;

  /** Accumulated cost of the path */
  cost: number;
}

/**
 * No path was found
 */
export interface SearchFailure<S> extends SearchOutcome<S> {
  found: false;
  status: 'failed';

  /** Why the search ended */
  reason: StoppingReason;
}

export type SearchResult<S> = SearchSuccess<S> | SearchFailure<S>;

/**
 * Single-use search over one problem
 */
export class GraphSearch<S> {
  readonly policy: OrderingPolicy;
  readonly store: NodeStore<S>;
  readonly root: SearchNode<S>;

  private readonly problem: SearchProblem<S>;
  private readonly settings: SearchSettings;
  private readonly context: ExpansionContext<S>;
  private readonly eventSink?: EventSink<S>;
  private readonly observer?: SearchObserver<S>;
  private readonly signal?: AbortSignal;

  private frontier: SearchNode<S>[];
  private explored: SearchNode<S>[] = [];
  private iterations: number = 0;
  private prunes: number = 0;
  private started: boolean = false;
  private result: SearchResult<S> | undefined;

  /**
   * @throws InvalidStrategyError if the strategy is unknown
   * @throws MissingHeuristicError if the strategy needs a heuristic and none is given
   * @throws SearchConfigError if the problem or options are malformed
   */
  constructor(problem: SearchProblem<S>, options: SearchOptions<S>) {
    this.policy = getOrderingPolicy(options.strategy);
    validateSearchProblem(problem);
    if (this.policy.requiresHeuristic && !problem.heuristic) {
      throw new MissingHeuristicError(this.policy.strategy);
    }
    this.settings = resolveSearchSettings(options);

    this.problem = problem;
    if (options.eventSink !== undefined) {
      this.eventSink = options.eventSink;
    }
    if (options.observer !== undefined) {
      this.observer = options.observer;
    }
    if (options.signal !== undefined) {
      this.signal = options.signal;
    }

    this.store = new NodeStore<S>({ trackChildren: this.settings.trackChildren });
    this.context = {
      store: this.store,
      policy: this.policy,
      heuristic: problem.heuristic,
      stateKey: problem.stateKey ?? ((state: S): unknown => state),
    };

    this.root = this.store.createRoot(
      problem.initialState,
      problem.initialCost ?? 0,
      problem.heuristic?.(problem.initialState),
    );
    this.frontier = [this.root];
  }

  /**
   * Current lifecycle status
   */
  get status(): SearchStatus {
    return this.result?.status ?? 'running';
  }

  /**
   * Counters for the run so far
   */
  get stats(): SearchStats {
    return {
      iterations: this.iterations,
      generated: this.store.size,
      pruned: this.prunes,
      explored: this.explored.length,
      frontier: this.frontier.length,
    };
  }

  /**
   * Perform one iteration
   *
   * @returns The final result once the search has ended, otherwise undefined
   */
  step(): SearchResult<S> | undefined {
    if (this.result) return this.result;

    if (!this.started) {
      this.started = true;
      this.observer?.onStart?.(this.policy, this.root);
    }

    const stopCheck = shouldStop(
      { iterations: this.iterations, frontierSize: this.frontier.length },
      { maxIterations: this.settings.maxIterations, signal: this.signal },
    );
    if (stopCheck.stop) {
      return this.fail(stopCheck.reason);
    }

    const node = this.frontier.shift();
    if (!node) {
      return this.fail('frontier_exhausted');
    }

    this.iterations++;
    this.explored.push(node);
    this.observer?.onExpand?.(this.iterations, node);

    if (this.problem.goalTest(node.state)) {
      return this.succeed(node);
    }

    const expansion = expandNode(
      this.context,
      node,
      this.problem.nextStates(node.state),
      this.frontier,
      this.explored,
    );
    this.frontier = expansion.frontier;
    this.explored = expansion.explored;
    const { discarded, frontierPruned, exploredPruned } = expansion;
    this.prunes += discarded.length + frontierPruned.length + exploredPruned.length;

    this.observer?.onExpansion?.(this.iterations, expansion);

    this.emit([node], 'expand');
    this.emit(discarded, 'discard');
    this.emit(expansion.added, 'add');
    this.emit(frontierPruned, 'frontier_prune');
    this.emit(exploredPruned, 'explored_prune');

    return undefined;
  }

  /**
   * Run to completion, calling the step gate between iterations
   */
  run(stepGate?: StepGate): SearchResult<S> {
    for (;;) {
      const result = this.step();
      if (result) return result;
      stepGate?.(this.iterations);
    }
  }

  /**
   * Run to completion, awaiting the step gate between iterations
   */
  async runAsync(stepGate?: AsyncStepGate): Promise<SearchResult<S>> {
    for (;;) {
      const result = this.step();
      if (result) return result;
      if (stepGate) {
        await stepGate(this.iterations);
      }
    }
  }

  private succeed(goal: SearchNode<S>): SearchSuccess<S> {
    const nodes = reconstructPath(this.store, goal);
    const stats = this.stats;

    const result: SearchSuccess<S> = {
      found: true,
      status: 'succeeded',
      path: pathStates(nodes),
      nodes,
      goal,
      cost: goal.g,
      stats,
      frontier: [...this.frontier],
      explored: [...this.explored],
    };
    this.result = result;

    this.observer?.onSolution?.(nodes, stats);
    this.emit(nodes, 'solution');
    return result;
  }

  private fail(reason: StoppingReason): SearchFailure<S> {
    const stats = this.stats;

    const result: SearchFailure<S> = {
      found: false,
      status: 'failed',
      reason,
      stats,
      frontier: [...this.frontier],
      explored: [...this.explored],
    };
    this.result = result;

    this.observer?.onFailure?.(reason, stats);
    return result;
  }

  private emit(nodes: readonly SearchNode<S>[], status: EdgeStatus): void {
    if (this.eventSink) {
      this.eventSink(nodesToEdges(this.store, nodes), status);
    }
  }
}

/**
 * Options for a synchronous search
 */
export interface SyncSearchOptions<S> extends SearchOptions<S> {
  stepGate?: StepGate;
}

/**
 * Options for an asynchronous search
 */
export interface AsyncSearchOptions<S> extends SearchOptions<S> {
  stepGate?: AsyncStepGate;
}

/**
 * Search for a path from the initial state to a goal state
 *
 * @returns A success with the path, or a failure (never an empty path)
 */
export function search<S>(
  problem: SearchProblem<S>,
  options: SyncSearchOptions<S>,
): SearchResult<S> {
  return new GraphSearch(problem, options).run(options.stepGate);
}

/**
 * Search with an asynchronous step gate between iterations
 */
export async function searchAsync<S>(
  problem: SearchProblem<S>,
  options: AsyncSearchOptions<S>,
): Promise<SearchResult<S>> {
  return new GraphSearch(problem, options).runAsync(options.stepGate);
}
