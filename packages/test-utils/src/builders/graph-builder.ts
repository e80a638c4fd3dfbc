/**
 * Fluent builder for weighted directed graph problems
 */

import type { SearchProblem, Successor } from '@gsearch/core';

/**
 * Immutable weighted directed graph with goal and heuristic tables
 */
export interface WeightedGraph {
  /** Start state */
  readonly start: string;

  /** Goal states */
  readonly goals: ReadonlySet<string>;

  /** Outgoing edges of a state, in insertion order */
  successors(state: string): Successor<string>[];

  /** Heuristic estimate for a state (0 when not set) */
  estimate(state: string): number;

  /** Cost of the cheapest edge from one state to another, if any */
  edgeCost(from: string, to: string): number | undefined;
}

/**
 * Fluent builder for creating WeightedGraph instances
 */
export class GraphBuilder {
  private readonly adjacency = new Map<string, Array<Successor<string>>>();
  private readonly estimates = new Map<string, number>();
  private readonly goalStates = new Set<string>();
  private startState: string | undefined;

  /**
   * Set the start state
   */
  from(state: string): this {
    this.startState = state;
    this.touch(state);
    return this;
  }

  /**
   * Add a directed edge
   */
  edge(from: string, to: string, cost: number = 1): this {
    this.touch(from);
    this.touch(to);
    this.adjacency.get(from)?.push([to, cost]);
    return this;
  }

  /**
   * Add edges in both directions
   */
  undirected(a: string, b: string, cost: number = 1): this {
    return this.edge(a, b, cost).edge(b, a, cost);
  }

  /**
   * Mark goal states
   */
  goal(...states: string[]): this {
    for (const state of states) {
      this.touch(state);
      this.goalStates.add(state);
    }
    return this;
  }

  /**
   * Set heuristic estimates
   */
  heuristic(table: Record<string, number>): this {
    for (const [state, value] of Object.entries(table)) {
      this.estimates.set(state, value);
    }
    return this;
  }

  /**
   * Build the graph
   *
   * @throws Error if no start state was set
   */
  build(): WeightedGraph {
    const start = this.startState;
    if (start === undefined) {
      throw new Error('GraphBuilder: start state not set (call from())');
    }

    const adjacency = new Map(
      [...this.adjacency].map(([state, edges]) => [state, [...edges]] as const),
    );
    const estimates = new Map(this.estimates);
    const goals: ReadonlySet<string> = new Set(this.goalStates);

    return {
      start,
      goals,
      successors: (state) => [...(adjacency.get(state) ?? [])],
      estimate: (state) => estimates.get(state) ?? 0,
      edgeCost: (from, to) => {
        let best: number | undefined;
        for (const [target, cost] of adjacency.get(from) ?? []) {
          if (target === to && (best === undefined || cost < best)) best = cost;
        }
        return best;
      },
    };
  }

  /**
   * Build the graph and wrap it as a search problem
   */
  buildProblem(options: GraphProblemOptions = {}): SearchProblem<string> {
    return graphProblem(this.build(), options);
  }

  private touch(state: string): void {
    if (!this.adjacency.has(state)) {
      this.adjacency.set(state, []);
    }
  }
}

/**
 * Start a new graph builder
 */
export function graph(): GraphBuilder {
  return new GraphBuilder();
}

/**
 * Options for turning a graph into a search problem
 */
export interface GraphProblemOptions {
  /** Attach the graph's heuristic table (default: true) */
  withHeuristic?: boolean;
}

/**
 * Search problem over a weighted graph
 */
export function graphProblem(
  source: WeightedGraph,
  options: GraphProblemOptions = {},
): SearchProblem<string> {
  const { withHeuristic = true } = options;

  const problem: SearchProblem<string> = {
    initialState: source.start,
    nextStates: (state) => source.successors(state),
    goalTest: (state) => source.goals.has(state),
  };
  if (withHeuristic) {
    problem.heuristic = (state) => source.estimate(state);
  }
  return problem;
}
