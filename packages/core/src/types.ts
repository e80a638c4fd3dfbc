/**
 * Problem definition types
 */

/**
 * Successor of a state with the cost of the transition
 */
export type Successor<S> = readonly [state: S, cost: number];

/**
 * Successor generation function
 */
export type NextStatesFn<S> = (state: S) => Iterable<Successor<S>>;

/**
 * Goal predicate
 */
export type GoalTest<S> = (state: S) => boolean;

/**
 * Heuristic estimate of the remaining cost from a state
 */
export type HeuristicFn<S> = (state: S) => number;

/**
 * Maps a state to the value used for state equality
 *
 * Keys are compared with SameValueZero, as Map keys are.
 */
export type StateKeyFn<S> = (state: S) => unknown;

/**
 * A search problem over opaque states
 */
export interface SearchProblem<S> {
  /** Start state */
  initialState: S;

  /** Successors of a state, each with a transition cost */
  nextStates: NextStatesFn<S>;

  /** Whether a state is a goal */
  goalTest: GoalTest<S>;

  /** Heuristic (required by greedy-best-first and a-star) */
  heuristic?: HeuristicFn<S>;

  /** State equality key (default: the state itself) */
  stateKey?: StateKeyFn<S>;

  /** g-value of the root node (default: 0) */
  initialCost?: number;
}
