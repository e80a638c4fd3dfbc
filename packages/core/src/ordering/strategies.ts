/**
 * Ordering Policy
 *
 * Maps each search strategy to the key used to order the frontier and to
 * decide dominance between nodes for the same state. Smaller keys are
 * expanded first.
 */

import { InvalidStrategyError } from '../errors.js';
import { nodeF, type SearchNode } from '../nodes/search-node.js';

/**
 * Supported strategies
 */
export const SEARCH_STRATEGIES = [
  'best-first',
  'depth-first',
  'uniform-cost',
  'greedy-best-first',
  'a-star',
] as const;

export type SearchStrategy = (typeof SEARCH_STRATEGIES)[number];

/**
 * Short strategy names, accepted as aliases
 */
export const STRATEGY_ALIASES: ReadonlyMap<string, SearchStrategy> = new Map<
  string,
  SearchStrategy
>([
  ['bf', 'best-first'],
  ['df', 'depth-first'],
  ['uc', 'uniform-cost'],
  ['gbf', 'greedy-best-first'],
  ['a*', 'a-star'],
]);

/**
 * Display name of the ordering key
 */
export type KeyName = 'id' | '-id' | 'g' | 'h' | 'f';

export type KeyFn = (node: SearchNode<unknown>) => number;

/**
 * Ordering policy for one strategy
 */
export interface OrderingPolicy {
  readonly strategy: SearchStrategy;
  readonly keyName: KeyName;
  readonly key: KeyFn;
  /** Whether the key reads the heuristic value */
  readonly requiresHeuristic: boolean;
}

/**
 * Ordering policies by strategy
 */
export const ORDERING_POLICIES: Readonly<Record<SearchStrategy, OrderingPolicy>> = {
  'best-first': {
    strategy: 'best-first',
    keyName: 'id',
    key: (node) => node.id,
    requiresHeuristic: false,
  },
  'depth-first': {
    strategy: 'depth-first',
    keyName: '-id',
    key: (node) => -node.id,
    requiresHeuristic: false,
  },
  'uniform-cost': {
    strategy: 'uniform-cost',
    keyName: 'g',
    key: (node) => node.g,
    requiresHeuristic: false,
  },
  'greedy-best-first': {
    strategy: 'greedy-best-first',
    keyName: 'h',
    key: (node) => node.h ?? 0,
    requiresHeuristic: true,
  },
  'a-star': {
    strategy: 'a-star',
    keyName: 'f',
    key: nodeF,
    requiresHeuristic: true,
  },
};

/**
 * Check if a value is a canonical strategy name
 */
export function isSearchStrategy(value: unknown): value is SearchStrategy {
  return SEARCH_STRATEGIES.some((strategy) => strategy === value);
}

/**
 * Resolve a strategy name or alias to its canonical name
 *
 * @throws InvalidStrategyError if the name is unknown
 */
export function resolveStrategy(name: string): SearchStrategy {
  if (isSearchStrategy(name)) return name;

  const alias = STRATEGY_ALIASES.get(name);
  if (alias !== undefined) return alias;

  throw new InvalidStrategyError(name, SEARCH_STRATEGIES);
}

/**
 * Get the ordering policy for a strategy name or alias
 *
 * @throws InvalidStrategyError if the name is unknown
 */
export function getOrderingPolicy(name: string): OrderingPolicy {
  return ORDERING_POLICIES[resolveStrategy(name)];
}

/**
 * Ascending comparator over a policy's key
 *
 * Infinite keys compare as ordinary values.
 */
export function compareNodes(
  policy: OrderingPolicy,
): (a: SearchNode<unknown>, b: SearchNode<unknown>) => number {
  return (a, b) => {
    const ka = policy.key(a);
    const kb = policy.key(b);
    if (ka < kb) return -1;
    if (ka > kb) return 1;
    return 0;
  };
}

/**
 * Sort nodes by a policy's key without mutating the input (stable)
 */
export function sortByKey<N extends SearchNode<unknown>>(
  nodes: readonly N[],
  policy: OrderingPolicy,
): N[] {
  return [...nodes].sort(compareNodes(policy));
}
