/**
 * @gsearch/core - Best-first graph search
 *
 * This package contains the search engine:
 * - Node store (search tree arena)
 * - Ordering policies for the five strategies
 * - Dominance pruning between nodes for the same state
 * - The search loop and its result types
 */

export const VERSION = '0.1.0';

// Problem types
export type {
  Successor,
  NextStatesFn,
  GoalTest,
  HeuristicFn,
  StateKeyFn,
  SearchProblem,
} from './types.js';

// Errors
export {
  SearchError,
  InvalidStrategyError,
  MissingHeuristicError,
  SearchConfigError,
} from './errors.js';

// Nodes
export * from './nodes/index.js';

// Ordering
export {
  type SearchStrategy,
  type KeyName,
  type KeyFn,
  type OrderingPolicy,
  SEARCH_STRATEGIES,
  STRATEGY_ALIASES,
  ORDERING_POLICIES,
  isSearchStrategy,
  resolveStrategy,
  getOrderingPolicy,
  compareNodes,
  sortByKey,
} from './ordering/strategies.js';

// Dominance pruning
export { type ExpansionContext, type ExpansionResult, expandNode } from './dominance/expand.js';

// Events
export {
  type EdgeStatus,
  type Edge,
  type EventSink,
  type SearchStats,
  type ExpansionReport,
  type SearchObserver,
  nodesToEdges,
} from './events.js';

// Configuration
export { type SearchSettings, DEFAULT_SEARCH_SETTINGS } from './config/defaults.js';
export {
  searchProblemSchema,
  searchOptionsSchema,
  toConfigError,
  validateSearchProblem,
  resolveSearchSettings,
} from './config/validation.js';

// Search
export * from './search/index.js';
