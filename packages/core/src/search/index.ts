/**
 * Search Module
 *
 * The search loop, its stopping conditions and path reconstruction.
 */

// Stopping Conditions
export {
  type StoppingReason,
  type StoppingConfig,
  type StoppingResult,
  type LoopState,
  shouldStop,
  describeStoppingReason,
} from './stopping-conditions.js';

// Paths
export { reconstructPath, pathStates } from './path.js';

// Graph Search
export {
  type SearchStatus,
  type StepGate,
  type AsyncStepGate,
  type SearchOptions,
  type SyncSearchOptions,
  type AsyncSearchOptions,
  type SearchSuccess,
  type SearchFailure,
  type SearchResult,
  GraphSearch,
  search,
  searchAsync,
} from './graph-search.js';
