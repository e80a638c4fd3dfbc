/**
 * @gsearch/test-utils
 *
 * Shared problem builders, fixtures and assertions for gsearch tests
 */

// Fixture loading
export {
  graphFixtureSchema,
  type GraphFixture,
  getFixturePath,
  readGraphFixture,
  loadGraphFixture,
} from './fixtures/loader.js';

// Builders
export {
  GraphBuilder,
  graph,
  graphProblem,
  type WeightedGraph,
  type GraphProblemOptions,
} from './builders/graph-builder.js';

export {
  createGridProblem,
  cellKey,
  manhattan,
  type Cell,
  type GridProblem,
  type GridProblemOptions,
} from './builders/grid-builder.js';

export { randomGraph, lcg, type RandomGraphOptions } from './builders/random-graph.js';

// Mocks
export {
  createRecordingSink,
  createTrackingObserver,
  type RecordedEvent,
  type RecordingSink,
  type ObserverHook,
  type TrackingObserver,
} from './mocks/recording-sink.js';

// Assertions
export {
  pathCost,
  isValidPath,
  expectValidPath,
  shortestPathCost,
} from './assertions/path-assertions.js';
