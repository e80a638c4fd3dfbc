/**
 * Search events
 *
 * Side channel for reporting and visualisation. The search loop works the
 * same with or without any of these collaborators attached.
 */

import type { SearchNode } from './nodes/search-node.js';
import type { NodeStore } from './nodes/node-store.js';
import type { OrderingPolicy } from './ordering/strategies.js';
import type { StoppingReason } from './search/stopping-conditions.js';

/**
 * Kind of edges being reported
 */
export type EdgeStatus =
  | 'expand' // Node popped from the frontier
  | 'add' // New nodes that survived pruning
  | 'discard' // New nodes dominated on creation
  | 'frontier_prune' // Frontier nodes evicted by a better new node
  | 'explored_prune' // Explored nodes evicted by a better new node
  | 'solution'; // Edges of the solution path

/**
 * Edge from a parent state to a child state
 */
export type Edge<S> = readonly [parent: S, child: S];

/**
 * Receives batches of edges as the search progresses
 */
export type EventSink<S> = (edges: Edge<S>[], status: EdgeStatus) => void;

/**
 * Counters describing a search run
 */
export interface SearchStats {
  /** Iterations performed (nodes popped) */
  iterations: number;

  /** Nodes created, root included */
  generated: number;

  /** Nodes discarded or evicted by dominance pruning */
  pruned: number;

  /** Size of the explored set */
  explored: number;

  /** Size of the frontier */
  frontier: number;
}

/**
 * Outcome of one expansion
 */
export interface ExpansionReport<S> {
  /** New nodes that survived pruning, in creation order */
  added: SearchNode<S>[];

  /** New nodes discarded as dominated */
  discarded: SearchNode<S>[];

  /** Frontier nodes evicted */
  frontierPruned: SearchNode<S>[];

  /** Explored nodes evicted */
  exploredPruned: SearchNode<S>[];

  /** Frontier after the expansion, in key order */
  frontier: SearchNode<S>[];
}

/**
 * Lifecycle hooks for reporters
 */
export interface SearchObserver<S> {
  /** Called once after the root node is created */
  onStart?(policy: OrderingPolicy, root: SearchNode<S>): void;

  /** Called when a node is popped from the frontier */
  onExpand?(iteration: number, node: SearchNode<S>): void;

  /** Called after a popped non-goal node has been expanded */
  onExpansion?(iteration: number, report: ExpansionReport<S>): void;

  /** Called when a goal node is popped */
  onSolution?(path: SearchNode<S>[], stats: SearchStats): void;

  /** Called when the search stops without a solution */
  onFailure?(reason: StoppingReason, stats: SearchStats): void;
}

/**
 * Edges from each node's parent to the node; parentless nodes are skipped
 */
export function nodesToEdges<S>(store: NodeStore<S>, nodes: readonly SearchNode<S>[]): Edge<S>[] {
  const edges: Edge<S>[] = [];
  for (const node of nodes) {
    const parent = store.parentOf(node);
    if (parent) edges.push([parent.state, node.state]);
  }
  return edges;
}
