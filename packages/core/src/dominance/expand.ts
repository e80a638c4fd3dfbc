/**
 * Dominance/Pruning Engine
 *
 * Expands a node and reconciles the new nodes with the frontier and the
 * explored set so that each state keeps only its best-known node(s).
 *
 * Pruning rules for a policy key k:
 * - a new node m is discarded if an explored or frontier node n for the same
 *   state has k(n) <= k(m), or a sibling new node n has k(n) < k(m), or the
 *   same key and a smaller id
 * - a frontier or explored node is evicted only by a surviving new node with
 *   a strictly smaller key
 */

import type { ExpansionReport } from '../events.js';
import type { NodeStore } from '../nodes/node-store.js';
import type { SearchNode } from '../nodes/search-node.js';
import { sortByKey, type OrderingPolicy } from '../ordering/strategies.js';
import type { HeuristicFn, StateKeyFn, Successor } from '../types.js';

/**
 * Collaborators needed to expand nodes
 */
export interface ExpansionContext<S> {
  store: NodeStore<S>;
  policy: OrderingPolicy;
  heuristic: HeuristicFn<S> | undefined;
  stateKey: StateKeyFn<S>;
}

/**
 * Result of expanding a node
 */
export interface ExpansionResult<S> extends ExpansionReport<S> {
  /** Explored set after pruning */
  explored: SearchNode<S>[];
}

/**
 * Group nodes by state key, preserving order within each group
 */
function groupByState<S>(
  nodes: readonly SearchNode<S>[],
  stateKey: StateKeyFn<S>,
): Map<unknown, SearchNode<S>[]> {
  const groups = new Map<unknown, SearchNode<S>[]>();
  for (const node of nodes) {
    const key = stateKey(node.state);
    const group = groups.get(key);
    if (group) {
      group.push(node);
    } else {
      groups.set(key, [node]);
    }
  }
  return groups;
}

/**
 * Expand a node with its successors
 *
 * The frontier and explored arrays are not modified; updated copies are
 * returned.
 *
 * @param node - Node being expanded (already removed from the frontier)
 * @param successors - Successor states with transition costs
 */
export function expandNode<S>(
  context: ExpansionContext<S>,
  node: SearchNode<S>,
  successors: Iterable<Successor<S>>,
  frontier: readonly SearchNode<S>[],
  explored: readonly SearchNode<S>[],
): ExpansionResult<S> {
  const { store, policy, heuristic, stateKey } = context;
  const key = policy.key;

  const created: SearchNode<S>[] = [];
  for (const [state, cost] of successors) {
    const h = heuristic ? heuristic(state) : undefined;
    created.push(store.createChild(node, state, cost, h));
  }

  const exploredByState = groupByState(explored, stateKey);
  const frontierByState = groupByState(frontier, stateKey);
  const createdByState = groupByState(created, stateKey);

  const isDominatedOnCreation = (m: SearchNode<S>): boolean => {
    const stateId = stateKey(m.state);
    const km = key(m);

    if (exploredByState.get(stateId)?.some((n) => km >= key(n))) return true;
    if (frontierByState.get(stateId)?.some((n) => km >= key(n))) return true;

    return (
      createdByState.get(stateId)?.some((n) => {
        const kn = key(n);
        return km > kn || (km === kn && m.id > n.id);
      }) ?? false
    );
  };

  const added: SearchNode<S>[] = [];
  const discarded: SearchNode<S>[] = [];
  for (const m of created) {
    if (isDominatedOnCreation(m)) {
      discarded.push(m);
    } else {
      added.push(m);
    }
  }

  const addedByState = groupByState(added, stateKey);
  const isEvicted = (m: SearchNode<S>): boolean => {
    const km = key(m);
    return addedByState.get(stateKey(m.state))?.some((n) => km > key(n)) ?? false;
  };

  const frontierPruned: SearchNode<S>[] = [];
  const keptFrontier: SearchNode<S>[] = [];
  for (const m of frontier) {
    (isEvicted(m) ? frontierPruned : keptFrontier).push(m);
  }

  const exploredPruned: SearchNode<S>[] = [];
  const keptExplored: SearchNode<S>[] = [];
  for (const m of explored) {
    (isEvicted(m) ? exploredPruned : keptExplored).push(m);
  }

  return {
    added,
    discarded,
    frontier: sortByKey([...keptFrontier, ...added], policy),
    frontierPruned,
    explored: keptExplored,
    exploredPruned,
  };
}
