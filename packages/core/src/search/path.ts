/**
 * Solution path helpers
 */

import type { NodeStore } from '../nodes/node-store.js';
import type { SearchNode } from '../nodes/search-node.js';

/**
 * Nodes from the root down to the given node, found by walking parent links
 */
export function reconstructPath<S>(store: NodeStore<S>, node: SearchNode<S>): SearchNode<S>[] {
  const path: SearchNode<S>[] = [node];
  let current = store.parentOf(node);
  while (current) {
    path.push(current);
    current = store.parentOf(current);
  }
  return path.reverse();
}

/**
 * States along a node path
 */
export function pathStates<S>(nodes: readonly SearchNode<S>[]): S[] {
  return nodes.map((node) => node.state);
}
