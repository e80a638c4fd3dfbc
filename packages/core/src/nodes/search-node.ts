/**
 * Search Node
 *
 * One point in the search tree. Nodes are created only by a NodeStore,
 * which derives depth and accumulated cost from the parent.
 */

/**
 * Unique node identifier, increasing with creation order
 */
export type NodeId = number;

/**
 * A node in the search tree
 */
export interface SearchNode<S> {
  /** Creation-ordered identifier, never reused within a store */
  readonly id: NodeId;

  /** State this node represents */
  readonly state: S;

  /** Parent node id (undefined for the root) */
  readonly parentId: NodeId | undefined;

  /** Depth in the search tree (0 = root) */
  readonly depth: number;

  /** Accumulated path cost from the root */
  readonly g: number;

  /** Heuristic value, absent when the search runs without a heuristic */
  readonly h: number | undefined;
}

/**
 * Estimated total cost through a node (g + h)
 *
 * A node without a heuristic value counts as h = 0.
 */
export function nodeF(node: SearchNode<unknown>): number {
  return node.g + (node.h ?? 0);
}

/**
 * Check if a node is the root of its tree
 */
export function isRootNode(node: SearchNode<unknown>): boolean {
  return node.parentId === undefined;
}
