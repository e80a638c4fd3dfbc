/**
 * Node Store
 *
 * Arena of search nodes owned by a single search. Nodes reference their
 * parent by id; the children index is derived bookkeeping kept for
 * visualisation and can be switched off.
 */

import type { NodeId, SearchNode } from './search-node.js';

/**
 * Options for a node store
 */
export interface NodeStoreOptions {
  /** Maintain the parent → children index (default: true) */
  trackChildren?: boolean;
}

/**
 * Node arena with a per-store id counter
 */
export class NodeStore<S> {
  private readonly nodes = new Map<NodeId, SearchNode<S>>();
  private readonly children = new Map<NodeId, NodeId[]>();
  private readonly trackChildren: boolean;
  private lastId: NodeId = 0;

  constructor(options: NodeStoreOptions = {}) {
    this.trackChildren = options.trackChildren ?? true;
  }

  /**
   * Number of nodes created so far
   */
  get size(): number {
    return this.nodes.size;
  }

  /**
   * Create a root node
   *
   * @param initialCost - g-value of the root (normally 0)
   * @param h - Heuristic value, if the search uses one
   */
  createRoot(state: S, initialCost: number = 0, h?: number): SearchNode<S> {
    return this.insert({
      id: ++this.lastId,
      state,
      parentId: undefined,
      depth: 0,
      g: initialCost,
      h,
    });
  }

  /**
   * Create a child of an existing node
   *
   * The cost is accepted as given; callers own cost semantics.
   */
  createChild(parent: SearchNode<S>, state: S, transitionCost: number, h?: number): SearchNode<S> {
    const node = this.insert({
      id: ++this.lastId,
      state,
      parentId: parent.id,
      depth: parent.depth + 1,
      g: parent.g + transitionCost,
      h,
    });

    if (this.trackChildren) {
      const siblings = this.children.get(parent.id);
      if (siblings) {
        siblings.push(node.id);
      } else {
        this.children.set(parent.id, [node.id]);
      }
    }

    return node;
  }

  /**
   * Look up a node by id
   */
  get(id: NodeId): SearchNode<S> | undefined {
    return this.nodes.get(id);
  }

  /**
   * Parent of a node (undefined for the root)
   */
  parentOf(node: SearchNode<S>): SearchNode<S> | undefined {
    return node.parentId === undefined ? undefined : this.nodes.get(node.parentId);
  }

  /**
   * Children created from a node, in creation order
   */
  childrenOf(node: SearchNode<S>): SearchNode<S>[] {
    const ids = this.children.get(node.id) ?? [];
    const result: SearchNode<S>[] = [];
    for (const id of ids) {
      const child = this.nodes.get(id);
      if (child) result.push(child);
    }
    return result;
  }

  private insert(node: SearchNode<S>): SearchNode<S> {
    this.nodes.set(node.id, node);
    return node;
  }
}
