/**
 * Node Module
 *
 * Search tree nodes and the arena that allocates them.
 */

export { type NodeId, type SearchNode, nodeF, isRootNode } from './search-node.js';

export { type NodeStoreOptions, NodeStore } from './node-store.js';
