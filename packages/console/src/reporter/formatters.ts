/**
 * Output formatting utilities
 */

import {
  describeStoppingReason,
  nodeF,
  sortByKey,
  type OrderingPolicy,
  type SearchNode,
  type SearchStats,
  type SearchStrategy,
  type StoppingReason,
} from '@gsearch/core';

import type { StateFormatter } from './types.js';

/** Entries shown in a compact node list */
export const COMPACT_LIST_LIMIT = 5;

/** Entries shown in a detailed node list */
export const DETAILED_LIST_LIMIT = 10;

/** Indent of detailed list entries */
const DETAIL_INDENT = ' '.repeat(11);

/**
 * Default state renderer
 */
export function formatState(state: unknown): string {
  if (typeof state === 'string') return state;
  return JSON.stringify(state) ?? String(state);
}

/**
 * Format a number with two decimals
 */
export function formatNumber(value: number): string {
  return value.toFixed(2);
}

/**
 * One-line description of a node, with fields ordered for the strategy
 */
export function formatNodeInfo<S>(
  node: SearchNode<S>,
  strategy: SearchStrategy,
  renderState: StateFormatter<S>,
): string {
  const d = `d ${node.depth}`;
  const g = `g ${formatNumber(node.g)}`;
  const h = `h ${formatNumber(node.h ?? 0)}`;
  const state = `state ${renderState(node.state)}`;

  switch (strategy) {
    case 'best-first':
    case 'depth-first':
      return `#${node.id}: ${d}, ${g}, ${state}`;
    case 'uniform-cost':
      return `#${node.id}: ${g}, ${d}, ${state}`;
    case 'greedy-best-first':
      return `#${node.id}: ${h}, ${d}, ${g}, ${state}`;
    case 'a-star':
      return `#${node.id}: f ${formatNumber(nodeF(node))}, ${g}, ${h}, ${d}, ${state}`;
  }
}

/**
 * Run header line
 */
export function formatHeader(policy: OrderingPolicy): string {
  return `==> ${policy.strategy} search, keep frontier ordered by ${policy.keyName}:`;
}

/**
 * Line announcing the node popped in an iteration
 */
export function formatExpandLine(iteration: number, info: string): string {
  return `${String(iteration).padStart(3)} Expand ${info}`;
}

/**
 * Single line listing up to five nodes by id and key
 */
export function formatCompactList<S>(
  label: string,
  nodes: readonly SearchNode<S>[],
  policy: OrderingPolicy,
): string {
  const sorted = sortByKey(nodes, policy);
  const names = sorted
    .slice(0, COMPACT_LIST_LIMIT)
    .map((node) => `#${node.id} ${formatNumber(policy.key(node))}`);
  const more = sorted.length > COMPACT_LIST_LIMIT ? ', ...' : '';

  return `${label.padStart(11)}${String(sorted.length).padStart(4)}: ${names.join(', ')}${more}`;
}

/**
 * Count line followed by up to ten node-info lines
 */
export function formatDetailedList<S>(
  label: string,
  nodes: readonly SearchNode<S>[],
  policy: OrderingPolicy,
  renderState: StateFormatter<S>,
): string[] {
  const sorted = sortByKey(nodes, policy);
  const count = sorted.length;
  const noun = count === 0 ? 'nodes.' : count === 1 ? 'node:' : 'nodes:';

  const lines = [`    ${label.padStart(10)} ${count} ${noun}`];
  for (const node of sorted.slice(0, DETAILED_LIST_LIMIT)) {
    lines.push(DETAIL_INDENT + formatNodeInfo(node, policy.strategy, renderState));
  }
  if (count > DETAILED_LIST_LIMIT) {
    lines.push(`${DETAIL_INDENT} and ${count - DETAILED_LIST_LIMIT} more ...`);
  }
  return lines;
}

function formatCounters(stats: SearchStats): string {
  return (
    `Generated ${stats.generated}, pruned ${stats.pruned}, ` +
    `explored ${stats.explored}, frontier ${stats.frontier}.`
  );
}

/**
 * End-of-run line for a found path
 *
 * Path length counts actions, one less than the number of states.
 */
export function formatSolutionLine(pathLength: number, cost: number, stats: SearchStats): string {
  return `==> Path length ${pathLength - 1}, cost ${cost}. ${formatCounters(stats)}`;
}

/**
 * End-of-run line when no path was found
 */
export function formatFailureLine(reason: StoppingReason, stats: SearchStats): string {
  const why = describeStoppingReason(reason);
  return `==> Couldn't find a solution (${why}). ${formatCounters(stats)}`;
}
