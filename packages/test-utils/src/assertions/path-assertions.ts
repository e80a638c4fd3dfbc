/**
 * Path assertions and a reference shortest-path oracle
 */

import type { SearchResult } from '@gsearch/core';
import { expect } from 'vitest';

import type { WeightedGraph } from '../builders/graph-builder.js';

/**
 * Sum of edge costs along a path, or undefined if some step is not an edge
 */
export function pathCost(graph: WeightedGraph, path: readonly string[]): number | undefined {
  let total = 0;
  for (let i = 1; i < path.length; i++) {
    const from = path[i - 1];
    const to = path[i];
    if (from === undefined || to === undefined) return undefined;
    const cost = graph.edgeCost(from, to);
    if (cost === undefined) return undefined;
    total += cost;
  }
  return total;
}

/**
 * Whether a path starts at the start state, follows edges and ends on a goal
 */
export function isValidPath(graph: WeightedGraph, path: readonly string[]): boolean {
  const last = path[path.length - 1];
  return (
    path[0] === graph.start &&
    last !== undefined &&
    graph.goals.has(last) &&
    pathCost(graph, path) !== undefined
  );
}

/**
 * Assert that a search found a valid path through the graph
 *
 * @returns The path's cost
 */
export function expectValidPath(graph: WeightedGraph, result: SearchResult<string>): number {
  expect(result.found, 'Expected the search to find a path').toBe(true);
  if (!result.found) return Number.NaN;

  expect(
    isValidPath(graph, result.path),
    `Path ${result.path.join(' -> ')} should follow edges from the start state to a goal`,
  ).toBe(true);
  return pathCost(graph, result.path) ?? Number.NaN;
}

/**
 * Cheapest cost from the start state to any goal (Dijkstra), or undefined
 * when no goal is reachable
 */
export function shortestPathCost(graph: WeightedGraph): number | undefined {
  const dist = new Map<string, number>([[graph.start, 0]]);
  const done = new Set<string>();

  for (;;) {
    let current: string | undefined;
    let best = Infinity;
    for (const [state, d] of dist) {
      if (!done.has(state) && d < best) {
        best = d;
        current = state;
      }
    }
    if (current === undefined) return undefined;
    if (graph.goals.has(current)) return best;
    done.add(current);

    for (const [next, cost] of graph.successors(current)) {
      const candidate = best + cost;
      const known = dist.get(next);
      if (known === undefined || candidate < known) {
        dist.set(next, candidate);
      }
    }
  }
}
