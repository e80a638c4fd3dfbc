/**
 * Deterministic random graphs for property tests
 */

import { GraphBuilder, type WeightedGraph } from './graph-builder.js';

/**
 * Deterministic 32-bit LCG yielding values in [0, 1)
 */
export function* lcg(seed: number): Generator<number, never, void> {
  let s = seed >>> 0 || 1;
  for (;;) {
    s = (1664525 * s + 1013904223) >>> 0;
    yield s / 2 ** 32;
  }
}

/**
 * Options for random graphs
 */
export interface RandomGraphOptions {
  /** Number of states, named n0..n{N-1} (default: 12) */
  nodes?: number;

  /** Probability of each directed edge (default: 0.25) */
  density?: number;

  /** Largest integer edge cost (default: 9) */
  maxCost?: number;

  /** Only add edges from lower to higher numbered states (default: false) */
  acyclic?: boolean;
}

/**
 * Random directed graph with positive integer costs
 *
 * Start is `n0`, goal is the last state. The heuristic is zero everywhere
 * so every strategy can run on it.
 */
export function randomGraph(seed: number, options: RandomGraphOptions = {}): WeightedGraph {
  const { nodes = 12, density = 0.25, maxCost = 9, acyclic = false } = options;
  const rng = lcg(seed);
  const next = (): number => rng.next().value;

  const names = Array.from({ length: nodes }, (_, i) => `n${i}`);
  const builder = new GraphBuilder().from('n0').goal(`n${nodes - 1}`);

  names.forEach((from, i) => {
    names.forEach((to, j) => {
      if (i === j || (acyclic && j < i)) return;
      if (next() < density) {
        builder.edge(from, to, 1 + Math.floor(next() * maxCost));
      }
    });
  });

  builder.heuristic(Object.fromEntries(names.map((name) => [name, 0])));
  return builder.build();
}
