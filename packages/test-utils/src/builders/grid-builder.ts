/**
 * Grid problems
 *
 * 4-connected grids parsed from ASCII rows. `#` is a wall, `S` the start,
 * `G` a goal, anything else is open floor. States are `{ r, c }` objects,
 * so the problem carries a state key.
 */

import type { SearchProblem, Successor } from '@gsearch/core';

/**
 * Grid cell
 */
export interface Cell {
  r: number;
  c: number;
}

/**
 * Options for grid problems
 */
export interface GridProblemOptions {
  /** Cost of every move (default: 1) */
  stepCost?: number;

  /** Attach the Manhattan heuristic (default: true) */
  withHeuristic?: boolean;
}

/**
 * Parsed grid with its search problem
 */
export interface GridProblem {
  rows: number;
  cols: number;
  start: Cell;
  goals: Cell[];
  problem: SearchProblem<Cell>;
  isWall(cell: Cell): boolean;
}

const DELTAS: ReadonlyArray<readonly [number, number]> = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1],
];

/**
 * String key for a cell
 */
export function cellKey(cell: Cell): string {
  return `${cell.r},${cell.c}`;
}

/**
 * Manhattan distance between two cells
 */
export function manhattan(a: Cell, b: Cell): number {
  return Math.abs(a.r - b.r) + Math.abs(a.c - b.c);
}

/**
 * Parse an ASCII grid into a search problem
 *
 * @throws Error if the grid has no start cell
 */
export function createGridProblem(
  layout: readonly string[],
  options: GridProblemOptions = {},
): GridProblem {
  const { stepCost = 1, withHeuristic = true } = options;

  const rows = layout.length;
  const cols = Math.max(0, ...layout.map((row) => row.length));
  const walls = new Set<string>();
  const goals: Cell[] = [];
  let start: Cell | undefined;

  for (let r = 0; r < rows; r++) {
    const row = layout[r] ?? '';
    for (let c = 0; c < row.length; c++) {
      const ch = row[c];
      if (ch === '#') walls.add(cellKey({ r, c }));
      if (ch === 'S') start = { r, c };
      if (ch === 'G') goals.push({ r, c });
    }
  }

  if (!start) {
    throw new Error('createGridProblem: grid has no start cell (S)');
  }

  const goalKeys = new Set(goals.map(cellKey));
  const isWall = (cell: Cell): boolean => walls.has(cellKey(cell));

  const problem: SearchProblem<Cell> = {
    initialState: start,
    nextStates: (cell) => {
      const out: Successor<Cell>[] = [];
      for (const [dr, dc] of DELTAS) {
        const next = { r: cell.r + dr, c: cell.c + dc };
        if (next.r < 0 || next.r >= rows || next.c < 0 || next.c >= cols) continue;
        if (isWall(next)) continue;
        out.push([next, stepCost]);
      }
      return out;
    },
    goalTest: (cell) => goalKeys.has(cellKey(cell)),
    stateKey: cellKey,
  };

  if (withHeuristic) {
    // Admissible only while stepCost >= 1
    problem.heuristic = (cell) =>
      goals.length === 0 ? 0 : Math.min(...goals.map((goal) => manhattan(cell, goal)));
  }

  return { rows, cols, start, goals, problem, isWall };
}
