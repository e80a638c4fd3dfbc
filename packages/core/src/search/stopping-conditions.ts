/**
 * Stopping Conditions
 *
 * Checked at the top of every search iteration. Reaching a goal is not a
 * stopping condition; it ends the search from inside the iteration.
 */

/**
 * Reason a search ended without a solution
 */
export type StoppingReason =
  | 'cancelled' // Abort signal fired
  | 'max_iterations_reached' // Iteration limit reached
  | 'frontier_exhausted'; // No nodes left to expand

/**
 * Configuration for stopping conditions
 */
export interface StoppingConfig {
  /** Maximum number of iterations (undefined = unbounded) */
  maxIterations: number | undefined;

  /** Cooperative cancellation */
  signal: AbortSignal | undefined;
}

/**
 * Loop state inspected by the stopping check
 */
export interface LoopState {
  /** Iterations completed so far */
  iterations: number;

  /** Current frontier size */
  frontierSize: number;
}

/**
 * Result of a stopping check
 */
export type StoppingResult =
  | { stop: false }
  | {
      stop: true;
      /** Reason for stopping */
      reason: StoppingReason;
      /** Human-readable explanation */
      explanation: string;
    };

/**
 * Check if the search should stop before the next iteration
 */
export function shouldStop(state: LoopState, config: StoppingConfig): StoppingResult {
  // Check cancellation first
  if (config.signal?.aborted) {
    return {
      stop: true,
      reason: 'cancelled',
      explanation: 'Search was cancelled',
    };
  }

  if (config.maxIterations !== undefined && state.iterations >= config.maxIterations) {
    return {
      stop: true,
      reason: 'max_iterations_reached',
      explanation: `Iteration limit of ${config.maxIterations} reached`,
    };
  }

  if (state.frontierSize === 0) {
    return {
      stop: true,
      reason: 'frontier_exhausted',
      explanation: 'No more nodes to expand',
    };
  }

  return { stop: false };
}

/**
 * Human-readable description of a stopping reason
 */
export function describeStoppingReason(reason: StoppingReason): string {
  switch (reason) {
    case 'cancelled':
      return 'cancelled';
    case 'max_iterations_reached':
      return 'iteration limit reached';
    case 'frontier_exhausted':
      return 'frontier exhausted';
  }
}
