/**
 * Error classes for search operations
 */

/**
 * Base error class for search errors
 */
export class SearchError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
  ) {
    super(message);
    this.name = 'SearchError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SearchError);
    }
  }
}

/**
 * Error thrown when a strategy name is not recognised
 */
export class InvalidStrategyError extends SearchError {
  constructor(
    public readonly strategy: string,
    known: readonly string[],
  ) {
    super(
      `Unknown search strategy '${strategy}' (expected one of: ${known.join(', ')})`,
      'INVALID_STRATEGY',
    );
    this.name = 'InvalidStrategyError';
  }
}

/**
 * Error thrown when a strategy orders by heuristic value but none was supplied
 */
export class MissingHeuristicError extends SearchError {
  constructor(public readonly strategy: string) {
    super(`Strategy '${strategy}' requires a heuristic function`, 'MISSING_HEURISTIC');
    this.name = 'MissingHeuristicError';
  }
}

/**
 * Configuration validation error
 */
export class SearchConfigError extends SearchError {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Search configuration is invalid:\n${errorMessages}`, 'INVALID_CONFIG');
    this.name = 'SearchConfigError';
  }

  /**
   * Format error for display
   */
  format(): string {
    return [
      'Search configuration is invalid:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
    ].join('\n');
  }
}
