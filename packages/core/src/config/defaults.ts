/**
 * Default search configuration values
 */

/**
 * Scalar search settings after defaults are applied
 */
export interface SearchSettings {
  /** Maximum number of iterations (undefined = unbounded) */
  maxIterations: number | undefined;

  /** Maintain the parent → children index in the node store */
  trackChildren: boolean;
}

/**
 * Default search settings
 */
export const DEFAULT_SEARCH_SETTINGS: SearchSettings = {
  maxIterations: undefined,
  trackChildren: true,
};
