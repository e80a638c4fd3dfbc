/**
 * Shared types for console reporter components
 */

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  green: ColorFn;
  red: ColorFn;
  cyan: ColorFn;
}

/**
 * Receives one line of output, without its trailing newline
 */
export type LineWriter = (line: string) => void;

/**
 * Renders a state for display
 */
export type StateFormatter<S> = (state: S) => string;

/**
 * Amount of console output
 *
 * - 0: silent
 * - 1: end-of-run summary
 * - 2: one line per expansion and compact node lists
 * - 3: detailed node lists
 * - 4: detailed lists, pausing after each iteration
 */
export type Verbosity = 0 | 1 | 2 | 3 | 4;

/**
 * Console reporter options
 */
export interface ConsoleReporterOptions<S> {
  /** Amount of output (default: 1) */
  verbosity?: number;
  /** Enable colored output (default: true) */
  color?: boolean;
  /** Line sink (default: console.log) */
  write?: LineWriter;
  /** State renderer (default: strings as-is, other values as JSON) */
  formatState?: StateFormatter<S>;
}
