/**
 * Interactive step gate
 *
 * Pauses a search between iterations until the user presses Enter.
 */

import * as readline from 'node:readline';

/** Prompt written before waiting for input */
export const DEFAULT_PROMPT = 'continue > ';

/**
 * Options for a prompt gate
 */
export interface PromptGateOptions {
  /** Stream to read lines from (default: process.stdin) */
  input?: NodeJS.ReadableStream;
  /** Stream the prompt is written to (default: process.stdout) */
  output?: NodeJS.WritableStream;
  /** Prompt text (default: 'continue > ') */
  prompt?: string;
}

/**
 * Step gate bound to a readline interface
 */
export interface PromptGate {
  /** Pass this as the search's step gate */
  gate: (iteration: number) => Promise<void>;
  /** Release the readline interface */
  close(): void;
}

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Create a step gate that prompts and waits for a line of input
 *
 * Each line releases one pause, including lines that arrive before the
 * pause. Once the input ends, the gate stops pausing. A read error rejects
 * the waiting pause and every later one.
 */
export function createPromptGate(options: PromptGateOptions = {}): PromptGate {
  const prompt = options.prompt ?? DEFAULT_PROMPT;
  const output = options.output ?? process.stdout;
  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    terminal: false,
  });

  let closed = false;
  let failure: Error | undefined;
  let buffered = 0;
  let waiter: Waiter | undefined;

  rl.on('line', () => {
    if (waiter) {
      const { resolve } = waiter;
      waiter = undefined;
      resolve();
    } else {
      buffered++;
    }
  });

  rl.on('close', () => {
    closed = true;
    const pending = waiter;
    waiter = undefined;
    pending?.resolve();
  });

  rl.on('error', (err: Error) => {
    failure = new Error(`Failed to read step input: ${err.message}`, { cause: err });
    const pending = waiter;
    waiter = undefined;
    pending?.reject(failure);
    rl.close();
  });

  const gate = (): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      if (failure) {
        reject(failure);
        return;
      }
      if (closed) {
        resolve();
        return;
      }
      output.write(prompt);
      if (buffered > 0) {
        buffered--;
        resolve();
        return;
      }
      waiter = { resolve, reject };
    });

  return {
    gate,
    close: () => {
      if (!closed) rl.close();
    },
  };
}
