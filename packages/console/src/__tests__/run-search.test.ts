import { PassThrough } from 'node:stream';

import { SearchConfigError } from '@gsearch/core';
import { createRecordingSink, graphProblem, loadGraphFixture } from '@gsearch/test-utils';
import { describe, it, expect, vi } from 'vitest';

import { runSearch } from '../run-search.js';

describe('runSearch', () => {
  const diamond = loadGraphFixture('diamond');

  it('should search silently by default', async () => {
    const write = vi.fn();

    const result = await runSearch(graphProblem(diamond), { strategy: 'uc', write });

    expect(result.found && result.path).toEqual(['A', 'B', 'D']);
    expect(write).not.toHaveBeenCalled();
  });

  it('should attach a reporter from verbosity 1', async () => {
    const lines: string[] = [];

    await runSearch(graphProblem(diamond), {
      strategy: 'uniform-cost',
      verbosity: 1,
      color: false,
      write: (line) => lines.push(line),
    });

    expect(lines).toEqual([
      '==> Path length 2, cost 2. Generated 4, pruned 0, explored 3, frontier 1.',
    ]);
  });

  it('should pass the event sink and iteration limit through', async () => {
    const recorder = createRecordingSink<string>();

    const result = await runSearch(graphProblem(diamond), {
      strategy: 'uniform-cost',
      eventSink: recorder.sink,
      maxIterations: 1,
    });

    expect(result.found).toBe(false);
    expect(recorder.statuses()).toEqual([
      'expand',
      'discard',
      'add',
      'frontier_prune',
      'explored_prune',
    ]);
  });

  it('should stop when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await runSearch(graphProblem(diamond), {
      strategy: 'uniform-cost',
      signal: controller.signal,
    });

    expect(result.found || result.reason).toBe('cancelled');
  });

  it('should prompt after each iteration at verbosity 4', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    let prompts = 0;
    output.on('data', () => {
      prompts++;
      input.write('\n');
    });
    const lines: string[] = [];

    const result = await runSearch(graphProblem(diamond), {
      strategy: 'uniform-cost',
      verbosity: 4,
      color: false,
      write: (line) => lines.push(line),
      input,
      output,
    });

    expect(result.found).toBe(true);
    expect(prompts).toBe(2);
    expect(lines).toEqual([
      '==> uniform-cost search, keep frontier ordered by g:',
      '',
      '  1 Expand #1: g 0.00, d 0, state A',
      '           add 2 nodes:',
      '           #2: g 1.00, d 1, state B',
      '           #3: g 4.00, d 1, state C',
      '      frontier 2 nodes:',
      '           #2: g 1.00, d 1, state B',
      '           #3: g 4.00, d 1, state C',
      '  2 Expand #2: g 1.00, d 1, state B',
      '           add 1 node:',
      '           #4: g 2.00, d 2, state D',
      '      frontier 2 nodes:',
      '           #4: g 2.00, d 2, state D',
      '           #3: g 4.00, d 1, state C',
      '  3 Expand #4: g 2.00, d 2, state D',
      '==> Path length 2, cost 2. Generated 4, pruned 0, explored 3, frontier 1.',
    ]);
  });

  it('should use lines piped ahead of the prompts', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    input.write('\n\n');

    const result = await runSearch(graphProblem(diamond), {
      strategy: 'uniform-cost',
      verbosity: 4,
      color: false,
      write: () => undefined,
      input,
      output,
    });

    expect(result.found && result.path).toEqual(['A', 'B', 'D']);
  });

  it('should reject an out-of-range verbosity', async () => {
    await expect(
      runSearch(graphProblem(diamond), { strategy: 'uc', verbosity: 9 }),
    ).rejects.toBeInstanceOf(SearchConfigError);
  });
});
