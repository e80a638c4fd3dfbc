import { PassThrough } from 'node:stream';

import { describe, it, expect } from 'vitest';

import { createPromptGate } from '../step-gate.js';

function streams(): { input: PassThrough; output: PassThrough; written: () => string } {
  const input = new PassThrough();
  const output = new PassThrough();
  let text = '';
  output.on('data', (chunk: Buffer) => {
    text += chunk.toString();
  });
  return { input, output, written: () => text };
}

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('createPromptGate', () => {
  it('should prompt and wait for a line of input', async () => {
    const { input, output, written } = streams();
    const prompt = createPromptGate({ input, output });

    let released = false;
    const waiting = prompt.gate(1);
    void waiting.then(() => {
      released = true;
    });
    await tick();
    expect(released).toBe(false);

    input.write('\n');
    await waiting;
    await tick();

    expect(released).toBe(true);
    expect(written()).toBe('continue > ');
    prompt.close();
  });

  it('should use a custom prompt', async () => {
    const { input, output, written } = streams();
    const prompt = createPromptGate({ input, output, prompt: 'next? ' });

    const waiting = prompt.gate(1);
    input.write('y\n');
    await waiting;
    await tick();

    expect(written()).toBe('next? ');
    prompt.close();
  });

  it('should release a waiting gate when closed', async () => {
    const { input, output } = streams();
    const prompt = createPromptGate({ input, output });

    const waiting = prompt.gate(1);
    prompt.close();

    await expect(waiting).resolves.toBeUndefined();
  });

  it('should count lines that arrive before the pause', async () => {
    const { input, output, written } = streams();
    const prompt = createPromptGate({ input, output });

    input.write('\n\n');
    await tick();

    await expect(prompt.gate(1)).resolves.toBeUndefined();
    await expect(prompt.gate(2)).resolves.toBeUndefined();

    let released = false;
    void prompt.gate(3).then(() => {
      released = true;
    });
    await tick();
    expect(released).toBe(false);
    expect(written()).toBe('continue > continue > continue > ');
    prompt.close();
  });

  it('should reject the waiting pause when the input fails', async () => {
    const { input, output } = streams();
    const prompt = createPromptGate({ input, output });

    const waiting = prompt.gate(1);
    input.emit('error', new Error('EIO'));

    await expect(waiting).rejects.toThrow('Failed to read step input: EIO');
    await expect(prompt.gate(2)).rejects.toThrow('Failed to read step input: EIO');
    prompt.close();
  });

  it('should stop pausing after it is closed', async () => {
    const { input, output, written } = streams();
    const prompt = createPromptGate({ input, output });
    prompt.close();

    await expect(prompt.gate(2)).resolves.toBeUndefined();
    await tick();
    expect(written()).toBe('');
  });
});
