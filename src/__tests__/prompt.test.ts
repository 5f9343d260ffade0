import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { isExitCommand, runInteractiveLoop } from '../shared/prompt/index.js';

function scriptedReader(lines: (string | null)[]): (prompt: string) => Promise<string | null> {
  const queue = [...lines];
  return async () => (queue.length > 0 ? queue.shift() ?? null : null);
}

describe('isExitCommand', () => {
  it('should match exit tokens case-insensitively', () => {
    expect(isExitCommand(' QUIT ')).toBe(true);
    expect(isExitCommand('Bye')).toBe(true);
    expect(isExitCommand('q')).toBe(true);
    expect(isExitCommand('quite')).toBe(false);
  });
});

describe('runInteractiveLoop', () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('should hand trimmed lines to the handler until an exit token', async () => {
    const inputs: string[] = [];

    const handled = await runInteractiveLoop({
      prompt: 'You: ',
      read: scriptedReader(['  hello ', 'second', 'exit', 'never read']),
      onInput: async (input) => {
        inputs.push(input);
      },
    });

    expect(handled).toBe(2);
    expect(inputs).toEqual(['hello', 'second']);
  });

  it('should skip blank lines and stop at end of input', async () => {
    const inputs: string[] = [];

    const handled = await runInteractiveLoop({
      prompt: 'You: ',
      read: scriptedReader(['', '   ', 'one', null]),
      onInput: async (input) => {
        inputs.push(input);
      },
    });

    expect(handled).toBe(1);
    expect(inputs).toEqual(['one']);
  });

  it('should keep reading after a handler failure', async () => {
    const inputs: string[] = [];

    const handled = await runInteractiveLoop({
      prompt: 'You: ',
      read: scriptedReader(['fail', 'ok', 'q']),
      onInput: async (input) => {
        if (input === 'fail') throw new Error('handler broke');
        inputs.push(input);
      },
    });

    expect(handled).toBe(1);
    expect(inputs).toEqual(['ok']);
    expect(logSpy.mock.calls.some(([line]) => String(line).includes('[ERROR] handler broke'))).toBe(true);
  });
});
