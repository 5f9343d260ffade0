import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { debug, error, info, setLogLevel, Spinner, truncate, warn, withSpinner } from '../shared/ui/index.js';

describe('truncate', () => {
  it('should keep short text and cut long text with an ellipsis', () => {
    expect(truncate('short', 10)).toBe('short');
    expect(truncate('abcdefghijkl', 8)).toBe('abcde...');
  });
});

describe('log level filtering', () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    setLogLevel('info');
    logSpy.mockRestore();
  });

  it('should drop messages below the current level', () => {
    setLogLevel('warn');

    debug('d');
    info('i');
    warn('w');
    error('e');

    const lines = logSpy.mock.calls.map(([line]) => String(line));
    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain('[WARN] w');
    expect(lines[1]).toContain('[ERROR] e');
  });

  it('should show debug output at the debug level', () => {
    setLogLevel('debug');

    debug('details');

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(String(logSpy.mock.calls[0]?.[0])).toContain('[DEBUG] details');
  });
});

describe('withSpinner', () => {
  let stopSpy: MockInstance<Spinner['stop']>;

  beforeEach(() => {
    stopSpy = vi.spyOn(Spinner.prototype, 'stop');
  });

  afterEach(() => {
    stopSpy.mockRestore();
  });

  it('should return the task result and stop the spinner', async () => {
    await expect(withSpinner('Writing...', async () => 'post')).resolves.toBe('post');
    expect(stopSpy).toHaveBeenCalledTimes(1);
  });

  it('should stop the spinner when the task throws', async () => {
    await expect(withSpinner('Writing...', async () => {
      throw new Error('rate limited');
    })).rejects.toThrow('rate limited');
    expect(stopSpy).toHaveBeenCalledTimes(1);
  });
});
