import { describe, it, expect, afterEach } from 'vitest';
import { existsSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  createLogger,
  getDebugLogFile,
  initDebugLogger,
  isDebugEnabled,
  resetDebugLogger,
} from '../shared/utils/index.js';

const testDir = join(tmpdir(), `labgraph-debug-test-${Date.now()}`);

describe('debug logger', () => {
  afterEach(() => {
    resetDebugLogger();
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true });
    }
  });

  it('should stay off without a debug config', () => {
    initDebugLogger(undefined, testDir);

    expect(isDebugEnabled()).toBe(false);
    expect(getDebugLogFile()).toBeNull();
    createLogger('quiet').info('nothing written');
    expect(existsSync(testDir)).toBe(false);
  });

  it('should append module-tagged records to the configured file', () => {
    const logFile = join(testDir, 'nested', 'debug.log');
    initDebugLogger({ enabled: true, logFile }, testDir);

    createLogger('engine').warn('Loop detected', { step: 'generate' });

    const lines = readFileSync(logFile, 'utf-8').trimEnd().split('\n');
    expect(lines[0]).toMatch(/^=== labgraph debug log started /);
    expect(lines[1]).toMatch(/ \[WARN\] \[engine\] Loop detected \{"step":"generate"\}$/);
  });

  it('should default the log file under the working directory', () => {
    initDebugLogger({ enabled: true }, testDir);

    expect(isDebugEnabled()).toBe(true);
    expect(getDebugLogFile()).toMatch(/\.labgraph\/logs\/debug-\d{8}-\d{6}\.log$/);
  });
});
