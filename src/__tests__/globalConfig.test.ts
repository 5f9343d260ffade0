import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  ConfigError,
  getGlobalConfigPath,
  invalidateGlobalConfigCache,
  loadGlobalConfig,
  resolveAnthropicApiKey,
  saveGlobalConfig,
} from '../infra/config/global/index.js';
import { createGenerationClient } from '../infra/llm/index.js';
import { DEFAULT_MODEL } from '../shared/constants.js';

const testConfigDir = join(tmpdir(), `labgraph-config-test-${Date.now()}`);
const ENV_NAMES = ['LABGRAPH_CONFIG_DIR', 'LABGRAPH_ANTHROPIC_API_KEY', 'ANTHROPIC_API_KEY'] as const;
const savedEnv = new Map<string, string | undefined>();

function writeConfig(lines: string[]): void {
  writeFileSync(getGlobalConfigPath(), lines.join('\n'), 'utf-8');
}

describe('global config', () => {
  beforeEach(() => {
    for (const name of ENV_NAMES) {
      savedEnv.set(name, process.env[name]);
      delete process.env[name];
    }
    process.env.LABGRAPH_CONFIG_DIR = testConfigDir;
    mkdirSync(testConfigDir, { recursive: true });
    invalidateGlobalConfigCache();
  });

  afterEach(() => {
    for (const name of ENV_NAMES) {
      const value = savedEnv.get(name);
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
    if (existsSync(testConfigDir)) {
      rmSync(testConfigDir, { recursive: true });
    }
    invalidateGlobalConfigCache();
  });

  it('should place the config file under the override directory', () => {
    expect(getGlobalConfigPath()).toBe(join(testConfigDir, 'config.yaml'));
  });

  it('should return defaults when no file exists', () => {
    const config = loadGlobalConfig();

    expect(config).toEqual({
      model: DEFAULT_MODEL,
      maxTokens: 1024,
      temperature: 0.7,
      timeoutMs: undefined,
      logLevel: 'info',
      anthropicApiKey: undefined,
      maxIterations: 25,
      maxRetries: 3,
      debug: undefined,
      data: { paymentMethodsCsv: undefined, transactionsDir: undefined },
    });
  });

  it('should map snake_case keys', () => {
    writeConfig([
      'model: test-model',
      'max_iterations: 40',
      'max_retries: 1',
      'log_level: debug',
      'debug:',
      '  enabled: true',
      '  log_file: /tmp/labgraph-debug.log',
      'data:',
      '  transactions_dir: /srv/tables',
    ]);

    const config = loadGlobalConfig();

    expect(config.model).toBe('test-model');
    expect(config.maxIterations).toBe(40);
    expect(config.maxRetries).toBe(1);
    expect(config.logLevel).toBe('debug');
    expect(config.debug).toEqual({ enabled: true, logFile: '/tmp/labgraph-debug.log' });
    expect(config.data.transactionsDir).toBe('/srv/tables');
  });

  it('should cache until invalidated', () => {
    writeConfig(['model: first-model']);
    expect(loadGlobalConfig().model).toBe('first-model');

    writeConfig(['model: second-model']);
    expect(loadGlobalConfig().model).toBe('first-model');

    invalidateGlobalConfigCache();
    expect(loadGlobalConfig().model).toBe('second-model');
  });

  it('should reject invalid values', () => {
    writeConfig(['temperature: 3']);

    expect(() => loadGlobalConfig()).toThrow(ConfigError);
    expect(() => loadGlobalConfig()).toThrow(/^Invalid config .*config\.yaml: temperature: /);
  });

  it('should reject malformed YAML', () => {
    writeConfig(['model: [unclosed']);

    expect(() => loadGlobalConfig()).toThrow(/^Failed to read /);
  });

  it('should save and reload', () => {
    const config = { ...loadGlobalConfig(), model: 'saved-model', maxRetries: 5, data: { paymentMethodsCsv: '/data/pm.csv' } };

    saveGlobalConfig(config);

    expect(readFileSync(getGlobalConfigPath(), 'utf-8')).toContain('payment_methods_csv: /data/pm.csv');
    const reloaded = loadGlobalConfig();
    expect(reloaded.model).toBe('saved-model');
    expect(reloaded.maxRetries).toBe(5);
    expect(reloaded.data.paymentMethodsCsv).toBe('/data/pm.csv');
  });

  describe('API key resolution', () => {
    it('should prefer the app-specific variable, then the generic one, then the file', () => {
      writeConfig(['anthropic_api_key: file-key']);
      const config = loadGlobalConfig();

      expect(resolveAnthropicApiKey(config)).toBe('file-key');

      process.env.ANTHROPIC_API_KEY = 'test-secret';
      expect(resolveAnthropicApiKey(config)).toBe('test-secret');

      process.env.LABGRAPH_ANTHROPIC_API_KEY = 'test-secret-2';
      expect(resolveAnthropicApiKey(config)).toBe('test-secret-2');
    });

    it('should refuse to build a client without a key', () => {
      const config = loadGlobalConfig();

      expect(() => createGenerationClient(config)).toThrow(ConfigError);
    });

    it('should build a client when a key is set', () => {
      process.env.ANTHROPIC_API_KEY = 'test-secret';

      const client = createGenerationClient(loadGlobalConfig(), { model: 'override-model' });

      expect(typeof client.generate).toBe('function');
    });
  });
});
