/**
 * Global configuration loader
 *
 * Reads ~/.labgraph/config.yaml (or $LABGRAPH_CONFIG_DIR/config.yaml),
 * validates it and caches the camelCase view.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { parse, stringify } from 'yaml';
import { GlobalConfigSchema, type GlobalConfig, type GlobalConfigRaw } from '../../../core/models/index.js';
import { API_KEY_ENV_VARS, APP_DIR_NAME, CONFIG_DIR_ENV, DEFAULT_MODEL } from '../../../shared/constants.js';
import { createLogger, formatIssues, getErrorMessage, type DebugConfig } from '../../../shared/utils/index.js';

const log = createLogger('config');

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function getGlobalConfigDir(): string {
  return process.env[CONFIG_DIR_ENV] || join(homedir(), APP_DIR_NAME);
}

export function getGlobalConfigPath(): string {
  return join(getGlobalConfigDir(), 'config.yaml');
}

let cachedConfig: GlobalConfig | null = null;

export function invalidateGlobalConfigCache(): void {
  cachedConfig = null;
}

function toGlobalConfig(raw: GlobalConfigRaw): GlobalConfig {
  return {
    model: raw.model ?? DEFAULT_MODEL,
    maxTokens: raw.max_tokens,
    temperature: raw.temperature,
    timeoutMs: raw.timeout_ms,
    logLevel: raw.log_level,
    anthropicApiKey: raw.anthropic_api_key,
    maxIterations: raw.max_iterations,
    maxRetries: raw.max_retries,
    debug: raw.debug ? { enabled: raw.debug.enabled, logFile: raw.debug.log_file } : undefined,
    data: {
      paymentMethodsCsv: raw.data?.payment_methods_csv,
      transactionsDir: raw.data?.transactions_dir,
    },
  };
}

/**
 * Load and validate the global config.
 * A missing file yields the defaults.
 * @throws ConfigError when the file is unreadable or invalid
 */
export function loadGlobalConfig(): GlobalConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configPath = getGlobalConfigPath();
  let content: unknown = {};
  if (existsSync(configPath)) {
    try {
      content = parse(readFileSync(configPath, 'utf-8')) ?? {};
    } catch (err) {
      throw new ConfigError(`Failed to read ${configPath}: ${getErrorMessage(err)}`);
    }
  }

  const parsed = GlobalConfigSchema.safeParse(content);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config ${configPath}: ${formatIssues(parsed.error.issues).join('; ')}`);
  }

  cachedConfig = toGlobalConfig(parsed.data);
  log.debug('Global config loaded', { path: configPath, model: cachedConfig.model, exists: existsSync(configPath) });
  return cachedConfig;
}

/** Write config back as YAML (snake_case keys) */
export function saveGlobalConfig(config: GlobalConfig): void {
  const raw: Record<string, unknown> = {
    model: config.model,
    max_tokens: config.maxTokens,
    temperature: config.temperature,
    log_level: config.logLevel,
    max_iterations: config.maxIterations,
    max_retries: config.maxRetries,
  };
  if (config.timeoutMs !== undefined) raw.timeout_ms = config.timeoutMs;
  if (config.anthropicApiKey) raw.anthropic_api_key = config.anthropicApiKey;
  if (config.debug) {
    raw.debug = {
      enabled: config.debug.enabled,
      ...(config.debug.logFile ? { log_file: config.debug.logFile } : {}),
    };
  }
  const data: Record<string, string> = {};
  if (config.data.paymentMethodsCsv) data.payment_methods_csv = config.data.paymentMethodsCsv;
  if (config.data.transactionsDir) data.transactions_dir = config.data.transactionsDir;
  if (Object.keys(data).length > 0) raw.data = data;

  const dir = getGlobalConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(getGlobalConfigPath(), stringify(raw, { indent: 2 }), 'utf-8');
  invalidateGlobalConfigCache();
}

/**
 * Resolve the Anthropic API key.
 * Priority: LABGRAPH_ANTHROPIC_API_KEY > ANTHROPIC_API_KEY > config file.
 */
export function resolveAnthropicApiKey(config: GlobalConfig = loadGlobalConfig()): string | undefined {
  for (const name of API_KEY_ENV_VARS) {
    const value = process.env[name];
    if (value) return value;
  }
  return config.anthropicApiKey;
}

export function getEffectiveDebugConfig(config: GlobalConfig = loadGlobalConfig()): DebugConfig | undefined {
  return config.debug;
}
