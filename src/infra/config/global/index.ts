/**
 * Global configuration - barrel exports
 */

export {
  ConfigError,
  getGlobalConfigDir,
  getGlobalConfigPath,
  invalidateGlobalConfigCache,
  loadGlobalConfig,
  saveGlobalConfig,
  resolveAnthropicApiKey,
  getEffectiveDebugConfig,
} from './globalConfig.js';
