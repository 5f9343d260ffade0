import type { DebugConfig } from '../../shared/utils/index.js';
import type { LogLevel } from '../../shared/ui/index.js';

/** Resolved global configuration (camelCase view of config.yaml) */
export interface GlobalConfig {
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs?: number;
  logLevel: LogLevel;
  anthropicApiKey?: string;
  maxIterations: number;
  maxRetries: number;
  debug?: DebugConfig;
  data: {
    paymentMethodsCsv?: string;
    transactionsDir?: string;
  };
}
