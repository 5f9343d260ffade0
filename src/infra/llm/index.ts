/**
 * Generation client factory
 */

import type { GenerationClient, GlobalConfig } from '../../core/models/index.js';
import { API_KEY_ENV_VARS } from '../../shared/constants.js';
import { ConfigError, resolveAnthropicApiKey } from '../config/global/index.js';
import { AnthropicGenerationClient } from './anthropic.js';

export {
  AnthropicGenerationClient,
  GenerationError,
  JSON_ONLY_INSTRUCTION,
  toAnthropicConversation,
  toAnthropicTool,
  fromAnthropicMessage,
  type AnthropicClientOptions,
} from './anthropic.js';

export interface GenerationClientOverrides {
  model?: string;
}

/**
 * Build the configured generation client.
 * @throws ConfigError when no API key is available
 */
export function createGenerationClient(config: GlobalConfig, overrides: GenerationClientOverrides = {}): GenerationClient {
  const apiKey = resolveAnthropicApiKey(config);
  if (!apiKey) {
    throw new ConfigError(
      `Anthropic API key not set. Export ${API_KEY_ENV_VARS.join(' or ')}, or set anthropic_api_key in the global config.`,
    );
  }

  return new AnthropicGenerationClient({
    apiKey,
    model: overrides.model ?? config.model,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    timeoutMs: config.timeoutMs,
  });
}
