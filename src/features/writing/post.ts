import type { GenerationClient } from '../../core/models/index.js';

export const POST_SYSTEM_PROMPT = 'You are a helpful assistant that writes blog posts.';
export const DEFAULT_POST_PROMPT = 'Write me a haiku about the sea.';

export interface WritePostOptions {
  system?: string;
  prompt?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

/** Single completion for a system + user pair */
export async function writePost(client: GenerationClient, options: WritePostOptions = {}): Promise<string> {
  const response = await client.generate({
    model: options.model,
    messages: [
      { role: 'system', content: options.system ?? POST_SYSTEM_PROMPT },
      { role: 'user', content: options.prompt ?? DEFAULT_POST_PROMPT },
    ],
    temperature: options.temperature ?? 0.7,
    maxTokens: options.maxTokens ?? 100,
  });
  return response.content;
}
