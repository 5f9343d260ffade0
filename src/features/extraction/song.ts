/**
 * Song request extraction
 */

import { z } from 'zod/v4';
import type { GenerationClient } from '../../core/models/index.js';
import { extractStructured } from './structured.js';

const requiredText = (label: string, max: number) =>
  z.string()
    .trim()
    .min(1, `${label} cannot be empty`)
    .max(max, `${label} must be at most ${max} characters`);

export const SongRequestSchema = z.object({
  song_name: requiredText('Song name', 100).describe('Name of the song'),
  recipient_name: requiredText('Recipient name', 50).describe('Name of the recipient'),
  free_text: requiredText('Free text', 500).describe('Free text message'),
});

export type SongRequest = z.infer<typeof SongRequestSchema>;

export interface SongParseResult {
  success: boolean;
  songRequest: SongRequest | null;
  errors: string[];
  rawData: Record<string, unknown> | null;
}

export interface IndexedSongParseResult extends SongParseResult {
  input: string;
  /** 1-based position in the batch */
  index: number;
}

const SONG_SYSTEM_PROMPT = 'You are a data extraction assistant. Extract song request information and return valid JSON only.';

export function buildSongPrompt(input: string): string {
  return `Extract the following information from this user input and return as JSON:
- song_name: The name of the song
- recipient_name: The name of the person to send the song to
- free_text: The message to include

User input: "${input}"

Return only valid JSON with these three fields. If any information is missing, make reasonable assumptions.`;
}

export async function parseSongRequest(client: GenerationClient, input: string, model?: string): Promise<SongParseResult> {
  const result = await extractStructured(client, {
    system: SONG_SYSTEM_PROMPT,
    user: buildSongPrompt(input),
    schema: SongRequestSchema,
    model,
    temperature: 0.3,
    maxTokens: 200,
  });
  return {
    success: result.success,
    songRequest: result.data,
    errors: result.errors,
    rawData: result.rawData,
  };
}

/** Parse inputs one after another, in order */
export async function parseMultipleRequests(
  client: GenerationClient,
  inputs: readonly string[],
  onResult?: (result: IndexedSongParseResult) => void,
  model?: string,
): Promise<IndexedSongParseResult[]> {
  const results: IndexedSongParseResult[] = [];
  for (const [offset, input] of inputs.entries()) {
    const result = { ...(await parseSongRequest(client, input, model)), input, index: offset + 1 };
    results.push(result);
    onResult?.(result);
  }
  return results;
}
