/**
 * Haiku pipeline: write, then rate
 */

import { z } from 'zod/v4';
import type { GenerationClient } from '../../core/models/index.js';
import { createLogger } from '../../shared/utils/index.js';
import { extractStructured } from '../extraction/index.js';
import { writePost } from './post.js';

const log = createLogger('haiku');

export const HAIKU_RATER_PROMPT = 'You are an expert in haiku about the sea.';

export const HaikuRatingSchema = z.object({
  rate: z.number().int().min(1).max(10),
  reason: z.string().trim().min(1),
});

export type HaikuRating = z.infer<typeof HaikuRatingSchema>;

export interface HaikuResult {
  haiku: string;
  /** null when the rating reply was unusable */
  rating: number | null;
  reason: string | null;
  errors: string[];
}

export function buildRatingPrompt(haiku: string): string {
  return 'Rate the level of this haiku from 1 to 10 and provide a reason. '
    + "Return your response as a JSON with exactly two keys: 'rate' (integer 1-10) and 'reason' (string explaining the rating). "
    + `Haiku: ${haiku}`;
}

export async function runHaikuPipeline(client: GenerationClient, model?: string): Promise<HaikuResult> {
  const haiku = await writePost(client, { model, temperature: 0.7, maxTokens: 100 });
  log.debug('Haiku written', { length: haiku.length });

  const rated = await extractStructured(client, {
    system: HAIKU_RATER_PROMPT,
    user: buildRatingPrompt(haiku),
    schema: HaikuRatingSchema,
    model,
    temperature: 0.7,
    maxTokens: 200,
  });

  if (!rated.success) {
    log.warn('Haiku rating rejected', { errors: rated.errors });
    return { haiku, rating: null, reason: null, errors: rated.errors };
  }
  return { haiku, rating: rated.data.rate, reason: rated.data.reason, errors: [] };
}
