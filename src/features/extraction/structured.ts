/**
 * Structured extraction
 *
 * One forced-JSON generation call followed by zod validation.
 * Parse and validation failures are returned, never thrown.
 */

import type { z } from 'zod/v4';
import type { GenerationClient } from '../../core/models/index.js';
import { createLogger, formatIssues, parseJsonObject } from '../../shared/utils/index.js';

const log = createLogger('extraction');

export type ExtractionResult<T> =
  | { success: true; data: T; errors: string[]; rawData: Record<string, unknown> }
  | { success: false; data: null; errors: string[]; rawData: Record<string, unknown> | null };

/** Validate model text against a schema */
export function validateStructured<T>(content: string, schema: z.ZodType<T>): ExtractionResult<T> {
  const json = parseJsonObject(content);
  if (!json.ok) {
    return { success: false, data: null, errors: [`JSON parsing error: ${json.error}`], rawData: null };
  }

  const parsed = schema.safeParse(json.value);
  if (!parsed.success) {
    const errors = formatIssues(parsed.error.issues);
    log.debug('Extraction failed validation', { errors });
    return { success: false, data: null, errors, rawData: json.value };
  }
  return { success: true, data: parsed.data, errors: [], rawData: json.value };
}

export interface ExtractionRequest<T> {
  system: string;
  user: string;
  schema: z.ZodType<T>;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Ask for a JSON object and validate it.
 * Transport failures propagate.
 */
export async function extractStructured<T>(client: GenerationClient, request: ExtractionRequest<T>): Promise<ExtractionResult<T>> {
  const response = await client.generate({
    model: request.model,
    messages: [
      { role: 'system', content: request.system },
      { role: 'user', content: request.user },
    ],
    temperature: request.temperature,
    maxTokens: request.maxTokens,
    forceJson: true,
  });
  return validateStructured(response.content, request.schema);
}
