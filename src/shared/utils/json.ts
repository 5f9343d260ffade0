/**
 * JSON helpers for model output
 */

import { getErrorMessage } from './error.js';

export type JsonObjectResult =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; error: string };

const FENCE_PATTERN = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/i;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse model text as a single JSON object.
 * A surrounding markdown code fence is tolerated.
 */
export function parseJsonObject(text: string): JsonObjectResult {
  const trimmed = text.trim();
  const fenced = FENCE_PATTERN.exec(trimmed);
  const body = fenced?.[1] ?? trimmed;

  let value: unknown;
  try {
    value = JSON.parse(body);
  } catch (err) {
    return { ok: false, error: getErrorMessage(err) };
  }

  if (!isRecord(value)) {
    return { ok: false, error: 'Expected a JSON object' };
  }
  return { ok: true, value };
}
