/**
 * Payment query parsing
 *
 * Deterministic parsing of free-text payment questions and
 * country normalization to ISO 3166-1 alpha-2.
 */

import type { CountryIndex } from '../../infra/data/index.js';

/** Country text and optional category extracted from one input */
export interface ParsedQuery {
  readonly subject: string;
  readonly category: string | null;
}

/** Category synonyms, checked in order; the first hit wins */
const CATEGORY_PATTERNS: ReadonlyArray<readonly [string, RegExp]> = [
  ['card', /\b(card|credit|debit)\b/],
  ['bank', /\b(bank|transfer)\b/],
];

const FILLER_WORDS = ['card', 'credit', 'debit', 'bank', 'transfer', 'methods', 'for', 'list', 'please', 'show', 'get'];

const FILLER_PATTERN = new RegExp(`\\b(${FILLER_WORDS.join('|')})\\b`, 'g');

const COUNTRY_ALIASES: Readonly<Record<string, string>> = {
  UK: 'GB',
  'UNITED KINGDOM': 'GB',
  'GREAT BRITAIN': 'GB',
  BRITAIN: 'GB',
  USA: 'US',
  'UNITED STATES': 'US',
  'UNITED STATES OF AMERICA': 'US',
  AMERICA: 'US',
};

/**
 * Split a message into country text and category.
 *
 * "Please list bank methods for br" -> { subject: "br", category: "bank" }
 */
export function parseUserInput(message: string): ParsedQuery {
  const text = message.trim().toLowerCase();
  if (!text) {
    return Object.freeze({ subject: '', category: null });
  }

  const match = CATEGORY_PATTERNS.find(([, pattern]) => pattern.test(text));

  const subject = text
    .replace(FILLER_PATTERN, '')
    .replace(/[^\p{L}\p{N}_\s]/gu, '')
    .split(/\s+/)
    .filter(Boolean)
    .join(' ');

  return Object.freeze({ subject, category: match ? match[0] : null });
}

/**
 * Resolve country text to an alpha-2 code.
 * Returns null when the text is unknown or matches more than one country.
 */
export function normalizeCountry(text: string, countries: CountryIndex): string | null {
  const upper = text.trim().toUpperCase();
  if (!upper) return null;

  const alias = COUNTRY_ALIASES[upper];
  if (alias) return alias;

  if (upper.length === 2) {
    return countries.findByAlpha2(upper)?.alpha2 ?? null;
  }

  const exact = countries.findByName(upper);
  if (exact) return exact.alpha2;

  const partial = countries.searchByName(upper);
  return partial.length === 1 && partial[0] ? partial[0].alpha2 : null;
}
