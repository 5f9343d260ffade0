/**
 * ISO 3166-1 country list
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod/v4';
import { formatIssues, getErrorMessage } from '../../shared/utils/index.js';
import { DataSourceError } from './csv.js';
import { COUNTRIES_JSON } from './paths.js';

const CountryListSchema = z.array(z.object({
  alpha2: z.string().regex(/^[A-Z]{2}$/),
  name: z.string().min(1),
}));

export interface Country {
  alpha2: string;
  name: string;
}

function toWords(text: string): string[] {
  return text.toUpperCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean);
}

function containsWords(haystack: readonly string[], needle: readonly string[]): boolean {
  for (let start = 0; start + needle.length <= haystack.length; start++) {
    if (needle.every((word, offset) => haystack[start + offset] === word)) {
      return true;
    }
  }
  return false;
}

/** Lookup over the country list; all comparisons are upper-case */
export class CountryIndex {
  private readonly byCode = new Map<string, Country>();
  private readonly byUpperName = new Map<string, Country>();

  constructor(private readonly countries: readonly Country[]) {
    for (const country of countries) {
      this.byCode.set(country.alpha2, country);
      this.byUpperName.set(country.name.toUpperCase(), country);
    }
  }

  get size(): number {
    return this.countries.length;
  }

  findByAlpha2(code: string): Country | undefined {
    return this.byCode.get(code.toUpperCase());
  }

  findByName(name: string): Country | undefined {
    return this.byUpperName.get(name.toUpperCase());
  }

  /**
   * Countries whose name contains the fragment as whole words,
   * e.g. "KINGDOM" matches "United Kingdom" but "MARS" does not match "Marshall Islands".
   */
  searchByName(fragment: string): Country[] {
    const needle = toWords(fragment);
    if (needle.length === 0) return [];
    return this.countries.filter((country) => containsWords(toWords(country.name), needle));
  }
}

export function loadCountries(filePath: string = COUNTRIES_JSON): Country[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new DataSourceError(`Cannot read country list ${filePath}: ${getErrorMessage(err)}`);
  }
  const parsed = CountryListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataSourceError(`Invalid country list ${filePath}: ${formatIssues(parsed.error.issues).join('; ')}`);
  }
  return parsed.data;
}

let defaultIndex: CountryIndex | null = null;

/** Index over the bundled country list, loaded on first use */
export function getCountryIndex(): CountryIndex {
  if (!defaultIndex) {
    defaultIndex = new CountryIndex(loadCountries());
  }
  return defaultIndex;
}
