/**
 * Payment method lookup
 */

import type { CountryIndex, PaymentMethodTable } from '../../infra/data/index.js';
import { normalizeCountry, type ParsedQuery } from './parser.js';

export interface PaymentLookupResult {
  country: string | null;
  payment_type: string | null;
  count: number;
  types: string[];
  note: string;
}

export interface PaymentLookupSources {
  table: PaymentMethodTable;
  countries: CountryIndex;
}

/** Resolve a parsed query against the table. Never throws for unmatched input. */
export function lookupPaymentMethods(query: ParsedQuery | null, sources: PaymentLookupSources): PaymentLookupResult {
  const paymentType = query?.category ?? null;

  if (!query || !query.subject) {
    return { country: null, payment_type: paymentType, count: 0, types: [], note: 'No country specified in input' };
  }

  const country = normalizeCountry(query.subject, sources.countries);
  if (!country) {
    return { country: null, payment_type: paymentType, count: 0, types: [], note: 'Invalid country' };
  }

  const types = sources.table.query(country, paymentType);
  let note = '';
  if (types.length === 0) {
    note = paymentType
      ? `No ${paymentType} payment methods found for ${country}`
      : `No payment methods found for ${country}`;
  }

  return { country, payment_type: paymentType, count: types.length, types, note };
}
