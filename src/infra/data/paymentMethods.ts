/**
 * Payment method table
 *
 * Rows of (country, payment_method_type, payment_method_type_name).
 */

import { readCsvRecords } from './csv.js';
import { DEFAULT_PAYMENT_METHODS_CSV } from './paths.js';

export interface PaymentMethodRow {
  /** ISO alpha-2 country code */
  country: string;
  /** Category, e.g. "card" or "bank" */
  paymentMethodType: string;
  paymentMethodTypeName: string;
}

const REQUIRED_COLUMNS = ['country', 'payment_method_type', 'payment_method_type_name'] as const;

export class PaymentMethodTable {
  constructor(private readonly rows: readonly PaymentMethodRow[]) {}

  static fromCsv(filePath: string = DEFAULT_PAYMENT_METHODS_CSV): PaymentMethodTable {
    const records = readCsvRecords(filePath, REQUIRED_COLUMNS);
    return new PaymentMethodTable(records.map((record) => ({
      country: (record.country ?? '').toUpperCase(),
      paymentMethodType: (record.payment_method_type ?? '').toLowerCase(),
      paymentMethodTypeName: record.payment_method_type_name ?? '',
    })));
  }

  get size(): number {
    return this.rows.length;
  }

  /**
   * Distinct method names for a country, optionally restricted to a category.
   * Returns an empty list when nothing matches.
   */
  query(country: string, category: string | null): string[] {
    const names = new Set<string>();
    for (const row of this.rows) {
      if (row.country !== country) continue;
      if (category && row.paymentMethodType !== category) continue;
      if (row.paymentMethodTypeName) names.add(row.paymentMethodTypeName);
    }
    return [...names].sort();
  }
}
