/**
 * Merchant transaction store
 *
 * Tables live at `<root>/<dataset>/<table>.csv`.
 */

import { join } from 'node:path';
import { readCsvRecords, DataSourceError } from './csv.js';

export interface Transaction {
  transaction_id: string;
  merchant_id: string;
  amount: number;
  currency: string;
  /** ISO-8601 date or date-time */
  transaction_date: string;
}

const REQUIRED_COLUMNS = ['transaction_id', 'merchant_id', 'amount', 'currency', 'transaction_date'] as const;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface TransactionStoreOptions {
  /** Reference time for look-back windows (defaults to now) */
  asOf?: Date;
}

export function resolveTablePath(root: string, dataset: string, table: string): string {
  return join(root, dataset, `${table}.csv`);
}

/** First day (UTC, YYYY-MM-DD) inside a window of `daysBack` days ending at `asOf` */
export function windowStartDate(asOf: Date, daysBack: number): string {
  return new Date(asOf.getTime() - daysBack * DAY_MS).toISOString().slice(0, 10);
}

export class TransactionStore {
  private readonly asOf: Date;

  constructor(private readonly transactions: readonly Transaction[], options: TransactionStoreOptions = {}) {
    this.asOf = options.asOf ?? new Date();
  }

  /**
   * @throws DataSourceError when the table is missing or a row is malformed
   */
  static fromDataset(root: string, dataset: string, table: string, options: TransactionStoreOptions = {}): TransactionStore {
    const filePath = resolveTablePath(root, dataset, table);
    const records = readCsvRecords(filePath, REQUIRED_COLUMNS);
    const transactions = records.map((record, index): Transaction => {
      const amount = Number(record.amount);
      if (record.amount === '' || !Number.isFinite(amount)) {
        throw new DataSourceError(`${filePath} row ${index + 2}: invalid amount "${record.amount ?? ''}"`);
      }
      return {
        transaction_id: record.transaction_id ?? '',
        merchant_id: record.merchant_id ?? '',
        amount,
        currency: record.currency ?? '',
        transaction_date: record.transaction_date ?? '',
      };
    });
    return new TransactionStore(transactions, options);
  }

  get size(): number {
    return this.transactions.length;
  }

  getAsOf(): Date {
    return this.asOf;
  }

  /** Transactions dated within the last `daysBack` days up to the as-of day, newest first */
  inWindow(daysBack: number): Transaction[] {
    const start = windowStartDate(this.asOf, daysBack);
    const end = this.asOf.toISOString().slice(0, 10);
    return this.transactions
      .filter((tx) => {
        const day = tx.transaction_date.slice(0, 10);
        return day >= start && day <= end;
      })
      .sort((a, b) => b.transaction_date.localeCompare(a.transaction_date));
  }

  forMerchant(merchantId: string, daysBack: number): Transaction[] {
    return this.inWindow(daysBack).filter((tx) => tx.merchant_id === merchantId);
  }
}
