/**
 * Tests for CSV parsing and the bundled data sources
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  BUNDLED_DATA_DIR,
  DataSourceError,
  DEFAULT_DATASET,
  DEFAULT_TABLE,
  getCountryIndex,
  loadCountries,
  parseCsv,
  PaymentMethodTable,
  readCsvRecords,
  toRecords,
  TransactionStore,
  windowStartDate,
  type Transaction,
} from '../infra/data/index.js';

describe('parseCsv', () => {
  it('should split rows and fields', () => {
    expect(parseCsv('a,b\n1,2\n')).toEqual([['a', 'b'], ['1', '2']]);
  });

  it('should handle quoted commas, escaped quotes and CRLF', () => {
    expect(parseCsv('name,note\r\n"Smith, J","said ""hi"""\r\n')).toEqual([
      ['name', 'note'],
      ['Smith, J', 'said "hi"'],
    ]);
  });

  it('should keep a last row without a newline and empty trailing fields', () => {
    expect(parseCsv('a,b\n1,')).toEqual([['a', 'b'], ['1', '']]);
  });
});

describe('toRecords', () => {
  it('should key rows by trimmed header and skip blank lines', () => {
    const rows = parseCsv(' country , payment_method_type\nUS, card \n\n');

    expect(toRecords(rows, ['country'], 'inline')).toEqual([{ country: 'US', payment_method_type: 'card' }]);
  });

  it('should name missing columns', () => {
    expect(() => toRecords(parseCsv('a,b\n1,2'), ['a', 'c', 'd'], 'inline'))
      .toThrow('CSV inline is missing column(s): c, d');
    expect(() => toRecords([], ['a'], 'inline')).toThrow('CSV has no header row: inline');
  });
});

describe('file-backed sources', () => {
  const testDir = join(tmpdir(), `labgraph-data-test-${Date.now()}`);

  beforeEach(() => {
    mkdirSync(join(testDir, 'sales'), { recursive: true });
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true });
    }
  });

  it('should report an unreadable file as a DataSourceError', () => {
    expect(() => readCsvRecords(join(testDir, 'absent.csv'), [])).toThrow(DataSourceError);
  });

  it('should load a transaction table from <dataset>/<table>.csv', () => {
    writeFileSync(
      join(testDir, 'sales', 'orders.csv'),
      'transaction_id,merchant_id,amount,currency,transaction_date\nT1,M1,12.50,EUR,2025-06-01\n',
      'utf-8',
    );

    const store = TransactionStore.fromDataset(testDir, 'sales', 'orders', { asOf: new Date('2025-06-02T00:00:00Z') });

    expect(store.size).toBe(1);
    expect(store.inWindow(7)).toEqual([
      { transaction_id: 'T1', merchant_id: 'M1', amount: 12.5, currency: 'EUR', transaction_date: '2025-06-01' },
    ]);
  });

  it('should reject a row with a non-numeric amount', () => {
    writeFileSync(
      join(testDir, 'sales', 'orders.csv'),
      'transaction_id,merchant_id,amount,currency,transaction_date\nT1,M1,ten,EUR,2025-06-01\n',
      'utf-8',
    );

    expect(() => TransactionStore.fromDataset(testDir, 'sales', 'orders'))
      .toThrow(`${join(testDir, 'sales', 'orders.csv')} row 2: invalid amount "ten"`);
  });

  it('should validate the country list', () => {
    const path = join(testDir, 'countries.json');
    writeFileSync(path, '[{"alpha2":"usa","name":"United States"}]', 'utf-8');

    expect(() => loadCountries(path)).toThrow(/^Invalid country list /);
  });
});

describe('TransactionStore windows', () => {
  const tx = (id: string, merchantId: string, date: string): Transaction => ({
    transaction_id: id,
    merchant_id: merchantId,
    amount: 10,
    currency: 'USD',
    transaction_date: date,
  });

  it('should compute the first day of the window', () => {
    expect(windowStartDate(new Date('2025-06-30T00:00:00Z'), 7)).toBe('2025-06-23');
    expect(windowStartDate(new Date('2025-03-01T12:00:00Z'), 1)).toBe('2025-02-28');
  });

  it('should keep transactions on or after the window start, newest first', () => {
    const store = new TransactionStore(
      [
        tx('T1', 'A', '2025-06-22T23:59:59Z'),
        tx('T2', 'A', '2025-06-23T00:00:00Z'),
        tx('T3', 'B', '2025-06-29T10:00:00Z'),
        tx('T4', 'A', '2025-06-25T10:00:00Z'),
      ],
      { asOf: new Date('2025-06-30T00:00:00Z') },
    );

    expect(store.inWindow(7).map((t) => t.transaction_id)).toEqual(['T3', 'T4', 'T2']);
    expect(store.forMerchant('A', 7).map((t) => t.transaction_id)).toEqual(['T4', 'T2']);
  });

  it('should leave out transactions dated after the as-of day', () => {
    const store = new TransactionStore(
      [
        tx('T1', 'A', '2025-06-05T10:00:00Z'),
        tx('T2', 'A', '2025-06-10T23:00:00Z'),
        tx('T3', 'A', '2025-06-25T10:00:00Z'),
      ],
      { asOf: new Date('2025-06-10T00:00:00Z') },
    );

    expect(store.inWindow(7).map((t) => t.transaction_id)).toEqual(['T2', 'T1']);
    expect(store.forMerchant('A', 30).map((t) => t.transaction_id)).toEqual(['T2', 'T1']);
  });
});

describe('bundled data', () => {
  it('should ship the payment method table', () => {
    const table = PaymentMethodTable.fromCsv();

    expect(table.query('US', 'bank')).toEqual(['ach', 'wire_transfer']);
    expect(table.query('US', null)).toEqual(['ach', 'amex', 'apple_pay', 'mastercard', 'visa', 'wire_transfer']);
    expect(table.query('ZZ', null)).toEqual([]);
  });

  it('should ship the country list', () => {
    const countries = getCountryIndex();

    expect(countries.findByAlpha2('de')?.name).toBe('Germany');
    expect(countries.searchByName('mars')).toEqual([]);
    expect(countries.searchByName('kingdom').map((c) => c.alpha2)).toEqual(['GB']);
  });

  it('should ship the sample transaction table', () => {
    const store = TransactionStore.fromDataset(BUNDLED_DATA_DIR, DEFAULT_DATASET, DEFAULT_TABLE);

    expect(store.size).toBe(192);
  });
});
