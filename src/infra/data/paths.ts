import { fileURLToPath } from 'node:url';
import { join } from 'node:path';

/** Bundled data directory (`<package>/data`) */
export const BUNDLED_DATA_DIR = fileURLToPath(new URL('../../../data/', import.meta.url));

export const DEFAULT_PAYMENT_METHODS_CSV = join(BUNDLED_DATA_DIR, 'payment_methods_types.csv');

export const COUNTRIES_JSON = join(BUNDLED_DATA_DIR, 'countries.json');

export const DEFAULT_DATASET = 'transactions_dataset';

export const DEFAULT_TABLE = 'transactions';
