export { parseCsv, toRecords, readCsvRecords, DataSourceError } from './csv.js';
export { CountryIndex, loadCountries, getCountryIndex, type Country } from './countries.js';
export { PaymentMethodTable, type PaymentMethodRow } from './paymentMethods.js';
export {
  TransactionStore,
  resolveTablePath,
  windowStartDate,
  type Transaction,
  type TransactionStoreOptions,
} from './transactions.js';
export {
  BUNDLED_DATA_DIR,
  DEFAULT_PAYMENT_METHODS_CSV,
  COUNTRIES_JSON,
  DEFAULT_DATASET,
  DEFAULT_TABLE,
} from './paths.js';
