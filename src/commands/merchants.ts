/**
 * Merchant analysis command
 *
 * Runs the merchant workflow over the transaction table, saves the
 * result as JSON and prints the high-ratio merchants.
 */

import { resolve } from 'node:path';
import chalk from 'chalk';
import {
  HIGH_RATIO_THRESHOLD,
  KEY_INSIGHTS,
  RECOMMENDATIONS,
  runMerchantAnalysis,
  type MerchantAnalysisResult,
  type MerchantWorkflowData,
} from '../features/merchants/index.js';
import { BUNDLED_DATA_DIR, DEFAULT_DATASET, DEFAULT_TABLE, TransactionStore } from '../infra/data/index.js';
import { blankLine, divider, header, info, list, section, status, success } from '../shared/ui/index.js';
import { createLogger, generateResultsFileName, writeJsonFile } from '../shared/utils/index.js';
import { createRuntime, workflowRunOptions, type GlobalCommandOptions } from './runtime.js';

const log = createLogger('merchants-command');

export const RESULTS_FILE_PREFIX = 'merchant_analysis_results';
export const DEFAULT_ANALYSIS_DAYS = 30;
const TOP_MERCHANTS_SHOWN = 10;

export interface MerchantsCommandOptions extends GlobalCommandOptions {
  output?: string;
  dataset: string;
  table: string;
  days: number;
  /** Reference date for the look-back window */
  asOf?: Date;
}

export const MERCHANTS_DEFAULTS = {
  dataset: DEFAULT_DATASET,
  table: DEFAULT_TABLE,
  days: DEFAULT_ANALYSIS_DAYS,
} as const;

export function printMerchantReport(result: MerchantAnalysisResult, verbose: boolean): void {
  header('Merchant analysis');
  status('Dataset', `${result.configuration.dataset}.${result.configuration.table}`);
  status('Window', `${result.configuration.analysis_days} days up to ${result.configuration.as_of.slice(0, 10)}`);
  status('Iterations', String(result.total_iterations));

  section(`Merchants with q50/avg ratio > ${HIGH_RATIO_THRESHOLD}`);
  if (result.high_ratio_merchants.length === 0) {
    info('None found');
  }
  result.high_ratio_merchants.slice(0, TOP_MERCHANTS_SHOWN).forEach((merchant, index) => {
    console.log(
      `${String(index + 1).padStart(2)}. ${chalk.bold(merchant.merchant_id)}`
      + `  ratio ${merchant.q50_avg_ratio}`
      + chalk.gray(`  (q50 ${merchant.q50_amount}, avg ${merchant.avg_amount}, ${merchant.transaction_count} txns)`),
    );
  });

  section('Key insights');
  list(KEY_INSIGHTS);
  section('Recommendations');
  list(RECOMMENDATIONS.map((line, index) => `${index + 1}. ${line}`), '');

  if (verbose) {
    section('Messages');
    result.messages.forEach((message, index) => {
      divider();
      console.log(chalk.gray(`#${index + 1}`));
      console.log(message);
    });
  }
}

export async function merchantsCommand(options: MerchantsCommandOptions): Promise<void> {
  const runtime = createRuntime(options);
  const root = runtime.config.data.transactionsDir ?? BUNDLED_DATA_DIR;
  const store = TransactionStore.fromDataset(root, options.dataset, options.table, { asOf: options.asOf });
  log.info('Transaction store loaded', { root, dataset: options.dataset, table: options.table, rows: store.size });

  info(`Analyzing merchants over ${options.days} days...`);
  const result = await runMerchantAnalysis(
    {
      client: runtime.client,
      store,
      daysBack: options.days,
      model: runtime.model,
      modelName: runtime.model,
      maxRetries: runtime.config.maxRetries,
      dataset: options.dataset,
      table: options.table,
    },
    workflowRunOptions<MerchantWorkflowData>(runtime),
  );

  const outputPath = resolve(options.output ?? generateResultsFileName(RESULTS_FILE_PREFIX));
  writeJsonFile(outputPath, result);

  printMerchantReport(result, runtime.verbose);
  blankLine();
  success(`Results saved to ${outputPath}`);
}
