/**
 * Merchant analysis tools
 */

import { z } from 'zod/v4';
import { createToolRegistry, defineTool, type ToolRegistry } from '../../core/tools/index.js';
import type { TransactionStore } from '../../infra/data/index.js';
import {
  analyzeAnomalies,
  computeMerchantStatistics,
  summarizeMerchantTransactions,
} from './stats.js';

export const MERCHANT_TOOL_NAMES = [
  'get_merchant_statistics',
  'get_merchant_transactions',
  'analyze_merchant_anomalies',
] as const;

export type MerchantToolName = (typeof MERCHANT_TOOL_NAMES)[number];

export const DEFAULT_TRANSACTION_DAYS = 7;

export interface MerchantToolOptions {
  store: TransactionStore;
  /** Window used by get_merchant_statistics when the model passes none */
  statisticsDays: number;
}

const daysBack = (fallback: number) =>
  z.number().int().positive().default(fallback).describe(`Number of days to look back (default: ${fallback})`);

const merchantId = z.string().trim().min(1).describe('The merchant ID to inspect');

export function createMerchantTools(options: MerchantToolOptions): ToolRegistry<MerchantToolName> {
  const { store, statisticsDays } = options;

  return createToolRegistry<MerchantToolName>([
    defineTool({
      name: 'get_merchant_statistics',
      description:
        'Get the list of merchants with their q50 amount, average amount, transaction count and q50/avg ratio, ordered by ratio.',
      schema: z.object({ days_back: daysBack(statisticsDays) }),
      execute: ({ days_back }) => computeMerchantStatistics(store.inWindow(days_back), days_back),
    }),
    defineTool({
      name: 'get_merchant_transactions',
      description: 'Get detailed transactions and summary statistics for one merchant.',
      schema: z.object({ merchant_id: merchantId, days_back: daysBack(DEFAULT_TRANSACTION_DAYS) }),
      execute: ({ merchant_id, days_back }) =>
        summarizeMerchantTransactions(merchant_id, store.forMerchant(merchant_id, days_back), days_back),
    }),
    defineTool({
      name: 'analyze_merchant_anomalies',
      description:
        "Analyze one merchant's transactions for IQR outliers and large transactions that drive a high q50/avg ratio.",
      schema: z.object({ merchant_id: merchantId, days_back: daysBack(DEFAULT_TRANSACTION_DAYS) }),
      execute: ({ merchant_id, days_back }) => analyzeAnomalies(merchant_id, store.forMerchant(merchant_id, days_back)),
    }),
  ]);
}
