/**
 * Merchant statistics
 *
 * Pure functions over transaction lists. Quantiles are taken by index
 * into the sorted amounts (q50 = sorted[floor(n/2)]), not interpolated.
 */

import type { Transaction } from '../../infra/data/index.js';

export const HIGH_RATIO_THRESHOLD = 1.5;
export const MAX_STATISTICS_MERCHANTS = 50;
export const MAX_LISTED_ANOMALIES = 10;
export const MAX_MERCHANT_TRANSACTIONS = 50_000;

export interface MerchantStatistic {
  merchant_id: string;
  q50_amount: number;
  avg_amount: number;
  transaction_count: number;
  q50_avg_ratio: number;
}

export type MerchantStatisticsResult =
  | { total_merchants: number; merchants: MerchantStatistic[]; query_period_days: number }
  | { error: string; merchants: MerchantStatistic[] };

export interface TransactionSummary {
  total_amount: number;
  avg_amount: number;
  min_amount: number;
  max_amount: number;
  q50_amount: number;
}

export type MerchantTransactionsResult =
  | {
      merchant_id: string;
      query_period_days: number;
      total_transactions: number;
      transaction_summary: TransactionSummary;
      transactions: Transaction[];
    }
  | { error: string; merchant_id: string; transactions: Transaction[] };

export interface AnomalousTransaction {
  transaction_id: string;
  amount: number;
  date: string;
  type: 'outlier';
  reason: string;
}

export interface LargeTransaction {
  transaction_id: string;
  amount: number;
  date: string;
  multiple_of_q75: number;
}

export type AnomalyAnalysis = {
  merchant_id: string;
  q50_avg_ratio: number;
  statistics: {
    q25: number;
    q50: number;
    q75: number;
    avg: number;
    min: number;
    max: number;
  };
  anomaly_analysis: {
    total_anomalies: number;
    anomalous_transactions: AnomalousTransaction[];
    large_transactions: LargeTransaction[];
  };
  ratio_explanation: {
    high_ratio_indicates: string;
    potential_causes: string[];
  };
};

export type AnomalyAnalysisResult = AnomalyAnalysis | { error: string; analysis: Record<string, never> };

const RATIO_EXPLANATION: AnomalyAnalysis['ratio_explanation'] = {
  high_ratio_indicates:
    'Many transactions are at or above median, suggesting consistent higher-value transactions',
  potential_causes: [
    'Bimodal distribution with many small and large transactions',
    'Recent shift towards higher value transactions',
    'Outlier transactions skewing the average downward relative to median',
    'Business model changes or customer behavior shifts',
  ],
};

export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

function sortedAmounts(amounts: readonly number[]): number[] {
  return [...amounts].sort((a, b) => a - b);
}

/** Element at `floor(fraction * n)` of an ascending list; 0 when empty */
export function quantileAt(sorted: readonly number[], numerator: number, denominator: number): number {
  return sorted[Math.floor((numerator * sorted.length) / denominator)] ?? 0;
}

function average(amounts: readonly number[]): number {
  return amounts.length === 0 ? 0 : amounts.reduce((sum, amount) => sum + amount, 0) / amounts.length;
}

/**
 * Per-merchant median, mean and count over positive amounts,
 * ordered by q50/avg ratio (desc) then transaction count (desc).
 */
export function computeMerchantStatistics(transactions: readonly Transaction[], daysBack: number): MerchantStatisticsResult {
  const byMerchant = new Map<string, number[]>();
  for (const tx of transactions) {
    if (tx.amount <= 0) continue;
    const amounts = byMerchant.get(tx.merchant_id);
    if (amounts) {
      amounts.push(tx.amount);
    } else {
      byMerchant.set(tx.merchant_id, [tx.amount]);
    }
  }

  const merchants: MerchantStatistic[] = [];
  for (const [merchantId, amounts] of byMerchant) {
    const avg = average(amounts);
    if (avg <= 0) continue;
    const q50 = quantileAt(sortedAmounts(amounts), 1, 2);
    merchants.push({
      merchant_id: merchantId,
      q50_amount: q50,
      avg_amount: roundTo(avg, 2),
      transaction_count: amounts.length,
      q50_avg_ratio: roundTo(q50 / avg, 3),
    });
  }

  if (merchants.length === 0) {
    return { error: 'No merchant data found', merchants: [] };
  }

  merchants.sort((a, b) => b.q50_avg_ratio - a.q50_avg_ratio || b.transaction_count - a.transaction_count);
  const limited = merchants.slice(0, MAX_STATISTICS_MERCHANTS);
  return { total_merchants: limited.length, merchants: limited, query_period_days: daysBack };
}

/** Merchants strictly above the ratio threshold, in input order */
export function selectHighRatioMerchants(
  merchants: readonly MerchantStatistic[],
  threshold: number = HIGH_RATIO_THRESHOLD,
): MerchantStatistic[] {
  return merchants.filter((merchant) => merchant.q50_avg_ratio > threshold);
}

/** Transaction listing with summary statistics for one merchant */
export function summarizeMerchantTransactions(
  merchantId: string,
  transactions: readonly Transaction[],
  daysBack: number,
): MerchantTransactionsResult {
  const positive = transactions.filter((tx) => tx.amount > 0).slice(0, MAX_MERCHANT_TRANSACTIONS);
  if (positive.length === 0) {
    return { error: `No transactions found for merchant ${merchantId}`, merchant_id: merchantId, transactions: [] };
  }

  const amounts = positive.map((tx) => tx.amount);
  return {
    merchant_id: merchantId,
    query_period_days: daysBack,
    total_transactions: positive.length,
    transaction_summary: {
      total_amount: roundTo(amounts.reduce((sum, amount) => sum + amount, 0), 2),
      avg_amount: roundTo(average(amounts), 2),
      min_amount: Math.min(...amounts),
      max_amount: Math.max(...amounts),
      q50_amount: quantileAt(sortedAmounts(amounts), 1, 2),
    },
    transactions: positive,
  };
}

/**
 * Flag transactions outside the IQR fences [q25 - 1.5*IQR, q75 + 1.5*IQR]
 * and transactions larger than twice q75.
 */
export function analyzeAnomalies(merchantId: string, transactions: readonly Transaction[]): AnomalyAnalysisResult {
  const priced = transactions.filter((tx) => tx.amount !== 0);
  if (priced.length === 0) {
    return { error: 'No valid transaction data provided for analysis', analysis: {} };
  }

  const amounts = priced.map((tx) => tx.amount);
  const sorted = sortedAmounts(amounts);
  const q25 = quantileAt(sorted, 1, 4);
  const q50 = quantileAt(sorted, 1, 2);
  const q75 = quantileAt(sorted, 3, 4);
  const avg = average(amounts);

  const iqr = q75 - q25;
  const lowerBound = q25 - 1.5 * iqr;
  const upperBound = q75 + 1.5 * iqr;

  const anomalies: AnomalousTransaction[] = [];
  const large: LargeTransaction[] = [];

  for (const tx of priced) {
    if (tx.amount < lowerBound || tx.amount > upperBound) {
      anomalies.push({
        transaction_id: tx.transaction_id,
        amount: tx.amount,
        date: tx.transaction_date,
        type: 'outlier',
        reason: `Amount ${tx.amount} outside IQR bounds [${lowerBound.toFixed(2)}, ${upperBound.toFixed(2)}]`,
      });
    }
    if (tx.amount > q75 * 2) {
      large.push({
        transaction_id: tx.transaction_id,
        amount: tx.amount,
        date: tx.transaction_date,
        multiple_of_q75: q75 > 0 ? roundTo(tx.amount / q75, 2) : 0,
      });
    }
  }

  return {
    merchant_id: merchantId,
    q50_avg_ratio: avg > 0 ? roundTo(q50 / avg, 3) : 0,
    statistics: {
      q25: roundTo(q25, 2),
      q50: roundTo(q50, 2),
      q75: roundTo(q75, 2),
      avg: roundTo(avg, 2),
      min: roundTo(sorted[0] ?? 0, 2),
      max: roundTo(sorted[sorted.length - 1] ?? 0, 2),
    },
    anomaly_analysis: {
      total_anomalies: anomalies.length,
      anomalous_transactions: anomalies.slice(0, MAX_LISTED_ANOMALIES),
      large_transactions: large.slice(0, MAX_LISTED_ANOMALIES),
    },
    ratio_explanation: RATIO_EXPLANATION,
  };
}
