export {
  HIGH_RATIO_THRESHOLD,
  MAX_STATISTICS_MERCHANTS,
  MAX_LISTED_ANOMALIES,
  computeMerchantStatistics,
  selectHighRatioMerchants,
  summarizeMerchantTransactions,
  analyzeAnomalies,
  quantileAt,
  roundTo,
  type MerchantStatistic,
  type MerchantStatisticsResult,
  type MerchantTransactionsResult,
  type TransactionSummary,
  type AnomalyAnalysis,
  type AnomalyAnalysisResult,
  type AnomalousTransaction,
  type LargeTransaction,
} from './stats.js';
export {
  MERCHANT_TOOL_NAMES,
  DEFAULT_TRANSACTION_DAYS,
  createMerchantTools,
  type MerchantToolName,
  type MerchantToolOptions,
} from './tools.js';
export {
  MAX_ANALYZED_ITEMS,
  KEY_INSIGHTS,
  RECOMMENDATIONS,
  buildSystemPrompt,
  phasePrompt,
  buildSummary,
  formatFinalMessage,
  createMerchantWorkflow,
  createMerchantInitialData,
  runMerchantAnalysis,
  type MerchantPhase,
  type MerchantAnalysisSummary,
  type MerchantWorkflowData,
  type MerchantWorkflowOptions,
  type MerchantAnalysisOptions,
  type MerchantAnalysisResult,
  type MerchantAnalysisConfiguration,
} from './workflow.js';
