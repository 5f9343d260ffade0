/**
 * Merchant analysis workflow
 *
 * Phases drive the prompt sent with each generation call:
 *   get_merchant_stats -> process_merchants -> (analyze_transactions -> analyze_patterns)* -> completed
 *
 * Steps:
 *   start             system prompt
 *   generate          phase prompt + tools
 *   dispatch_tool     runs tools, records statistics and anomaly analyses
 *   aggregate_partial keeps merchants above the ratio threshold
 *   iterate_item      advances to the next merchant (at most MAX_ANALYZED_ITEMS)
 *   finalize          compiles the summary
 */

import { z } from 'zod/v4';
import type { GenerationClient } from '../../core/models/index.js';
import type { ToolDispatchResult, ToolOutput } from '../../core/tools/index.js';
import {
  appendTurns,
  createErrorHandleStep,
  createGenerationStep,
  createInitialState,
  createStartStep,
  createToolDispatchStep,
  DEFAULT_MAX_RETRIES,
  lastTurn,
  setError,
  setMetadata,
  toTranscript,
  updateData,
  type RunWorkflowOptions,
  type StepId,
  type WorkflowDefinition,
  type WorkflowState,
  runWorkflow,
} from '../../core/workflow/index.js';
import type { TransactionStore } from '../../infra/data/index.js';
import { createLogger } from '../../shared/utils/index.js';
import { HIGH_RATIO_THRESHOLD, selectHighRatioMerchants, type MerchantStatistic } from './stats.js';
import { createMerchantTools } from './tools.js';

const log = createLogger('merchants');

export const MAX_ANALYZED_ITEMS = 5;

const ANALYSIS_TEMPERATURE = 0.1;

export type MerchantPhase =
  | 'get_merchant_stats'
  | 'process_merchants'
  | 'analyze_transactions'
  | 'analyze_patterns'
  | 'completed';

export interface MerchantAnalysisSummary {
  analysis_summary: {
    total_merchants_analyzed: number;
    high_ratio_merchants_found: number;
    detailed_analysis_completed: number;
    analysis_timestamp: string;
  };
  high_ratio_merchants: MerchantStatistic[];
  detailed_analysis: ToolOutput[];
  insights: {
    common_patterns: string;
    recommendations: string;
  };
}

export interface MerchantWorkflowData {
  phase: MerchantPhase;
  /** Merchants from the last statistics result; null until one arrives */
  statistics: MerchantStatistic[] | null;
  highRatioMerchants: MerchantStatistic[];
  analysisResults: ToolOutput[];
  /** Number of merchants taken from highRatioMerchants so far */
  cursor: number;
  currentMerchantId: string;
  /** Phase/merchant key of the last prompt sent */
  promptedKey: string | null;
  summary: MerchantAnalysisSummary | null;
}

export function buildSystemPrompt(daysBack: number): string {
  return `You are a specialized merchant transaction analysis agent. Your job is to:

1. Get merchant statistics using the get_merchant_statistics tool (look back ${daysBack} days)
2. Identify merchants with q50/avg ratio > ${HIGH_RATIO_THRESHOLD}
3. For each high-ratio merchant, get their detailed transactions using get_merchant_transactions
4. Analyze transaction patterns to understand what causes the high ratio using analyze_merchant_anomalies
5. Provide comprehensive insights and recommendations

Start by getting the merchant statistics data. Focus on finding actionable insights about merchant behavior patterns.`;
}

export function phasePrompt(phase: MerchantPhase, merchantId: string): string | undefined {
  switch (phase) {
    case 'get_merchant_stats':
      return 'Start by calling get_merchant_statistics to get the list of merchants with their q50, avg amounts, and transaction counts.';
    case 'process_merchants':
      return `Now identify merchants with q50/avg ratio > ${HIGH_RATIO_THRESHOLD} from the data you just received.`;
    case 'analyze_transactions':
      return `Get detailed transactions for merchant ${merchantId} using get_merchant_transactions.`;
    case 'analyze_patterns':
      return `Analyze the transaction patterns for merchant ${merchantId} using analyze_merchant_anomalies.`;
    case 'completed':
      return undefined;
  }
}

function promptKey(data: MerchantWorkflowData): string {
  return `${data.phase}:${data.currentMerchantId}`;
}

/**
 * Prompt for the next generation call: the phase prompt when the phase
 * changed, or when the conversation ends on a plain assistant turn.
 * Nothing after tool results.
 */
function nextPrompt(state: WorkflowState<MerchantWorkflowData>): string | undefined {
  const last = lastTurn(state);
  const endsOnAnswer = last?.role === 'assistant' && !last.toolCalls?.length;
  if (state.data.promptedKey === promptKey(state.data) && !endsOnAnswer) {
    return undefined;
  }
  return phasePrompt(state.data.phase, state.data.currentMerchantId);
}

const StatisticsOutputSchema = z.object({
  merchants: z.array(z.object({
    merchant_id: z.string(),
    q50_amount: z.number(),
    avg_amount: z.number(),
    transaction_count: z.number(),
    q50_avg_ratio: z.number(),
  })),
});

function recordToolResult(
  state: WorkflowState<MerchantWorkflowData>,
  result: ToolDispatchResult,
): WorkflowState<MerchantWorkflowData> {
  if (result.name === 'get_merchant_statistics') {
    const parsed = StatisticsOutputSchema.safeParse(result.output);
    return parsed.success ? updateData(state, { statistics: parsed.data.merchants }) : state;
  }
  if (result.name === 'analyze_merchant_anomalies' && !result.isError) {
    return updateData(state, { analysisResults: [...state.data.analysisResults, result.output] });
  }
  return state;
}

function analysisLimit(data: MerchantWorkflowData): number {
  return Math.min(data.highRatioMerchants.length, MAX_ANALYZED_ITEMS);
}

async function processMerchantData(state: WorkflowState<MerchantWorkflowData>): Promise<WorkflowState<MerchantWorkflowData>> {
  const { statistics } = state.data;
  if (statistics === null) {
    return setError(state, 'No merchant statistics found in conversation');
  }

  const highRatioMerchants = selectHighRatioMerchants(statistics);
  log.info('High-ratio merchants selected', { total: statistics.length, selected: highRatioMerchants.length });

  const note = [
    `Found ${highRatioMerchants.length} merchants with q50/avg ratio > ${HIGH_RATIO_THRESHOLD}:`,
    JSON.stringify(highRatioMerchants.slice(0, 3), null, 2),
    '',
    'Will now analyze transactions for each of these merchants.',
  ].join('\n');

  return appendTurns(
    updateData(state, { highRatioMerchants, phase: 'process_merchants' }),
    { role: 'assistant', content: note },
  );
}

async function advanceMerchant(state: WorkflowState<MerchantWorkflowData>): Promise<WorkflowState<MerchantWorkflowData>> {
  const { data } = state;
  if (data.phase === 'analyze_transactions') {
    return updateData(state, { phase: 'analyze_patterns' });
  }

  const merchant = data.cursor < analysisLimit(data) ? data.highRatioMerchants[data.cursor] : undefined;
  if (!merchant) {
    return setError(state, 'No merchant left to analyze');
  }

  log.debug('Analyzing merchant', { merchantId: merchant.merchant_id, position: data.cursor + 1 });
  return updateData(state, {
    phase: 'analyze_transactions',
    currentMerchantId: merchant.merchant_id,
    cursor: data.cursor + 1,
  });
}

export const KEY_INSIGHTS = [
  'Merchants with high q50/avg ratios often show bimodal transaction distributions',
  'Large outlier transactions can significantly impact the ratio',
  'Patterns suggest potential changes in business models or customer behavior',
] as const;

export const RECOMMENDATIONS = [
  'Monitor these merchants for unusual transaction patterns',
  'Investigate large transaction outliers',
  'Set up alerts for significant ratio changes',
  'Consider business verification for merchants with extreme ratios',
] as const;

export function buildSummary(data: MerchantWorkflowData, timestamp: string): MerchantAnalysisSummary {
  return {
    analysis_summary: {
      total_merchants_analyzed: data.statistics?.length ?? 0,
      high_ratio_merchants_found: data.highRatioMerchants.length,
      detailed_analysis_completed: data.analysisResults.length,
      analysis_timestamp: timestamp,
    },
    high_ratio_merchants: data.highRatioMerchants,
    detailed_analysis: data.analysisResults,
    insights: {
      common_patterns: `Analysis of transaction patterns in merchants with q50/avg > ${HIGH_RATIO_THRESHOLD}`,
      recommendations: 'Recommendations for monitoring and action',
    },
  };
}

export function formatFinalMessage(summary: MerchantAnalysisSummary): string {
  const { analysis_summary: counts } = summary;
  return [
    '## Merchant Analysis Complete',
    '',
    '**Summary:**',
    `- Analyzed ${counts.total_merchants_analyzed} total merchants`,
    `- Found ${counts.high_ratio_merchants_found} merchants with q50/avg ratio > ${HIGH_RATIO_THRESHOLD}`,
    `- Completed detailed analysis for ${counts.detailed_analysis_completed} merchants`,
    '',
    '**High-Ratio Merchants:**',
    JSON.stringify(summary.high_ratio_merchants, null, 2),
    '',
    '**Key Insights:**',
    ...KEY_INSIGHTS.map((line) => `- ${line}`),
    '',
    '**Recommendations:**',
    ...RECOMMENDATIONS.map((line, index) => `${index + 1}. ${line}`),
  ].join('\n');
}

function routeAfterGeneration(state: WorkflowState<MerchantWorkflowData>): StepId {
  const { data } = state;
  switch (data.phase) {
    case 'get_merchant_stats':
      return 'aggregate_partial';
    case 'process_merchants':
      return data.highRatioMerchants.length > 0 ? 'iterate_item' : 'finalize';
    case 'analyze_transactions':
      return 'iterate_item';
    case 'analyze_patterns':
      return data.cursor < analysisLimit(data) ? 'iterate_item' : 'finalize';
    case 'completed':
      return 'finalize';
  }
}

export interface MerchantWorkflowOptions {
  client: GenerationClient;
  store: TransactionStore;
  daysBack: number;
  model?: string;
  maxRetries?: number;
  /** Clock for timestamps */
  now?: () => Date;
}

export function createMerchantWorkflow(options: MerchantWorkflowOptions): WorkflowDefinition<MerchantWorkflowData> {
  const now = options.now ?? (() => new Date());
  const tools = createMerchantTools({ store: options.store, statisticsDays: options.daysBack });

  const finalize = async (state: WorkflowState<MerchantWorkflowData>): Promise<WorkflowState<MerchantWorkflowData>> => {
    const summary = buildSummary(state.data, now().toISOString());
    const done = updateData(state, { summary, phase: 'completed' });
    return setMetadata(
      appendTurns(done, { role: 'assistant', content: formatFinalMessage(summary) }),
      { completed_at: summary.analysis_summary.analysis_timestamp },
    );
  };

  return {
    name: 'merchants',
    steps: {
      start: createStartStep<MerchantWorkflowData>({
        system: buildSystemPrompt(options.daysBack),
        user: (state) => phasePrompt(state.data.phase, state.data.currentMerchantId),
        now: () => now().getTime(),
      }),
      generate: createGenerationStep<MerchantWorkflowData>({
        client: options.client,
        model: options.model,
        tools,
        temperature: ANALYSIS_TEMPERATURE,
        prompt: nextPrompt,
        onReply: (state) => updateData(state, { promptedKey: promptKey(state.data) }),
      }),
      dispatch_tool: createToolDispatchStep<MerchantWorkflowData>({ registry: tools, onResult: recordToolResult }),
      aggregate_partial: processMerchantData,
      iterate_item: advanceMerchant,
      finalize,
      error_handle: createErrorHandleStep<MerchantWorkflowData>({ maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES }),
    },
    transitions: {
      start: () => 'generate',
      generate: routeAfterGeneration,
      aggregate_partial: () => 'generate',
      iterate_item: () => 'generate',
    },
    resumeStep: 'generate',
  };
}

export function createMerchantInitialData(): MerchantWorkflowData {
  return {
    phase: 'get_merchant_stats',
    statistics: null,
    highRatioMerchants: [],
    analysisResults: [],
    cursor: 0,
    currentMerchantId: '',
    promptedKey: null,
    summary: null,
  };
}

export interface MerchantAnalysisConfiguration {
  dataset: string;
  table: string;
  analysis_days: number;
  model: string;
  as_of: string;
  execution_time: string;
}

export interface MerchantAnalysisResult {
  status: 'completed';
  high_ratio_merchants: MerchantStatistic[];
  analysis_results: ToolOutput[];
  messages: string[];
  total_iterations: number;
  summary: MerchantAnalysisSummary | null;
  configuration: MerchantAnalysisConfiguration;
}

export interface MerchantAnalysisOptions extends MerchantWorkflowOptions {
  dataset: string;
  table: string;
  /** Model name recorded in the configuration block */
  modelName: string;
}

/**
 * Run the merchant analysis end to end.
 * @throws Error when the workflow aborts
 */
export async function runMerchantAnalysis(
  options: MerchantAnalysisOptions,
  runOptions: RunWorkflowOptions<MerchantWorkflowData> = {},
): Promise<MerchantAnalysisResult> {
  const now = options.now ?? (() => new Date());
  const definition = createMerchantWorkflow({ ...options, now });
  const initial = createInitialState(createMerchantInitialData());

  // The initial user turn carries the first phase prompt
  const run = await runWorkflow(definition, updateData(initial, { promptedKey: promptKey(initial.data) }), runOptions);
  if (!run.success) {
    throw new Error(run.error);
  }

  const { state } = run;
  return {
    status: 'completed',
    high_ratio_merchants: state.data.highRatioMerchants,
    analysis_results: state.data.analysisResults,
    messages: toTranscript(state.messages),
    total_iterations: state.iteration,
    summary: state.data.summary,
    configuration: {
      dataset: options.dataset,
      table: options.table,
      analysis_days: options.daysBack,
      model: options.modelName,
      as_of: options.store.getAsOf().toISOString(),
      execution_time: now().toISOString(),
    },
  };
}
