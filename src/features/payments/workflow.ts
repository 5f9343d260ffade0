/**
 * Payment lookup workflow
 *
 * start -> generate (parse) -> aggregate_partial (lookup) -> finalize -> terminal
 *
 * The generation step is optional: without a client the heuristic
 * parser is used directly.
 */

import { z } from 'zod/v4';
import type { GenerationClient, GenerationResponse } from '../../core/models/index.js';
import {
  appendTurns,
  createGenerationStep,
  createInitialState,
  createStartStep,
  runWorkflow,
  setMetadata,
  updateData,
  type RunWorkflowOptions,
  type WorkflowDefinition,
  type WorkflowState,
} from '../../core/workflow/index.js';
import { createLogger, formatIssues, parseJsonObject } from '../../shared/utils/index.js';
import { lookupPaymentMethods, type PaymentLookupResult, type PaymentLookupSources } from './lookup.js';
import { parseUserInput, type ParsedQuery } from './parser.js';

const log = createLogger('payments');

export const PAYMENT_PARSER_PROMPT = `You are a payment method query parser. Parse the user's message to extract:
1. Country name (required) - can be in any format
2. Payment type (optional) - one of: "card", "bank", "wallet", "ewallet", "on-screen QR", "card_redirect", "card_to_card", "cash_redirect", "pos"

The user might say things like:
- "US card" (country: US, payment_type: card)
- "United Kingdom" (country: United Kingdom, payment_type: null)
- "Please list bank methods for br" (country: br, payment_type: bank)

Respond ONLY with a JSON object in this exact format:
{"country_text": "extracted country text", "payment_type": "card|bank|null"}

If no clear country is found, use an empty string for country_text.
Payment type synonyms: credit/debit -> card, transfer/bank transfer -> bank`;

const PARSE_TEMPERATURE = 0.1;
const PARSE_MAX_TOKENS = 100;

const ModelQuerySchema = z.object({
  country_text: z.string().default(''),
  payment_type: z.string().nullable().optional(),
});

export type ParseSource = 'model' | 'heuristic';

export interface PaymentWorkflowData {
  input: string;
  parsedQuery: ParsedQuery | null;
  parseSource: ParseSource | null;
  result: PaymentLookupResult | null;
}

/**
 * Read the model's parse. Returns null when the reply is not the expected object.
 */
export function parseModelQuery(content: string): ParsedQuery | null {
  const json = parseJsonObject(content);
  if (!json.ok) {
    log.debug('Parser reply is not JSON', { error: json.error });
    return null;
  }
  const parsed = ModelQuerySchema.safeParse(json.value);
  if (!parsed.success) {
    log.debug('Parser reply failed validation', { issues: formatIssues(parsed.error.issues) });
    return null;
  }

  const rawType = parsed.data.payment_type?.trim().toLowerCase() ?? '';
  const category = rawType === '' || rawType === 'null' ? null : rawType;
  return Object.freeze({ subject: parsed.data.country_text.trim(), category });
}

function foldParse(state: WorkflowState<PaymentWorkflowData>, response: GenerationResponse): WorkflowState<PaymentWorkflowData> {
  const modelQuery = parseModelQuery(response.content);
  if (modelQuery) {
    return updateData(state, { parsedQuery: modelQuery, parseSource: 'model' });
  }
  log.info('Falling back to heuristic parser', { input: state.data.input });
  return updateData(state, { parsedQuery: parseUserInput(state.data.input), parseSource: 'heuristic' });
}

function formatSummary(result: PaymentLookupResult): string {
  if (result.note) return result.note;
  const scope = result.payment_type ? `${result.payment_type} payment methods` : 'payment methods';
  return `Found ${result.count} ${scope} for ${result.country ?? 'unknown'}: ${result.types.join(', ')}`;
}

export interface PaymentWorkflowOptions {
  sources: PaymentLookupSources;
  /** Generation client for parsing; omitted means heuristic parsing only */
  client?: GenerationClient;
  model?: string;
  now?: () => number;
}

export function createPaymentWorkflow(options: PaymentWorkflowOptions): WorkflowDefinition<PaymentWorkflowData> {
  const { client, sources } = options;

  const lookup = async (state: WorkflowState<PaymentWorkflowData>): Promise<WorkflowState<PaymentWorkflowData>> => {
    let next = state;
    if (!next.data.parsedQuery) {
      next = updateData(next, { parsedQuery: parseUserInput(next.data.input), parseSource: 'heuristic' });
    }
    const result = lookupPaymentMethods(next.data.parsedQuery, sources);
    log.debug('Payment lookup', { query: next.data.parsedQuery, country: result.country, count: result.count });
    return appendTurns(updateData(next, { result }), { role: 'assistant', content: JSON.stringify(result) });
  };

  const finalize = async (state: WorkflowState<PaymentWorkflowData>): Promise<WorkflowState<PaymentWorkflowData>> => {
    const result = state.data.result ?? lookupPaymentMethods(state.data.parsedQuery, sources);
    const summarized = appendTurns(updateData(state, { result }), { role: 'assistant', content: formatSummary(result) });
    return setMetadata(summarized, { completed_at: new Date().toISOString(), parse_source: state.data.parseSource });
  };

  return {
    name: 'payments',
    steps: {
      start: createStartStep<PaymentWorkflowData>({
        system: client ? PAYMENT_PARSER_PROMPT : undefined,
        user: (state) => state.data.input,
        now: options.now,
      }),
      ...(client
        ? {
            generate: createGenerationStep<PaymentWorkflowData>({
              client,
              model: options.model,
              temperature: PARSE_TEMPERATURE,
              maxTokens: PARSE_MAX_TOKENS,
              forceJson: true,
              onReply: foldParse,
            }),
          }
        : {}),
      aggregate_partial: lookup,
      finalize,
    },
    transitions: {
      start: () => (client ? 'generate' : 'aggregate_partial'),
      ...(client ? { generate: () => 'aggregate_partial' as const } : {}),
      aggregate_partial: () => 'finalize',
    },
    resumeStep: 'aggregate_partial',
  };
}

export interface PaymentLookupRun {
  result: PaymentLookupResult;
  parsedQuery: ParsedQuery | null;
  parseSource: ParseSource | null;
  state: WorkflowState<PaymentWorkflowData>;
}

/**
 * Answer one payment question.
 * @throws Error when the workflow aborts (e.g. a transport failure)
 */
export async function runPaymentLookup(
  input: string,
  options: PaymentWorkflowOptions,
  runOptions: RunWorkflowOptions<PaymentWorkflowData> = {},
): Promise<PaymentLookupRun> {
  const initial = createInitialState<PaymentWorkflowData>({
    input,
    parsedQuery: null,
    parseSource: null,
    result: null,
  });

  const run = await runWorkflow(createPaymentWorkflow(options), initial, runOptions);
  if (!run.success) {
    throw new Error(run.error);
  }

  const { data } = run.state;
  return {
    result: data.result ?? lookupPaymentMethods(data.parsedQuery, options.sources),
    parsedQuery: data.parsedQuery,
    parseSource: data.parseSource,
    state: run.state,
  };
}
