/**
 * Confidence-routed assistant graph
 *
 * start -> generate -> (confidence > 0.7) finalize
 *                   -> otherwise aggregate_partial (decision) -> generate | finalize
 */

import { z } from 'zod/v4';
import type { GenerationClient, GenerationResponse } from '../../core/models/index.js';
import {
  appendTurns,
  createErrorHandleStep,
  createGenerationStep,
  createInitialState,
  createStartStep,
  DEFAULT_MAX_RETRIES,
  lastTurn,
  runWorkflow,
  setError,
  setMetadata,
  updateData,
  type RunWorkflowOptions,
  type WorkflowDefinition,
  type WorkflowState,
} from '../../core/workflow/index.js';
import { createLogger, formatIssues, parseJsonObject } from '../../shared/utils/index.js';

const log = createLogger('assistant');

export const ASSISTANT_SYSTEM_PROMPT =
  'You are a helpful AI assistant processing user requests through a step-by-step workflow.';

export const PROCESSING_INSTRUCTION =
  'Answer the user\'s request. Reply with a JSON object {"answer": string, "confidence": number} '
  + 'where confidence is between 0 and 1 and reflects how sure you are of the answer.';

/** Processing result at or below this goes through the decision step */
export const FINALIZE_CONFIDENCE = 0.7;
export const HIGH_CONFIDENCE = 0.8;
export const DEFAULT_MAX_PASSES = 3;

export type AssistantDecision = 'high_confidence' | 'needs_assistance' | 'standard_processing';

export interface AssistantData {
  input: string;
  context: string | null;
  result: string | null;
  confidence: number;
  decision: AssistantDecision | null;
  /** Completed processing passes */
  passes: number;
}

const ProcessingReplySchema = z.object({
  answer: z.string(),
  confidence: z.number().min(0).max(1),
});

export function decide(input: string, confidence: number): AssistantDecision {
  if (confidence > HIGH_CONFIDENCE) return 'high_confidence';
  const lower = input.toLowerCase();
  if (lower.includes('help') || lower.includes('question')) return 'needs_assistance';
  return 'standard_processing';
}

function followUpPrompt(state: WorkflowState<AssistantData>): string | undefined {
  if (lastTurn(state)?.role !== 'assistant') return undefined;
  if (state.data.decision === 'needs_assistance') {
    return 'This request needs more assistance. Give a more complete answer and reassess your confidence.';
  }
  return 'Reconsider your answer and reassess your confidence.';
}

function foldProcessingReply(state: WorkflowState<AssistantData>, response: GenerationResponse): WorkflowState<AssistantData> {
  const json = parseJsonObject(response.content);
  if (!json.ok) {
    return setError(state, `Invalid processing response: ${json.error}`);
  }
  const parsed = ProcessingReplySchema.safeParse(json.value);
  if (!parsed.success) {
    return setError(state, `Invalid processing response: ${formatIssues(parsed.error.issues).join('; ')}`);
  }
  log.debug('Processing pass', { pass: state.data.passes + 1, confidence: parsed.data.confidence });
  return updateData(state, {
    result: parsed.data.answer,
    confidence: parsed.data.confidence,
    passes: state.data.passes + 1,
  });
}

export interface AssistantGraphOptions {
  client: GenerationClient;
  model?: string;
  maxRetries?: number;
  maxPasses?: number;
  /** Clock in milliseconds */
  now?: () => number;
}

export function createAssistantGraph(options: AssistantGraphOptions): WorkflowDefinition<AssistantData> {
  const now = options.now ?? Date.now;
  const maxPasses = options.maxPasses ?? DEFAULT_MAX_PASSES;

  const decision = async (state: WorkflowState<AssistantData>): Promise<WorkflowState<AssistantData>> => {
    const made = decide(state.data.input, state.data.confidence);
    log.info('Decision made', { decision: made, confidence: state.data.confidence });
    return setMetadata(updateData(state, { decision: made }), {
      decision: made,
      decision_confidence: state.data.confidence,
    });
  };

  const finalize = async (state: WorkflowState<AssistantData>): Promise<WorkflowState<AssistantData>> => {
    const endTime = now();
    const startTime = state.metadata.start_time;
    const executionTime = typeof startTime === 'number' ? (endTime - startTime) / 1000 : 0;
    const result = state.data.result ?? 'No result generated';
    const finished = appendTurns(state, {
      role: 'assistant',
      content: `Final result: ${result}\nExecution time: ${executionTime.toFixed(2)}s`,
    });
    return setMetadata(finished, { end_time: endTime, execution_time: executionTime });
  };

  return {
    name: 'assistant',
    steps: {
      start: createStartStep<AssistantData>({
        system: ASSISTANT_SYSTEM_PROMPT,
        user: (state) => state.data.context
          ? `${state.data.input}\n\nContext: ${state.data.context}`
          : state.data.input,
        now,
      }),
      generate: createGenerationStep<AssistantData>({
        client: options.client,
        model: options.model,
        instruction: PROCESSING_INSTRUCTION,
        prompt: followUpPrompt,
        forceJson: true,
        onReply: foldProcessingReply,
      }),
      aggregate_partial: decision,
      finalize,
      error_handle: createErrorHandleStep<AssistantData>({ maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES }),
    },
    transitions: {
      start: () => 'generate',
      generate: (state) => (state.data.confidence > FINALIZE_CONFIDENCE ? 'finalize' : 'aggregate_partial'),
      aggregate_partial: (state) => {
        if (state.data.passes >= maxPasses || state.data.decision === 'high_confidence') {
          return 'finalize';
        }
        return 'generate';
      },
    },
    resumeStep: 'generate',
  };
}

export interface AssistantRunResult {
  result: string | null;
  confidence: number;
  decision: AssistantDecision | null;
  retryCount: number;
  executionTime: number;
  messages: string[];
}

/**
 * Run the graph for one input.
 * @throws Error when the workflow aborts (including the retry ceiling)
 */
export async function runAssistant(
  input: string,
  context: string | null,
  options: AssistantGraphOptions,
  runOptions: RunWorkflowOptions<AssistantData> = {},
): Promise<AssistantRunResult> {
  const initial = createInitialState<AssistantData>({
    input,
    context,
    result: null,
    confidence: 0,
    decision: null,
    passes: 0,
  });

  const run = await runWorkflow(createAssistantGraph(options), initial, runOptions);
  if (!run.success) {
    throw new Error(run.error);
  }

  const { state } = run;
  const executionTime = state.metadata.execution_time;
  return {
    result: state.data.result,
    confidence: state.data.confidence,
    decision: state.data.decision,
    retryCount: state.retryCount,
    executionTime: typeof executionTime === 'number' ? executionTime : 0,
    messages: state.messages.map((turn) => turn.content),
  };
}
