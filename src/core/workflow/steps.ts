/**
 * Reusable step executors
 *
 * Workflows assemble their step tables from these factories and add
 * their own aggregation and finalization steps.
 */

import type {
  AssistantTurn,
  ChatTurn,
  GenerationClient,
  GenerationResponse,
  ToolTurn,
} from '../models/index.js';
import type { ToolDispatchResult, ToolRegistry } from '../tools/index.js';
import { createLogger } from '../../shared/utils/index.js';
import { ERROR_MESSAGES } from './constants.js';
import {
  appendTurns,
  incrementIteration,
  pendingToolCalls,
  setMetadata,
  withStatus,
} from './state.js';
import type { StepExecutor, WorkflowState } from './types.js';

const log = createLogger('steps');

type StateText<D> = string | ((state: WorkflowState<D>) => string | undefined);

function resolveText<D>(text: StateText<D> | undefined, state: WorkflowState<D>): string | undefined {
  if (text === undefined) return undefined;
  return typeof text === 'string' ? text : text(state);
}

export interface StartStepOptions<D> {
  system?: StateText<D>;
  user: StateText<D>;
  /** Clock used for metadata.start_time */
  now?: () => number;
}

/** Seed the conversation with a system and a user turn */
export function createStartStep<D>(options: StartStepOptions<D>): StepExecutor<D> {
  const now = options.now ?? Date.now;
  return async (state) => {
    const turns: ChatTurn[] = [];
    const system = resolveText(options.system, state);
    if (system) turns.push({ role: 'system', content: system });
    const user = resolveText(options.user, state);
    if (user) turns.push({ role: 'user', content: user });
    return setMetadata(appendTurns(state, ...turns), { start_time: now() });
  };
}

export interface GenerationStepOptions<D> {
  client: GenerationClient;
  /** Step-specific system instruction */
  instruction?: StateText<D>;
  /** User turn appended before the call (e.g. a phase prompt) */
  prompt?: StateText<D>;
  /** Tools advertised with the request */
  tools?: ToolRegistry;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  forceJson?: boolean;
  /** Fold the reply into workflow data after it is appended */
  onReply?: (state: WorkflowState<D>, response: GenerationResponse) => WorkflowState<D>;
}

/**
 * Send the conversation to the generation service and append the reply.
 * Transport errors propagate and end the run.
 */
export function createGenerationStep<D>(options: GenerationStepOptions<D>): StepExecutor<D> {
  return async (state) => {
    const prompt = resolveText(options.prompt, state);
    const prepared = prompt ? appendTurns(state, { role: 'user', content: prompt }) : state;

    const response = await options.client.generate({
      model: options.model,
      system: resolveText(options.instruction, prepared),
      messages: prepared.messages,
      tools: options.tools?.schemas(),
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      forceJson: options.forceJson,
    });

    log.debug('Generation reply', {
      iteration: state.iteration + 1,
      toolCalls: response.toolCalls.map((call) => call.name),
      stopReason: response.stopReason,
    });

    const reply: AssistantTurn = response.toolCalls.length > 0
      ? { role: 'assistant', content: response.content, toolCalls: response.toolCalls }
      : { role: 'assistant', content: response.content };

    const next = incrementIteration(appendTurns(prepared, reply));
    return options.onReply ? options.onReply(next, response) : next;
  };
}

export interface ToolDispatchStepOptions<D> {
  registry: ToolRegistry;
  /** Fold one tool result into workflow data */
  onResult?: (state: WorkflowState<D>, result: ToolDispatchResult) => WorkflowState<D>;
}

/**
 * Run every pending tool call, in order, appending one tool turn per call.
 * Unknown tools and executor failures come back as `{ error }` records.
 */
export function createToolDispatchStep<D>(options: ToolDispatchStepOptions<D>): StepExecutor<D> {
  return async (state) => {
    let next = state;
    for (const call of pendingToolCalls(state)) {
      const result = await options.registry.dispatch(call);
      const turn: ToolTurn = {
        role: 'tool',
        content: JSON.stringify(result.output),
        toolCallId: result.callId,
        name: result.name,
      };
      next = appendTurns(next, turn);
      if (options.onResult) {
        next = options.onResult(next, result);
      }
    }
    return next;
  };
}

export interface ErrorHandleStepOptions {
  maxRetries: number;
}

/**
 * Note the error in the conversation, count the retry and clear the error.
 * Once `maxRetries` retries have been spent the run is marked failed.
 */
export function createErrorHandleStep<D>(options: ErrorHandleStepOptions): StepExecutor<D> {
  return async (state) => {
    const message = state.lastError ?? 'Unknown error occurred';

    if (state.retryCount >= options.maxRetries) {
      log.error('Retry ceiling reached', { retryCount: state.retryCount, error: message });
      return {
        ...withStatus(state, 'failed'),
        lastError: ERROR_MESSAGES.MAX_RETRIES_EXCEEDED(options.maxRetries, message),
      };
    }

    log.warn('Handling workflow error', { retryCount: state.retryCount, error: message });
    const noted = appendTurns(state, {
      role: 'assistant',
      content: `An error occurred: ${message}. Retry count: ${state.retryCount}`,
    });
    return { ...noted, retryCount: state.retryCount + 1, lastError: null };
  };
}
