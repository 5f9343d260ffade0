/**
 * Workflow state helpers
 *
 * Every helper returns a new state; the input is left untouched.
 */

import type { ChatTurn, ToolCall, ToolTurn } from '../models/index.js';
import type { StepId, WorkflowState, WorkflowStatus } from './types.js';

export interface InitialStateOptions {
  messages?: readonly ChatTurn[];
  metadata?: Record<string, unknown>;
}

export function createInitialState<D>(data: D, options: InitialStateOptions = {}): WorkflowState<D> {
  return {
    messages: [...(options.messages ?? [])],
    metadata: { ...options.metadata },
    currentStep: 'start',
    iteration: 0,
    retryCount: 0,
    lastError: null,
    status: 'running',
    data,
  };
}

export function appendTurns<D>(state: WorkflowState<D>, ...turns: ChatTurn[]): WorkflowState<D> {
  if (turns.length === 0) return state;
  return { ...state, messages: [...state.messages, ...turns] };
}

export function updateData<D extends object>(state: WorkflowState<D>, patch: Partial<D>): WorkflowState<D> {
  return { ...state, data: { ...state.data, ...patch } };
}

export function setMetadata<D>(state: WorkflowState<D>, patch: Record<string, unknown>): WorkflowState<D> {
  return { ...state, metadata: { ...state.metadata, ...patch } };
}

export function setError<D>(state: WorkflowState<D>, message: string): WorkflowState<D> {
  return { ...state, lastError: message };
}

export function incrementIteration<D>(state: WorkflowState<D>): WorkflowState<D> {
  return { ...state, iteration: state.iteration + 1 };
}

export function moveTo<D>(state: WorkflowState<D>, step: StepId): WorkflowState<D> {
  return { ...state, currentStep: step };
}

export function withStatus<D>(state: WorkflowState<D>, status: WorkflowStatus): WorkflowState<D> {
  return { ...state, status };
}

export function lastTurn<D>(state: WorkflowState<D>): ChatTurn | undefined {
  return state.messages[state.messages.length - 1];
}

/** Tool calls on the most recent turn that have not been dispatched yet */
export function pendingToolCalls<D>(state: WorkflowState<D>): readonly ToolCall[] {
  const turn = lastTurn(state);
  if (turn?.role !== 'assistant') return [];
  return turn.toolCalls ?? [];
}

/** Most recent tool result for the given tool name */
export function findLastToolResult<D>(state: WorkflowState<D>, toolName: string): ToolTurn | undefined {
  for (let i = state.messages.length - 1; i >= 0; i--) {
    const turn = state.messages[i];
    if (turn?.role === 'tool' && turn.name === toolName) {
      return turn;
    }
  }
  return undefined;
}

/** Text content of each turn, in order */
export function toTranscript(messages: readonly ChatTurn[]): string[] {
  return messages.map((turn) => turn.content);
}
