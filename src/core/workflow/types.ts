/**
 * Workflow engine type definitions
 */

import type { ChatTurn } from '../models/index.js';

/** Closed set of step identifiers */
export const STEP_IDS = [
  'start',
  'generate',
  'dispatch_tool',
  'aggregate_partial',
  'iterate_item',
  'finalize',
  'error_handle',
  'terminal',
] as const;

export type StepId = (typeof STEP_IDS)[number];

/** Steps that have an executor ('terminal' is only a marker) */
export type ExecutableStepId = Exclude<StepId, 'terminal'>;

export type WorkflowStatus = 'running' | 'completed' | 'failed';

/**
 * State threaded through every step.
 * Steps return a new value; they never mutate the one they receive.
 */
export interface WorkflowState<D> {
  /** Append-only conversation for this run */
  readonly messages: readonly ChatTurn[];
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly currentStep: StepId;
  /** Generation calls made so far */
  readonly iteration: number;
  readonly retryCount: number;
  readonly lastError: string | null;
  readonly status: WorkflowStatus;
  /** Workflow-specific accumulators */
  readonly data: D;
}

export type StepExecutor<D> = (state: WorkflowState<D>) => Promise<WorkflowState<D>>;

/** Table entry; undefined means "no opinion" and falls through to finalize */
export type Route<D> = (state: WorkflowState<D>) => StepId | undefined;

export type TransitionTable<D> = Partial<Record<ExecutableStepId, Route<D>>>;

export interface LoopDetectionConfig {
  /** Consecutive runs of the same step before the detector fires */
  maxConsecutiveSameStep?: number;
  action?: 'warn' | 'abort' | 'ignore';
}

export interface WorkflowDefinition<D> {
  name: string;
  steps: Partial<Record<ExecutableStepId, StepExecutor<D>>>;
  transitions: TransitionTable<D>;
  /** Step re-entered after error handling */
  resumeStep: ExecutableStepId;
  maxIterations?: number;
  loopDetection?: LoopDetectionConfig;
}

export type WorkflowRunResult<D> =
  | { success: true; state: WorkflowState<D> }
  | { success: false; error: string; state: null };

/** Events emitted by WorkflowEngine */
export interface WorkflowEvents<D> {
  'step:start': (step: ExecutableStepId, iteration: number) => void;
  'step:complete': (step: ExecutableStepId, state: WorkflowState<D>, appended: readonly ChatTurn[]) => void;
  'step:loop_detected': (step: ExecutableStepId, consecutiveCount: number) => void;
  'iteration:limit': (iteration: number, maxIterations: number) => void;
  'workflow:complete': (state: WorkflowState<D>) => void;
  'workflow:abort': (state: WorkflowState<D>, reason: string) => void;
}

export interface IterationLimitRequest {
  currentIteration: number;
  maxIterations: number;
  currentStep: StepId;
}

/**
 * Callback for iteration limit reached.
 * Returns the number of additional iterations to continue, or null to stop.
 */
export type IterationLimitCallback = (request: IterationLimitRequest) => Promise<number | null>;

export interface WorkflowEngineOptions {
  /** Overrides the definition's maxIterations */
  maxIterations?: number;
  onIterationLimit?: IterationLimitCallback;
}

export interface LoopCheckResult {
  isLoop: boolean;
  count: number;
  shouldAbort: boolean;
  shouldWarn: boolean;
}
