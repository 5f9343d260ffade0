export { WorkflowEngine, WorkflowDefinitionError } from './engine.js';
export { routeNext } from './transitions.js';
export { runWorkflow, type RunWorkflowOptions } from './runner.js';
export { LoopDetector } from './loop-detector.js';
export {
  createStartStep,
  createGenerationStep,
  createToolDispatchStep,
  createErrorHandleStep,
  type StartStepOptions,
  type GenerationStepOptions,
  type ToolDispatchStepOptions,
  type ErrorHandleStepOptions,
} from './steps.js';
export {
  createInitialState,
  appendTurns,
  updateData,
  setMetadata,
  setError,
  incrementIteration,
  moveTo,
  withStatus,
  lastTurn,
  pendingToolCalls,
  findLastToolResult,
  toTranscript,
  type InitialStateOptions,
} from './state.js';
export {
  GENERATION_STEP,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_MAX_RETRIES,
  ERROR_MESSAGES,
} from './constants.js';
export {
  STEP_IDS,
  type StepId,
  type ExecutableStepId,
  type WorkflowStatus,
  type WorkflowState,
  type StepExecutor,
  type Route,
  type TransitionTable,
  type LoopDetectionConfig,
  type WorkflowDefinition,
  type WorkflowRunResult,
  type WorkflowEvents,
  type IterationLimitRequest,
  type IterationLimitCallback,
  type WorkflowEngineOptions,
  type LoopCheckResult,
} from './types.js';
