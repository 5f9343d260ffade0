/**
 * One-call workflow execution
 */

import { WorkflowEngine } from './engine.js';
import type { WorkflowDefinition, WorkflowEngineOptions, WorkflowRunResult, WorkflowState } from './types.js';

export interface RunWorkflowOptions<D> extends WorkflowEngineOptions {
  /** Attach listeners before the run starts */
  observe?: (engine: WorkflowEngine<D>) => void;
}

/** Build an engine for the definition, let the caller observe it, and run it */
export async function runWorkflow<D>(
  definition: WorkflowDefinition<D>,
  initialState: WorkflowState<D>,
  options: RunWorkflowOptions<D> = {},
): Promise<WorkflowRunResult<D>> {
  const { observe, ...engineOptions } = options;
  const engine = new WorkflowEngine(definition, initialState, engineOptions);
  observe?.(engine);
  return engine.run();
}
