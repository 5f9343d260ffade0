/**
 * Step routing
 *
 * Pure: reads the state, returns the next step id.
 */

import { pendingToolCalls } from './state.js';
import type { ExecutableStepId, StepId, TransitionTable, WorkflowState } from './types.js';

/**
 * Decide the step after the one just executed.
 *
 * Precedence:
 *   1. failed run or finalize -> terminal
 *   2. undispatched tool calls -> dispatch_tool
 *   3. lastError set -> error_handle
 *   4. error_handle -> resumeStep; dispatch_tool -> generate
 *   5. the workflow's table entry for the current step
 *   6. otherwise finalize
 */
export function routeNext<D>(
  state: WorkflowState<D>,
  transitions: TransitionTable<D>,
  resumeStep: ExecutableStepId,
): StepId {
  const current = state.currentStep;

  if (state.status === 'failed' || current === 'terminal' || current === 'finalize') {
    return 'terminal';
  }

  if (pendingToolCalls(state).length > 0) {
    return 'dispatch_tool';
  }

  if (state.lastError !== null && current !== 'error_handle') {
    return 'error_handle';
  }

  if (current === 'error_handle') {
    return resumeStep;
  }

  if (current === 'dispatch_tool') {
    return 'generate';
  }

  return transitions[current]?.(state) ?? 'finalize';
}
