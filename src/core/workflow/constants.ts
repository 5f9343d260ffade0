/**
 * Workflow engine constants
 */

import type { StepId } from './types.js';

/** The only step that increments the iteration counter */
export const GENERATION_STEP: StepId = 'generate';

export const DEFAULT_MAX_ITERATIONS = 25;

export const DEFAULT_MAX_RETRIES = 3;

export const ERROR_MESSAGES = {
  MAX_ITERATIONS_REACHED: 'Max iterations reached',
  UNKNOWN_STEP: (step: string) => `Unknown step: ${step}`,
  LOOP_DETECTED: (step: string, count: number) =>
    `Loop detected: step "${step}" ran ${count} times consecutively`,
  STEP_EXECUTION_FAILED: (message: string) => `Step execution failed: ${message}`,
  MAX_RETRIES_EXCEEDED: (maxRetries: number, message: string) =>
    `Max retries (${maxRetries}) exceeded: ${message}`,
} as const;
