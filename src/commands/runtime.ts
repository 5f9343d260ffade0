/**
 * Shared command plumbing: client construction, iteration-limit
 * prompting and engine event display.
 */

import type { GenerationClient, GlobalConfig } from '../core/models/index.js';
import type { IterationLimitRequest, RunWorkflowOptions, WorkflowEngine } from '../core/workflow/index.js';
import { loadGlobalConfig } from '../infra/config/global/index.js';
import { createGenerationClient } from '../infra/llm/index.js';
import { promptInput } from '../shared/prompt/index.js';
import { debug, info, toolResult, truncate, warn } from '../shared/ui/index.js';
import { createLogger, parseJsonObject } from '../shared/utils/index.js';

const log = createLogger('runtime');

/** Options every subcommand reads from the root program */
export type GlobalCommandOptions = {
  model?: string;
  verbose?: boolean;
};

export interface CommandRuntime {
  config: GlobalConfig;
  client: GenerationClient;
  model: string;
  verbose: boolean;
}

/**
 * Load config and build the generation client.
 * @throws ConfigError when the API key is missing
 */
export function createRuntime(options: GlobalCommandOptions): CommandRuntime {
  const config = loadGlobalConfig();
  const model = options.model ?? config.model;
  return {
    config,
    client: createGenerationClient(config, { model }),
    model,
    verbose: options.verbose === true,
  };
}

/**
 * Ask whether to extend the iteration budget.
 * Non-interactive sessions stop at the limit.
 */
export async function promptIterationExtension(request: IterationLimitRequest): Promise<number | null> {
  warn(`Max iterations reached (${request.currentIteration}/${request.maxIterations})`);
  info(`Current step: ${request.currentStep}`);

  if (!process.stdin.isTTY) {
    return null;
  }

  while (true) {
    const input = await promptInput('Additional iterations (empty to stop)');
    if (!input) {
      return null;
    }

    const additional = Number.parseInt(input, 10);
    if (Number.isInteger(additional) && additional > 0) {
      return additional;
    }

    warn('Enter a whole number of 1 or more.');
  }
}

function isErrorPayload(content: string): boolean {
  const parsed = parseJsonObject(content);
  return parsed.ok && typeof parsed.value.error === 'string';
}

/**
 * Print engine progress. Tool activity is always shown,
 * step transitions only in verbose mode.
 */
export function observeWorkflow<D>(verbose: boolean): (engine: WorkflowEngine<D>) => void {
  return (engine) => {
    engine.on('step:start', (step, iteration) => {
      log.debug('Step starting', { step, iteration });
      if (verbose) debug(`[${iteration}] ${step}`);
    });

    engine.on('step:complete', (step, _state, appended) => {
      log.debug('Step completed', { step, appended: appended.length });
      for (const turn of appended) {
        if (turn.role === 'assistant' && turn.toolCalls) {
          for (const call of turn.toolCalls) {
            info(`Using tool: ${call.name} ${truncate(call.arguments, 80)}`);
          }
        } else if (turn.role === 'tool') {
          toolResult(turn.name, turn.content, isErrorPayload(turn.content));
        }
      }
    });

    engine.on('step:loop_detected', (step, count) => {
      warn(`Step "${step}" has run ${count} times in a row`);
    });

    engine.on('workflow:abort', (state, reason) => {
      log.error('Workflow aborted', { reason, iterations: state.iteration });
    });
  };
}

/** Engine options shared by every engine-driven command */
export function workflowRunOptions<D>(runtime: CommandRuntime): RunWorkflowOptions<D> {
  return {
    maxIterations: runtime.config.maxIterations,
    onIterationLimit: promptIterationExtension,
    observe: observeWorkflow<D>(runtime.verbose),
  };
}
