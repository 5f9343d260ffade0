/**
 * Confidence-routed assistant
 */

import { runAssistant, type AssistantData } from '../features/assistant/index.js';
import { runInteractiveLoop } from '../shared/prompt/index.js';
import { blankLine, header, status, success } from '../shared/ui/index.js';
import { createRuntime, workflowRunOptions, type GlobalCommandOptions } from './runtime.js';

export interface AssistantCommandOptions extends GlobalCommandOptions {
  context?: string;
}

export async function assistantCommand(input: string | undefined, options: AssistantCommandOptions): Promise<void> {
  const runtime = createRuntime(options);
  const runOptions = workflowRunOptions<AssistantData>(runtime);
  const context = options.context ?? null;

  const ask = async (text: string): Promise<void> => {
    const outcome = await runAssistant(
      text,
      context,
      { client: runtime.client, model: runtime.model, maxRetries: runtime.config.maxRetries },
      runOptions,
    );
    success(outcome.result ?? 'No result generated');
    status('Confidence', outcome.confidence.toFixed(2), outcome.confidence > 0.7 ? 'green' : 'yellow');
    if (outcome.decision) status('Decision', outcome.decision);
    status('Retries', String(outcome.retryCount));
    status('Execution time', `${outcome.executionTime.toFixed(2)}s`);
    if (runtime.verbose) {
      blankLine();
      outcome.messages.forEach((message, index) => console.log(`${index + 1}. ${message}`));
    }
  };

  if (input) {
    await ask(input);
    return;
  }

  header('Assistant');
  await runInteractiveLoop({ prompt: 'You: ', onInput: ask });
}
