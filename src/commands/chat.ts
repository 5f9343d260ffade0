/**
 * Interactive tool-calling chat
 */

import { CHAT_TOOL_NAMES, runChatTurn, type ChatWorkflowData } from '../features/chat/index.js';
import { runInteractiveLoop } from '../shared/prompt/index.js';
import { blankLine, header, info } from '../shared/ui/index.js';
import { createRuntime, workflowRunOptions, type GlobalCommandOptions } from './runtime.js';

export async function chatCommand(options: GlobalCommandOptions): Promise<void> {
  const runtime = createRuntime(options);
  const runOptions = workflowRunOptions<ChatWorkflowData>(runtime);

  header('Tool chat');
  info(`Tools: ${CHAT_TOOL_NAMES.join(', ')}`);

  await runInteractiveLoop({
    prompt: 'You: ',
    onInput: async (input) => {
      const reply = await runChatTurn(
        input,
        { client: runtime.client, model: runtime.model },
        runOptions,
      );
      console.log(`Assistant: ${reply.answer}`);
      blankLine();
    },
  });
}
