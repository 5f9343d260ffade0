/**
 * Tool-calling chat agent
 *
 * start -> generate <-> dispatch_tool -> finalize -> terminal
 */

import type { ChatTurn, GenerationClient } from '../../core/models/index.js';
import type { ToolDispatchResult } from '../../core/tools/index.js';
import {
  createGenerationStep,
  createInitialState,
  createStartStep,
  createToolDispatchStep,
  runWorkflow,
  setMetadata,
  updateData,
  type RunWorkflowOptions,
  type WorkflowDefinition,
  type WorkflowState,
} from '../../core/workflow/index.js';
import { createChatTools, type ChatToolOptions } from './tools.js';

export const CHAT_SYSTEM_PROMPT =
  'You are a helpful AI assistant with access to various tools. You can help with weather information, calculations, '
  + 'web searches, and time queries. Always use the appropriate tool when needed and provide clear, helpful responses.';

const CHAT_TEMPERATURE = 0.7;
const CHAT_MAX_TOKENS = 1000;

export interface ChatWorkflowData {
  input: string;
  toolResults: ToolDispatchResult[];
  answer: string | null;
}

export interface ChatAgentOptions extends ChatToolOptions {
  client: GenerationClient;
  model?: string;
}

function lastAnswer(messages: readonly ChatTurn[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const turn = messages[i];
    if (turn?.role === 'assistant' && turn.content) return turn.content;
  }
  return '';
}

export function createChatWorkflow(options: ChatAgentOptions): WorkflowDefinition<ChatWorkflowData> {
  const tools = createChatTools(options);

  const finalize = async (state: WorkflowState<ChatWorkflowData>): Promise<WorkflowState<ChatWorkflowData>> => {
    const answer = lastAnswer(state.messages);
    return setMetadata(updateData(state, { answer }), { tool_calls: state.data.toolResults.length });
  };

  return {
    name: 'chat',
    steps: {
      start: createStartStep<ChatWorkflowData>({
        system: CHAT_SYSTEM_PROMPT,
        user: (state) => state.data.input,
      }),
      generate: createGenerationStep<ChatWorkflowData>({
        client: options.client,
        model: options.model,
        tools,
        temperature: CHAT_TEMPERATURE,
        maxTokens: CHAT_MAX_TOKENS,
      }),
      dispatch_tool: createToolDispatchStep<ChatWorkflowData>({
        registry: tools,
        onResult: (state, result) => updateData(state, { toolResults: [...state.data.toolResults, result] }),
      }),
      finalize,
    },
    // A reply without tool calls falls through to finalize
    transitions: {
      start: () => 'generate',
    },
    resumeStep: 'generate',
  };
}

export interface ChatReply {
  answer: string;
  toolResults: ToolDispatchResult[];
  iterations: number;
}

/**
 * Answer one message, calling tools as the model requests.
 * @throws Error when the workflow aborts
 */
export async function runChatTurn(
  input: string,
  options: ChatAgentOptions,
  runOptions: RunWorkflowOptions<ChatWorkflowData> = {},
): Promise<ChatReply> {
  const initial = createInitialState<ChatWorkflowData>({ input, toolResults: [], answer: null });
  const run = await runWorkflow(createChatWorkflow(options), initial, runOptions);
  if (!run.success) {
    throw new Error(run.error);
  }
  return {
    answer: run.state.data.answer ?? '',
    toolResults: run.state.data.toolResults,
    iterations: run.state.iteration,
  };
}
