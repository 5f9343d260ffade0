/**
 * Anthropic Messages API client
 *
 * Maps the provider-neutral conversation onto Messages API calls:
 * system turns become the `system` parameter, tool turns become
 * `tool_result` blocks and consecutive same-role turns are merged.
 */

import Anthropic from '@anthropic-ai/sdk';
import type {
  ContentBlockParam,
  Message,
  MessageCreateParamsNonStreaming,
  MessageParam,
  Tool,
} from '@anthropic-ai/sdk/resources/messages';
import type {
  ChatTurn,
  GenerationClient,
  GenerationRequest,
  GenerationResponse,
  ToolCall,
  ToolSchema,
} from '../../core/models/index.js';
import { DEFAULT_MODEL } from '../../shared/constants.js';
import { createLogger, getErrorMessage, isRecord } from '../../shared/utils/index.js';

const log = createLogger('anthropic');

export const JSON_ONLY_INSTRUCTION =
  'Respond with a single valid JSON object only. Do not wrap it in markdown or add any other text.';

const DEFAULT_MAX_TOKENS = 1024;

export class GenerationError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
    this.status = status;
  }
}

export interface AnthropicClientOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}

interface ConvertedConversation {
  system: string[];
  messages: MessageParam[];
}

function parseToolInput(args: string): Record<string, unknown> {
  if (!args.trim()) return {};
  try {
    const value: unknown = JSON.parse(args);
    return isRecord(value) ? value : {};
  } catch {
    return {};
  }
}

function toBlocks(turn: Exclude<ChatTurn, { role: 'system' }>): ContentBlockParam[] {
  switch (turn.role) {
    case 'user':
      return turn.content ? [{ type: 'text', text: turn.content }] : [];
    case 'assistant': {
      const blocks: ContentBlockParam[] = turn.content ? [{ type: 'text', text: turn.content }] : [];
      for (const call of turn.toolCalls ?? []) {
        blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: parseToolInput(call.arguments) });
      }
      return blocks;
    }
    case 'tool':
      return [{ type: 'tool_result', tool_use_id: turn.toolCallId, content: turn.content }];
  }
}

/** Convert conversation turns to Messages API parameters */
export function toAnthropicConversation(turns: readonly ChatTurn[]): ConvertedConversation {
  const system: string[] = [];
  const messages: { role: 'user' | 'assistant'; content: ContentBlockParam[] }[] = [];

  for (const turn of turns) {
    if (turn.role === 'system') {
      if (turn.content) system.push(turn.content);
      continue;
    }

    const role = turn.role === 'assistant' ? 'assistant' : 'user';
    const blocks = toBlocks(turn);
    if (blocks.length === 0) continue;

    const previous = messages[messages.length - 1];
    if (previous && previous.role === role) {
      previous.content.push(...blocks);
    } else {
      messages.push({ role, content: blocks });
    }
  }

  return { system, messages };
}

export function toAnthropicTool(schema: ToolSchema): Tool {
  return {
    name: schema.name,
    description: schema.description,
    input_schema: {
      type: 'object',
      properties: schema.inputSchema.properties,
      required: schema.inputSchema.required,
    },
  };
}

/** Extract text and tool calls from a Messages API reply */
export function fromAnthropicMessage(message: Pick<Message, 'content' | 'stop_reason' | 'model'>): GenerationResponse {
  const text: string[] = [];
  const toolCalls: ToolCall[] = [];

  for (const block of message.content) {
    if (block.type === 'text') {
      text.push(block.text);
    } else if (block.type === 'tool_use') {
      toolCalls.push({ id: block.id, name: block.name, arguments: JSON.stringify(block.input ?? {}) });
    }
  }

  return {
    content: text.join(''),
    toolCalls,
    stopReason: message.stop_reason,
    model: message.model,
  };
}

export class AnthropicGenerationClient implements GenerationClient {
  private readonly client: Anthropic;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number | undefined;

  constructor(options: AnthropicClientOptions) {
    this.client = new Anthropic({
      apiKey: options.apiKey,
      maxRetries: 0,
      ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {}),
    });
    this.model = options.model ?? DEFAULT_MODEL;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = options.temperature;
  }

  buildParams(request: GenerationRequest): MessageCreateParamsNonStreaming {
    const { system, messages } = toAnthropicConversation(request.messages);
    if (request.system) system.push(request.system);
    if (request.forceJson) system.push(JSON_ONLY_INSTRUCTION);

    const temperature = request.temperature ?? this.temperature;
    const tools = request.tools ?? [];

    return {
      model: request.model ?? this.model,
      max_tokens: request.maxTokens ?? this.maxTokens,
      messages,
      ...(system.length > 0 ? { system: system.join('\n\n') } : {}),
      ...(temperature !== undefined ? { temperature } : {}),
      ...(tools.length > 0 ? { tools: tools.map(toAnthropicTool) } : {}),
    };
  }

  async generate(request: GenerationRequest): Promise<GenerationResponse> {
    const params = this.buildParams(request);
    log.debug('Sending generation request', {
      model: params.model,
      messages: params.messages.length,
      tools: params.tools?.map((tool) => tool.name) ?? [],
      forceJson: request.forceJson ?? false,
    });

    let message: Message;
    try {
      message = await this.client.messages.create(params);
    } catch (err) {
      if (err instanceof Anthropic.APIError) {
        log.error('Generation request failed', { status: err.status, message: err.message });
        throw new GenerationError(`Generation request failed (${err.status ?? 'no status'}): ${err.message}`, err.status, { cause: err });
      }
      log.error('Generation request failed', { error: getErrorMessage(err) });
      throw new GenerationError(`Generation request failed: ${getErrorMessage(err)}`, undefined, { cause: err });
    }

    const response = fromAnthropicMessage(message);
    log.debug('Generation response received', {
      stopReason: response.stopReason,
      toolCalls: response.toolCalls.length,
      length: response.content.length,
    });
    return response;
  }
}
