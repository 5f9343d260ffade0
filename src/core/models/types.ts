/**
 * Conversation and generation-service types
 */

/** A tool call requested by the model */
export interface ToolCall {
  id: string;
  name: string;
  /** Serialized JSON argument object */
  arguments: string;
}

export interface SystemTurn {
  role: 'system';
  content: string;
}

export interface UserTurn {
  role: 'user';
  content: string;
}

export interface AssistantTurn {
  role: 'assistant';
  content: string;
  toolCalls?: readonly ToolCall[];
}

/** Result of one tool call, paired with its originating call id */
export interface ToolTurn {
  role: 'tool';
  content: string;
  toolCallId: string;
  name: string;
}

export type ChatTurn = SystemTurn | UserTurn | AssistantTurn | ToolTurn;

export type ChatRole = ChatTurn['role'];

/** JSON-schema description of a tool's arguments */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required: string[];
}

export interface ToolSchema {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface GenerationRequest {
  /** Overrides the client's default model */
  model?: string;
  /** Instruction appended after any system turns in `messages` */
  system?: string;
  messages: readonly ChatTurn[];
  tools?: readonly ToolSchema[];
  temperature?: number;
  maxTokens?: number;
  /** Ask for a single JSON object and nothing else */
  forceJson?: boolean;
}

export interface GenerationResponse {
  content: string;
  toolCalls: ToolCall[];
  stopReason: string | null;
  model: string;
}

/** Boundary to the hosted text-generation service */
export interface GenerationClient {
  generate(request: GenerationRequest): Promise<GenerationResponse>;
}
