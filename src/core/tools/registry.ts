/**
 * Tool registry
 *
 * Maps a closed set of tool names to executors. Names and argument
 * schemas are checked once at registration; dispatch never throws.
 */

import { z } from 'zod/v4';
import type { ToolCall, ToolSchema } from '../models/index.js';
import { createLogger, formatIssues, getErrorMessage } from '../../shared/utils/index.js';
import type { RegisteredTool, ToolDefinition, ToolDispatchResult, ToolOutput } from './types.js';

const log = createLogger('tools');

const TOOL_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_-]{0,63}$/;

export class ToolRegistrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolRegistrationError';
  }
}

export function unknownToolError(name: string): ToolOutput {
  return { error: `Unknown tool: ${name}` };
}

function parseArguments(rawArguments: string): unknown {
  const trimmed = rawArguments.trim();
  return trimmed ? JSON.parse(trimmed) : {};
}

/**
 * Bind a tool definition to its schema, producing a registered tool.
 */
export function defineTool<N extends string, A>(definition: ToolDefinition<N, A>): RegisteredTool<N> {
  const json = z.toJSONSchema(definition.schema, { io: 'input' });
  if (json.type !== 'object') {
    throw new ToolRegistrationError(`Tool "${definition.name}" must take an object of named arguments`);
  }

  return {
    name: definition.name,
    description: definition.description,
    inputSchema: {
      type: 'object',
      properties: json.properties ?? {},
      required: json.required ?? [],
    },
    async invoke(rawArguments: string): Promise<ToolOutput> {
      let parsedJson: unknown;
      try {
        parsedJson = parseArguments(rawArguments);
      } catch (err) {
        return { error: `Invalid arguments for ${definition.name}: ${getErrorMessage(err)}` };
      }

      const parsed = definition.schema.safeParse(parsedJson);
      if (!parsed.success) {
        return { error: `Invalid arguments for ${definition.name}: ${formatIssues(parsed.error.issues).join('; ')}` };
      }

      try {
        return await definition.execute(parsed.data);
      } catch (err) {
        return { error: getErrorMessage(err) };
      }
    },
  };
}

export interface ToolRegistry<N extends string = string> {
  readonly names: readonly N[];
  has(name: string): name is N;
  /** Schemas advertised to the generation service */
  schemas(): ToolSchema[];
  dispatch(call: ToolCall): Promise<ToolDispatchResult>;
}

/**
 * Create a registry from a fixed tool set.
 * @throws ToolRegistrationError on duplicate or malformed names
 */
export function createToolRegistry<N extends string>(tools: readonly RegisteredTool<N>[]): ToolRegistry<N> {
  const byName = new Map<string, RegisteredTool<N>>();
  for (const tool of tools) {
    if (!TOOL_NAME_PATTERN.test(tool.name)) {
      throw new ToolRegistrationError(`Invalid tool name: "${tool.name}"`);
    }
    if (byName.has(tool.name)) {
      throw new ToolRegistrationError(`Duplicate tool name: "${tool.name}"`);
    }
    byName.set(tool.name, tool);
  }

  const names = tools.map((tool) => tool.name);
  log.debug('Tool registry created', { tools: names });

  return {
    names,
    has(name: string): name is N {
      return byName.has(name);
    },
    schemas(): ToolSchema[] {
      return tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      }));
    },
    async dispatch(call: ToolCall): Promise<ToolDispatchResult> {
      const tool = byName.get(call.name);
      if (!tool) {
        log.warn('Unknown tool requested', { name: call.name, callId: call.id });
        return { callId: call.id, name: call.name, output: unknownToolError(call.name), isError: true };
      }

      const output = await tool.invoke(call.arguments);
      const isError = typeof output.error === 'string';
      log.debug('Tool dispatched', { name: call.name, callId: call.id, isError });
      return { callId: call.id, name: call.name, output, isError };
    },
  };
}
