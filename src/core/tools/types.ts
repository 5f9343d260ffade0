import type { z } from 'zod/v4';
import type { ToolInputSchema } from '../models/index.js';

/** A JSON-serializable record returned by a tool */
export type ToolOutput = Record<string, unknown>;

/** Declaration of one tool: name, argument schema and executor */
export interface ToolDefinition<N extends string, A> {
  name: N;
  description: string;
  schema: z.ZodType<A>;
  execute: (args: A) => ToolOutput | Promise<ToolOutput>;
}

/** A tool after registration-time validation, with its argument type erased */
export interface RegisteredTool<N extends string = string> {
  readonly name: N;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  /** Parse, validate and execute against serialized JSON arguments */
  invoke(rawArguments: string): Promise<ToolOutput>;
}

export interface ToolDispatchResult {
  callId: string;
  name: string;
  output: ToolOutput;
  isError: boolean;
}
