export {
  defineTool,
  createToolRegistry,
  unknownToolError,
  ToolRegistrationError,
  type ToolRegistry,
} from './registry.js';
export type { ToolDefinition, RegisteredTool, ToolDispatchResult, ToolOutput } from './types.js';
