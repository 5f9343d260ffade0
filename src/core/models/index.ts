export type {
  ToolCall,
  SystemTurn,
  UserTurn,
  AssistantTurn,
  ToolTurn,
  ChatTurn,
  ChatRole,
  ToolInputSchema,
  ToolSchema,
  GenerationRequest,
  GenerationResponse,
  GenerationClient,
} from './types.js';
export type { GlobalConfig } from './config.js';
export {
  LogLevelSchema,
  DebugConfigSchema,
  DataConfigSchema,
  GlobalConfigSchema,
  type GlobalConfigRaw,
} from './schemas.js';
