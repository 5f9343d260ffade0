export {
  CHAT_TOOL_NAMES,
  CALCULATOR_OPERATIONS,
  createChatTools,
  getWeather,
  calculate,
  webSearch,
  getCurrentTime,
  formatUtcDateTime,
  type ChatToolName,
  type ChatToolOptions,
} from './tools.js';
export {
  CHAT_SYSTEM_PROMPT,
  createChatWorkflow,
  runChatTurn,
  type ChatWorkflowData,
  type ChatAgentOptions,
  type ChatReply,
} from './agent.js';
