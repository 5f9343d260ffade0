export {
  ASSISTANT_SYSTEM_PROMPT,
  PROCESSING_INSTRUCTION,
  FINALIZE_CONFIDENCE,
  HIGH_CONFIDENCE,
  DEFAULT_MAX_PASSES,
  decide,
  createAssistantGraph,
  runAssistant,
  type AssistantDecision,
  type AssistantData,
  type AssistantGraphOptions,
  type AssistantRunResult,
} from './graph.js';
