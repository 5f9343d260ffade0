/**
 * labgraph - step-state LLM workflow labs
 *
 * This module exports the public API for programmatic usage.
 */

// Models
export * from './core/models/index.js';

// Tools and workflow engine
export * from './core/tools/index.js';
export * from './core/workflow/index.js';

// Configuration
export * from './infra/config/global/index.js';

// Generation service and data sources
export * from './infra/llm/index.js';
export * from './infra/data/index.js';

// Features
export * from './features/writing/index.js';
export * from './features/extraction/index.js';
export * from './features/chat/index.js';
export * from './features/payments/index.js';
export * from './features/assistant/index.js';
export * from './features/merchants/index.js';

// Utilities
export {
  createLogger,
  initDebugLogger,
  setVerboseConsole,
  getErrorMessage,
  generateResultsFileName,
  writeJsonFile,
  type Logger,
  type DebugConfig,
} from './shared/utils/index.js';
