/**
 * Command exports
 */

export {
  createRuntime,
  observeWorkflow,
  promptIterationExtension,
  workflowRunOptions,
  type CommandRuntime,
  type GlobalCommandOptions,
} from './runtime.js';
export { postCommand, haikuCommand, rentalCommand, songCommand, type SongCommandOptions } from './labs.js';
export { chatCommand } from './chat.js';
export { paymentsCommand, type PaymentsCommandOptions } from './payments.js';
export { assistantCommand, type AssistantCommandOptions } from './assistant.js';
export {
  merchantsCommand,
  printMerchantReport,
  MERCHANTS_DEFAULTS,
  DEFAULT_ANALYSIS_DAYS,
  RESULTS_FILE_PREFIX,
  type MerchantsCommandOptions,
} from './merchants.js';
