export {
  createLogger,
  initDebugLogger,
  setVerboseConsole,
  isDebugEnabled,
  getDebugLogFile,
  resetDebugLogger,
  type Logger,
  type DebugConfig,
} from './debug.js';
export { getErrorMessage } from './error.js';
export {
  formatFileTimestamp,
  generateResultsFileName,
  writeFileAtomic,
  writeJsonFile,
} from './resultsFile.js';
export { formatIssues } from './validation.js';
export { parseJsonObject, isRecord, type JsonObjectResult } from './json.js';
