/**
 * Application-wide constants
 */

/** Directory name for global and project-local state */
export const APP_DIR_NAME = '.labgraph';

/** Default model for all generation calls */
export const DEFAULT_MODEL = 'claude-sonnet-4-5';

/** Environment variable that overrides the global config directory */
export const CONFIG_DIR_ENV = 'LABGRAPH_CONFIG_DIR';

/** Environment variables checked (in order) for the API key */
export const API_KEY_ENV_VARS = ['LABGRAPH_ANTHROPIC_API_KEY', 'ANTHROPIC_API_KEY'] as const;
