/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `helpdesk config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  LLMProviderTypeSchema,
  EmbeddingProviderTypeSchema,
  VectorStoreBackendSchema,
} from './schema.js';
export type {
  Config,
  PartialConfig,
  LLMProviderType,
  EmbeddingProviderType,
  VectorStoreBackend,
} from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  deepMerge,
  parseValue,
  envOverrides,
  type LoadConfigOptions,
} from './loader.js';

// Paths
export {
  HELPDESK_DIR,
  DEFAULT_CONFIG_PATH,
  getHelpdeskDir,
  getConfigPath,
  getIndexDbPath,
  expandHome,
} from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  getApiKey,
  hasApiKey,
  API_KEY_ENV_VARS,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars } from './env.js';

// Startup validation
export {
  validateStartupConfig,
  assertStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  COMMANDS_REQUIRING_LLM,
  COMMANDS_REQUIRING_EMBEDDING,
} from './startup-validation.js';
export type {
  StartupValidationResult,
  StartupValidationOptions,
  StartupProblem,
} from './startup-validation.js';
