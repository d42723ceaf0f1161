/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `derma config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  RetrievalConfigSchema,
  ClassifierConfigSchema,
  CatalogConfigSchema,
  DocumentsConfigSchema,
  WebConfigSchema,
  GenerationConfigSchema,
  EmbeddingConfigSchema,
  HistoryConfigSchema,
  ObservabilityConfigSchema,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE, buildDefaultConfig, buildConfigTemplate } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  deepMerge,
  parseValue,
} from './loader.js';

// Paths
export { getAppDir, getConfigPath, getDbPath } from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  hasApiKey,
  getOllamaHost,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars } from './env.js';
