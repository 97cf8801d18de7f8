/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `godoc-extract config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  ParserConfigSchema,
  OutputConfigSchema,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  toScanOptions,
  resolveOutputDir,
} from './loader.js';

// Paths
export { getHomeDir, getConfigPath, DEFAULT_HOME_DIR } from './paths.js';

// Environment variables
export { loadEnv, getEnv, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
