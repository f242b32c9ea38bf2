/**
 * Configuration module.
 *
 * @module core/config
 */

export {
  DEFAULT_CONFIG,
  DEFAULT_BUFFER_THRESHOLD,
  mergeWithDefaults,
  getDataPaths,
  type DataPaths,
} from './defaults.js';
export {
  loadConfig,
  readConfigFile,
  configFromEnv,
  PartialConfigSchema,
  CONFIG_FILE,
  type LoadConfigOptions,
} from './loader.js';
