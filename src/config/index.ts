/**
 * Config module exports.
 */

export type {
  RegulatorConfigFile,
  MergedConfig,
  LogLevel,
  VizMode,
  ConfigSectionName,
} from './config-schema.js';
export {
  DEFAULT_CONFIG,
  CONFIG_FILE_VERSION,
  LOG_LEVELS,
  VIZ_MODES,
  configFileSections,
} from './config-schema.js';
export {
  ConfigLoader,
  createConfigLoader,
  loadConfig,
  CONFIG_FILE_NAME,
  STAGE_ENV_VARS,
} from './config-loader.js';
export { ConfigError, type ConfigErrorCode } from './config-errors.js';
