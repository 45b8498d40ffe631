/**
 * Config module exports.
 */

export type { SessionConfig, SessionConfigFile, MergedConfig, ConfigLogLevel } from './config-schema.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_SESSION_CONFIG,
  DEFAULT_FRAME_RATE,
  CONFIG_FILE_VERSION,
  sessionConfigFileSchema,
} from './config-schema.js';
export {
  ConfigLoader,
  createConfigLoader,
  loadConfig,
  CONFIG_FILE_NAME,
  type ConfigLoaderOptions,
} from './config-loader.js';
