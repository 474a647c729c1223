/**
 * Config module exports.
 */

export type {
  SimulationConfigFile,
  MergedConfig,
  SimulationSettings,
  CareTeamMember,
  LLMProviderName,
} from './config-schema.js';
export {
  DEFAULT_CONFIG,
  CONFIG_FILE_VERSION,
  LLM_PROVIDERS,
  configFileSchema,
} from './config-schema.js';
export { ConfigLoader, createConfigLoader, loadConfig } from './config-loader.js';
