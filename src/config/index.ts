export { loadConfig, type ConfigLoadResult, type ConfigLoadOptions } from './config-manager.js';
export {
  UserConfigSchema,
  DEFAULT_CONFIG,
  resolveConfig,
  type ValidatedUserConfig,
  type TimelineConfig,
} from './schema.js';
