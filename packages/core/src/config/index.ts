export {
  NetlensConfigSchema,
  ProviderConfigSchema,
  ProviderKindSchema,
  DEFAULT_CONFIG,
  type NetlensConfig,
  type ProviderConfig,
  type ProviderKind,
  type LogLevel,
} from './schema.js';
export { loadConfig, applyEnvOverrides, deepMerge, type LoadConfigOptions } from './loader.js';
export {
  validateConfig,
  activeProviders,
  ConfigError,
  type ValidationResult,
  type ValidationError,
  type ValidationWarning,
} from './validator.js';
