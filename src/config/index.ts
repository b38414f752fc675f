/**
 * Configuration module for nullproof.toml parsing.
 *
 * Provides typed configuration parsing with defaults and environment
 * variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ABSENT_VALUE_SETTINGS, ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  AbsentValueSetting,
  CheckerSettingsConfig,
  Config,
  EnumerationConfig,
  LoggingConfig,
  PartialConfig,
} from './types.js';
export { DEFAULT_CHECKER, DEFAULT_CONFIG, DEFAULT_ENUMERATION, DEFAULT_LOGGING } from './defaults.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  mergeConfig,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { CONFIG_FILE_NAME, loadConfig } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
