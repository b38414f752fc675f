/**
 * Configuration types for nullproof.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Value substituted for the parameter under test.
 */
export type AbsentValueSetting = 'null' | 'undefined';

/**
 * Settings that decide how a single parameter check runs and is classified.
 */
export interface CheckerSettingsConfig {
  /** Whether the target parameter receives `null` or `undefined`. */
  absent_value: AbsentValueSetting;
  /**
   * Whether any TypeError counts as a null rejection.
   * When false, only NullArgumentError does.
   */
  accept_type_errors: boolean;
  /** Error names accepted as an unsupported-operation signal, besides UnsupportedOperationError. */
  accepted_error_names: string[];
  /** Parameter markers that exempt a parameter from being the null target. */
  exemption_markers: string[];
}

/**
 * Settings for reading member descriptors out of TypeScript sources.
 */
export interface EnumerationConfig {
  /** JSDoc tag naming a parameter that accepts null, as in `@nullable fallback`. */
  nullable_tag: string;
  /** JSDoc tag that demotes a public member to package visibility. */
  internal_tag: string;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Whether debug-level entries are written. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from nullproof.toml.
 */
export interface Config {
  /** Check execution and outcome classification. */
  checker: CheckerSettingsConfig;
  /** Source enumeration. */
  enumeration: EnumerationConfig;
  /** Logging. */
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  checker?: Partial<CheckerSettingsConfig>;
  enumeration?: Partial<EnumerationConfig>;
  logging?: Partial<LoggingConfig>;
}
