/**
 * Default configuration values for nullproof.toml.
 *
 * @packageDocumentation
 */

import type { CheckerSettingsConfig, Config, EnumerationConfig, LoggingConfig } from './types.js';

/**
 * Default checker settings: substitute `null`, accept any TypeError, and
 * exempt parameters that are annotated or typed as nullable, or optional.
 */
export const DEFAULT_CHECKER: CheckerSettingsConfig = {
  absent_value: 'null',
  accept_type_errors: true,
  accepted_error_names: [],
  exemption_markers: ['Nullable', 'optional', 'nullable-type'],
};

/**
 * Default JSDoc tags recognised by the source enumerator.
 */
export const DEFAULT_ENUMERATION: EnumerationConfig = {
  nullable_tag: 'nullable',
  internal_tag: 'internal',
};

/**
 * Default logging settings (debug disabled).
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  checker: DEFAULT_CHECKER,
  enumeration: DEFAULT_ENUMERATION,
  logging: DEFAULT_LOGGING,
};
