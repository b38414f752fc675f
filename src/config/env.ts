/**
 * Environment variable overrides for configuration.
 *
 * NULLPROOF_* variables override configuration values at runtime.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { ABSENT_VALUE_SETTINGS } from './parser.js';
import type { AbsentValueSetting, Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Gets the default environment from Node.js process.env.
 */
function getDefaultEnv(): EnvRecord {
  return process.env;
}

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvMapping =
  | { section: 'checker'; field: 'absent_value'; type: 'absent' }
  | { section: 'checker'; field: 'accept_type_errors'; type: 'boolean' }
  | { section: 'checker'; field: 'accepted_error_names' | 'exemption_markers'; type: 'list' }
  | { section: 'enumeration'; field: 'nullable_tag' | 'internal_tag'; type: 'string' }
  | { section: 'logging'; field: 'debug'; type: 'boolean' };

/**
 * Mapping from environment variable names to config paths.
 */
const ENV_VAR_MAPPINGS: ReadonlyMap<string, EnvMapping> = new Map<string, EnvMapping>([
  ['NULLPROOF_ABSENT_VALUE', { section: 'checker', field: 'absent_value', type: 'absent' }],
  [
    'NULLPROOF_ACCEPT_TYPE_ERRORS',
    { section: 'checker', field: 'accept_type_errors', type: 'boolean' },
  ],
  [
    'NULLPROOF_ACCEPTED_ERROR_NAMES',
    { section: 'checker', field: 'accepted_error_names', type: 'list' },
  ],
  ['NULLPROOF_EXEMPTION_MARKERS', { section: 'checker', field: 'exemption_markers', type: 'list' }],
  ['NULLPROOF_NULLABLE_TAG', { section: 'enumeration', field: 'nullable_tag', type: 'string' }],
  ['NULLPROOF_INTERNAL_TAG', { section: 'enumeration', field: 'internal_tag', type: 'string' }],
  ['NULLPROOF_DEBUG', { section: 'logging', field: 'debug', type: 'boolean' }],
]);

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();
  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }
  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Splits a comma-separated list, dropping blank entries.
 */
function coerceToList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

/**
 * Coerces the absent-value setting.
 *
 * @throws EnvCoercionError if the value is not 'null' or 'undefined'.
 */
function coerceToAbsentValue(value: string, envVar: string): AbsentValueSetting {
  const trimmed = value.trim();
  const match = ABSENT_VALUE_SETTINGS.find((setting) => setting === trimmed);
  if (match === undefined) {
    throw new EnvCoercionError(envVar, value, ABSENT_VALUE_SETTINGS.join(' | '));
  }
  return match;
}

/**
 * Writes one coerced value into the overrides object.
 */
function applyMapping(
  overrides: PartialConfig,
  mapping: EnvMapping,
  value: string,
  envVar: string
): void {
  switch (mapping.type) {
    case 'absent':
      overrides.checker = { ...overrides.checker, absent_value: coerceToAbsentValue(value, envVar) };
      return;
    case 'list':
      overrides.checker =
        mapping.field === 'accepted_error_names'
          ? { ...overrides.checker, accepted_error_names: coerceToList(value) }
          : { ...overrides.checker, exemption_markers: coerceToList(value) };
      return;
    case 'string':
      overrides.enumeration =
        mapping.field === 'nullable_tag'
          ? { ...overrides.enumeration, nullable_tag: value.trim() }
          : { ...overrides.enumeration, internal_tag: value.trim() };
      return;
    case 'boolean':
      if (mapping.section === 'checker') {
        overrides.checker = {
          ...overrides.checker,
          accept_type_errors: coerceToBoolean(value, envVar),
        };
      } else {
        overrides.logging = { ...overrides.logging, debug: coerceToBoolean(value, envVar) };
      }
      return;
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @returns Result containing overrides and the variables that set them.
 * @throws EnvCoercionError on the first variable that cannot be coerced.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ NULLPROOF_ABSENT_VALUE: 'undefined' });
 * console.log(result.overrides.checker?.absent_value); // "undefined"
 * ```
 */
export function readEnvOverrides(env: EnvRecord = getDefaultEnv()): EnvOverrideResult {
  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];

  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    const value = env[envVar];
    if (value === undefined || value === '') {
      continue;
    }

    applyMapping(overrides, mapping, value, envVar);
    appliedVars.push(envVar);
  }

  return { overrides, appliedVars };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    checker: { ...base.checker, ...partial.checker },
    enumeration: { ...base.enumeration, ...partial.enumeration },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = getDefaultEnv()): Config {
  const { overrides } = readEnvOverrides(env);
  return mergeConfig(config, overrides);
}
