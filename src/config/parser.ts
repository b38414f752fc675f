/**
 * TOML configuration parser for nullproof.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_CHECKER, DEFAULT_CONFIG, DEFAULT_ENUMERATION, DEFAULT_LOGGING } from './defaults.js';
import type {
  AbsentValueSetting,
  CheckerSettingsConfig,
  Config,
  EnumerationConfig,
  LoggingConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/**
 * Accepted values for `checker.absent_value`.
 */
export const ABSENT_VALUE_SETTINGS: readonly AbsentValueSetting[] = ['null', 'undefined'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAbsentValueSetting(value: string): value is AbsentValueSetting {
  return ABSENT_VALUE_SETTINGS.some((setting) => setting === value);
}

/**
 * Narrows a TOML section to a table.
 *
 * @throws ConfigParseError if the section is present but not a table.
 */
function sectionOf(raw: Record<string, unknown>, name: string): Record<string, unknown> | undefined {
  const section = raw[name];
  if (section === undefined) {
    return undefined;
  }
  if (!isRecord(section)) {
    throw new ConfigParseError(`Invalid type for '${name}': expected table, got ${typeof section}`);
  }
  return section;
}

/**
 * Validates that a value is a non-empty string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a non-empty string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  if (value.trim() === '') {
    throw new ConfigParseError(`Invalid value for '${fieldPath}': must not be empty`);
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is an array of non-empty strings.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns A copy of the validated array.
 * @throws ConfigParseError if value is not an array or holds a non-string.
 */
function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected array of strings, got ${typeof value}`
    );
  }
  return value.map((item: unknown, index) => validateString(item, `${fieldPath}[${String(index)}]`));
}

/**
 * Validates the substituted absent value.
 *
 * @throws ConfigParseError if value is not one of ABSENT_VALUE_SETTINGS.
 */
function validateAbsentValue(value: unknown, fieldPath: string): AbsentValueSetting {
  const text = validateString(value, fieldPath);
  if (!isAbsentValueSetting(text)) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected one of ${ABSENT_VALUE_SETTINGS.join(', ')}, got '${text}'`
    );
  }
  return text;
}

/**
 * Parses checker settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the checker section.
 * @returns Validated checker settings merged with defaults.
 */
function parseChecker(raw: Record<string, unknown> | undefined): CheckerSettingsConfig {
  const result: CheckerSettingsConfig = {
    ...DEFAULT_CHECKER,
    accepted_error_names: [...DEFAULT_CHECKER.accepted_error_names],
    exemption_markers: [...DEFAULT_CHECKER.exemption_markers],
  };

  if (raw === undefined) {
    return result;
  }

  if ('absent_value' in raw) {
    result.absent_value = validateAbsentValue(raw.absent_value, 'checker.absent_value');
  }
  if ('accept_type_errors' in raw) {
    result.accept_type_errors = validateBoolean(
      raw.accept_type_errors,
      'checker.accept_type_errors'
    );
  }
  if ('accepted_error_names' in raw) {
    result.accepted_error_names = validateStringArray(
      raw.accepted_error_names,
      'checker.accepted_error_names'
    );
  }
  if ('exemption_markers' in raw) {
    result.exemption_markers = validateStringArray(
      raw.exemption_markers,
      'checker.exemption_markers'
    );
  }

  return result;
}

/**
 * Parses enumeration settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the enumeration section.
 * @returns Validated enumeration settings merged with defaults.
 */
function parseEnumeration(raw: Record<string, unknown> | undefined): EnumerationConfig {
  const result: EnumerationConfig = { ...DEFAULT_ENUMERATION };

  if (raw === undefined) {
    return result;
  }

  if ('nullable_tag' in raw) {
    result.nullable_tag = stripTagPrefix(validateString(raw.nullable_tag, 'enumeration.nullable_tag'));
  }
  if ('internal_tag' in raw) {
    result.internal_tag = stripTagPrefix(validateString(raw.internal_tag, 'enumeration.internal_tag'));
  }

  return result;
}

/**
 * Parses logging settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the logging section.
 * @returns Validated logging settings merged with defaults.
 */
function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };

  if (raw !== undefined && 'debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

/**
 * Tags may be written with or without the leading `@`.
 */
function stripTagPrefix(tag: string): string {
  return tag.startsWith('@') ? tag.slice(1) : tag;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [checker]
 * absent_value = "undefined"
 * `);
 * console.log(config.checker.absent_value); // "undefined"
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: unknown;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  if (!isRecord(parsed)) {
    throw new ConfigParseError('Invalid TOML document: expected a table at the top level');
  }

  return {
    checker: parseChecker(sectionOf(parsed, 'checker')),
    enumeration: parseEnumeration(sectionOf(parsed, 'enumeration')),
    logging: parseLogging(sectionOf(parsed, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 *
 * @returns Default configuration object.
 */
export function getDefaultConfig(): Config {
  return {
    checker: {
      ...DEFAULT_CONFIG.checker,
      accepted_error_names: [...DEFAULT_CONFIG.checker.accepted_error_names],
      exemption_markers: [...DEFAULT_CONFIG.checker.exemption_markers],
    },
    enumeration: { ...DEFAULT_CONFIG.enumeration },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}
