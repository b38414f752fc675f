/**
 * Resolves the effective configuration from nullproof.toml and the environment.
 *
 * @packageDocumentation
 */

import { applyEnvOverrides, type EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import type { Config } from './types.js';
import { safeExistsSync, safeReadTextFileSync, validatePath } from '../utils/safe-fs.js';

/**
 * File name looked up in the working directory when no explicit path is given.
 */
export const CONFIG_FILE_NAME = 'nullproof.toml';

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /** Directory searched for nullproof.toml. Defaults to process.cwd(). */
  cwd?: string;
  /**
   * Explicit configuration file. Unlike the implicit lookup, a missing
   * explicit file is an error.
   */
  configPath?: string;
  /** Environment used for overrides. Defaults to process.env. */
  env?: EnvRecord;
}

/**
 * Loads configuration with precedence env > file > defaults.
 *
 * @param options - Where to look and which environment to read.
 * @returns The merged configuration.
 * @throws ConfigParseError if the file is invalid or an explicit file is missing.
 * @throws EnvCoercionError if an environment override cannot be coerced.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.configPath !== undefined;
  const configPath = validatePath(options.configPath ?? CONFIG_FILE_NAME, cwd);

  let config: Config;
  if (safeExistsSync(configPath)) {
    config = parseConfig(safeReadTextFileSync(configPath));
  } else if (explicit) {
    throw new ConfigParseError(`Configuration file not found: ${configPath}`);
  } else {
    config = getDefaultConfig();
  }

  return options.env === undefined
    ? applyEnvOverrides(config)
    : applyEnvOverrides(config, options.env);
}
