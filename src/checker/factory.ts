/**
 * Builds a checker from nullproof.toml, the environment and a list of
 * source files.
 *
 * @packageDocumentation
 */

import { loadConfig, type LoadConfigOptions } from '../config/loader.js';
import type { Config } from '../config/types.js';
import { SourceEnumerator } from '../reflect/source-enumerator.js';
import { Logger } from '../utils/logger.js';
import { NullAcceptanceChecker } from './checker.js';
import type { Reporter } from './reporter.js';

/**
 * Options for {@link createChecker}.
 */
export interface CreateCheckerOptions extends LoadConfigOptions {
  /** Configuration to use instead of loading one. */
  config?: Config;
  /** Files declaring the classes under test. */
  sourceFiles?: readonly string[];
  /** tsconfig.json whose compiler options the declarations are read with. */
  tsConfigPath?: string;
  reporter?: Reporter;
  logger?: Logger;
}

/**
 * Creates a checker with a {@link SourceEnumerator} over `sourceFiles`.
 *
 * @throws ConfigParseError if the configuration file is invalid.
 * @throws EnvCoercionError if an environment override cannot be coerced.
 *
 * @example
 * ```typescript
 * const checker = createChecker({ sourceFiles: ['src/widget.ts'] });
 * checker.testAllPublicConstructors(Widget);
 * ```
 */
export function createChecker(options: CreateCheckerOptions = {}): NullAcceptanceChecker {
  const config = options.config ?? loadConfig(options);
  const logger =
    options.logger ?? new Logger({ component: 'nullproof', debugMode: config.logging.debug });

  const enumerator = new SourceEnumerator({
    enumeration: config.enumeration,
    logger,
    ...(options.sourceFiles !== undefined && { sourceFiles: options.sourceFiles }),
    ...(options.tsConfigPath !== undefined && { tsConfigPath: options.tsConfigPath }),
  });

  return new NullAcceptanceChecker({
    enumerator,
    settings: config.checker,
    logger,
    ...(options.reporter !== undefined && { reporter: options.reporter }),
  });
}
