/**
 * nullproof
 *
 * Checks that constructors and methods reject a null or undefined argument
 * in every parameter that does not declare itself nullable.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './checker/index.js';
export * from './config/index.js';
export * from './reflect/index.js';
export * from './registry/index.js';
export { Logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
export { PathValidationError } from './utils/safe-fs.js';
