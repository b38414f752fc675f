/**
 * Argument checks for code that wants to pass the null-acceptance checker.
 *
 * @packageDocumentation
 */

import { NullArgumentError, UnsupportedOperationError } from './errors.js';

/**
 * Returns `value`, or throws a {@link NullArgumentError} naming the
 * parameter when it is null or undefined.
 *
 * @example
 * ```typescript
 * class Widget {
 *   constructor(name: string) {
 *     this.name = requireNonNull(name, 'name');
 *   }
 * }
 * ```
 */
export function requireNonNull<T>(value: T, name: string): NonNullable<T> {
  if (value === null || value === undefined) {
    throw new NullArgumentError(name);
  }
  return value;
}

/**
 * Throws an {@link UnsupportedOperationError} for `operation`.
 */
export function unsupported(operation: string): never {
  throw new UnsupportedOperationError(`${operation} is not supported`);
}
