/**
 * Error taxonomy of the null-acceptance checker.
 *
 * Only {@link AssertionFailedError} is a test outcome. Every other error
 * means the check could not run and halts the enclosing test.
 *
 * @packageDocumentation
 */

import type { CheckFailure } from './outcome.js';

/**
 * Error thrown when the checker is set up in a way that prevents a check
 * from running.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when a non-exempt filler position has no registered default.
 */
export class MissingDefaultError extends ConfigurationError {
  /** The type key that has no default. */
  public readonly typeKey: string;
  /** Member whose argument list was being built. */
  public readonly memberId: string;
  /** Position of the parameter that needed the default. */
  public readonly parameterIndex: number;

  constructor(typeKey: string, memberId: string, parameterIndex: number) {
    super(`No default value found for ${typeKey}`);
    this.name = 'MissingDefaultError';
    this.typeKey = typeKey;
    this.memberId = memberId;
    this.parameterIndex = parameterIndex;
  }
}

/**
 * Test failure raised by reporters.
 *
 * Carries every failure it stands for; the cause of a wrong-kind failure is
 * chained through `Error.cause`.
 */
export class AssertionFailedError extends Error {
  public readonly failures: readonly CheckFailure[];

  constructor(message: string, failures: readonly CheckFailure[], cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'AssertionFailedError';
    this.failures = failures;
  }
}

/**
 * Wraps whatever the invoked member threw.
 */
export class InvocationTargetError extends Error {
  /** The thrown value, which need not be an Error. */
  public readonly targetError: unknown;

  constructor(functor: string, targetError: unknown) {
    super(`${functor} threw during invocation`, { cause: targetError });
    this.name = 'InvocationTargetError';
    this.targetError = targetError;
  }
}

/**
 * Error thrown when a member cannot be called at all: there is no receiver,
 * the target is abstract or unreachable, or the argument list does not fit.
 */
export class InvocationMarshalError extends Error {
  public readonly memberId: string;

  constructor(memberId: string, reason: string) {
    super(`Cannot invoke ${memberId}: ${reason}`);
    this.name = 'InvocationMarshalError';
    this.memberId = memberId;
  }
}

/**
 * Null-rejection signal for code under test.
 *
 * Extends TypeError, so code that throws a plain TypeError for a null
 * argument is recognised too unless `checker.accept_type_errors` is off.
 */
export class NullArgumentError extends TypeError {
  public readonly parameterName: string;

  constructor(parameterName: string) {
    super(`${parameterName} must not be null or undefined`);
    this.name = 'NullArgumentError';
    this.parameterName = parameterName;
  }
}

/**
 * Unsupported-operation signal for code under test.
 */
export class UnsupportedOperationError extends Error {
  constructor(message = 'Unsupported operation') {
    super(message);
    this.name = 'UnsupportedOperationError';
  }
}
