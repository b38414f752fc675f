/**
 * Reporting of failing checks.
 *
 * @packageDocumentation
 */

import { AssertionFailedError } from './errors.js';
import type { CheckFailure } from './outcome.js';

/**
 * Receives every failing outcome of a check.
 */
export interface Reporter {
  fail(failure: CheckFailure): void;
}

/**
 * Fails the current test at the first failure.
 *
 * Any test framework treats the thrown {@link AssertionFailedError} as a
 * failed test.
 */
export class ThrowingReporter implements Reporter {
  fail(failure: CheckFailure): void {
    throw new AssertionFailedError(failure.message, [failure], failure.cause);
  }
}

/**
 * Records failures so that a whole scan can be reported at once.
 *
 * @example
 * ```typescript
 * const reporter = new CollectingReporter();
 * const checker = new NullAcceptanceChecker({ enumerator, reporter });
 * checker.testAllPublicConstructors(Widget);
 * checker.testAllPublicStaticMethods(Widget);
 * reporter.assertNoFailures();
 * ```
 */
export class CollectingReporter implements Reporter {
  private readonly recorded: CheckFailure[] = [];

  /** Failures recorded so far, in report order. */
  get failures(): readonly CheckFailure[] {
    return [...this.recorded];
  }

  fail(failure: CheckFailure): void {
    this.recorded.push(failure);
  }

  clear(): void {
    this.recorded.length = 0;
  }

  /**
   * @throws {AssertionFailedError} Listing every recorded failure, if any. The
   * first failure's cause is chained.
   */
  assertNoFailures(): void {
    const [first] = this.recorded;
    if (first === undefined) {
      return;
    }
    const count = this.recorded.length;
    const lines = this.recorded.map((failure) => `  ${failure.message}`);
    const message = `${String(count)} null acceptance check${count === 1 ? '' : 's'} failed:\n${lines.join('\n')}`;
    throw new AssertionFailedError(message, this.failures, first.cause);
  }
}
