/**
 * Null-acceptance checker: functors, classification, reporting.
 *
 * @packageDocumentation
 */

export { NullAcceptanceChecker } from './checker.js';
export type { CheckerOptions } from './checker.js';
export { createChecker } from './factory.js';
export type { CreateCheckerOptions } from './factory.js';
export {
  AssertionFailedError,
  ConfigurationError,
  InvocationMarshalError,
  InvocationTargetError,
  MissingDefaultError,
  NullArgumentError,
  UnsupportedOperationError,
} from './errors.js';
export { ConstructorFunctor, MethodFunctor, functorFor } from './functor.js';
export type { Functor } from './functor.js';
export { OUTCOME_KINDS, isFailure, toFailure } from './outcome.js';
export type {
  CheckFailure,
  CheckOutcome,
  CorrectRejectionOutcome,
  ExemptOutcome,
  ExemptionReason,
  FailureKind,
  MemberCheckResult,
  NoExceptionThrownOutcome,
  OutcomeKind,
  WrongExceptionKindOutcome,
} from './outcome.js';
export { requireNonNull, unsupported } from './preconditions.js';
export { renderArgument, renderArguments, renderCause } from './render.js';
export { CollectingReporter, ThrowingReporter } from './reporter.js';
export type { Reporter } from './reporter.js';
