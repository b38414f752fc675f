/**
 * Results of parameter and member checks.
 *
 * @packageDocumentation
 */

/**
 * All outcome kinds a parameter check can end in.
 *
 * A missing default and an error outside the invoked member are not
 * outcomes: they are thrown.
 */
export const OUTCOME_KINDS = [
  'Exempt',
  'CorrectRejection',
  'NoExceptionThrown',
  'WrongExceptionKind',
] as const;

export type OutcomeKind = (typeof OUTCOME_KINDS)[number];

/**
 * Outcome kinds that are reported as test failures.
 */
export type FailureKind = Extract<OutcomeKind, 'NoExceptionThrown' | 'WrongExceptionKind'>;

/**
 * Why a parameter was not checked.
 *
 * - `primitive`: number-, boolean-, bigint- or symbol-like type
 * - `rest`: a rest parameter always receives an array
 * - `marker`: carries a configured exemption marker
 */
export type ExemptionReason = 'primitive' | 'rest' | 'marker';

interface OutcomeBase {
  /** Identity of the checked member. */
  readonly memberId: string;
  /** Position that was checked. */
  readonly parameterIndex: number;
}

export interface ExemptOutcome extends OutcomeBase {
  readonly kind: 'Exempt';
  readonly reason: ExemptionReason;
  /** The matching marker when `reason` is `marker`. */
  readonly marker?: string;
}

export interface CorrectRejectionOutcome extends OutcomeBase {
  readonly kind: 'CorrectRejection';
  /** The accepted rejection signal. */
  readonly error: unknown;
}

export interface NoExceptionThrownOutcome extends OutcomeBase {
  readonly kind: 'NoExceptionThrown';
  readonly message: string;
  /** Rendered argument list of the call. */
  readonly args: readonly string[];
}

export interface WrongExceptionKindOutcome extends OutcomeBase {
  readonly kind: 'WrongExceptionKind';
  readonly message: string;
  readonly args: readonly string[];
  /** What the member threw instead of an accepted signal. */
  readonly cause: unknown;
}

/**
 * Result of checking one parameter position.
 */
export type CheckOutcome =
  | ExemptOutcome
  | CorrectRejectionOutcome
  | NoExceptionThrownOutcome
  | WrongExceptionKindOutcome;

/**
 * A failing outcome as handed to a reporter.
 */
export interface CheckFailure {
  readonly kind: FailureKind;
  readonly message: string;
  readonly memberId: string;
  readonly parameterIndex: number;
  readonly args: readonly string[];
  readonly cause?: unknown;
}

/**
 * Result of checking every parameter of one member in a bulk scan.
 */
export interface MemberCheckResult {
  readonly memberId: string;
  readonly outcomes: readonly CheckOutcome[];
  /** True when no outcome is a failure. */
  readonly passed: boolean;
}

/**
 * Type guard for failing outcomes.
 */
export function isFailure(
  outcome: CheckOutcome
): outcome is NoExceptionThrownOutcome | WrongExceptionKindOutcome {
  return outcome.kind === 'NoExceptionThrown' || outcome.kind === 'WrongExceptionKind';
}

/**
 * Converts a failing outcome to the form reporters receive.
 */
export function toFailure(outcome: NoExceptionThrownOutcome | WrongExceptionKindOutcome): CheckFailure {
  const base = {
    kind: outcome.kind,
    message: outcome.message,
    memberId: outcome.memberId,
    parameterIndex: outcome.parameterIndex,
    args: outcome.args,
  };
  return outcome.kind === 'WrongExceptionKind' ? { ...base, cause: outcome.cause } : base;
}
