/**
 * The null-acceptance checker.
 *
 * For every checked parameter position the member is invoked with that
 * position absent and every other position filled from the default-value
 * registry. The member passes when it throws a null-rejection signal or an
 * unsupported-operation signal.
 *
 * @packageDocumentation
 */

import { DEFAULT_CHECKER } from '../config/defaults.js';
import type { CheckerSettingsConfig } from '../config/types.js';
import { DefaultValueRegistry, primitiveFiller } from '../registry/default-values.js';
import {
  isClassType,
  isStatic,
  type ClassType,
  type ConstructorMember,
  type MemberDescriptor,
  type MemberEnumerator,
  type MethodMember,
  type ParameterDescriptor,
  type TypeKey,
} from '../reflect/types.js';
import { isMemberVisible, type Visibility } from '../reflect/visibility.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import {
  ConfigurationError,
  InvocationTargetError,
  MissingDefaultError,
  NullArgumentError,
  UnsupportedOperationError,
} from './errors.js';
import { ConstructorFunctor, MethodFunctor, type Functor } from './functor.js';
import {
  isFailure,
  toFailure,
  type CheckOutcome,
  type ExemptOutcome,
  type MemberCheckResult,
} from './outcome.js';
import { renderArguments, renderCause } from './render.js';
import { ThrowingReporter, type Reporter } from './reporter.js';

/**
 * Options for {@link NullAcceptanceChecker}.
 */
export interface CheckerOptions {
  /** Lists members for the bulk scans. Single-member checks work without one. */
  enumerator?: MemberEnumerator;
  /** Receives failures. Defaults to a {@link ThrowingReporter}. */
  reporter?: Reporter;
  /** Registry to fill arguments from. A fresh one is created when absent. */
  registry?: DefaultValueRegistry;
  settings?: CheckerSettingsConfig;
  logger?: Logger;
}

type Exemption = Pick<ExemptOutcome, 'reason' | 'marker'>;

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    ((typeof value === 'object' && value !== null) || typeof value === 'function') &&
    typeof Reflect.get(value, 'then') === 'function'
  );
}

/**
 * Verifies that members reject an absent argument in every non-exempt
 * parameter position.
 *
 * A parameter is exempt when its type is primitive, when it is a rest
 * parameter, or when it carries one of the configured exemption markers.
 *
 * @example
 * ```typescript
 * const checker = new NullAcceptanceChecker({ enumerator: new SourceEnumerator({ sourceFiles }) })
 *   .setDefault(Widget, new Widget('placeholder'))
 *   .setDefault('string', '');
 *
 * checker.testAllPublicConstructors(Widget);
 * checker.testAllPublicStaticMethods(Widget);
 * checker.testAllPublicInstanceMethods(new Widget('w'));
 * ```
 */
export class NullAcceptanceChecker {
  private readonly enumerator: MemberEnumerator | undefined;
  private readonly reporter: Reporter;
  private readonly registry: DefaultValueRegistry;
  private readonly settings: CheckerSettingsConfig;
  private readonly logger: Logger;
  private readonly ignored = new Set<string>();
  private readonly exemptionMarkers: ReadonlySet<string>;
  private readonly acceptedErrorNames: ReadonlySet<string>;

  constructor(options: CheckerOptions = {}) {
    this.enumerator = options.enumerator;
    this.reporter = options.reporter ?? new ThrowingReporter();
    this.registry = options.registry ?? new DefaultValueRegistry();
    this.settings = options.settings ?? DEFAULT_CHECKER;
    this.logger = (options.logger ?? defaultLogger).child('checker');
    this.exemptionMarkers = new Set(this.settings.exemption_markers);
    this.acceptedErrorNames = new Set(this.settings.accepted_error_names);
  }

  /** The value placed at the checked position. */
  get absentValue(): null | undefined {
    return this.settings.absent_value === 'undefined' ? undefined : null;
  }

  /**
   * Registers the filler used for parameters of `type`.
   */
  setDefault<T>(type: ClassType<T>, value: T): this;
  setDefault(type: TypeKey, value: unknown): this;
  setDefault(type: ClassType | TypeKey, value: unknown): this {
    if (typeof type === 'string') {
      this.registry.setDefault(type, value);
    } else {
      this.registry.setDefault(type, value);
    }
    return this;
  }

  /**
   * Excludes a member from the bulk scans. Single-member checks still run.
   */
  ignore(member: MemberDescriptor): this {
    this.ignored.add(member.id);
    return this;
  }

  isIgnored(member: MemberDescriptor): boolean {
    return member.synthetic || this.ignored.has(member.id);
  }

  testAllPublicConstructors(type: ClassType): MemberCheckResult[] {
    return this.testConstructors(type, 'PUBLIC');
  }

  /**
   * Checks every constructor of `type` visible at `visibility`.
   *
   * @throws {ConfigurationError} If the checker has no enumerator.
   */
  testConstructors(type: ClassType, visibility: Visibility): MemberCheckResult[] {
    const constructors = this.requireEnumerator('testConstructors')
      .declaredConstructors(type)
      .filter((ctor) => this.isScanned(ctor, visibility));

    return this.scan(type, visibility, 'constructors', constructors, (ctor) =>
      this.testConstructor(ctor)
    );
  }

  testAllPublicStaticMethods(type: ClassType): MemberCheckResult[] {
    return this.testStaticMethods(type, 'PUBLIC');
  }

  /**
   * Checks every static method declared by `type` visible at `visibility`.
   *
   * @throws {ConfigurationError} If the checker has no enumerator.
   */
  testStaticMethods(type: ClassType, visibility: Visibility): MemberCheckResult[] {
    const methods = this.requireEnumerator('testStaticMethods')
      .declaredMethods(type)
      .filter((method) => isStatic(method) && this.isScanned(method, visibility));

    return this.scan(type, visibility, 'static_methods', methods, (method) =>
      this.testMethod(undefined, method)
    );
  }

  testAllPublicInstanceMethods(instance: object): MemberCheckResult[] {
    return this.testInstanceMethods(instance, 'PUBLIC');
  }

  /**
   * Checks every instance method declared by the class of `instance` visible
   * at `visibility`. Methods inherited from a superclass are not included.
   *
   * @throws {ConfigurationError} If the checker has no enumerator.
   */
  testInstanceMethods(instance: object, visibility: Visibility): MemberCheckResult[] {
    const enumerator = this.requireEnumerator('testInstanceMethods');
    const type = this.classOf(instance);
    const methods = enumerator
      .declaredMethods(type)
      .filter((method) => !isStatic(method) && this.isScanned(method, visibility));

    return this.scan(type, visibility, 'instance_methods', methods, (method) =>
      this.testMethod(instance, method)
    );
  }

  /**
   * Checks every parameter of a constructor.
   */
  testConstructor(ctor: ConstructorMember): CheckOutcome[] {
    const functor = new ConstructorFunctor(ctor);
    return ctor.parameters.map((_, index) => this.checkParameter(functor, undefined, index));
  }

  /**
   * Checks every parameter of a method.
   *
   * @param receiver - The instance to call an instance method on; ignored
   * for static methods.
   */
  testMethod(receiver: unknown, method: MethodMember): CheckOutcome[] {
    const functor = new MethodFunctor(method);
    return method.parameters.map((_, index) => this.checkParameter(functor, receiver, index));
  }

  testConstructorParameter(ctor: ConstructorMember, index: number): CheckOutcome {
    return this.checkParameter(new ConstructorFunctor(ctor), undefined, index);
  }

  testMethodParameter(receiver: unknown, method: MethodMember, index: number): CheckOutcome {
    return this.checkParameter(new MethodFunctor(method), receiver, index);
  }

  /**
   * Returns why a parameter is not checked, or undefined when it is.
   */
  exemptionOf(parameter: ParameterDescriptor): Exemption | undefined {
    if (parameter.primitive) {
      return { reason: 'primitive' };
    }
    if (parameter.rest) {
      return { reason: 'rest' };
    }
    for (const marker of parameter.markers) {
      if (this.exemptionMarkers.has(marker)) {
        return { reason: 'marker', marker };
      }
    }
    return undefined;
  }

  /**
   * Builds the argument list with `target` absent.
   *
   * Other positions take the registered default, then a zero value for a
   * primitive, then the absent value if they are exempt.
   *
   * @throws {MissingDefaultError} If a non-exempt position has no default.
   */
  buildArguments(functor: Functor, target: number): unknown[] {
    return functor.parameters.map((parameter, index) => {
      if (index === target) {
        return this.absentValue;
      }
      const value = this.registry.get(parameter.type);
      if (value !== undefined) {
        return value;
      }
      const filler = parameter.primitive ? primitiveFiller(parameter.type) : undefined;
      if (filler !== undefined) {
        return filler;
      }
      if (this.exemptionOf(parameter) !== undefined) {
        return this.absentValue;
      }
      throw new MissingDefaultError(parameter.type, functor.toString(), index);
    });
  }

  private checkParameter(functor: Functor, receiver: unknown, index: number): CheckOutcome {
    const memberId = functor.toString();
    const parameter = functor.parameters[index];
    if (parameter === undefined) {
      throw new RangeError(
        `Parameter index ${String(index)} out of range for ${memberId} with ${String(functor.parameters.length)} parameters`
      );
    }

    const exemption = this.exemptionOf(parameter);
    if (exemption !== undefined) {
      this.logger.debug('parameter_exempt', {
        member: memberId,
        index,
        parameter: parameter.name,
        ...exemption,
      });
      return { kind: 'Exempt', memberId, parameterIndex: index, ...exemption };
    }

    const args = this.buildArguments(functor, index);

    let result: unknown;
    try {
      result = functor.invoke(receiver, args);
    } catch (error) {
      if (!(error instanceof InvocationTargetError)) {
        throw error;
      }
      return this.classifyThrown(functor, index, args, error.targetError);
    }

    this.observeAsyncResult(memberId, index, result);

    const rendered = renderArguments(args);
    const outcome: CheckOutcome = {
      kind: 'NoExceptionThrown',
      memberId,
      parameterIndex: index,
      message: `No exception thrown from ${memberId}[${rendered.join(', ')}] for ${functor.member.className}`,
      args: rendered,
    };
    this.logger.warn('null_accepted', { member: memberId, index, parameter: parameter.name });
    this.reporter.fail(toFailure(outcome));
    return outcome;
  }

  private classifyThrown(
    functor: Functor,
    index: number,
    args: readonly unknown[],
    thrown: unknown
  ): CheckOutcome {
    const memberId = functor.toString();

    if (this.isNullRejection(thrown) || this.isUnsupportedOperation(thrown)) {
      this.logger.debug('parameter_rejected', {
        member: memberId,
        index,
        error: renderCause(thrown),
      });
      return { kind: 'CorrectRejection', memberId, parameterIndex: index, error: thrown };
    }

    const outcome: CheckOutcome = {
      kind: 'WrongExceptionKind',
      memberId,
      parameterIndex: index,
      message: `wrong exception thrown from ${memberId}: ${renderCause(thrown)}`,
      args: renderArguments(args),
      cause: thrown,
    };
    this.logger.warn('wrong_exception_kind', {
      member: memberId,
      index,
      error: renderCause(thrown),
    });
    this.reporter.fail(toFailure(outcome));
    return outcome;
  }

  private isNullRejection(thrown: unknown): boolean {
    if (thrown instanceof NullArgumentError) {
      return true;
    }
    return this.settings.accept_type_errors && thrown instanceof TypeError;
  }

  private isUnsupportedOperation(thrown: unknown): boolean {
    if (thrown instanceof UnsupportedOperationError) {
      return true;
    }
    return thrown instanceof Error && this.acceptedErrorNames.has(thrown.name);
  }

  /**
   * A returned promise is not awaited. Its rejection is logged so that it
   * does not surface as an unhandled rejection.
   */
  private observeAsyncResult(memberId: string, index: number, result: unknown): void {
    if (!isThenable(result)) {
      return;
    }
    void result.then(undefined, (reason: unknown) => {
      this.logger.debug('async_rejection_not_observed', {
        member: memberId,
        index,
        error: renderCause(reason),
      });
    });
  }

  private isScanned(member: MemberDescriptor, visibility: Visibility): boolean {
    return isMemberVisible(member, visibility) && !this.isIgnored(member);
  }

  private scan<M extends MemberDescriptor>(
    type: ClassType,
    visibility: Visibility,
    scope: string,
    members: readonly M[],
    check: (member: M) => CheckOutcome[]
  ): MemberCheckResult[] {
    const results = members.map((member) => {
      const outcomes = check(member);
      return { memberId: member.id, outcomes, passed: !outcomes.some(isFailure) };
    });

    this.logger.debug('scan_completed', {
      className: type.name,
      scope,
      visibility,
      members: results.length,
      failed: results.filter((result) => !result.passed).length,
    });

    return results;
  }

  private requireEnumerator(operation: string): MemberEnumerator {
    if (this.enumerator === undefined) {
      throw new ConfigurationError(`${operation} needs a member enumerator`);
    }
    return this.enumerator;
  }

  private classOf(instance: object): ClassType {
    const type: unknown = instance.constructor;
    if (!isClassType(type)) {
      throw new ConfigurationError('Instance has no constructor to enumerate methods from');
    }
    return type;
  }
}
