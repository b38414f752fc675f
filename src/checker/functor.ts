/**
 * Uniform view over constructors and methods, so one check algorithm can
 * drive both.
 *
 * @packageDocumentation
 */

import type {
  ConstructorMember,
  MemberDescriptor,
  MethodMember,
  ParameterDescriptor,
  TypeKey,
} from '../reflect/types.js';
import { InvocationMarshalError, InvocationTargetError } from './errors.js';

/**
 * An invocable member with typed, annotated parameters.
 */
export interface Functor {
  readonly member: MemberDescriptor;
  readonly parameters: readonly ParameterDescriptor[];
  /** Erased type of every parameter, in order. */
  readonly parameterTypes: readonly TypeKey[];
  /** Marker set of every parameter, in order. */
  readonly parameterAnnotations: readonly ReadonlySet<string>[];

  /**
   * Calls the member with one argument per parameter.
   *
   * @throws {InvocationTargetError} Wrapping anything the member throws.
   * @throws {InvocationMarshalError} If the call cannot be made at all.
   */
  invoke(receiver: unknown, args: readonly unknown[]): unknown;

  toString(): string;
}

function isObject(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

abstract class MemberFunctor<M extends MemberDescriptor> implements Functor {
  readonly member: M;

  constructor(member: M) {
    this.member = member;
  }

  get parameters(): readonly ParameterDescriptor[] {
    return this.member.parameters;
  }

  get parameterTypes(): readonly TypeKey[] {
    return this.member.parameters.map((parameter) => parameter.type);
  }

  get parameterAnnotations(): readonly ReadonlySet<string>[] {
    return this.member.parameters.map((parameter) => parameter.markers);
  }

  abstract invoke(receiver: unknown, args: readonly unknown[]): unknown;

  toString(): string {
    return this.member.id;
  }

  protected marshalError(reason: string): InvocationMarshalError {
    return new InvocationMarshalError(this.member.id, reason);
  }

  /**
   * Turns one-argument-per-parameter into the actual call arguments: a rest
   * array is spread and an absent rest argument contributes nothing.
   */
  protected callArguments(args: readonly unknown[]): unknown[] {
    const { parameters } = this.member;
    if (args.length !== parameters.length) {
      throw this.marshalError(
        `expected ${String(parameters.length)} arguments, got ${String(args.length)}`
      );
    }

    const last = parameters[parameters.length - 1];
    if (last === undefined || !last.rest) {
      return [...args];
    }

    const leading = args.slice(0, -1);
    const restArgument = args[args.length - 1];
    if (restArgument === null || restArgument === undefined) {
      return leading;
    }
    if (!Array.isArray(restArgument)) {
      throw this.marshalError(`rest argument '${last.name}' is not an array`);
    }
    return [...leading, ...restArgument];
  }

  protected call(target: () => unknown): unknown {
    try {
      return target();
    } catch (error) {
      throw new InvocationTargetError(this.toString(), error);
    }
  }
}

/**
 * Invokes a constructor with `new`. The receiver is ignored.
 */
export class ConstructorFunctor extends MemberFunctor<ConstructorMember> {
  invoke(_receiver: unknown, args: readonly unknown[]): unknown {
    if (this.member.modifiers.has('abstract')) {
      throw this.marshalError('abstract class cannot be instantiated');
    }
    const callArgs = this.callArguments(args);
    const type = this.member.declaringType;
    return this.call(() => Reflect.construct(type, callArgs));
  }
}

/**
 * Invokes a static method on its class or an instance method on the
 * receiver. Instance methods are looked up on the receiver, so an override
 * in a subclass is the one called.
 */
export class MethodFunctor extends MemberFunctor<MethodMember> {
  invoke(receiver: unknown, args: readonly unknown[]): unknown {
    const { name, declaringType } = this.member;
    if (name.startsWith('#')) {
      throw this.marshalError('private names cannot be reached from outside the class');
    }

    let target: object;
    if (this.member.modifiers.has('static')) {
      target = declaringType;
    } else {
      if (!isObject(receiver)) {
        throw this.marshalError('instance method needs a receiver');
      }
      if (!(receiver instanceof declaringType)) {
        throw this.marshalError(`receiver is not an instance of ${this.member.className}`);
      }
      target = receiver;
    }

    const method: unknown = Reflect.get(target, name);
    if (typeof method !== 'function') {
      throw this.marshalError(`property '${name}' is not a function`);
    }

    const callArgs = this.callArguments(args);
    return this.call(() => Reflect.apply(method, target, callArgs));
  }
}

/**
 * Wraps a member in the matching functor.
 */
export function functorFor(member: ConstructorMember): ConstructorFunctor;
export function functorFor(member: MethodMember): MethodFunctor;
export function functorFor(member: MemberDescriptor): Functor;
export function functorFor(member: MemberDescriptor): Functor {
  return member.kind === 'constructor' ? new ConstructorFunctor(member) : new MethodFunctor(member);
}
