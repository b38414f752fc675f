/**
 * Descriptor types for the constructors and methods of a runtime class.
 *
 * A descriptor carries everything the checker needs to know about a member
 * without holding onto the source AST it was read from.
 *
 * @module reflect/types
 */

/**
 * A runtime class, abstract or concrete.
 */
export type ClassType<T = unknown> = abstract new (...args: never[]) => T;

/**
 * Erased identifier of a parameter type, e.g. `string`, `Array`, `Widget`,
 * `function(1)`.
 */
export type TypeKey = string;

/**
 * Declared modifiers of a member.
 *
 * A member tagged `@internal` carries `internal` instead of `public`, which
 * makes it visible at package level only.
 */
export type Modifier = 'public' | 'protected' | 'private' | 'internal' | 'static' | 'abstract';

/**
 * Marker added for a `@nullable <name>` JSDoc tag or a `@Nullable()` decorator.
 */
export const NULLABLE_MARKER = 'Nullable';

/**
 * Marker added for a parameter declared with `?` or an initializer.
 */
export const OPTIONAL_MARKER = 'optional';

/**
 * Marker added for a parameter whose declared type admits null or undefined
 * (including `any` and `unknown`).
 */
export const NULLABLE_TYPE_MARKER = 'nullable-type';

/**
 * One parameter of a constructor or method.
 */
export interface ParameterDescriptor {
  /** Declared parameter name. */
  readonly name: string;
  /** Erased type used for default-value lookup. */
  readonly type: TypeKey;
  /** Type as written in the source, for diagnostics. */
  readonly typeText: string;
  /** Whether the erased type is number-, boolean-, bigint- or symbol-like. */
  readonly primitive: boolean;
  /** Whether this is a `...rest` parameter. */
  readonly rest: boolean;
  /** Marker tags attached to this parameter. */
  readonly markers: ReadonlySet<string>;
}

/**
 * Fields shared by constructor and method descriptors.
 */
interface MemberDescriptorBase {
  /**
   * Stable identity, e.g. `new Widget(string)` or `static Widget.parse(string)`.
   * Two descriptors of the same declaration share it.
   */
  readonly id: string;
  /** Name of the declaring class. */
  readonly className: string;
  /** The runtime class the member belongs to. */
  readonly declaringType: ClassType;
  readonly modifiers: ReadonlySet<Modifier>;
  /** Ordered parameters. */
  readonly parameters: readonly ParameterDescriptor[];
  /**
   * Whether the member exists only because the compiler provides it: an
   * implicit constructor or the implementation signature behind overloads.
   */
  readonly synthetic: boolean;
}

/**
 * Descriptor of a constructor.
 */
export interface ConstructorMember extends MemberDescriptorBase {
  readonly kind: 'constructor';
}

/**
 * Descriptor of an instance or static method.
 */
export interface MethodMember extends MemberDescriptorBase {
  readonly kind: 'method';
  /** Property name the method is reached through. */
  readonly name: string;
}

/**
 * Any member descriptor.
 */
export type MemberDescriptor = ConstructorMember | MethodMember;

/**
 * Lists the members a class declares.
 *
 * Implementations must return the same descriptor identities (`id`) on every
 * call for the same class.
 */
export interface MemberEnumerator {
  declaredConstructors(type: ClassType): readonly ConstructorMember[];
  declaredMethods(type: ClassType): readonly MethodMember[];
}

/**
 * Type guard for runtime classes.
 */
export function isClassType(value: unknown): value is ClassType {
  return typeof value === 'function';
}

/**
 * Whether a member is declared `static`.
 */
export function isStatic(member: MemberDescriptor): boolean {
  return member.modifiers.has('static');
}

/**
 * Builds the stable identity of a member from its parts.
 *
 * @example
 * memberId('constructor', 'Widget', 'constructor', false, ['string']);  // 'new Widget(string)'
 * memberId('method', 'Widget', 'parse', true, ['string']);             // 'static Widget.parse(string)'
 */
export function memberId(
  kind: MemberDescriptor['kind'],
  className: string,
  name: string,
  isStaticMember: boolean,
  parameterTypes: readonly string[]
): string {
  const list = parameterTypes.join(', ');
  if (kind === 'constructor') {
    return `new ${className}(${list})`;
  }
  return `${isStaticMember ? 'static ' : ''}${className}.${name}(${list})`;
}
