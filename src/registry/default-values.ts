/**
 * Type-keyed store of placeholder arguments.
 *
 * @packageDocumentation
 */

import { ConfigurationError } from '../checker/errors.js';
import type { ClassType, TypeKey } from '../reflect/types.js';

interface StoredDefault {
  readonly value: unknown;
  /** Class the value was registered under, checked again on every lookup. */
  readonly guard?: ClassType;
}

/**
 * Creates the built-in table. Called once per registry, so no two
 * registries share the mutable array.
 *
 * `Function`, `function(1)` and `function(0)` are unsound for generic
 * contracts: a supplier of any `T` yields `1`, and any one-argument function
 * is the identity. They only need to be present and non-null.
 */
function builtInDefaults(): Map<TypeKey, unknown> {
  return new Map<TypeKey, unknown>([
    ['Array', []],
    ['Error', new Error('placeholder')],
    ['Function', Function],
    ['function(1)', (value: unknown): unknown => value],
    ['function(0)', (): number => 1],
  ]);
}

/**
 * Values passed for a primitive parameter that fills a position next to the
 * one being checked. They are kept apart from the registry, so `get` never
 * returns them and an override for the same key still wins.
 */
const PRIMITIVE_FILLERS: ReadonlyMap<TypeKey, () => unknown> = new Map<TypeKey, () => unknown>([
  ['number', () => 0],
  ['boolean', () => false],
  ['bigint', () => 0n],
  ['symbol', () => Symbol('filler')],
]);

/**
 * Returns the filler for a primitive key, or undefined when the key names no
 * single primitive (e.g. `number | boolean`).
 */
export function primitiveFiller(key: TypeKey): unknown {
  return PRIMITIVE_FILLERS.get(key)?.();
}

/**
 * Key a class token is stored under.
 *
 * @throws {ConfigurationError} For anonymous classes and blank keys.
 */
export function keyOf(type: ClassType | TypeKey): TypeKey {
  if (typeof type === 'string') {
    if (type.trim() === '') {
      throw new ConfigurationError('Default value key must not be blank');
    }
    return type;
  }
  if (type.name === '') {
    throw new ConfigurationError('Cannot register a default for an anonymous class');
  }
  return type.name;
}

/**
 * Maps erased parameter types to one representative non-null value each.
 *
 * Lookups are exact: a default registered for `Widget` is never used for a
 * subclass or a supertype. Overrides win over the built-in table and the
 * last write wins.
 *
 * Keys are class names, because erased parameter types carry only the name.
 * Two classes that share a name share one entry: registering either replaces
 * the other, and a string lookup returns whichever was written last. A class
 * lookup only sees a value registered under that same class.
 *
 * @example
 * ```typescript
 * const registry = new DefaultValueRegistry()
 *   .setDefault(Widget, new Widget('placeholder'))
 *   .setDefault('string', '');
 * registry.get('Widget'); // the Widget instance
 * ```
 */
export class DefaultValueRegistry {
  private readonly overrides = new Map<TypeKey, StoredDefault>();
  private readonly builtIns = builtInDefaults();

  /**
   * Registers `value` for `type`, replacing any earlier value.
   *
   * @throws {ConfigurationError} If the value is null or undefined, or the
   * class is anonymous.
   */
  setDefault<T>(type: ClassType<T>, value: T): this;
  setDefault(type: TypeKey, value: unknown): this;
  setDefault(type: ClassType | TypeKey, value: unknown): this {
    const key = keyOf(type);
    if (value === null || value === undefined) {
      throw new ConfigurationError(`Default value for ${key} must not be null or undefined`);
    }
    this.overrides.set(key, typeof type === 'string' ? { value } : { value, guard: type });
    return this;
  }

  /**
   * Returns the default for `type`, or undefined when there is none or it
   * was registered under another class of the same name.
   *
   * @throws {ConfigurationError} If the stored value is not an instance of
   * the class it is looked up or was registered under.
   */
  get<T>(type: ClassType<T>): T | undefined;
  get(type: TypeKey): unknown;
  get(type: ClassType | TypeKey): unknown {
    const key = keyOf(type);
    if (typeof type !== 'string' && this.heldByNamesake(key, type)) {
      return undefined;
    }
    const value = this.lookup(key);
    if (value === undefined || typeof type === 'string') {
      return value;
    }
    if (!(value instanceof type)) {
      throw new ConfigurationError(`Default value for ${key} is not an instance of ${type.name}`);
    }
    return value;
  }

  /**
   * Whether {@link get} finds a value for `type`.
   */
  has(type: ClassType | TypeKey): boolean {
    const key = keyOf(type);
    if (typeof type !== 'string' && this.heldByNamesake(key, type)) {
      return false;
    }
    return this.overrides.has(key) || this.builtIns.has(key);
  }

  /** Keys with an explicit override, in registration order. */
  overriddenKeys(): TypeKey[] {
    return [...this.overrides.keys()];
  }

  /**
   * Whether `key` holds a value registered for a different class that
   * happens to have the same name.
   */
  private heldByNamesake(key: TypeKey, type: ClassType): boolean {
    const stored = this.overrides.get(key);
    return (
      stored?.guard !== undefined && stored.guard !== type && !(stored.value instanceof type)
    );
  }

  private lookup(key: TypeKey): unknown {
    const stored = this.overrides.get(key);
    if (stored === undefined) {
      return this.builtIns.get(key);
    }
    if (stored.guard !== undefined && !(stored.value instanceof stored.guard)) {
      throw new ConfigurationError(`Default value for ${key} is not an instance of ${stored.guard.name}`);
    }
    return stored.value;
  }
}
