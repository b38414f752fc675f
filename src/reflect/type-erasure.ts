/**
 * Maps declared TypeScript parameter types to the erased keys used for
 * default-value lookup.
 *
 * @module reflect/type-erasure
 */

import {
  ts,
  type JSDocableNode,
  type JSDocTag,
  type Node,
  type ParameterDeclaration,
  type Type,
} from 'ts-morph';
import {
  NULLABLE_MARKER,
  NULLABLE_TYPE_MARKER,
  OPTIONAL_MARKER,
  type ParameterDescriptor,
  type TypeKey,
} from './types.js';

/**
 * Result of erasing one declared type.
 */
export interface ErasedType {
  /** Key used for default-value lookup. */
  key: TypeKey;
  /** Whether the type is one that a null argument cannot stand for. */
  primitive: boolean;
}

const PRIMITIVE_KINDS: ReadonlyArray<readonly [TypeKey, ts.TypeFlags]> = [
  ['number', ts.TypeFlags.NumberLike],
  ['boolean', ts.TypeFlags.BooleanLike],
  ['bigint', ts.TypeFlags.BigIntLike],
  ['symbol', ts.TypeFlags.ESSymbolLike],
];

const PRIMITIVE_FLAGS = PRIMITIVE_KINDS.reduce((mask, [, flags]) => mask | flags, 0);

function hasFlag(type: Type, mask: number): boolean {
  return (type.getFlags() & mask) !== 0;
}

/**
 * Applies `predicate` to every member of a union, or to the type itself.
 */
function everyMember(type: Type, predicate: (member: Type) => boolean): boolean {
  if (predicate(type)) {
    return true;
  }
  return type.isUnion() && type.getUnionTypes().every(predicate);
}

/**
 * Whether `null` or `undefined` is a legitimate value of the declared type.
 */
export function admitsNullish(type: Type): boolean {
  if (type.isAny() || type.isUnknown() || type.isNull() || type.isUndefined()) {
    return true;
  }
  return type.isUnion() && type.getUnionTypes().some((t) => t.isNull() || t.isUndefined());
}

function primitiveKey(type: Type, enclosing: Node | undefined): TypeKey {
  for (const [key, flags] of PRIMITIVE_KINDS) {
    if (everyMember(type, (t) => hasFlag(t, flags))) {
      return key;
    }
  }
  return type.getText(enclosing);
}

/**
 * Erases a non-nullable type to its lookup key.
 *
 * Rules, first match wins:
 * - `any`/`unknown` to `unknown`
 * - type parameters to their constraint, or `Object`
 * - string-like to `string`
 * - number/boolean/bigint/symbol-like to the primitive name (flagged primitive)
 * - arrays and tuples to `Array`
 * - construct signatures to `Function`
 * - call signatures to `function(n)` with n the arity
 * - otherwise the alias name, the symbol name, or the type text
 *
 * Type text is printed relative to `enclosing`, so names visible from the
 * declaring file are not qualified with `import("...")` paths.
 *
 * @example
 * // (value: string) => number   -> 'function(1)'
 * // readonly Widget[]           -> 'Array'
 * // 'a' | 'b'                   -> 'string'
 * // Map<string, number>         -> 'Map'
 */
export function eraseType(type: Type, enclosing?: Node): ErasedType {
  if (type.isAny() || type.isUnknown()) {
    return { key: 'unknown', primitive: false };
  }

  // An unconstrained `T` with null removed is `T & {}`.
  if (type.isIntersection()) {
    const typeParameter = type.getIntersectionTypes().find((t) => t.isTypeParameter());
    if (typeParameter !== undefined) {
      return eraseType(typeParameter, enclosing);
    }
  }

  if (type.isTypeParameter()) {
    const constraint = type.getConstraint();
    return constraint === undefined
      ? { key: 'Object', primitive: false }
      : eraseType(constraint.getNonNullableType(), enclosing);
  }

  if (everyMember(type, (t) => hasFlag(t, ts.TypeFlags.StringLike))) {
    return { key: 'string', primitive: false };
  }

  if (everyMember(type, (t) => hasFlag(t, PRIMITIVE_FLAGS))) {
    return { key: primitiveKey(type, enclosing), primitive: true };
  }

  if (type.isArray() || type.isTuple() || type.getSymbol()?.getName() === 'ReadonlyArray') {
    return { key: 'Array', primitive: false };
  }

  if (type.getConstructSignatures().length > 0) {
    return { key: 'Function', primitive: false };
  }

  const callSignature = type.getCallSignatures()[0];
  if (callSignature !== undefined) {
    return { key: `function(${String(callSignature.getParameters().length)})`, primitive: false };
  }

  const aliasName = type.getAliasSymbol()?.getName();
  if (aliasName !== undefined) {
    return { key: aliasName, primitive: false };
  }

  const symbolName = type.getSymbol()?.getName();
  if (symbolName !== undefined && !symbolName.startsWith('__')) {
    return { key: symbolName, primitive: false };
  }

  return { key: type.getText(enclosing), primitive: false };
}

/**
 * Extracts the tag name from a JSDoc tag, without the @ prefix.
 */
function getTagName(tag: JSDocTag): string {
  const fullName = tag.getTagName();
  return fullName.startsWith('@') ? fullName.slice(1) : fullName;
}

/**
 * Collects the first word of every `@<tag> word` JSDoc tag on a node.
 *
 * @param node - A node that can carry JSDoc.
 * @param tag - Tag name without the @ prefix.
 * @returns The tagged names, e.g. the parameter names of `@nullable fallback`.
 */
export function taggedNames(node: JSDocableNode, tag: string): Set<string> {
  const names = new Set<string>();
  for (const jsDoc of node.getJsDocs()) {
    for (const jsDocTag of jsDoc.getTags()) {
      if (getTagName(jsDocTag) !== tag) {
        continue;
      }
      const word = jsDocTag.getCommentText()?.trim().split(/\s+/)[0];
      if (word !== undefined && word !== '') {
        names.add(word);
      }
    }
  }
  return names;
}

/**
 * Whether a node carries a `@<tag>` JSDoc tag.
 */
export function hasTag(node: JSDocableNode, tag: string): boolean {
  return node.getJsDocs().some((jsDoc) => jsDoc.getTags().some((t) => getTagName(t) === tag));
}

/**
 * Builds the descriptor of a single parameter.
 *
 * @param param - The parameter declaration.
 * @param nullableNames - Parameter names tagged nullable on the member's JSDoc.
 * @returns The parameter descriptor with its erased type and markers.
 */
export function describeParameter(
  param: ParameterDeclaration,
  nullableNames: ReadonlySet<string>
): ParameterDescriptor {
  const name = param.getName();
  const rest = param.isRestParameter();
  const declared = param.getType();
  const typeNode = param.getTypeNode();
  const typeText = typeNode ? typeNode.getText() : declared.getText(param);

  const markers = new Set<string>(param.getDecorators().map((decorator) => decorator.getName()));
  if (nullableNames.has(name)) {
    markers.add(NULLABLE_MARKER);
  }
  if (!rest && (param.hasQuestionToken() || param.hasInitializer())) {
    markers.add(OPTIONAL_MARKER);
  }
  if (admitsNullish(declared)) {
    markers.add(NULLABLE_TYPE_MARKER);
  }

  const erased = eraseType(declared.isUnion() ? declared.getNonNullableType() : declared, param);

  return {
    name,
    type: erased.key,
    typeText,
    primitive: erased.primitive,
    rest,
    markers,
  };
}

/**
 * Describes the runtime parameters of a signature, skipping a leading
 * `this` parameter, which only exists at compile time.
 */
export function describeParameters(
  params: readonly ParameterDeclaration[],
  nullableNames: ReadonlySet<string>
): ParameterDescriptor[] {
  return params
    .filter((param) => param.getName() !== 'this')
    .map((param) => describeParameter(param, nullableNames));
}
