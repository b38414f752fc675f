/**
 * Member descriptors, visibility and the ts-morph source enumerator.
 *
 * @packageDocumentation
 */

export {
  NULLABLE_MARKER,
  NULLABLE_TYPE_MARKER,
  OPTIONAL_MARKER,
  isClassType,
  isStatic,
  memberId,
} from './types.js';
export type {
  ClassType,
  ConstructorMember,
  MemberDescriptor,
  MemberEnumerator,
  MethodMember,
  Modifier,
  ParameterDescriptor,
  TypeKey,
} from './types.js';
export { VISIBILITY_LEVELS, isMemberVisible, isVisible } from './visibility.js';
export type { Visibility } from './visibility.js';
export { admitsNullish, describeParameter, describeParameters, eraseType, hasTag, taggedNames } from './type-erasure.js';
export type { ErasedType } from './type-erasure.js';
export { TsConfigNotFoundError, createProject } from './project.js';
export {
  ClassNotFoundError,
  MemberNotFoundError,
  SourceEnumerator,
  SourceFileNotFoundError,
} from './source-enumerator.js';
export type { SourceEnumeratorOptions } from './source-enumerator.js';
