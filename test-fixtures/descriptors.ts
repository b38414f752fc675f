/**
 * Hand-built member descriptors for checker tests that do not go through
 * the source enumerator.
 */

import {
  memberId,
  type ClassType,
  type ConstructorMember,
  type MethodMember,
  type Modifier,
  type ParameterDescriptor,
} from '../src/reflect/types.js';

export interface ParameterSpec {
  type: string;
  name?: string;
  primitive?: boolean;
  rest?: boolean;
  markers?: readonly string[];
}

export function parameter(spec: ParameterSpec, index: number): ParameterDescriptor {
  return {
    name: spec.name ?? `arg${String(index)}`,
    type: spec.type,
    typeText: spec.type,
    primitive: spec.primitive ?? false,
    rest: spec.rest ?? false,
    markers: new Set(spec.markers ?? []),
  };
}

export function constructorOf(
  type: ClassType,
  params: readonly ParameterSpec[],
  modifiers: readonly Modifier[] = ['public']
): ConstructorMember {
  const parameters = params.map(parameter);
  return {
    kind: 'constructor',
    id: memberId('constructor', type.name, 'constructor', false, parameters.map((p) => p.type)),
    className: type.name,
    declaringType: type,
    modifiers: new Set(modifiers),
    parameters,
    synthetic: false,
  };
}

export function methodOf(
  type: ClassType,
  name: string,
  params: readonly ParameterSpec[],
  modifiers: readonly Modifier[] = ['public'],
  synthetic = false
): MethodMember {
  const parameters = params.map(parameter);
  return {
    kind: 'method',
    id: memberId('method', type.name, name, modifiers.includes('static'), parameters.map((p) => p.type)),
    className: type.name,
    name,
    declaringType: type,
    modifiers: new Set(modifiers),
    parameters,
    synthetic,
  };
}
