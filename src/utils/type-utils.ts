/**
 * Type utilities for inspection and substitution
 */

import type { Type, TypeKind } from '../types/index.js';
import { Types } from './type-factory.js';

/**
 * Check if a type is of a specific kind
 */
export function isTypeKind<K extends TypeKind>(type: Type, kind: K): type is Extract<Type, { kind: K }> {
  return type.kind === kind;
}

/**
 * Get all member types from a union, or wrap single type in array
 */
export function getUnionMembers(type: Type): readonly Type[] {
  if (type.kind === 'union') {
    return type.members;
  }
  return [type];
}

export function isBottom(type: Type): boolean {
  return type.kind === 'bottom';
}

/**
 * Structural equality
 */
export function typesEqual(a: Type, b: Type): boolean {
  return a.id === b.id;
}

/**
 * Replace type variables by their bindings. Unbound variables are left as is.
 */
export function substituteTypeVars(type: Type, bindings: ReadonlyMap<string, Type>): Type {
  switch (type.kind) {
    case 'typevar':
      return bindings.get(type.name) ?? type;
    case 'concrete':
      if (type.params.length === 0) return type;
      return Types.concrete(
        type.name,
        type.params.map((p) => substituteTypeVars(p, bindings))
      );
    case 'union':
      return Types.union(type.members.map((m) => substituteTypeVars(m, bindings)));
    default:
      return type;
  }
}

/**
 * Replace type variables by their upper bounds. A parametric type whose
 * arguments mention a variable becomes its unparameterized form
 * (`Vector{T}` erases to `Vector`, any instance).
 */
export function eraseTypeVars(type: Type): Type {
  switch (type.kind) {
    case 'typevar':
      return eraseTypeVars(type.bound);
    case 'concrete':
      if (type.params.some(hasTypeVars)) return Types.concrete(type.name);
      return type;
    case 'union':
      return Types.union(type.members.map(eraseTypeVars));
    default:
      return type;
  }
}

/**
 * Check whether a type mentions any type variable
 */
export function hasTypeVars(type: Type): boolean {
  switch (type.kind) {
    case 'typevar':
      return true;
    case 'concrete':
      return type.params.some(hasTypeVars);
    case 'union':
      return type.members.some(hasTypeVars);
    default:
      return false;
  }
}

/**
 * Number of member combinations of a union-typed argument list
 */
export function unionCaseCount(argTypes: readonly Type[]): number {
  let count = 1;
  for (const arg of argTypes) {
    count *= getUnionMembers(arg).length;
  }
  return count;
}

/**
 * Cartesian product of union members, one tuple per dispatch case
 */
export function unionCombinations(argTypes: readonly Type[]): Type[][] {
  let cases: Type[][] = [[]];
  for (const arg of argTypes) {
    const next: Type[][] = [];
    for (const prefix of cases) {
      for (const member of getUnionMembers(arg)) {
        next.push([...prefix, member]);
      }
    }
    cases = next;
  }
  return cases;
}

/**
 * Dispatch cases of an argument list. Returns the input unchanged when
 * splitting would exceed `limit` cases.
 */
export function splitUnionArgs(argTypes: readonly Type[], limit: number): Type[][] {
  const count = unionCaseCount(argTypes);
  if (count <= 1 || count > limit) {
    return [[...argTypes]];
  }
  return unionCombinations(argTypes);
}
