/**
 * Type State Management - Environment operations
 *
 * Environments are immutable; every update returns a new environment that
 * shares its parent (the global scope) with the original.
 */

import type { Binding, ScopeKind, Type, TypeEnvironment } from '../types/index.js';
import type { TypeLattice } from '../lattice/lattice.js';
import { Types } from '../utils/type-factory.js';

/**
 * Create an empty type environment
 */
export function createEnv(parent: TypeEnvironment | null, kind: ScopeKind): TypeEnvironment {
  return {
    bindings: new Map(),
    parent,
    scopeKind: kind,
  };
}

/**
 * Lookup a binding in the environment chain
 */
export function lookupBinding(env: TypeEnvironment, name: string): Binding | undefined {
  const binding = env.bindings.get(name);
  if (binding) return binding;
  if (env.parent) return lookupBinding(env.parent, name);
  return undefined;
}

/**
 * Lookup a binding of the innermost scope only
 */
export function lookupLocal(env: TypeEnvironment, name: string): Binding | undefined {
  return env.scopeKind === 'method' ? env.bindings.get(name) : undefined;
}

/**
 * Update a binding in the environment (returns new env)
 */
export function updateBinding(
  env: TypeEnvironment,
  name: string,
  type: Type,
  kind: Binding['kind'],
  declared: Type | null = null
): TypeEnvironment {
  const newBindings = new Map(env.bindings);
  const existing = env.bindings.get(name);
  newBindings.set(name, {
    name,
    type,
    declared: existing?.declared ?? declared,
    kind: existing?.kind ?? kind,
  });
  return {
    ...env,
    bindings: newBindings,
  };
}

/**
 * Join two type environments at a merge point. A binding present on one
 * side only keeps its type.
 */
export function joinEnvironments(
  lattice: TypeLattice,
  env1: TypeEnvironment,
  env2: TypeEnvironment
): TypeEnvironment {
  const newBindings = new Map<string, Binding>(env1.bindings);

  for (const [name, binding2] of env2.bindings) {
    const binding1 = env1.bindings.get(name);
    if (!binding1) {
      newBindings.set(name, binding2);
      continue;
    }
    if (binding1.type.id === binding2.type.id) continue;
    newBindings.set(name, {
      ...binding1,
      type: lattice.join(binding1.type, binding2.type),
      declared: binding1.declared ?? binding2.declared,
    });
  }

  return {
    bindings: newBindings,
    parent: env1.parent,
    scopeKind: env1.scopeKind,
  };
}

/**
 * Join optional environments; null stands for an unreachable point
 */
export function joinFlows(
  lattice: TypeLattice,
  flows: readonly (TypeEnvironment | null)[]
): TypeEnvironment | null {
  let result: TypeEnvironment | null = null;
  for (const flow of flows) {
    if (!flow) continue;
    result = result ? joinEnvironments(lattice, result, flow) : flow;
  }
  return result;
}

/**
 * Same bindings with the same types
 */
export function envsEqual(env1: TypeEnvironment, env2: TypeEnvironment): boolean {
  if (env1.bindings.size !== env2.bindings.size) return false;
  for (const [name, binding] of env1.bindings) {
    if (env2.bindings.get(name)?.type.id !== binding.type.id) return false;
  }
  return true;
}

/**
 * Record each binding's type in its history and widen the ones that have
 * taken more than `threshold` distinct types
 */
export function widenEnvironment(
  lattice: TypeLattice,
  env: TypeEnvironment,
  histories: Map<string, Type[]>,
  threshold: number
): TypeEnvironment {
  let result = env;
  for (const [name, binding] of env.bindings) {
    const history = histories.get(name) ?? [];
    history.push(binding.type);
    histories.set(name, history);
    const widened = lattice.widen(history, threshold);
    if (widened.id !== binding.type.id && lattice.isSubtype(binding.type, widened)) {
      result = updateBinding(result, name, widened, binding.kind);
    }
  }
  return result;
}

/**
 * Bindings that still differ after the iteration cap are set to Any
 */
export function topDivergent(env: TypeEnvironment, next: TypeEnvironment): TypeEnvironment {
  let result = next;
  for (const [name, binding] of next.bindings) {
    if (env.bindings.get(name)?.type.id !== binding.type.id) {
      result = updateBinding(result, name, Types.any, binding.kind);
    }
  }
  return result;
}
