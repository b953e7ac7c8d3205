/**
 * Type factory functions
 *
 * Types are identified by their canonical id, so structurally equal types
 * built independently compare equal by `id`.
 */

import type {
  Type,
  TypeId,
  ConcreteType,
  AbstractType,
  TypeVariable,
  BottomType,
  AnyType,
} from '../types/index.js';

// Singleton types (only need one instance)
const bottomSingleton: BottomType = {
  kind: 'bottom',
  id: 'Bottom',
};

const anySingleton: AnyType = {
  kind: 'any',
  id: 'Any',
};

/**
 * Type factory object
 */
export const Types = {
  bottom: bottomSingleton,
  any: anySingleton,

  concrete(name: string, params: readonly Type[] = []): ConcreteType {
    return {
      kind: 'concrete',
      id: params.length === 0 ? name : `${name}{${params.map((p) => p.id).join(', ')}}`,
      name,
      params,
    };
  },

  abstract(name: string): AbstractType {
    return {
      kind: 'abstract',
      id: name,
      name,
    };
  },

  typeVar(name: string, bound: Type = anySingleton): TypeVariable {
    return {
      kind: 'typevar',
      id: name,
      name,
      bound,
    };
  },

  /**
   * Build a union without consulting the hierarchy: flattens, drops Bottom,
   * lets Any absorb and removes duplicates. Subsumption between members is
   * the lattice's job (`TypeLattice.join`).
   */
  union(members: readonly Type[]): Type {
    // Flatten nested unions
    const flattened: Type[] = [];
    for (const member of members) {
      if (member.kind === 'union') {
        flattened.push(...member.members);
      } else {
        flattened.push(member);
      }
    }

    if (flattened.some((t) => t.kind === 'any')) {
      return anySingleton;
    }

    // Remove duplicates by ID
    const seen = new Set<TypeId>();
    const unique: Type[] = [];
    for (const member of flattened) {
      if (member.kind === 'bottom' || seen.has(member.id)) continue;
      seen.add(member.id);
      unique.push(member);
    }

    if (unique.length === 0) {
      return bottomSingleton;
    }
    if (unique.length === 1 && unique[0]) {
      return unique[0];
    }

    unique.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return {
      kind: 'union',
      id: `Union{${unique.map((m) => m.id).join(', ')}}`,
      members: unique,
    };
  },
};
