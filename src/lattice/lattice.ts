/**
 * Type Lattice - partial order and lattice operations over types
 *
 * `Any` is top and `Bottom` is bottom. Unions are lattice elements, so the
 * least upper bound of two unrelated types is their normalized union;
 * `commonAncestor` gives the coarser nominal bound used by widening.
 */

import type { Type } from '../types/index.js';
import { Types } from '../utils/type-factory.js';
import { isTypeKind } from '../utils/type-utils.js';
import type { TypeHierarchy } from './hierarchy.js';

/**
 * Number of distinct types a tracked position may take before widening
 */
export const DEFAULT_WIDENING_THRESHOLD = 3;

export class TypeLattice {
  constructor(readonly hierarchy: TypeHierarchy) {}

  /**
   * a <: b
   */
  isSubtype(a: Type, b: Type): boolean {
    if (a.id === b.id) return true;
    if (a.kind === 'bottom' || b.kind === 'any') return true;
    if (a.kind === 'any') return false;
    if (a.kind === 'union') return a.members.every((m) => this.isSubtype(m, b));
    if (a.kind === 'typevar') return this.isSubtype(a.bound, b);
    if (b.kind === 'union') return b.members.some((m) => this.isSubtype(a, m));
    if (b.kind === 'typevar') return this.isSubtype(a, b.bound);
    if (b.kind === 'bottom') return false;

    if (b.kind === 'abstract') {
      return this.hierarchy.isAncestor(b.name, a.name);
    }

    // b is concrete: only instances of the same type qualify
    if (a.kind !== 'concrete' || a.name !== b.name) return false;
    if (b.params.length === 0) return true;
    if (a.params.length !== b.params.length) return false;

    const decls = this.hierarchy.paramsOf(b.name);
    return b.params.every((bp, index) => {
      const ap = a.params[index];
      if (!ap) return false;
      return decls[index]?.variance === 'covariant'
        ? this.isSubtype(ap, bp)
        : this.equivalent(ap, bp);
    });
  }

  /**
   * Mutual subtypes
   */
  equivalent(a: Type, b: Type): boolean {
    return a.id === b.id || (this.isSubtype(a, b) && this.isSubtype(b, a));
  }

  /**
   * Least upper bound
   */
  join(a: Type, b: Type): Type {
    if (this.isSubtype(a, b)) return b;
    if (this.isSubtype(b, a)) return a;
    return this.normalize(Types.union([a, b]));
  }

  joinAll(types: readonly Type[]): Type {
    let result: Type = Types.bottom;
    for (const type of types) {
      result = this.join(result, type);
    }
    return result;
  }

  /**
   * Greatest lower bound
   */
  meet(a: Type, b: Type): Type {
    if (this.isSubtype(a, b)) return a;
    if (this.isSubtype(b, a)) return b;
    if (a.kind === 'union') return this.joinAll(a.members.map((m) => this.meet(m, b)));
    if (b.kind === 'union') return this.joinAll(b.members.map((m) => this.meet(a, m)));
    if (a.kind === 'typevar') return this.meet(a.bound, b);
    if (b.kind === 'typevar') return this.meet(a, b.bound);

    if (
      a.kind === 'concrete' &&
      b.kind === 'concrete' &&
      a.name === b.name &&
      a.params.length === b.params.length &&
      this.allCovariant(a.name)
    ) {
      const params: Type[] = [];
      for (let i = 0; i < a.params.length; i++) {
        const ap = a.params[i];
        const bp = b.params[i];
        if (!ap || !bp) return Types.bottom;
        const met = this.meet(ap, bp);
        if (met.kind === 'bottom') return Types.bottom;
        params.push(met);
      }
      return Types.concrete(a.name, params);
    }

    // Unrelated nominal types share no instances under single inheritance
    return Types.bottom;
  }

  /**
   * Part of `a` that is not a subtype of `b`; the complement arm of a type test
   */
  subtract(a: Type, b: Type): Type {
    if (this.isSubtype(a, b)) return Types.bottom;
    if (a.kind === 'union') {
      return this.joinAll(a.members.map((m) => this.subtract(m, b)));
    }
    return a;
  }

  /**
   * Least common nominal ancestor; falls back to Any
   */
  commonAncestor(a: Type, b: Type): Type {
    if (this.isSubtype(a, b)) return b;
    if (this.isSubtype(b, a)) return a;
    if (a.kind === 'union') {
      return a.members.reduce<Type>((acc, m) => this.commonAncestor(acc, m), b);
    }
    if (b.kind === 'union') {
      return b.members.reduce<Type>((acc, m) => this.commonAncestor(acc, m), a);
    }
    if (a.kind === 'typevar') return this.commonAncestor(a.bound, b);
    if (b.kind === 'typevar') return this.commonAncestor(a, b.bound);
    if (a.kind !== 'concrete' && a.kind !== 'abstract') return Types.any;

    if (
      a.kind === 'concrete' &&
      b.kind === 'concrete' &&
      a.name === b.name &&
      a.params.length > 0 &&
      a.params.length === b.params.length &&
      this.allCovariant(a.name)
    ) {
      return Types.concrete(
        a.name,
        a.params.map((p, i) => {
          const other = b.params[i];
          return other ? this.commonAncestor(p, other) : Types.any;
        })
      );
    }

    for (const name of this.hierarchy.ancestors(a.name)) {
      const candidate = this.hierarchy.typeOf(name);
      if (!candidate || candidate.kind === 'any') break;
      if (candidate.kind === 'abstract' && this.isSubtype(b, candidate)) {
        return candidate;
      }
    }
    return Types.any;
  }

  /**
   * Widening over the types a call site or loop variable has taken across
   * fixpoint iterations. Up to `threshold` distinct types are joined
   * exactly; beyond that the result is their common abstract ancestor,
   * or Any when there is none narrower.
   */
  widen(history: readonly Type[], threshold: number = DEFAULT_WIDENING_THRESHOLD): Type {
    const distinct: Type[] = [];
    const seen = new Set<string>();
    for (const type of history) {
      if (type.kind === 'bottom' || seen.has(type.id)) continue;
      seen.add(type.id);
      distinct.push(type);
    }

    if (distinct.length <= threshold) {
      return this.joinAll(distinct);
    }

    const first = distinct[0];
    if (!first) return Types.bottom;
    const ancestor = distinct.slice(1).reduce<Type>((acc, t) => this.commonAncestor(acc, t), first);
    return isTypeKind(ancestor, 'abstract') ? ancestor : Types.any;
  }

  /**
   * Drop union members strictly below another member
   */
  private normalize(type: Type): Type {
    if (type.kind !== 'union') return type;
    const members = type.members;
    const kept = members.filter(
      (m) =>
        !members.some(
          (other) =>
            other.id !== m.id &&
            this.isSubtype(m, other) &&
            (!this.isSubtype(other, m) || other.id < m.id)
        )
    );
    return Types.union(kept);
  }

  private allCovariant(name: string): boolean {
    return this.hierarchy.paramsOf(name).every((p) => p.variance === 'covariant');
  }
}
