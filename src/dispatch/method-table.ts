/**
 * Method Table - multiple dispatch over declared signatures
 *
 * Each generic function owns the list of its methods. A lookup selects the
 * most specific applicable method under the subtype order; methods that
 * only partially apply to abstract or union arguments ride along because
 * any of them may run.
 */

import type { MethodSignature, Type } from '../types/index.js';
import type { TypeLattice } from '../lattice/lattice.js';
import { eraseTypeVars, hasTypeVars, isBottom } from '../utils/type-utils.js';

/**
 * How well a method's parameters cover the argument types
 */
export type Applicability = 'full' | 'partial' | 'none';

export interface MethodMatch {
  readonly method: MethodSignature;
  /** Where-clause variables bound by the arguments */
  readonly bindings: ReadonlyMap<string, Type>;
  readonly applicability: Exclude<Applicability, 'none'>;
}

export type DispatchResult =
  | { readonly kind: 'match'; readonly matches: readonly MethodMatch[] }
  | { readonly kind: 'no-method' }
  | { readonly kind: 'ambiguous'; readonly candidates: readonly MethodSignature[] };

function combine(a: Applicability, b: Applicability): Applicability {
  if (a === 'none' || b === 'none') return 'none';
  if (a === 'partial' || b === 'partial') return 'partial';
  return 'full';
}

export class MethodTable {
  private readonly methods = new Map<string, MethodSignature[]>();
  private sealed = false;

  constructor(private readonly lattice: TypeLattice) {}

  /**
   * Add a method. Only allowed before the table is sealed.
   */
  register(method: MethodSignature): void {
    if (this.sealed) {
      throw new Error(`method table is sealed; cannot register ${method.name}`);
    }
    const list = this.methods.get(method.name) ?? [];
    list.push(method);
    this.methods.set(method.name, list);
  }

  /**
   * Freeze the table; interpretation only reads it
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  has(name: string): boolean {
    return this.methods.has(name);
  }

  methodsOf(name: string): readonly MethodSignature[] {
    return this.methods.get(name) ?? [];
  }

  functionNames(): string[] {
    return [...this.methods.keys()];
  }

  lookup(name: string, argTypes: readonly Type[]): DispatchResult {
    const matched: MethodMatch[] = [];
    for (const method of this.methodsOf(name)) {
      if (method.params.length !== argTypes.length) continue;
      const match = this.match(method, argTypes);
      if (match) matched.push(match);
    }

    if (matched.length === 0) {
      return { kind: 'no-method' };
    }

    const full = matched.filter((m) => m.applicability === 'full');
    if (full.length === 0) {
      return { kind: 'match', matches: matched };
    }

    const maximal = full.filter(
      (m) => !full.some((other) => other !== m && this.moreSpecific(other.method, m.method))
    );
    const best = maximal[0];
    if (!best) {
      return { kind: 'match', matches: full };
    }
    if (maximal.length > 1) {
      return { kind: 'ambiguous', candidates: maximal.map((m) => m.method) };
    }

    const shadowing = matched.filter(
      (m) => m.applicability === 'partial' && this.moreSpecific(m.method, best.method)
    );
    return { kind: 'match', matches: [best, ...shadowing] };
  }

  /**
   * Strict specificity: `a`'s parameters are subtypes of `b`'s and not the
   * other way round. Between equivalent signatures a method that repeats a
   * type variable (`f(x::T, y::T)`) is the more specific one.
   */
  moreSpecific(a: MethodSignature, b: MethodSignature): boolean {
    const aParams = a.params.map((p) => eraseTypeVars(p.type));
    const bParams = b.params.map((p) => eraseTypeVars(p.type));
    const le = (x: readonly Type[], y: readonly Type[]): boolean =>
      x.length === y.length &&
      x.every((t, i) => {
        const other = y[i];
        return other !== undefined && this.lattice.isSubtype(t, other);
      });

    if (!le(aParams, bParams)) return false;
    if (!le(bParams, aParams)) return true;
    return repeatsTypeVar(a) && !repeatsTypeVar(b);
  }

  private match(method: MethodSignature, argTypes: readonly Type[]): MethodMatch | null {
    const bindings = new Map<string, Type>();
    let applicability: Applicability = 'full';

    for (let i = 0; i < method.params.length; i++) {
      const param = method.params[i];
      const arg = argTypes[i];
      if (!param || !arg) return null;
      applicability = combine(applicability, this.matchParam(param.type, arg, bindings));
      if (applicability === 'none') return null;
    }

    return { method, bindings, applicability };
  }

  private matchParam(param: Type, arg: Type, bindings: Map<string, Type>): Applicability {
    const lattice = this.lattice;

    if (!hasTypeVars(param)) {
      if (lattice.isSubtype(arg, param)) return 'full';
      return isBottom(lattice.meet(arg, param)) ? 'none' : 'partial';
    }

    if (param.kind === 'typevar') {
      const existing = bindings.get(param.name);
      if (!existing) {
        const narrowed = lattice.meet(arg, param.bound);
        if (isBottom(narrowed)) return 'none';
        bindings.set(param.name, narrowed);
        return lattice.isSubtype(arg, param.bound) ? 'full' : 'partial';
      }
      if (lattice.equivalent(existing, arg)) return 'full';
      const narrowed = lattice.meet(existing, arg);
      if (isBottom(narrowed)) return 'none';
      bindings.set(param.name, narrowed);
      return 'partial';
    }

    if (
      param.kind === 'concrete' &&
      arg.kind === 'concrete' &&
      arg.name === param.name &&
      arg.params.length === param.params.length
    ) {
      let result: Applicability = 'full';
      for (let i = 0; i < param.params.length; i++) {
        const pp = param.params[i];
        const ap = arg.params[i];
        if (!pp || !ap) return 'none';
        result = combine(result, this.matchParam(pp, ap, bindings));
      }
      return result;
    }

    const erased = eraseTypeVars(param);
    if (lattice.isSubtype(arg, erased)) return 'full';
    return isBottom(lattice.meet(arg, erased)) ? 'none' : 'partial';
  }
}

function repeatsTypeVar(method: MethodSignature): boolean {
  const counts = new Map<string, number>();
  const visit = (type: Type): void => {
    if (type.kind === 'typevar') {
      counts.set(type.name, (counts.get(type.name) ?? 0) + 1);
    } else if (type.kind === 'concrete') {
      type.params.forEach(visit);
    } else if (type.kind === 'union') {
      type.members.forEach(visit);
    }
  };
  method.params.forEach((p) => visit(p.type));
  return [...counts.values()].some((n) => n > 1);
}
