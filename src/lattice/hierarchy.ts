/**
 * Type Hierarchy - declared type names and their nominal relationships
 *
 * Single inheritance: every declared type has exactly one supertype, which
 * must be abstract. `Any` is the root.
 */

import type { Type, TypeDecl, TypeParamDecl } from '../types/index.js';
import { Types } from '../utils/type-factory.js';
import { substituteTypeVars } from '../utils/type-utils.js';
import { MalformedInputError } from '../errors.js';

const ANY_DECL: TypeDecl = {
  name: 'Any',
  abstract: true,
  supertype: null,
  params: [],
  fields: null,
  loc: null,
};

export class TypeHierarchy {
  private readonly decls = new Map<string, TypeDecl>([['Any', ANY_DECL]]);
  private readonly childNames = new Map<string, string[]>();

  constructor(decls: Iterable<TypeDecl> = []) {
    for (const decl of decls) {
      this.declare(decl);
    }
  }

  declare(decl: TypeDecl): void {
    if (this.decls.has(decl.name)) {
      throw new MalformedInputError(`type ${decl.name} is already declared`, decl.loc ?? undefined);
    }
    const superName = decl.supertype ?? 'Any';
    const superDecl = this.decls.get(superName);
    if (!superDecl) {
      throw new MalformedInputError(`unknown supertype ${superName} of ${decl.name}`, decl.loc ?? undefined);
    }
    if (!superDecl.abstract) {
      throw new MalformedInputError(
        `${decl.name} cannot subtype concrete type ${superName}`,
        decl.loc ?? undefined
      );
    }
    this.decls.set(decl.name, { ...decl, supertype: superName });
    const siblings = this.childNames.get(superName) ?? [];
    siblings.push(decl.name);
    this.childNames.set(superName, siblings);
  }

  has(name: string): boolean {
    return this.decls.has(name);
  }

  get(name: string): TypeDecl | undefined {
    return this.decls.get(name);
  }

  /**
   * Type denoted by a bare name: abstract, or concrete without arguments
   */
  typeOf(name: string): Type | undefined {
    const decl = this.decls.get(name);
    if (!decl) return undefined;
    if (name === 'Any') return Types.any;
    return decl.abstract ? Types.abstract(name) : Types.concrete(name);
  }

  /**
   * Names from `name` up to `Any`, inclusive
   */
  ancestors(name: string): string[] {
    const chain: string[] = [];
    let current: string | null = name;
    while (current !== null) {
      chain.push(current);
      current = this.decls.get(current)?.supertype ?? null;
    }
    return chain;
  }

  isAncestor(ancestor: string, name: string): boolean {
    return this.ancestors(name).includes(ancestor);
  }

  /**
   * Concrete struct descendants of an abstract type, in declaration order
   */
  concreteDescendants(name: string): TypeDecl[] {
    const result: TypeDecl[] = [];
    const visit = (current: string): void => {
      for (const child of this.childNames.get(current) ?? []) {
        const decl = this.decls.get(child);
        if (!decl) continue;
        if (decl.abstract) {
          visit(child);
        } else {
          result.push(decl);
        }
      }
    };
    visit(name);
    return result;
  }

  paramsOf(name: string): readonly TypeParamDecl[] {
    return this.decls.get(name)?.params ?? [];
  }

  /**
   * Declared field type of a struct instance, with its type arguments applied.
   * Unapplied parameters fall back to their bounds.
   */
  fieldType(type: { name: string; params: readonly Type[] }, field: string): Type | undefined {
    const decl = this.decls.get(type.name);
    const declared = decl?.fields?.get(field);
    if (!decl || !declared) return undefined;
    const bindings = new Map<string, Type>();
    decl.params.forEach((param, index) => {
      bindings.set(param.name, type.params[index] ?? param.bound);
    });
    return substituteTypeVars(declared, bindings);
  }
}
