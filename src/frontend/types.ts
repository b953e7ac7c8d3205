/**
 * Type annotation lowering - TS type syntax to lattice types
 */

import * as t from '@babel/types';
import type { SourceLocation, Type, TypeVariable, TypeParamDecl } from '../types/index.js';
import type { TypeHierarchy } from '../lattice/hierarchy.js';
import { Types } from '../utils/type-factory.js';
import { MalformedInputError } from '../errors.js';
import { parse } from '../parser/index.js';

/**
 * Names visible while lowering a type annotation
 */
export interface TypeScope {
  readonly file: string;
  readonly hierarchy: TypeHierarchy;
  readonly aliases: ReadonlyMap<string, Type>;
  readonly typeVars: ReadonlyMap<string, TypeVariable>;
}

export function locOf(node: t.Node, file: string): SourceLocation {
  return {
    file,
    line: node.loc?.start.line ?? 0,
    column: node.loc?.start.column ?? 0,
  };
}

const KEYWORD_HINTS: Partial<Record<t.TSType['type'], string>> = {
  TSNumberKeyword: 'Int or Float',
  TSStringKeyword: 'String',
  TSBooleanKeyword: 'Bool',
  TSUnknownKeyword: 'Any',
  TSObjectKeyword: 'Any',
};

export function lowerType(node: t.TSType, scope: TypeScope): Type {
  switch (node.type) {
    case 'TSAnyKeyword':
      return Types.any;
    case 'TSNeverKeyword':
      return Types.bottom;
    case 'TSNullKeyword':
    case 'TSVoidKeyword':
    case 'TSUndefinedKeyword':
      return Types.concrete('Nothing');
    case 'TSParenthesizedType':
      return lowerType(node.typeAnnotation, scope);
    case 'TSUnionType':
      return Types.union(node.types.map((member) => lowerType(member, scope)));
    case 'TSTypeReference':
      return lowerTypeReference(node, scope);
    default: {
      const hint = KEYWORD_HINTS[node.type];
      throw new MalformedInputError(
        hint ? `unsupported type ${node.type}; use ${hint}` : `unsupported type syntax ${node.type}`,
        locOf(node, scope.file)
      );
    }
  }
}

function lowerTypeReference(node: t.TSTypeReference, scope: TypeScope): Type {
  const loc = locOf(node, scope.file);
  if (!t.isIdentifier(node.typeName)) {
    throw new MalformedInputError('qualified type names are not supported', loc);
  }
  const name = node.typeName.name;
  const args = node.typeParameters?.params ?? [];

  const typeVar = scope.typeVars.get(name);
  if (typeVar) {
    if (args.length > 0) {
      throw new MalformedInputError(`type variable ${name} takes no arguments`, loc);
    }
    return typeVar;
  }

  const alias = scope.aliases.get(name);
  if (alias) {
    if (args.length > 0) {
      throw new MalformedInputError(`type alias ${name} takes no arguments`, loc);
    }
    return alias;
  }

  return resolveTypeName(name, args.map((arg) => lowerType(arg, scope)), scope.hierarchy, loc);
}

/**
 * Resolve a declared type name applied to arguments
 */
export function resolveTypeName(
  name: string,
  args: readonly Type[],
  hierarchy: TypeHierarchy,
  loc: SourceLocation
): Type {
  const decl = hierarchy.get(name);
  if (!decl) {
    throw new MalformedInputError(`unknown type ${name}`, loc);
  }
  if (name === 'Any' || decl.abstract) {
    if (args.length > 0) {
      throw new MalformedInputError(`abstract type ${name} takes no arguments`, loc);
    }
    return name === 'Any' ? Types.any : Types.abstract(name);
  }
  if (args.length > 0 && args.length !== decl.params.length) {
    throw new MalformedInputError(
      `type ${name} expects ${decl.params.length} argument(s), got ${args.length}`,
      loc
    );
  }
  return Types.concrete(name, args);
}

/**
 * Lower `<T extends Real, out U>`; bounds may mention earlier parameters
 */
export function lowerTypeParams(
  node: t.TSTypeParameterDeclaration | null | undefined,
  scope: TypeScope
): TypeParamDecl[] {
  const result: TypeParamDecl[] = [];
  if (!node) return result;
  const typeVars = new Map(scope.typeVars);
  for (const param of node.params) {
    const bound = param.constraint
      ? lowerType(param.constraint, { ...scope, typeVars })
      : Types.any;
    typeVars.set(param.name, Types.typeVar(param.name, bound));
    result.push({
      name: param.name,
      variance: param.out ? 'covariant' : 'invariant',
      bound,
    });
  }
  return result;
}

export function typeVarsOf(params: readonly TypeParamDecl[]): Map<string, TypeVariable> {
  return new Map(params.map((p) => [p.name, Types.typeVar(p.name, p.bound)]));
}

/**
 * Parse a standalone type expression such as `Vector<Int>` or `Int | Nothing`
 */
export function parseTypeString(source: string, scope: TypeScope): Type {
  const { ast, errors } = parse(`let __type: ${source};`, { filename: scope.file });
  const stmt = ast.program.body[0];
  const id = t.isVariableDeclaration(stmt) ? stmt.declarations[0]?.id : undefined;
  if (errors.length > 0 || !t.isIdentifier(id) || !t.isTSTypeAnnotation(id.typeAnnotation)) {
    throw new MalformedInputError(`invalid type expression '${source}'`);
  }
  return lowerType(id.typeAnnotation.typeAnnotation, scope);
}
