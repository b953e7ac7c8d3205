/**
 * Lowering - Babel AST to engine IR
 *
 * Declarations are collected first so that methods and fields may refer to
 * types declared later in the unit. Classes are declared supertype-first;
 * their field maps are filled once every type name and alias is known.
 */

import * as t from '@babel/types';
import type {
  CallExpr,
  EntryCall,
  Expr,
  GlobalBinding,
  MethodSignature,
  Param,
  Program,
  Stmt,
  Type,
  TypeDecl,
  TypeVariable,
} from '../types/index.js';
import type { TypeHierarchy } from '../lattice/hierarchy.js';
import { Types } from '../utils/type-factory.js';
import { MalformedInputError } from '../errors.js';
import {
  locOf,
  lowerType,
  lowerTypeParams,
  resolveTypeName,
  typeVarsOf,
  type TypeScope,
} from './types.js';

/**
 * Binary operators and the generic functions they call
 */
const BINARY_CALLEES: Partial<Record<t.BinaryExpression['operator'], string>> = {
  '+': '+',
  '-': '-',
  '*': '*',
  '/': '/',
  '%': '%',
  '**': '^',
  '<': '<',
  '<=': '<=',
  '>': '>',
  '>=': '>=',
  '===': '==',
  '==': '==',
  '!==': '!=',
  '!=': '!=',
};

const COMPOUND_CALLEES: Partial<Record<t.AssignmentExpression['operator'], string>> = {
  '+=': '+',
  '-=': '-',
  '*=': '*',
  '/=': '/',
  '%=': '%',
  '**=': '^',
};

interface LoweringContext {
  readonly file: string;
  readonly hierarchy: TypeHierarchy;
  readonly aliases: Map<string, Type>;
  /** Type variables of the method being lowered */
  typeVars: ReadonlyMap<string, TypeVariable>;
}

type FunctionNode = t.FunctionDeclaration | t.TSDeclareFunction;

/**
 * Lower a parsed source unit. Declared classes are added to `hierarchy`.
 */
export function lowerProgram(ast: t.File, file: string, hierarchy: TypeHierarchy): Program {
  const ctx: LoweringContext = { file, hierarchy, aliases: new Map(), typeVars: new Map() };

  const classes: t.ClassDeclaration[] = [];
  const aliases: t.TSTypeAliasDeclaration[] = [];
  const functions: FunctionNode[] = [];
  const globals: GlobalBinding[] = [];
  const entries: EntryCall[] = [];
  const pendingGlobals: t.VariableDeclaration[] = [];
  const pendingEntries: t.ExpressionStatement[] = [];

  for (const stmt of ast.program.body) {
    switch (stmt.type) {
      case 'ClassDeclaration':
        classes.push(stmt);
        break;
      case 'TSTypeAliasDeclaration':
        aliases.push(stmt);
        break;
      case 'FunctionDeclaration':
      case 'TSDeclareFunction':
        functions.push(stmt);
        break;
      case 'VariableDeclaration':
        pendingGlobals.push(stmt);
        break;
      case 'ExpressionStatement':
        pendingEntries.push(stmt);
        break;
      case 'EmptyStatement':
        break;
      default:
        throw new MalformedInputError(`unsupported toplevel statement ${stmt.type}`, locOf(stmt, file));
    }
  }

  const declared = declareClasses(classes, ctx);

  for (const alias of aliases) {
    const loc = locOf(alias, file);
    if (alias.typeParameters) {
      throw new MalformedInputError(`type alias ${alias.id.name} cannot take parameters`, loc);
    }
    if (ctx.aliases.has(alias.id.name) || hierarchy.has(alias.id.name)) {
      throw new MalformedInputError(`type ${alias.id.name} is already declared`, loc);
    }
    ctx.aliases.set(alias.id.name, lowerType(alias.typeAnnotation, scopeOf(ctx)));
  }

  const methods: MethodSignature[] = [];
  for (const { node, decl, fields } of declared) {
    if (fields === null) continue;
    lowerFields(node, decl, fields, ctx);
    methods.push({
      name: decl.name,
      params: [...fields.keys()].map((name) => ({ name, type: Types.any })),
      typeParams: [],
      returnType: null,
      body: null,
      intrinsic: 'construct',
      loc: locOf(node, file),
    });
  }

  for (const fn of functions) {
    methods.push(lowerFunction(fn, ctx));
  }

  for (const decl of pendingGlobals) {
    globals.push(...lowerGlobal(decl, ctx));
  }

  for (const stmt of pendingEntries) {
    const call = lowerExpression(stmt.expression, ctx);
    if (call.kind !== 'call') {
      throw new MalformedInputError('toplevel expressions must be calls', locOf(stmt, file));
    }
    entries.push({ call });
  }

  return {
    file,
    types: declared.map((d) => d.decl),
    methods,
    globals,
    entries,
  };
}

function scopeOf(ctx: LoweringContext): TypeScope {
  return {
    file: ctx.file,
    hierarchy: ctx.hierarchy,
    aliases: ctx.aliases,
    typeVars: ctx.typeVars,
  };
}

// ============================================================================
// Type declarations
// ============================================================================

interface DeclaredClass {
  readonly node: t.ClassDeclaration;
  readonly decl: TypeDecl;
  /** Filled after all names are declared; null for abstract types */
  readonly fields: Map<string, Type> | null;
}

function declareClasses(nodes: readonly t.ClassDeclaration[], ctx: LoweringContext): DeclaredClass[] {
  const declared: DeclaredClass[] = [];
  let pending = [...nodes];

  while (pending.length > 0) {
    const ready = pending.filter((node) => {
      const superName = superclassName(node, ctx.file);
      return superName === null || ctx.hierarchy.has(superName);
    });
    // Nothing can make progress: declare the first one to surface its error
    const batch = ready.length > 0 ? ready : pending.slice(0, 1);
    for (const node of batch) {
      declared.push(declareClass(node, ctx));
    }
    pending = pending.filter((node) => !batch.includes(node));
  }

  return declared;
}

function superclassName(node: t.ClassDeclaration, file: string): string | null {
  if (!node.superClass) return null;
  if (!t.isIdentifier(node.superClass)) {
    throw new MalformedInputError('supertype must be a type name', locOf(node.superClass, file));
  }
  return node.superClass.name;
}

function declareClass(node: t.ClassDeclaration, ctx: LoweringContext): DeclaredClass {
  const loc = locOf(node, ctx.file);
  if (!node.id) {
    throw new MalformedInputError('class declarations need a name', loc);
  }
  if (node.superTypeParameters) {
    throw new MalformedInputError(`supertype of ${node.id.name} cannot take arguments`, loc);
  }
  const typeParameters = t.isTSTypeParameterDeclaration(node.typeParameters)
    ? node.typeParameters
    : null;
  const isAbstract = node.abstract === true;
  if (isAbstract && typeParameters) {
    throw new MalformedInputError(`abstract type ${node.id.name} cannot take parameters`, loc);
  }
  if (isAbstract && node.body.body.length > 0) {
    throw new MalformedInputError(`abstract type ${node.id.name} cannot declare fields`, loc);
  }

  const fields = isAbstract ? null : new Map<string, Type>();
  const decl: TypeDecl = {
    name: node.id.name,
    abstract: isAbstract,
    supertype: superclassName(node, ctx.file) ?? 'Any',
    params: lowerTypeParams(typeParameters, scopeOf(ctx)),
    fields,
    loc,
  };
  ctx.hierarchy.declare(decl);
  return { node, decl, fields };
}

function lowerFields(
  node: t.ClassDeclaration,
  decl: TypeDecl,
  fields: Map<string, Type>,
  ctx: LoweringContext
): void {
  const scope: TypeScope = { ...scopeOf(ctx), typeVars: typeVarsOf(decl.params) };
  for (const member of node.body.body) {
    const loc = locOf(member, ctx.file);
    if (!t.isClassProperty(member) || !t.isIdentifier(member.key) || member.computed) {
      throw new MalformedInputError(`${decl.name} may only declare fields`, loc);
    }
    if (member.value) {
      throw new MalformedInputError(`field ${decl.name}.${member.key.name} cannot have an initializer`, loc);
    }
    if (fields.has(member.key.name)) {
      throw new MalformedInputError(`duplicate field ${decl.name}.${member.key.name}`, loc);
    }
    fields.set(member.key.name, annotationType(member.typeAnnotation, scope) ?? Types.any);
  }
}

function annotationType(
  annotation: t.TypeAnnotation | t.TSTypeAnnotation | t.Noop | null | undefined,
  scope: TypeScope
): Type | null {
  if (!annotation || t.isNoop(annotation)) return null;
  if (!t.isTSTypeAnnotation(annotation)) {
    throw new MalformedInputError('unsupported type annotation', locOf(annotation, scope.file));
  }
  return lowerType(annotation.typeAnnotation, scope);
}

// ============================================================================
// Methods and globals
// ============================================================================

function lowerFunction(node: FunctionNode, ctx: LoweringContext): MethodSignature {
  const loc = locOf(node, ctx.file);
  if (!node.id) {
    throw new MalformedInputError('function declarations need a name', loc);
  }
  if (node.async || node.generator) {
    throw new MalformedInputError(`${node.id.name} cannot be async or a generator`, loc);
  }

  const typeParameters = t.isTSTypeParameterDeclaration(node.typeParameters)
    ? node.typeParameters
    : null;
  const typeParams = lowerTypeParams(typeParameters, scopeOf({ ...ctx, typeVars: new Map() }));
  ctx.typeVars = typeVarsOf(typeParams);
  try {
    const scope = scopeOf(ctx);
    const params: Param[] = node.params.map((param) => {
      if (!t.isIdentifier(param)) {
        throw new MalformedInputError(
          `unsupported parameter ${param.type} in ${node.id?.name ?? ''}`,
          locOf(param, ctx.file)
        );
      }
      return { name: param.name, type: annotationType(param.typeAnnotation, scope) ?? Types.any };
    });

    return {
      name: node.id.name,
      params,
      typeParams: [...ctx.typeVars.values()],
      returnType: annotationType(node.returnType, scope),
      body: t.isFunctionDeclaration(node) ? lowerStatements(node.body.body, ctx) : null,
      intrinsic: null,
      loc,
    };
  } finally {
    ctx.typeVars = new Map();
  }
}

function lowerGlobal(node: t.VariableDeclaration, ctx: LoweringContext): GlobalBinding[] {
  return node.declarations.map((declarator) => {
    const loc = locOf(declarator, ctx.file);
    if (!t.isIdentifier(declarator.id) || !declarator.init) {
      throw new MalformedInputError('globals must be named and initialized', loc);
    }
    const value = lowerExpression(declarator.init, ctx);
    if (value.kind !== 'literal') {
      throw new MalformedInputError(`global ${declarator.id.name} must be initialized with a literal`, loc);
    }
    return { name: declarator.id.name, type: value.type, loc };
  });
}

// ============================================================================
// Statements
// ============================================================================

function lowerStatements(stmts: readonly t.Statement[], ctx: LoweringContext): Stmt[] {
  return stmts.flatMap((stmt) => lowerStatement(stmt, ctx));
}

function lowerStatement(stmt: t.Statement, ctx: LoweringContext): Stmt[] {
  const loc = locOf(stmt, ctx.file);

  switch (stmt.type) {
    case 'BlockStatement':
      return lowerStatements(stmt.body, ctx);

    case 'EmptyStatement':
      return [];

    case 'VariableDeclaration':
      return lowerVariableDeclaration(stmt, ctx);

    case 'ExpressionStatement':
      return [lowerExpressionStatement(stmt.expression, ctx)];

    case 'ReturnStatement':
      return [{ kind: 'return', value: stmt.argument ? lowerExpression(stmt.argument, ctx) : null, loc }];

    case 'ThrowStatement':
      return [{ kind: 'throw', value: lowerExpression(stmt.argument, ctx), loc }];

    case 'IfStatement':
      return [
        {
          kind: 'if',
          test: lowerExpression(stmt.test, ctx),
          consequent: lowerStatement(stmt.consequent, ctx),
          alternate: stmt.alternate ? lowerStatement(stmt.alternate, ctx) : [],
          loc,
        },
      ];

    case 'WhileStatement':
      return [
        {
          kind: 'while',
          test: lowerExpression(stmt.test, ctx),
          body: lowerStatement(stmt.body, ctx),
          update: [],
          loc,
        },
      ];

    case 'ForStatement': {
      const init: Stmt[] = !stmt.init
        ? []
        : t.isVariableDeclaration(stmt.init)
          ? lowerVariableDeclaration(stmt.init, ctx)
          : [lowerExpressionStatement(stmt.init, ctx)];
      const test: Expr = stmt.test
        ? lowerExpression(stmt.test, ctx)
        : { kind: 'literal', type: Types.concrete('Bool'), value: true, loc };
      const update = stmt.update ? [lowerExpressionStatement(stmt.update, ctx)] : [];
      return [...init, { kind: 'while', test, body: lowerStatement(stmt.body, ctx), update, loc }];
    }

    case 'ForOfStatement': {
      const left = stmt.left;
      const id = t.isVariableDeclaration(left) ? left.declarations[0]?.id : left;
      if (!t.isIdentifier(id) || stmt.await) {
        throw new MalformedInputError('for-of must bind a single name', loc);
      }
      return [
        {
          kind: 'for-each',
          variable: id.name,
          iterable: lowerExpression(stmt.right, ctx),
          body: lowerStatement(stmt.body, ctx),
          loc,
        },
      ];
    }

    case 'BreakStatement':
    case 'ContinueStatement':
      if (stmt.label) {
        throw new MalformedInputError('labeled jumps are not supported', loc);
      }
      return [{ kind: stmt.type === 'BreakStatement' ? 'break' : 'continue', loc }];

    default:
      throw new MalformedInputError(`unsupported statement ${stmt.type}`, loc);
  }
}

function lowerVariableDeclaration(node: t.VariableDeclaration, ctx: LoweringContext): Stmt[] {
  return node.declarations.map((declarator): Stmt => {
    const loc = locOf(declarator, ctx.file);
    if (!t.isIdentifier(declarator.id)) {
      throw new MalformedInputError('destructuring is not supported', loc);
    }
    if (!declarator.init) {
      throw new MalformedInputError(`variable ${declarator.id.name} needs an initializer`, loc);
    }
    return {
      kind: 'assign',
      target: declarator.id.name,
      value: lowerExpression(declarator.init, ctx),
      declared: annotationType(declarator.id.typeAnnotation, scopeOf(ctx)),
      loc,
    };
  });
}

function lowerExpressionStatement(expr: t.Expression, ctx: LoweringContext): Stmt {
  const loc = locOf(expr, ctx.file);

  if (t.isUpdateExpression(expr)) {
    if (!t.isIdentifier(expr.argument)) {
      throw new MalformedInputError('increments apply to variables only', loc);
    }
    const one: Expr = { kind: 'literal', type: Types.concrete('Int'), loc };
    const target: Expr = { kind: 'name', name: expr.argument.name, loc };
    return {
      kind: 'assign',
      target: expr.argument.name,
      value: call(expr.operator === '++' ? '+' : '-', [target, one], loc),
      declared: null,
      loc,
    };
  }

  if (!t.isAssignmentExpression(expr)) {
    return { kind: 'expr', expr: lowerExpression(expr, ctx), loc };
  }

  const left = expr.left;
  let value = lowerExpression(expr.right, ctx);
  if (expr.operator !== '=') {
    const callee = COMPOUND_CALLEES[expr.operator];
    if (!callee || !t.isExpression(left)) {
      throw new MalformedInputError(`unsupported assignment operator ${expr.operator}`, loc);
    }
    value = call(callee, [lowerExpression(left, ctx), value], loc);
  }

  if (t.isIdentifier(left)) {
    return { kind: 'assign', target: left.name, value, declared: null, loc };
  }
  if (t.isMemberExpression(left) && !t.isPrivateName(left.property)) {
    const object = lowerExpression(left.object, ctx);
    if (left.computed) {
      const index = lowerExpression(left.property, ctx);
      return { kind: 'expr', expr: call('setindex!', [object, value, index], loc), loc };
    }
    if (t.isIdentifier(left.property)) {
      return { kind: 'field-assign', object, field: left.property.name, value, loc };
    }
  }
  throw new MalformedInputError(`unsupported assignment target ${left.type}`, loc);
}

// ============================================================================
// Expressions
// ============================================================================

function call(callee: string, args: readonly Expr[], loc: Expr['loc']): CallExpr {
  return { kind: 'call', callee, args, loc };
}

/**
 * Integer literals keep their spelling: `2` is Int, `2.0` and `2e3` are Float
 */
function isIntegerLiteral(node: t.NumericLiteral): boolean {
  const raw = node.extra?.['raw'];
  if (typeof raw === 'string') {
    return /^0[xXbBoO]/.test(raw) || !/[.eE]/.test(raw);
  }
  return Number.isInteger(node.value);
}

function lowerArguments(args: readonly t.Node[], ctx: LoweringContext): Expr[] {
  return args.map((arg) => {
    if (!t.isExpression(arg)) {
      throw new MalformedInputError(`unsupported argument ${arg.type}`, locOf(arg, ctx.file));
    }
    return lowerExpression(arg, ctx);
  });
}

function lowerExpression(expr: t.Expression, ctx: LoweringContext): Expr {
  const loc = locOf(expr, ctx.file);

  switch (expr.type) {
    case 'NumericLiteral':
      return { kind: 'literal', type: Types.concrete(isIntegerLiteral(expr) ? 'Int' : 'Float'), loc };

    case 'StringLiteral':
      return { kind: 'literal', type: Types.concrete('String'), loc };

    case 'TemplateLiteral':
      if (expr.expressions.length > 0) {
        throw new MalformedInputError('template literals cannot interpolate; use string()', loc);
      }
      return { kind: 'literal', type: Types.concrete('String'), loc };

    case 'BooleanLiteral':
      return { kind: 'literal', type: Types.concrete('Bool'), value: expr.value, loc };

    case 'NullLiteral':
      return { kind: 'literal', type: Types.concrete('Nothing'), loc };

    case 'Identifier':
      return { kind: 'name', name: expr.name, loc };

    case 'BinaryExpression': {
      if (t.isPrivateName(expr.left)) {
        throw new MalformedInputError('private names are not supported', loc);
      }
      if (expr.operator === 'instanceof') {
        return { kind: 'isa', subject: lowerExpression(expr.left, ctx), test: lowerTypeTest(expr.right, ctx), loc };
      }
      const callee = BINARY_CALLEES[expr.operator];
      if (!callee) {
        throw new MalformedInputError(`unsupported operator ${expr.operator}`, loc);
      }
      return call(callee, [lowerExpression(expr.left, ctx), lowerExpression(expr.right, ctx)], loc);
    }

    case 'UnaryExpression':
      if (expr.operator === '-' && t.isNumericLiteral(expr.argument)) {
        return lowerExpression(expr.argument, ctx);
      }
      if (expr.operator === '-' || expr.operator === '!') {
        return call(expr.operator, [lowerExpression(expr.argument, ctx)], loc);
      }
      throw new MalformedInputError(`unsupported operator ${expr.operator}`, loc);

    case 'LogicalExpression':
      if (expr.operator === '??') {
        throw new MalformedInputError('unsupported operator ??', loc);
      }
      return {
        kind: 'logical',
        operator: expr.operator,
        left: lowerExpression(expr.left, ctx),
        right: lowerExpression(expr.right, ctx),
        loc,
      };

    case 'ConditionalExpression':
      return {
        kind: 'conditional',
        test: lowerExpression(expr.test, ctx),
        consequent: lowerExpression(expr.consequent, ctx),
        alternate: lowerExpression(expr.alternate, ctx),
        loc,
      };

    case 'CallExpression':
    case 'NewExpression':
      if (!t.isIdentifier(expr.callee)) {
        throw new MalformedInputError('only named functions can be called', loc);
      }
      return call(expr.callee.name, lowerArguments(expr.arguments, ctx), loc);

    case 'MemberExpression':
      if (t.isPrivateName(expr.property)) {
        throw new MalformedInputError('private names are not supported', loc);
      }
      if (expr.computed) {
        return call('getindex', [lowerExpression(expr.object, ctx), lowerExpression(expr.property, ctx)], loc);
      }
      if (!t.isIdentifier(expr.property)) {
        throw new MalformedInputError('field names must be identifiers', loc);
      }
      return { kind: 'field', object: lowerExpression(expr.object, ctx), field: expr.property.name, loc };

    case 'ArrayExpression':
      return {
        kind: 'vector',
        elements: expr.elements.map((element) => {
          if (!t.isExpression(element)) {
            throw new MalformedInputError('vector literals cannot have holes or spreads', loc);
          }
          return lowerExpression(element, ctx);
        }),
        loc,
      };

    default:
      throw new MalformedInputError(`unsupported expression ${expr.type}`, loc);
  }
}

/**
 * Right-hand side of `instanceof`: a type name or alias
 */
function lowerTypeTest(expr: t.Expression, ctx: LoweringContext): Type {
  const loc = locOf(expr, ctx.file);
  if (!t.isIdentifier(expr)) {
    throw new MalformedInputError('instanceof needs a type name', loc);
  }
  return (
    ctx.typeVars.get(expr.name) ??
    ctx.aliases.get(expr.name) ??
    resolveTypeName(expr.name, [], ctx.hierarchy, loc)
  );
}
