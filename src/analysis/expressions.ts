/**
 * Expression Interpretation - abstract value of each expression kind
 *
 * Every sub-expression is evaluated even when an earlier one fails, so one
 * error never hides another. A call whose argument is Bottom is unreachable
 * and creates no frame.
 */

import type { CallExpr, Expr, SourceLocation, Type, TypeEnvironment } from '../types/index.js';
import { Types } from '../utils/type-factory.js';
import { formatCall, formatType } from '../output/formatter.js';
import type { FrameContext, InterpreterContext } from './context.js';
import { callFunction, getField } from './calls.js';
import { invalidBuiltinCall, nonBooleanCondition, undefinedBinding } from './diagnostics.js';
import { narrow } from './narrowing.js';
import { lookupBinding, lookupLocal } from './state.js';

const BOOL = Types.concrete('Bool');

/**
 * Infer expression type in `env`
 */
export function evalExpr(
  ctx: InterpreterContext,
  fc: FrameContext,
  expr: Expr,
  env: TypeEnvironment
): Type {
  switch (expr.kind) {
    case 'literal':
      return expr.type;

    case 'name':
      return evalName(ctx, fc, expr.name, expr.loc, env);

    case 'call':
      return evalCall(ctx, fc, expr, env);

    case 'field': {
      const object = evalExpr(ctx, fc, expr.object, env);
      if (object.kind === 'bottom') return Types.bottom;
      return getField(ctx, fc, object, { callee: 'getfield', loc: expr.loc, field: expr.field });
    }

    case 'isa':
      return evalExpr(ctx, fc, expr.subject, env).kind === 'bottom' ? Types.bottom : BOOL;

    case 'logical': {
      const left = evalCondition(ctx, fc, expr.left, env);
      if (left.kind === 'bottom') return Types.bottom;
      const rightEnv = narrow(ctx.lattice, env, expr.left, expr.operator === '&&');
      if (!rightEnv) return BOOL;
      return ctx.lattice.join(BOOL, evalCondition(ctx, fc, expr.right, rightEnv));
    }

    case 'conditional': {
      evalCondition(ctx, fc, expr.test, env);
      const thenEnv = narrow(ctx.lattice, env, expr.test, true);
      const elseEnv = narrow(ctx.lattice, env, expr.test, false);
      const consequent = thenEnv ? evalExpr(ctx, fc, expr.consequent, thenEnv) : Types.bottom;
      const alternate = elseEnv ? evalExpr(ctx, fc, expr.alternate, elseEnv) : Types.bottom;
      return ctx.lattice.join(consequent, alternate);
    }

    case 'vector': {
      const elements = expr.elements.map((element) => evalExpr(ctx, fc, element, env));
      if (elements.some((t) => t.kind === 'bottom')) return Types.bottom;
      const elementType = elements.length > 0 ? ctx.lattice.joinAll(elements) : Types.any;
      return Types.concrete('Vector', [elementType]);
    }
  }
}

/**
 * Evaluate a branch or loop condition; a value that can never be Bool is a
 * TypeConversionFailure
 */
export function evalCondition(
  ctx: InterpreterContext,
  fc: FrameContext,
  expr: Expr,
  env: TypeEnvironment
): Type {
  const type = evalExpr(ctx, fc, expr, env);
  if (type.kind !== 'bottom' && ctx.lattice.meet(type, BOOL).kind === 'bottom') {
    fc.frame.errors.push(nonBooleanCondition(type, expr.loc));
  }
  return type;
}

/**
 * Lookup order: local scope, globals, type names, function names
 */
function evalName(
  ctx: InterpreterContext,
  fc: FrameContext,
  name: string,
  loc: SourceLocation,
  env: TypeEnvironment
): Type {
  const binding = lookupBinding(env, name);
  if (binding) return binding.type;

  const type = ctx.hierarchy.typeOf(name);
  if (type) return Types.concrete('Type', [type]);

  if (ctx.methodTable.has(name)) return Types.concrete('Function');

  fc.frame.errors.push(undefinedBinding(name, loc));
  return Types.bottom;
}

function evalCall(ctx: InterpreterContext, fc: FrameContext, expr: CallExpr, env: TypeEnvironment): Type {
  const argTypes = expr.args.map((arg) => evalExpr(ctx, fc, arg, env));
  if (argTypes.some((t) => t.kind === 'bottom')) return Types.bottom;
  return resolveCall(ctx, fc, expr, argTypes, env);
}

/**
 * Call `expr.callee` with already evaluated arguments. A local binding
 * shadows a generic function of the same name; a type name calls its
 * constructor.
 */
export function resolveCall(
  ctx: InterpreterContext,
  fc: FrameContext,
  expr: CallExpr,
  argTypes: readonly Type[],
  env: TypeEnvironment
): Type {
  const site = { callee: expr.callee, loc: expr.loc };

  const local = lookupLocal(env, expr.callee);
  if (local) return callValue(ctx, fc, expr, local.type, argTypes);

  if (ctx.methodTable.has(expr.callee)) {
    return callFunction(ctx, fc, expr.callee, argTypes, site);
  }

  const global = lookupBinding(env, expr.callee);
  if (global) return callValue(ctx, fc, expr, global.type, argTypes);

  // A declared type without a constructor method
  if (ctx.hierarchy.typeOf(expr.callee)) {
    return callFunction(ctx, fc, expr.callee, argTypes, site);
  }

  fc.frame.errors.push(undefinedBinding(expr.callee, expr.loc));
  return Types.bottom;
}

/**
 * Call through a variable: a `Type{X}` calls X's constructor, a `Function`
 * or `Any` value may be anything
 */
function callValue(
  ctx: InterpreterContext,
  fc: FrameContext,
  expr: CallExpr,
  value: Type,
  argTypes: readonly Type[]
): Type {
  if (value.kind === 'any' || (value.kind === 'concrete' && value.name === 'Function')) {
    return Types.any;
  }

  const target = value.kind === 'concrete' && value.name === 'Type' ? value.params[0] : undefined;
  if (target?.kind === 'concrete' && ctx.methodTable.has(target.name)) {
    return callFunction(ctx, fc, target.name, argTypes, { callee: target.name, loc: expr.loc });
  }

  const call = formatCall({ callee: expr.callee, loc: expr.loc }, argTypes);
  fc.frame.errors.push(
    invalidBuiltinCall(call, `${expr.callee}::${formatType(value)} is not callable`, expr.loc)
  );
  return Types.bottom;
}
