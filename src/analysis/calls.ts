/**
 * Call Resolution - dispatch cases, field access and engine intrinsics
 */

import type { CallFrame, CallSite, Type } from '../types/index.js';
import { Types } from '../utils/type-factory.js';
import {
  getUnionMembers,
  isBottom,
  splitUnionArgs,
  substituteTypeVars,
  unionCaseCount,
  unionCombinations,
} from '../utils/type-utils.js';
import { formatCall, formatType } from '../output/formatter.js';
import type { FrameContext, InterpreterContext } from './context.js';
import { createFrame } from './context.js';
import {
  ambiguousMethod,
  invalidBuiltinCall,
  invalidFieldAccess,
  noMatchingMethod,
  typeConversionFailure,
} from './diagnostics.js';

/**
 * Call a generic function. A union-typed argument list is split into one
 * dispatch case per member combination; each case becomes a child frame.
 * Past `maxUnionSplit` cases the union dispatches as a whole and every
 * combination is only looked up.
 */
export function callFunction(
  ctx: InterpreterContext,
  fc: FrameContext,
  callee: string,
  argTypes: readonly Type[],
  site: CallSite
): Type {
  let result: Type = Types.bottom;
  let dispatched = true;
  for (const args of splitUnionArgs(argTypes, ctx.options.maxUnionSplit)) {
    const frame = ctx.interpret(callee, args, site);
    fc.frame.children.push(frame);
    result = ctx.lattice.join(result, frame.returnType);
    dispatched = dispatched && frame.status !== 'errored';
  }
  if (dispatched && unionCaseCount(argTypes) > ctx.options.maxUnionSplit) {
    checkUnionCases(ctx, fc.frame, callee, argTypes, site);
  }
  return result;
}

/**
 * Dispatch errors of each member combination of `argTypes`, recorded as
 * childless frames on `parent`. No body is interpreted.
 */
export function checkUnionCases(
  ctx: InterpreterContext,
  parent: CallFrame,
  callee: string,
  argTypes: readonly Type[],
  site: CallSite
): void {
  for (const args of unionCombinations(argTypes)) {
    const result = ctx.methodTable.lookup(callee, args);
    if (result.kind === 'match') continue;

    const frame = createFrame(site, args, 'interpreted');
    if (result.kind === 'no-method') {
      frame.errors.push(noMatchingMethod(site, args));
    } else {
      frame.errors.push(ambiguousMethod(site, args, result.candidates));
      frame.returnType = Types.any;
    }
    frame.status = 'errored';
    parent.children.push(frame);
  }
}

/**
 * Convert a value type to a target type as an assignment or return would.
 * Numbers convert among themselves; otherwise the types must overlap.
 * Returns null when no value of `value` converts.
 */
export function convertType(ctx: InterpreterContext, value: Type, target: Type): Type | null {
  const lattice = ctx.lattice;
  if (value.kind === 'bottom' || lattice.isSubtype(value, target)) return value;
  const number = Types.abstract('Number');
  if (lattice.isSubtype(value, number) && lattice.isSubtype(target, number)) {
    return target;
  }
  const overlap = lattice.meet(value, target);
  return isBottom(overlap) ? null : overlap;
}

/**
 * Convert and record a TypeConversionFailure on `frame` when impossible
 */
export function convertOrReport(
  ctx: InterpreterContext,
  frame: CallFrame,
  value: Type,
  target: Type,
  call: string,
  loc: CallSite['loc']
): Type {
  const converted = convertType(ctx, value, target);
  if (converted === null) {
    frame.errors.push(typeConversionFailure(value, target, call, loc));
    return Types.bottom;
  }
  return converted;
}

// ============================================================================
// Field access
// ============================================================================

/**
 * `object.field`; one intrinsic frame per member of a union-typed object
 */
export function getField(ctx: InterpreterContext, fc: FrameContext, object: Type, site: CallSite): Type {
  let result: Type = Types.bottom;
  for (const member of getUnionMembers(object)) {
    const frame = createFrame(site, [member], 'intrinsic');
    frame.returnType = resolveField(ctx, frame, member, site);
    frame.status = frame.errors.length > 0 ? 'errored' : 'resolved';
    fc.frame.children.push(frame);
    result = ctx.lattice.join(result, frame.returnType);
  }
  return result;
}

/**
 * `object.field = value`; the value converts to the declared field type
 */
export function setField(
  ctx: InterpreterContext,
  fc: FrameContext,
  object: Type,
  value: Type,
  site: CallSite
): Type {
  let result: Type = Types.bottom;
  for (const member of getUnionMembers(object)) {
    const frame = createFrame(site, [member, value], 'intrinsic');
    const fieldType = resolveField(ctx, frame, member, site);
    frame.returnType =
      frame.errors.length > 0
        ? Types.bottom
        : convertOrReport(ctx, frame, value, fieldType, formatCall(site, frame.argTypes), site.loc);
    frame.status = frame.errors.length > 0 ? 'errored' : 'resolved';
    fc.frame.children.push(frame);
    result = ctx.lattice.join(result, frame.returnType);
  }
  return result;
}

function resolveField(ctx: InterpreterContext, frame: CallFrame, object: Type, site: CallSite): Type {
  const field = site.field ?? '';
  const hierarchy = ctx.hierarchy;

  switch (object.kind) {
    case 'any':
      return Types.any;
    case 'bottom':
      return Types.bottom;
    case 'typevar':
      return resolveField(ctx, frame, object.bound, site);
    case 'union':
      return ctx.lattice.joinAll(object.members.map((m) => resolveField(ctx, frame, m, site)));

    case 'concrete': {
      if (!hierarchy.get(object.name)?.fields) {
        frame.errors.push(
          invalidBuiltinCall(
            formatCall(site, frame.argTypes),
            `cannot access field ${field} of builtin type ${formatType(object)}`,
            site.loc
          )
        );
        return Types.bottom;
      }
      const fieldType = hierarchy.fieldType(object, field);
      if (!fieldType) {
        frame.errors.push(invalidFieldAccess(site, frame.argTypes, object));
        return Types.bottom;
      }
      return fieldType;
    }

    case 'abstract': {
      const structs = hierarchy.concreteDescendants(object.name).filter((d) => d.fields !== null);
      if (structs.length === 0) {
        frame.errors.push(
          invalidBuiltinCall(
            formatCall(site, frame.argTypes),
            `cannot access field ${field} of ${formatType(object)}, which has no struct subtypes`,
            site.loc
          )
        );
        return Types.bottom;
      }
      const found = structs
        .map((decl) => hierarchy.fieldType({ name: decl.name, params: [] }, field))
        .filter((t): t is Type => t !== undefined);
      if (found.length === 0) {
        frame.errors.push(invalidFieldAccess(site, frame.argTypes, object));
        return Types.bottom;
      }
      return ctx.lattice.joinAll(found);
    }
  }
}

// ============================================================================
// Intrinsics
// ============================================================================

/**
 * Default constructor of a struct: each argument converts to its field
 * type; type parameters are bound from the arguments.
 */
export function constructInstance(
  ctx: InterpreterContext,
  frame: CallFrame,
  name: string,
  argTypes: readonly Type[]
): Type {
  const decl = ctx.hierarchy.get(name);
  if (!decl?.fields) {
    frame.errors.push(
      invalidBuiltinCall(formatCall(frame.site, argTypes), `${name} has no default constructor`, frame.site.loc)
    );
    return Types.bottom;
  }

  const fields = [...decl.fields.values()];
  const bindings = new Map<string, Type>();
  fields.forEach((declared, index) => {
    const actual = argTypes[index];
    if (actual) bindTypeVars(ctx, declared, actual, bindings);
  });

  const call = formatCall(frame.site, argTypes);
  let failed = false;
  for (const param of decl.params) {
    const bound = bindings.get(param.name);
    if (bound && !ctx.lattice.isSubtype(bound, param.bound)) {
      frame.errors.push(typeConversionFailure(bound, param.bound, call, frame.site.loc));
      failed = true;
    }
  }

  for (let index = 0; index < fields.length && !failed; index++) {
    const declared = fields[index];
    const actual = argTypes[index];
    if (!declared || !actual) continue;
    const target = substituteTypeVars(declared, bindings);
    failed = convertOrReport(ctx, frame, actual, target, call, frame.site.loc).kind === 'bottom';
  }
  if (failed) return Types.bottom;

  const params: Type[] = [];
  for (const param of decl.params) {
    const bound = bindings.get(param.name);
    if (!bound) return Types.concrete(name);
    params.push(bound);
  }
  return Types.concrete(name, params);
}

function bindTypeVars(
  ctx: InterpreterContext,
  declared: Type,
  actual: Type,
  bindings: Map<string, Type>
): void {
  if (declared.kind === 'typevar') {
    const existing = bindings.get(declared.name);
    bindings.set(declared.name, existing ? ctx.lattice.join(existing, actual) : actual);
    return;
  }
  if (
    declared.kind === 'concrete' &&
    actual.kind === 'concrete' &&
    declared.name === actual.name &&
    declared.params.length === actual.params.length
  ) {
    declared.params.forEach((param, index) => {
      const arg = actual.params[index];
      if (arg) bindTypeVars(ctx, param, arg, bindings);
    });
  }
}

/**
 * `convert(Type{T}, x)`
 */
export function convertIntrinsic(ctx: InterpreterContext, frame: CallFrame, argTypes: readonly Type[]): Type {
  const [typeArg, value] = argTypes;
  if (!typeArg || !value) return Types.bottom;
  const target = typeArg.kind === 'concrete' && typeArg.name === 'Type' ? typeArg.params[0] : undefined;
  if (!target) return Types.any;
  return convertOrReport(ctx, frame, value, target, formatCall(frame.site, argTypes), frame.site.loc);
}
