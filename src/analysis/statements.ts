/**
 * Statement Interpretation - environment transfer for each statement kind
 *
 * A statement maps the incoming environment to the outgoing one, or to null
 * when control cannot continue past it (`return`, `throw`, `break`,
 * `continue`). A failed call does not end the flow.
 */

import type {
  AssignStmt,
  ForEachStmt,
  SourceLocation,
  Stmt,
  Type,
  TypeEnvironment,
  WhileStmt,
} from '../types/index.js';
import { Types } from '../utils/type-factory.js';
import { formatCall } from '../output/formatter.js';
import { MalformedInputError } from '../errors.js';
import type { Flow, FrameContext, InterpreterContext, LoopTargets } from './context.js';
import { scratchContext } from './context.js';
import { callFunction, convertOrReport, setField } from './calls.js';
import { evalCondition, evalExpr } from './expressions.js';
import { narrow } from './narrowing.js';
import {
  envsEqual,
  joinFlows,
  lookupLocal,
  topDivergent,
  updateBinding,
  widenEnvironment,
} from './state.js';

const NOTHING = Types.concrete('Nothing');

export function execBlock(
  ctx: InterpreterContext,
  fc: FrameContext,
  stmts: readonly Stmt[],
  env: Flow
): Flow {
  let flow = env;
  for (const stmt of stmts) {
    if (!flow) break;
    flow = execStatement(ctx, fc, stmt, flow);
  }
  return flow;
}

function execStatement(
  ctx: InterpreterContext,
  fc: FrameContext,
  stmt: Stmt,
  env: TypeEnvironment
): Flow {
  switch (stmt.kind) {
    case 'assign':
      return execAssign(ctx, fc, stmt, env);

    case 'field-assign': {
      const object = evalExpr(ctx, fc, stmt.object, env);
      const value = evalExpr(ctx, fc, stmt.value, env);
      if (object.kind !== 'bottom' && value.kind !== 'bottom') {
        setField(ctx, fc, object, value, { callee: 'setfield!', loc: stmt.loc, field: stmt.field });
      }
      return env;
    }

    case 'expr':
      evalExpr(ctx, fc, stmt.expr, env);
      return env;

    case 'return': {
      const value = stmt.value ? evalExpr(ctx, fc, stmt.value, env) : NOTHING;
      addReturn(ctx, fc, value, stmt.loc);
      return null;
    }

    case 'throw':
      evalExpr(ctx, fc, stmt.value, env);
      return null;

    case 'if': {
      evalCondition(ctx, fc, stmt.test, env);
      const thenEnv = narrow(ctx.lattice, env, stmt.test, true);
      const elseEnv = narrow(ctx.lattice, env, stmt.test, false);
      return joinFlows(ctx.lattice, [
        thenEnv && execBlock(ctx, fc, stmt.consequent, thenEnv),
        elseEnv && execBlock(ctx, fc, stmt.alternate, elseEnv),
      ]);
    }

    case 'while':
      return execWhile(ctx, fc, stmt, env);

    case 'for-each':
      return execForEach(ctx, fc, stmt, env);

    case 'break':
    case 'continue': {
      if (!fc.loop) {
        throw new MalformedInputError(`${stmt.kind} outside a loop`, stmt.loc);
      }
      (stmt.kind === 'break' ? fc.loop.breaks : fc.loop.continues).push(env);
      return null;
    }
  }
}

function conversionCall(value: Type, target: Type, loc: SourceLocation): string {
  return formatCall({ callee: 'convert', loc }, [Types.concrete('Type', [target]), value]);
}

function execAssign(
  ctx: InterpreterContext,
  fc: FrameContext,
  stmt: AssignStmt,
  env: TypeEnvironment
): TypeEnvironment {
  let value = evalExpr(ctx, fc, stmt.value, env);
  const declared = stmt.declared ?? lookupLocal(env, stmt.target)?.declared ?? null;
  if (declared && value.kind !== 'bottom') {
    value = convertOrReport(ctx, fc.frame, value, declared, conversionCall(value, declared, stmt.loc), stmt.loc);
  }
  return updateBinding(env, stmt.target, value, 'local', declared);
}

/**
 * Fold a returned value into the body result, converting it to the
 * declared return type
 */
export function addReturn(ctx: InterpreterContext, fc: FrameContext, value: Type, loc: SourceLocation): void {
  let result = value;
  if (fc.returnType && value.kind !== 'bottom') {
    result = convertOrReport(ctx, fc.frame, value, fc.returnType, conversionCall(value, fc.returnType, loc), loc);
  }
  fc.returns = ctx.lattice.join(fc.returns, result);
}

// ============================================================================
// Loops
// ============================================================================

interface LoopShape {
  /** Environment at the start of the body, or null when it cannot run */
  enter(fc: FrameContext, env: TypeEnvironment): Flow;
  /** Environment leaving through the loop condition */
  exit(env: TypeEnvironment): Flow;
  readonly body: readonly Stmt[];
  readonly update: readonly Stmt[];
}

function execWhile(ctx: InterpreterContext, fc: FrameContext, stmt: WhileStmt, env: TypeEnvironment): Flow {
  return runLoop(ctx, fc, env, {
    enter(loopFc, head) {
      evalCondition(ctx, loopFc, stmt.test, head);
      return narrow(ctx.lattice, head, stmt.test, true);
    },
    exit: (head) => narrow(ctx.lattice, head, stmt.test, false),
    body: stmt.body,
    update: stmt.update,
  });
}

/**
 * The element type is what `getindex(xs, ::Int)` dispatches to
 */
function execForEach(ctx: InterpreterContext, fc: FrameContext, stmt: ForEachStmt, env: TypeEnvironment): Flow {
  const iterable = evalExpr(ctx, fc, stmt.iterable, env);
  if (iterable.kind === 'bottom') return env;
  const element = callFunction(ctx, fc, 'getindex', [iterable, Types.concrete('Int')], {
    callee: 'getindex',
    loc: stmt.loc,
  });
  if (element.kind === 'bottom') return env;

  return runLoop(ctx, fc, env, {
    enter: (_loopFc, head) => updateBinding(head, stmt.variable, element, 'local'),
    exit: (head) => head,
    body: stmt.body,
    update: [],
  });
}

/**
 * Iterate the loop on scratch frames until the head environment is stable,
 * widening bindings that keep changing, then interpret it once more on the
 * real frame.
 */
function runLoop(ctx: InterpreterContext, fc: FrameContext, env: TypeEnvironment, shape: LoopShape): Flow {
  const { lattice, options } = ctx;
  const histories = new Map<string, Type[]>();
  let head = env;

  for (let iteration = 1; ; iteration++) {
    const targets: LoopTargets = { breaks: [], continues: [] };
    const end = iterate(ctx, scratchContext(fc, targets), targets, head, shape);
    const joined = joinFlows(lattice, [head, end]) ?? head;
    const next = widenEnvironment(lattice, joined, histories, options.wideningThreshold);
    if (envsEqual(next, head)) break;
    if (iteration >= options.maxFixpointIterations) {
      head = topDivergent(head, next);
      break;
    }
    head = next;
  }

  const targets: LoopTargets = { breaks: [], continues: [] };
  const loopFc: FrameContext = { ...fc, loop: targets };
  iterate(ctx, loopFc, targets, head, shape);
  fc.returns = loopFc.returns;
  return joinFlows(lattice, [shape.exit(head), ...targets.breaks]);
}

function iterate(
  ctx: InterpreterContext,
  fc: FrameContext,
  targets: LoopTargets,
  head: TypeEnvironment,
  shape: LoopShape
): Flow {
  const bodyEnv = shape.enter(fc, head);
  const afterBody = bodyEnv && execBlock(ctx, fc, shape.body, bodyEnv);
  const beforeUpdate = joinFlows(ctx.lattice, [afterBody, ...targets.continues]);
  return beforeUpdate && execBlock(ctx, fc, shape.update, beforeUpdate);
}
