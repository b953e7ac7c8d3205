/**
 * Interpreter Context - shared state and options for abstract interpretation
 */

import type {
  CallFrame,
  CallSite,
  MethodSignature,
  Type,
  TypeEnvironment,
} from '../types/index.js';
import type { TypeHierarchy } from '../lattice/hierarchy.js';
import type { TypeLattice } from '../lattice/lattice.js';
import { DEFAULT_WIDENING_THRESHOLD } from '../lattice/lattice.js';
import type { MethodTable } from '../dispatch/method-table.js';
import { Types } from '../utils/type-factory.js';

export interface InterpreterOptions {
  /** Maximum number of nested calls on the abstract call stack */
  maxCallDepth?: number;
  /** Maximum number of distinct (function, argument types) keys per run */
  maxCacheEntries?: number;
  /** Distinct types a position may take before it is widened */
  wideningThreshold?: number;
  /** Iterations of a recursive or loop fixpoint before giving up with Any */
  maxFixpointIterations?: number;
  /** Maximum dispatch cases a union-typed argument list is split into */
  maxUnionSplit?: number;
}

export const DEFAULT_INTERPRETER_OPTIONS: Required<InterpreterOptions> = {
  maxCallDepth: 100,
  maxCacheEntries: 5000,
  wideningThreshold: DEFAULT_WIDENING_THRESHOLD,
  maxFixpointIterations: 16,
  maxUnionSplit: 8,
};

/**
 * Run-wide state visible to expression and statement interpretation
 */
export interface InterpreterContext {
  readonly hierarchy: TypeHierarchy;
  readonly lattice: TypeLattice;
  readonly methodTable: MethodTable;
  readonly options: Required<InterpreterOptions>;
  /** Global bindings; parent of every method scope */
  readonly globals: TypeEnvironment;
  /** Resolve one dispatch case; see AbstractInterpreter.interpret */
  interpret(callee: string, argTypes: readonly Type[], site: CallSite): CallFrame;
}

/**
 * Targets of `break` and `continue` inside the innermost loop
 */
export interface LoopTargets {
  readonly breaks: TypeEnvironment[];
  readonly continues: TypeEnvironment[];
}

/**
 * Per-body state: the frame that collects children and diagnostics, and the
 * join of every reachable `return`
 */
export interface FrameContext {
  readonly frame: CallFrame;
  returns: Type;
  /** Declared return type with where-clause bindings applied */
  readonly returnType: Type | null;
  readonly loop: LoopTargets | null;
  readonly method: MethodSignature | null;
}

/**
 * Control-flow state after a statement; null when the point is unreachable
 */
export type Flow = TypeEnvironment | null;

export function createFrame(
  site: CallSite,
  argTypes: readonly Type[],
  origin: CallFrame['origin']
): CallFrame {
  return {
    site,
    argTypes,
    returnType: Types.bottom,
    children: [],
    errors: [],
    status: 'in-progress',
    origin,
  };
}

/**
 * Body context whose frame is thrown away; used for loop fixpoint passes
 */
export function scratchContext(fc: FrameContext, loop: LoopTargets | null = fc.loop): FrameContext {
  return {
    frame: createFrame(fc.frame.site, fc.frame.argTypes, fc.frame.origin),
    returns: Types.bottom,
    returnType: fc.returnType,
    loop,
    method: fc.method,
  };
}
