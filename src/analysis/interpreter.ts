/**
 * Abstract Interpreter - interprocedural fixpoint over the abstract call tree
 *
 * Each dispatch case `(function, argument types)` is interpreted once per
 * run and memoized in the inference cache. Recursion is detected through
 * in-progress placeholders: the frame that owns a re-entered placeholder
 * re-interprets its body until the placeholder's return type is stable,
 * widening it when it keeps growing. Frames computed while an outer
 * placeholder was still moving are not sealed; they are reused only until
 * some placeholder moves again.
 */

import type {
  CallFrame,
  CallSite,
  EntryCall,
  ErrorRecord,
  MethodSignature,
  Program,
  SourceLocation,
  Type,
  TypeEnvironment,
} from '../types/index.js';
import type { TypeHierarchy } from '../lattice/hierarchy.js';
import type { TypeLattice } from '../lattice/lattice.js';
import type { MethodMatch, MethodTable } from '../dispatch/method-table.js';
import { Types } from '../utils/type-factory.js';
import {
  eraseTypeVars,
  splitUnionArgs,
  substituteTypeVars,
  typesEqual,
  unionCaseCount,
} from '../utils/type-utils.js';
import { cloneErrorPaths, collectErrors, hasErrors } from '../utils/frame-utils.js';
import { formatCall } from '../output/formatter.js';
import { ResourceLimitError } from '../errors.js';
import { InferenceCache, type Placeholder } from './cache.js';
import {
  createFrame,
  DEFAULT_INTERPRETER_OPTIONS,
  type FrameContext,
  type InterpreterContext,
  type InterpreterOptions,
} from './context.js';
import { checkUnionCases, constructInstance, convertIntrinsic } from './calls.js';
import { ambiguousMethod, noMatchingMethod } from './diagnostics.js';
import { evalExpr, resolveCall } from './expressions.js';
import { addReturn, execBlock } from './statements.js';
import { createEnv, lookupBinding, updateBinding } from './state.js';

/**
 * What the interpreter needs from a compiled unit
 */
export interface InterpreterInput {
  readonly program: Program;
  readonly hierarchy: TypeHierarchy;
  readonly lattice: TypeLattice;
  readonly methodTable: MethodTable;
}

/**
 * Result of one entry call: its call tree, or the resource limit that
 * stopped it
 */
export type EntryOutcome =
  | { readonly kind: 'frame'; readonly frame: CallFrame }
  | {
      readonly kind: 'failure';
      readonly call: string;
      readonly loc: SourceLocation;
      readonly message: string;
    };

export interface RunResult {
  readonly file: string;
  readonly outcomes: readonly EntryOutcome[];
  /** Distinct cache keys at the end of the run */
  readonly cacheEntries: number;
}

/**
 * A frame on the abstract call stack
 */
interface ActiveFrame {
  readonly callee: string;
  readonly siteId: string;
  readonly argTypes: readonly Type[];
  readonly placeholder: Placeholder;
  /** Lowest stack index of an outer placeholder this frame has read */
  dependsOn: number;
}

/**
 * Result of a cycle member that was not sealed. It stays valid while the
 * outer placeholder it read is in progress and no placeholder has moved.
 */
interface ProvisionalResult {
  readonly frame: CallFrame;
  readonly dependsOn: number;
  readonly head: Placeholder;
  readonly generation: number;
}

function siteIdOf(site: CallSite): string {
  return `${site.loc.file}:${site.loc.line}:${site.loc.column}`;
}

function sameTypes(a: readonly Type[], b: readonly Type[]): boolean {
  return (
    a.length === b.length &&
    a.every((t, i) => {
      const other = b[i];
      return other !== undefined && typesEqual(t, other);
    })
  );
}

export class AbstractInterpreter {
  private readonly options: Required<InterpreterOptions>;
  private readonly cache: InferenceCache;
  private readonly stack: ActiveFrame[] = [];
  private readonly provisional = new Map<string, ProvisionalResult>();
  /** Bumped whenever a placeholder's return type moves */
  private generation = 0;
  private readonly ctx: InterpreterContext;

  constructor(
    private readonly input: InterpreterInput,
    options: InterpreterOptions = {}
  ) {
    this.options = { ...DEFAULT_INTERPRETER_OPTIONS, ...options };
    this.cache = new InferenceCache(this.options.maxCacheEntries);

    let globals: TypeEnvironment = createEnv(null, 'global');
    for (const binding of input.program.globals) {
      globals = updateBinding(globals, binding.name, binding.type, 'global');
    }

    this.ctx = {
      hierarchy: input.hierarchy,
      lattice: input.lattice,
      methodTable: input.methodTable,
      options: this.options,
      globals,
      interpret: (callee, argTypes, site) => this.interpret(callee, argTypes, site),
    };
  }

  /**
   * Profile every entry call on a fresh cache. A resource limit ends only
   * the entry call that hit it.
   */
  run(entries: readonly EntryCall[] = this.input.program.entries): RunResult {
    this.cache.clear();
    this.provisional.clear();
    const outcomes = entries.map((entry) => this.runEntry(entry));
    return { file: this.input.program.file, outcomes, cacheEntries: this.cache.size };
  }

  /**
   * Interpret one dispatch case of `callee` and return its frame
   */
  interpret(callee: string, argTypes: readonly Type[], site: CallSite): CallFrame {
    const args = this.widenRecursiveArgs(callee, argTypes, site);
    const key = InferenceCache.keyOf(callee, args);

    const entry = this.cache.get(key);
    if (entry?.state === 'sealed') {
      return this.frameFromCache(entry.result.frame, site, args);
    }
    if (entry?.state === 'in-progress') {
      return this.reenter(entry, site, args);
    }
    const memo = this.provisional.get(key);
    if (memo && this.isCurrent(memo)) {
      return this.reuseProvisional(memo, site, args);
    }

    if (this.stack.length >= this.options.maxCallDepth) {
      throw new ResourceLimitError('call-depth', this.options.maxCallDepth);
    }
    const index = this.stack.length;
    const placeholder = this.cache.begin(key, index);
    const active: ActiveFrame = {
      callee,
      siteId: siteIdOf(site),
      argTypes: args,
      placeholder,
      dependsOn: Infinity,
    };

    this.stack.push(active);
    const { frame, converged } = this.withPopOnExit(() => this.fixpoint(callee, args, site, placeholder));

    const parent = this.stack[index - 1];
    const head = this.stack[active.dependsOn];
    if (head && active.dependsOn < index) {
      this.cache.discard(key);
      this.provisional.set(key, {
        frame,
        dependsOn: active.dependsOn,
        head: head.placeholder,
        generation: this.generation,
      });
      if (parent && active.dependsOn < index - 1) {
        parent.dependsOn = Math.min(parent.dependsOn, active.dependsOn);
      }
    } else {
      this.provisional.delete(key);
      this.cache.seal(key, {
        returnType: frame.returnType,
        errors: collectErrors(frame),
        converged,
        status: frame.status === 'errored' ? 'errored' : 'resolved',
        frame,
      });
    }
    return frame;
  }

  private withPopOnExit<T>(body: () => T): T {
    try {
      return body();
    } finally {
      this.stack.pop();
    }
  }

  /**
   * Re-dispatch until the placeholder's return type is stable. Without
   * re-entry the first pass is final.
   */
  private fixpoint(
    callee: string,
    args: readonly Type[],
    site: CallSite,
    placeholder: Placeholder
  ): { frame: CallFrame; converged: boolean } {
    const lattice = this.input.lattice;
    let frame = this.dispatch(callee, args, site);

    for (let iteration = 1; placeholder.reentered; iteration++) {
      const previous = placeholder.returnType;
      const joined = lattice.join(previous, frame.returnType);
      placeholder.history.push(joined);
      const next =
        iteration > this.options.wideningThreshold
          ? lattice.widen(placeholder.history, this.options.wideningThreshold)
          : joined;

      if (typesEqual(next, previous)) {
        frame.returnType = next;
        break;
      }
      if (iteration >= this.options.maxFixpointIterations) {
        frame.returnType = Types.any;
        return { frame, converged: false };
      }
      placeholder.returnType = next;
      placeholder.reentered = false;
      this.generation++;
      frame = this.dispatch(callee, args, site);
    }
    return { frame, converged: true };
  }

  // ==========================================================================
  // Entry calls
  // ==========================================================================

  private runEntry(entry: EntryCall): EntryOutcome {
    const call = entry.call;
    const frame = createFrame({ callee: call.callee, loc: call.loc }, [], 'entry');
    const fc: FrameContext = { frame, returns: Types.bottom, returnType: null, loop: null, method: null };
    const globals = this.ctx.globals;

    try {
      const argTypes = call.args.map((arg) => evalExpr(this.ctx, fc, arg, globals));
      frame.argTypes = argTypes;
      if (argTypes.some((t) => t.kind === 'bottom')) {
        frame.returnType = Types.bottom;
      } else {
        const cases = splitUnionArgs(argTypes, this.options.maxUnionSplit);
        const only = cases.length === 1 ? cases[0] : undefined;
        if (only && this.input.methodTable.has(call.callee) && !lookupBinding(globals, call.callee)) {
          // A single dispatch case is the entry frame itself
          const inner = this.interpret(call.callee, only, frame.site);
          frame.children.push(...inner.children);
          frame.errors.push(...inner.errors);
          frame.returnType = inner.returnType;
          frame.status = inner.status;
          if (inner.status !== 'errored' && unionCaseCount(argTypes) > this.options.maxUnionSplit) {
            checkUnionCases(this.ctx, frame, call.callee, argTypes, frame.site);
          }
        } else {
          frame.returnType = resolveCall(this.ctx, fc, call, argTypes, globals);
        }
      }
    } catch (error) {
      if (!(error instanceof ResourceLimitError)) throw error;
      this.cache.discardPlaceholders();
      this.provisional.clear();
      return {
        kind: 'failure',
        call: formatCall(frame.site, frame.argTypes),
        loc: call.loc,
        message: error.message,
      };
    }

    if (frame.status === 'in-progress') {
      frame.status = 'resolved';
    }
    return { kind: 'frame', frame };
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  private dispatch(callee: string, argTypes: readonly Type[], site: CallSite): CallFrame {
    const frame = createFrame(site, argTypes, 'interpreted');
    const result = this.input.methodTable.lookup(callee, argTypes);

    switch (result.kind) {
      case 'no-method':
        frame.errors.push(noMatchingMethod(site, argTypes));
        frame.returnType = Types.bottom;
        frame.status = 'errored';
        return frame;

      case 'ambiguous':
        frame.errors.push(ambiguousMethod(site, argTypes, result.candidates));
        frame.returnType = Types.any;
        frame.status = 'errored';
        return frame;

      case 'match': {
        let returnType: Type = Types.bottom;
        for (const match of result.matches) {
          returnType = this.input.lattice.join(returnType, this.invoke(frame, match, argTypes));
        }
        frame.returnType = returnType;
        frame.status = 'resolved';
        return frame;
      }
    }
  }

  /**
   * Result of running one matched method on `argTypes`
   */
  private invoke(frame: CallFrame, match: MethodMatch, argTypes: readonly Type[]): Type {
    const method = match.method;
    if (method.intrinsic === 'construct') {
      frame.origin = 'intrinsic';
      return constructInstance(this.ctx, frame, method.name, argTypes);
    }
    if (method.intrinsic === 'convert') {
      frame.origin = 'intrinsic';
      return convertIntrinsic(this.ctx, frame, argTypes);
    }

    const returnType = method.returnType
      ? eraseTypeVars(substituteTypeVars(method.returnType, match.bindings))
      : null;
    if (!method.body) {
      return returnType ?? Types.any;
    }

    const fc: FrameContext = { frame, returns: Types.bottom, returnType, loop: null, method };
    const end = execBlock(this.ctx, fc, method.body, this.methodEnv(method, match, argTypes));
    if (end) {
      addReturn(this.ctx, fc, Types.concrete('Nothing'), method.loc);
    }
    return fc.returns;
  }

  /**
   * Parameters bound to the argument types, narrowed by the declared
   * parameter types; where-clause variables bound to `Type{T}`
   */
  private methodEnv(method: MethodSignature, match: MethodMatch, argTypes: readonly Type[]): TypeEnvironment {
    const lattice = this.input.lattice;
    let env = createEnv(this.ctx.globals, 'method');
    for (const typeVar of method.typeParams) {
      const bound = match.bindings.get(typeVar.name) ?? typeVar.bound;
      env = updateBinding(env, typeVar.name, Types.concrete('Type', [bound]), 'static');
    }
    method.params.forEach((param, index) => {
      const arg = argTypes[index] ?? Types.any;
      const declared = eraseTypeVars(substituteTypeVars(param.type, match.bindings));
      env = updateBinding(env, param.name, lattice.meet(arg, declared), 'param');
    });
    return env;
  }

  // ==========================================================================
  // Recursion
  // ==========================================================================

  private reenter(placeholder: Placeholder, site: CallSite, argTypes: readonly Type[]): CallFrame {
    placeholder.reentered = true;
    const top = this.stack[this.stack.length - 1];
    if (top && placeholder.depth < this.stack.length - 1) {
      top.dependsOn = Math.min(top.dependsOn, placeholder.depth);
    }
    const frame = createFrame(site, argTypes, 'recursive');
    frame.returnType = placeholder.returnType;
    frame.status = 'resolved';
    return frame;
  }

  private isCurrent(memo: ProvisionalResult): boolean {
    return memo.generation === this.generation && this.cache.get(memo.head.key) === memo.head;
  }

  /**
   * Reuse a cycle member computed earlier in the same fixpoint iteration;
   * the caller inherits its dependency on the outer placeholder
   */
  private reuseProvisional(memo: ProvisionalResult, site: CallSite, argTypes: readonly Type[]): CallFrame {
    const top = this.stack[this.stack.length - 1];
    if (top && memo.dependsOn < this.stack.length - 1) {
      top.dependsOn = Math.min(top.dependsOn, memo.dependsOn);
    }
    return this.frameFromCache(memo.frame, site, argTypes);
  }

  /**
   * A recursive call through a call site already on the stack with other
   * argument types is widened against those types, so that signatures
   * cannot grow without bound
   */
  private widenRecursiveArgs(callee: string, argTypes: readonly Type[], site: CallSite): readonly Type[] {
    const siteId = siteIdOf(site);
    const previous = this.stack.filter((f) => f.callee === callee && f.siteId === siteId);
    if (previous.every((f) => sameTypes(f.argTypes, argTypes))) {
      return argTypes;
    }
    return argTypes.map((arg, index) =>
      this.input.lattice.widen(
        [...previous.map((f) => f.argTypes[index] ?? Types.bottom), arg],
        this.options.wideningThreshold
      )
    );
  }

  /**
   * Frame for a sealed cache hit: only the error paths are copied. Errors
   * raised by dispatch itself move to the new call site.
   */
  private frameFromCache(source: CallFrame, site: CallSite, argTypes: readonly Type[]): CallFrame {
    const relocate = source.origin !== 'interpreted' || source.status === 'errored';
    const errors: ErrorRecord[] = source.errors.map((error) =>
      relocate ? { ...error, loc: site.loc } : error
    );
    return {
      site,
      argTypes,
      returnType: source.returnType,
      children: source.children.filter(hasErrors).map(cloneErrorPaths),
      errors,
      status: source.status,
      origin: 'cached',
    };
  }
}
