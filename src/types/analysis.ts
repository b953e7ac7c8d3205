/**
 * Type Environment, call frame and diagnostic types
 *
 * These types carry the abstract state through method bodies and the
 * call tree the interpreter builds from it.
 */

import type { SourceLocation, Type } from './types.js';

/**
 * A binding in the type environment
 */
export interface Binding {
  /** The variable/parameter name */
  readonly name: string;
  /** Current type of the binding */
  readonly type: Type;
  /** Declared type, for typed locals; assignments convert to it */
  readonly declared: Type | null;
  /** Declaration kind */
  readonly kind: 'local' | 'param' | 'static' | 'global';
}

/**
 * Type environment at a specific program point
 * Maps variable names to their types
 */
export interface TypeEnvironment {
  /** Bindings in the current scope */
  readonly bindings: ReadonlyMap<string, Binding>;
  /** Parent scope (globals for a method body) */
  readonly parent: TypeEnvironment | null;
  /** The scope kind */
  readonly scopeKind: ScopeKind;
}

export type ScopeKind = 'global' | 'method';

/**
 * Target-program diagnostic kinds
 */
export type ErrorKind =
  | 'UndefinedBinding'
  | 'NoMatchingMethod'
  | 'AmbiguousMethod'
  | 'InvalidFieldAccess'
  | 'InvalidBuiltinCall'
  | 'TypeConversionFailure';

export interface ErrorRecord {
  readonly kind: ErrorKind;
  readonly message: string;
  /** Call expression rendered with resolved argument types */
  readonly call: string;
  readonly loc: SourceLocation;
}

/**
 * Identity of a call expression
 */
export interface CallSite {
  readonly callee: string;
  readonly loc: SourceLocation;
  /** Field name, for `getfield` / `setfield!` frames */
  readonly field?: string;
}

export type FrameStatus = 'unvisited' | 'in-progress' | 'resolved' | 'errored';

/**
 * How a frame's result was obtained:
 * - interpreted: a method body (or declared signature) was analyzed here
 * - cached: copied from a sealed cache entry, carrying only its error paths
 * - recursive: re-entry into an in-progress placeholder
 * - intrinsic: field access or an engine-implemented method
 * - entry: toplevel entry call
 */
export type FrameOrigin = 'interpreted' | 'cached' | 'recursive' | 'intrinsic' | 'entry';

/**
 * Node of the abstract call tree. Owned by its parent; the entry frame has
 * no parent.
 */
export interface CallFrame {
  readonly site: CallSite;
  argTypes: readonly Type[];
  returnType: Type;
  /** Child frames in call order */
  children: CallFrame[];
  /** Diagnostics detected directly in this frame */
  errors: ErrorRecord[];
  status: FrameStatus;
  origin: FrameOrigin;
}

/**
 * Sealed value of the inference cache
 */
export interface InferenceResult {
  readonly returnType: Type;
  /** Every diagnostic in the frame's subtree */
  readonly errors: readonly ErrorRecord[];
  readonly converged: boolean;
  /** Whether dispatch itself failed (frame-level diagnostic, no body) */
  readonly status: 'resolved' | 'errored';
  /** Frame computed for the key; cache hits rebuild from it */
  readonly frame: CallFrame;
}
