/**
 * Intermediate representation consumed by the abstract interpreter.
 *
 * The front end lowers source units into this form; the engine never sees
 * surface syntax. All nodes are plain immutable data.
 */

import type { SourceLocation, Type, TypeDecl, TypeVariable } from './types.js';

export interface LiteralExpr {
  readonly kind: 'literal';
  readonly type: Type;
  /** Known boolean value, for `true` / `false` */
  readonly value?: boolean;
  readonly loc: SourceLocation;
}

export interface NameExpr {
  readonly kind: 'name';
  readonly name: string;
  readonly loc: SourceLocation;
}

/**
 * Call of a generic function by name. Operators, indexing and constructors
 * are calls too.
 */
export interface CallExpr {
  readonly kind: 'call';
  readonly callee: string;
  readonly args: readonly Expr[];
  readonly loc: SourceLocation;
}

export interface FieldExpr {
  readonly kind: 'field';
  readonly object: Expr;
  readonly field: string;
  readonly loc: SourceLocation;
}

/** Type test `subject instanceof test` */
export interface IsaExpr {
  readonly kind: 'isa';
  readonly subject: Expr;
  readonly test: Type;
  readonly loc: SourceLocation;
}

export interface LogicalExpr {
  readonly kind: 'logical';
  readonly operator: '&&' | '||';
  readonly left: Expr;
  readonly right: Expr;
  readonly loc: SourceLocation;
}

export interface ConditionalExpr {
  readonly kind: 'conditional';
  readonly test: Expr;
  readonly consequent: Expr;
  readonly alternate: Expr;
  readonly loc: SourceLocation;
}

export interface VectorExpr {
  readonly kind: 'vector';
  readonly elements: readonly Expr[];
  readonly loc: SourceLocation;
}

export type Expr =
  | LiteralExpr
  | NameExpr
  | CallExpr
  | FieldExpr
  | IsaExpr
  | LogicalExpr
  | ConditionalExpr
  | VectorExpr;

export interface AssignStmt {
  readonly kind: 'assign';
  readonly target: string;
  readonly value: Expr;
  /** Declared type of a typed local (`let x: Int = ...`) */
  readonly declared: Type | null;
  readonly loc: SourceLocation;
}

export interface FieldAssignStmt {
  readonly kind: 'field-assign';
  readonly object: Expr;
  readonly field: string;
  readonly value: Expr;
  readonly loc: SourceLocation;
}

export interface ExprStmt {
  readonly kind: 'expr';
  readonly expr: Expr;
  readonly loc: SourceLocation;
}

export interface ReturnStmt {
  readonly kind: 'return';
  readonly value: Expr | null;
  readonly loc: SourceLocation;
}

export interface ThrowStmt {
  readonly kind: 'throw';
  readonly value: Expr;
  readonly loc: SourceLocation;
}

export interface IfStmt {
  readonly kind: 'if';
  readonly test: Expr;
  readonly consequent: readonly Stmt[];
  readonly alternate: readonly Stmt[];
  readonly loc: SourceLocation;
}

export interface WhileStmt {
  readonly kind: 'while';
  readonly test: Expr;
  readonly body: readonly Stmt[];
  /** Runs after the body and after `continue` (lowered `for` update clause) */
  readonly update: readonly Stmt[];
  readonly loc: SourceLocation;
}

export interface ForEachStmt {
  readonly kind: 'for-each';
  readonly variable: string;
  readonly iterable: Expr;
  readonly body: readonly Stmt[];
  readonly loc: SourceLocation;
}

export interface BreakStmt {
  readonly kind: 'break';
  readonly loc: SourceLocation;
}

export interface ContinueStmt {
  readonly kind: 'continue';
  readonly loc: SourceLocation;
}

export type Stmt =
  | AssignStmt
  | FieldAssignStmt
  | ExprStmt
  | ReturnStmt
  | ThrowStmt
  | IfStmt
  | WhileStmt
  | ForEachStmt
  | BreakStmt
  | ContinueStmt;

export interface Param {
  readonly name: string;
  readonly type: Type;
}

/**
 * Intrinsics are methods whose semantics live in the engine
 */
export type IntrinsicKind = 'construct' | 'convert';

/**
 * One method of a generic function
 */
export interface MethodSignature {
  readonly name: string;
  readonly params: readonly Param[];
  /** Where-clause variables, referenced from `params` */
  readonly typeParams: readonly TypeVariable[];
  /** Declared return type; the body result is converted to it */
  readonly returnType: Type | null;
  /** Body statements; null for declared and builtin methods */
  readonly body: readonly Stmt[] | null;
  readonly intrinsic: IntrinsicKind | null;
  readonly loc: SourceLocation;
}

export interface GlobalBinding {
  readonly name: string;
  readonly type: Type;
  readonly loc: SourceLocation;
}

/**
 * Toplevel call expression the analysis starts from
 */
export interface EntryCall {
  readonly call: CallExpr;
}

/**
 * A fully lowered source unit
 */
export interface Program {
  readonly file: string;
  readonly types: readonly TypeDecl[];
  readonly methods: readonly MethodSignature[];
  readonly globals: readonly GlobalBinding[];
  readonly entries: readonly EntryCall[];
}
