/**
 * typeprobe - Core type definitions
 *
 * Abstract types stand in for the runtime values of the analyzed program.
 * Every type carries a canonical `id`; two types are structurally equal
 * exactly when their ids are equal.
 */

/** Canonical string form of a type */
export type TypeId = string;

/**
 * Base interface for all types
 */
export interface BaseType {
  readonly kind: string;
  readonly id: TypeId;
}

/**
 * Instance of a concrete (leaf) type, possibly parametric.
 * `params` is empty for a non-parametric type, and also for a parametric
 * type used without arguments (`Vector` meaning any `Vector{T}`).
 */
export interface ConcreteType extends BaseType {
  readonly kind: 'concrete';
  readonly name: string;
  readonly params: readonly Type[];
}

/**
 * Abstract type: has subtypes, never has instances of its own
 */
export interface AbstractType extends BaseType {
  readonly kind: 'abstract';
  readonly name: string;
}

/**
 * Union type (T1 | T2 | ... | Tn)
 */
export interface UnionType extends BaseType {
  readonly kind: 'union';
  /** Member types (flattened, no nested unions, sorted by id) */
  readonly members: readonly Type[];
}

/**
 * Type variable bound by a method's where-clause
 */
export interface TypeVariable extends BaseType {
  readonly kind: 'typevar';
  readonly name: string;
  /** Upper bound constraint */
  readonly bound: Type;
}

/**
 * Bottom - no value; unreachable code or a call that cannot return
 */
export interface BottomType extends BaseType {
  readonly kind: 'bottom';
}

/**
 * Any - top of the lattice
 */
export interface AnyType extends BaseType {
  readonly kind: 'any';
}

/**
 * Union of all possible types
 */
export type Type =
  | ConcreteType
  | AbstractType
  | UnionType
  | TypeVariable
  | BottomType
  | AnyType;

/**
 * Type kind discriminant
 */
export type TypeKind = Type['kind'];

/**
 * Declared variance of a type parameter
 */
export type Variance = 'covariant' | 'invariant';

export interface TypeParamDecl {
  readonly name: string;
  readonly variance: Variance;
  /** Upper bound for the parameter (Any when unconstrained) */
  readonly bound: Type;
}

/**
 * A declared type name in the hierarchy
 */
export interface TypeDecl {
  readonly name: string;
  readonly abstract: boolean;
  /** Name of the (abstract) supertype; null only for Any */
  readonly supertype: string | null;
  readonly params: readonly TypeParamDecl[];
  /**
   * Declared fields, in declaration order. `null` means the type carries no
   * structural information (builtin primitives and containers).
   */
  readonly fields: ReadonlyMap<string, Type> | null;
  readonly loc: SourceLocation | null;
}

/**
 * Location of a construct in a source unit
 */
export interface SourceLocation {
  readonly file: string;
  /** Line number (1-based) */
  readonly line: number;
  /** Column number (0-based) */
  readonly column: number;
}
