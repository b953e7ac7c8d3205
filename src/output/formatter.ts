/**
 * Type Formatter - Converts types, calls and signatures to display strings
 *
 * Types print in the analyzed language's own notation: `Vector{Int}`,
 * `Union{Int, String}`, and call expressions as `f(::Int, ::String)`.
 */

import type { CallSite, MethodSignature, Type } from '../types/index.js';

/**
 * Format options for type output
 */
export interface FormatOptions {
  /** Maximum depth for nested type arguments */
  maxDepth?: number;
}

const DEFAULT_FORMAT_OPTIONS: Required<FormatOptions> = {
  maxDepth: 6,
};

/**
 * Format a type to its display string
 */
export function formatType(type: Type, options: FormatOptions = {}): string {
  const opts = { ...DEFAULT_FORMAT_OPTIONS, ...options };
  return formatTypeInternal(type, opts, 0);
}

function formatTypeInternal(type: Type, opts: Required<FormatOptions>, depth: number): string {
  if (depth > opts.maxDepth) {
    return '...';
  }

  switch (type.kind) {
    case 'any':
      return 'Any';
    case 'bottom':
      return 'Bottom';
    case 'abstract':
    case 'typevar':
      return type.name;
    case 'concrete':
      if (type.params.length === 0) return type.name;
      return `${type.name}{${type.params.map((p) => formatTypeInternal(p, opts, depth + 1)).join(', ')}}`;
    case 'union':
      return `Union{${type.members.map((m) => formatTypeInternal(m, opts, depth + 1)).join(', ')}}`;
  }
}

/**
 * `f(::Int, ::String)`; field frames render as `getfield(::Point, :x)`
 */
export function formatCall(site: CallSite, argTypes: readonly Type[]): string {
  const args = argTypes.map((t) => `::${formatType(t)}`);
  if (site.field !== undefined) {
    args.splice(1, 0, `:${site.field}`);
  }
  return `${site.callee}(${args.join(', ')})`;
}

/**
 * `f(x::T, y::Int) where T<:Number`
 */
export function formatSignature(method: MethodSignature): string {
  const params = method.params.map((p) => `${p.name}::${formatType(p.type)}`).join(', ');
  const where = method.typeParams.map((tv) =>
    tv.bound.kind === 'any' ? tv.name : `${tv.name}<:${formatType(tv.bound)}`
  );
  return where.length > 0
    ? `${method.name}(${params}) where ${where.join(', ')}`
    : `${method.name}(${params})`;
}
