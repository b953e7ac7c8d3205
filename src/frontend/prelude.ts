/**
 * Builtin types and methods, loaded from data/prelude.json
 */

import { readFileSync } from 'node:fs';
import type {
  IntrinsicKind,
  MethodSignature,
  SourceLocation,
  TypeDecl,
  TypeParamDecl,
  TypeVariable,
} from '../types/index.js';
import { TypeHierarchy } from '../lattice/hierarchy.js';
import { Types } from '../utils/type-factory.js';
import { MalformedInputError } from '../errors.js';
import { parseTypeString, type TypeScope } from './types.js';

export const PRELUDE_FILE = '<prelude>';

const PRELUDE_URL = new URL('../../data/prelude.json', import.meta.url);

export interface PreludeTypeEntry {
  readonly name: string;
  readonly abstract: boolean;
  readonly supertype: string;
  readonly params: readonly { name: string; bound: string | null; covariant: boolean }[];
}

export interface PreludeMethodEntry {
  readonly name: string;
  readonly typeParams: readonly { name: string; bound: string | null }[];
  readonly params: readonly string[];
  readonly returns: string | null;
  readonly intrinsic: IntrinsicKind | null;
}

export interface PreludeData {
  readonly types: readonly PreludeTypeEntry[];
  readonly methods: readonly PreludeMethodEntry[];
}

export interface Prelude {
  readonly types: readonly TypeDecl[];
  readonly methods: readonly MethodSignature[];
}

let cachedPrelude: Prelude | null = null;

/**
 * The builtin prelude; read and lowered once per process
 */
export function loadPrelude(): Prelude {
  if (!cachedPrelude) {
    const text = readFileSync(PRELUDE_URL, 'utf-8');
    cachedPrelude = buildPrelude(readPreludeData(JSON.parse(text)));
  }
  return cachedPrelude;
}

export function buildPrelude(data: PreludeData): Prelude {
  const hierarchy = new TypeHierarchy();
  const scopeWith = (typeVars: ReadonlyMap<string, TypeVariable>): TypeScope => ({
    file: PRELUDE_FILE,
    hierarchy,
    aliases: new Map(),
    typeVars,
  });

  const types: TypeDecl[] = [];
  data.types.forEach((entry, index) => {
    const params: TypeParamDecl[] = entry.params.map((p) => ({
      name: p.name,
      variance: p.covariant ? 'covariant' : 'invariant',
      bound: p.bound ? parseTypeString(p.bound, scopeWith(new Map())) : Types.any,
    }));
    const decl: TypeDecl = {
      name: entry.name,
      abstract: entry.abstract,
      supertype: entry.supertype,
      params,
      fields: null,
      loc: preludeLoc(index),
    };
    hierarchy.declare(decl);
    types.push(decl);
  });

  const methods = data.methods.map((entry, index): MethodSignature => {
    const typeVars = new Map<string, TypeVariable>();
    const typeParams: TypeVariable[] = [];
    for (const tp of entry.typeParams) {
      const bound = tp.bound ? parseTypeString(tp.bound, scopeWith(typeVars)) : Types.any;
      const typeVar = Types.typeVar(tp.name, bound);
      typeVars.set(tp.name, typeVar);
      typeParams.push(typeVar);
    }
    const scope = scopeWith(typeVars);
    return {
      name: entry.name,
      params: entry.params.map((source, i) => ({
        name: `x${i + 1}`,
        type: parseTypeString(source, scope),
      })),
      typeParams,
      returnType: entry.returns ? parseTypeString(entry.returns, scope) : null,
      body: null,
      intrinsic: entry.intrinsic,
      loc: preludeLoc(data.types.length + index),
    };
  });

  return { types, methods };
}

function preludeLoc(index: number): SourceLocation {
  return { file: PRELUDE_FILE, line: index + 1, column: 0 };
}

// -- JSON validation --------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(path: string, expected: string): never {
  throw new MalformedInputError(`prelude: ${path} must be ${expected}`);
}

function requireString(record: Record<string, unknown>, key: string, path: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : fail(`${path}.${key}`, 'a string');
}

function optionalString(record: Record<string, unknown>, key: string, path: string): string | null {
  const value = record[key];
  if (value === undefined) return null;
  return typeof value === 'string' ? value : fail(`${path}.${key}`, 'a string');
}

function optionalArray(record: Record<string, unknown>, key: string, path: string): unknown[] {
  const value = record[key];
  if (value === undefined) return [];
  return Array.isArray(value) ? value : fail(`${path}.${key}`, 'an array');
}

function requireRecord(value: unknown, path: string): Record<string, unknown> {
  return isRecord(value) ? value : fail(path, 'an object');
}

function readIntrinsic(record: Record<string, unknown>, path: string): IntrinsicKind | null {
  const value = optionalString(record, 'intrinsic', path);
  if (value === null || value === 'construct' || value === 'convert') return value;
  return fail(`${path}.intrinsic`, "'construct' or 'convert'");
}

export function readPreludeData(value: unknown): PreludeData {
  const root = requireRecord(value, 'prelude');

  const types = optionalArray(root, 'types', 'prelude').map((item, i): PreludeTypeEntry => {
    const path = `types[${i}]`;
    const record = requireRecord(item, path);
    return {
      name: requireString(record, 'name', path),
      abstract: record['abstract'] === true,
      supertype: optionalString(record, 'supertype', path) ?? 'Any',
      params: optionalArray(record, 'params', path).map((param, j) => {
        const paramPath = `${path}.params[${j}]`;
        const paramRecord = requireRecord(param, paramPath);
        return {
          name: requireString(paramRecord, 'name', paramPath),
          bound: optionalString(paramRecord, 'bound', paramPath),
          covariant: paramRecord['covariant'] === true,
        };
      }),
    };
  });

  const methods = optionalArray(root, 'methods', 'prelude').map((item, i): PreludeMethodEntry => {
    const path = `methods[${i}]`;
    const record = requireRecord(item, path);
    return {
      name: requireString(record, 'name', path),
      typeParams: optionalArray(record, 'typeParams', path).map((param, j) => {
        const paramPath = `${path}.typeParams[${j}]`;
        const paramRecord = requireRecord(param, paramPath);
        return {
          name: requireString(paramRecord, 'name', paramPath),
          bound: optionalString(paramRecord, 'bound', paramPath),
        };
      }),
      params: optionalArray(record, 'params', path).map((param, j) =>
        typeof param === 'string' ? param : fail(`${path}.params[${j}]`, 'a string')
      ),
      returns: optionalString(record, 'returns', path),
      intrinsic: readIntrinsic(record, path),
    };
  });

  return { types, methods };
}
