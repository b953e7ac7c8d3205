/**
 * Tests for lowering source units and the builtin prelude
 */

import { describe, it, expect } from 'vitest';
import { compile } from '../../src/frontend/compile.js';
import { buildPrelude, loadPrelude, readPreludeData } from '../../src/frontend/prelude.js';
import { MalformedInputError } from '../../src/errors.js';
import { formatSignature } from '../../src/output/formatter.js';

describe('Prelude', () => {
  it('should declare the numeric tower', () => {
    const names = loadPrelude().types.map((d) => d.name);
    expect(names.slice(0, 6)).toEqual(['Number', 'Real', 'Integer', 'AbstractFloat', 'Int', 'Float']);
  });

  it('should lower builtin signatures', () => {
    const plus = loadPrelude().methods.filter((m) => m.name === '+');
    expect(plus.map(formatSignature)).toEqual([
      '+(x1::T, x2::T) where T<:Number',
      '+(x1::Int, x2::Float)',
      '+(x1::Float, x2::Int)',
    ]);
  });

  it('should place builtin locations after the type entries', () => {
    const prelude = buildPrelude({
      types: [{ name: 'Thing', abstract: false, supertype: 'Any', params: [] }],
      methods: [{ name: 'use', typeParams: [], params: ['Thing'], returns: null, intrinsic: null }],
    });
    expect(prelude.methods[0]?.loc).toEqual({ file: '<prelude>', line: 2, column: 0 });
  });

  it('should reject malformed prelude data', () => {
    expect(() => readPreludeData({ types: 'Int' })).toThrow('prelude: prelude.types must be an array');
    expect(() => readPreludeData({ methods: [{ name: 'f', intrinsic: 'magic' }] })).toThrow(
      "prelude: methods[0].intrinsic must be 'construct' or 'convert'"
    );
  });
});

describe('compile', () => {
  describe('type declarations', () => {
    it('should declare classes supertype-first', () => {
      const { program, hierarchy } = compile(
        `
        class Square extends Shape { side: Float; }
        abstract class Shape {}
        `,
        'shapes.tpr'
      );
      expect(program.types.map((d) => d.name)).toEqual(['Shape', 'Square']);
      expect(hierarchy.isAncestor('Shape', 'Square')).toBe(true);
    });

    it('should register a default constructor per struct', () => {
      const { methodTable } = compile('class Point { x: Int; y: Int; }', 'point.tpr');
      const [ctor] = methodTable.methodsOf('Point');
      expect(ctor?.intrinsic).toBe('construct');
      expect(ctor?.params.map((p) => p.name)).toEqual(['x', 'y']);
    });

    it('should bind covariant parameters in field types', () => {
      const { hierarchy } = compile('class Box<out T> { value: T; }', 'box.tpr');
      expect(hierarchy.paramsOf('Box').map((p) => p.variance)).toEqual(['covariant']);
      expect(hierarchy.get('Box')?.fields?.get('value')?.kind).toBe('typevar');
    });

    it('should resolve aliases in annotations', () => {
      const { methodTable } = compile('type Num = Int | Float;\nfunction half(x: Num) { return x / 2; }', 'alias.tpr');
      expect(methodTable.methodsOf('half')[0]?.params[0]?.type.id).toBe('Union{Float, Int}');
    });

    it('should reject fields on abstract types', () => {
      expect(() => compile('abstract class Shape { area: Float; }', 'bad.tpr')).toThrow(
        'abstract type Shape cannot declare fields'
      );
    });
  });

  describe('methods', () => {
    it('should lower parameters, return types and where-clauses', () => {
      const { methodTable } = compile(
        `
        function f(x: Int, y): Int { return x; }
        function g<T extends Real>(a: T, b: T) { return a; }
        declare function h(s: String): Int;
        `,
        'methods.tpr'
      );
      expect(methodTable.methodsOf('f').map(formatSignature)).toEqual(['f(x::Int, y::Any)']);
      expect(methodTable.methodsOf('f')[0]?.returnType?.id).toBe('Int');
      expect(methodTable.methodsOf('g').map(formatSignature)).toEqual(['g(a::T, b::T) where T<:Real']);
      expect(methodTable.methodsOf('h')[0]?.body).toBeNull();
    });

    it('should collect repeated declarations as methods of one function', () => {
      const { methodTable } = compile(
        'function show(x: Int) { return 1; }\nfunction show(x: String) { return 2; }',
        'show.tpr'
      );
      expect(methodTable.methodsOf('show').map(formatSignature)).toEqual(['show(x::Int)', 'show(x::String)']);
    });

    it('should lower a counting loop to a while with an update', () => {
      const { program } = compile(
        `
        function total(n) {
          let t = 0;
          for (let i = 0; i < n; i++) {
            t += i;
          }
          return t;
        }
        `,
        'loop.tpr'
      );
      const body = program.methods.find((m) => m.name === 'total')?.body ?? [];
      expect(body.map((s) => s.kind)).toEqual(['assign', 'assign', 'while', 'return']);
      const loop = body[2];
      expect(loop?.kind === 'while' ? loop.update.map((s) => s.kind) : []).toEqual(['assign']);
    });

    it('should lower operators to generic function calls', () => {
      const { program } = compile('function f(a, b) { return a ** b; }', 'ops.tpr');
      const ret = program.methods[0]?.body?.[0];
      const value = ret?.kind === 'return' ? ret.value : null;
      expect(value?.kind === 'call' ? value.callee : null).toBe('^');
    });
  });

  describe('globals and entries', () => {
    it('should type globals from their literal initializers', () => {
      const { program } = compile('const limit = 10;\nconst scale = 2.5;', 'globals.tpr');
      expect(program.globals.map((g) => `${g.name}::${g.type.id}`)).toEqual(['limit::Int', 'scale::Float']);
    });

    it('should collect toplevel calls as entries', () => {
      const { program } = compile('function f(x) { return x; }\nf(1);\nf("a");', 'entries.tpr');
      expect(program.entries.map((e) => `${e.call.callee}@${e.call.loc.line}`)).toEqual(['f@2', 'f@3']);
    });

    it('should require literal global initializers', () => {
      expect(() => compile('const x = f(1);', 'bad.tpr')).toThrow('global x must be initialized with a literal');
    });
  });

  describe('malformed input', () => {
    it('should turn parse errors into MalformedInputError', () => {
      expect(() => compile('function (', 'bad.tpr')).toThrow(MalformedInputError);
    });

    it('should reject unknown type names', () => {
      expect(() => compile('function f(x: Widget) { return x; }', 'bad.tpr')).toThrow('unknown type Widget');
    });

    it('should reject unsupported syntax with its location', () => {
      let caught: unknown;
      try {
        compile('function f(x) {\n  return x?.y;\n}', 'bad.tpr');
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(MalformedInputError);
      expect(caught instanceof MalformedInputError ? caught.line : null).toBe(2);
    });

    it('should suggest builtin names for TypeScript keywords', () => {
      expect(() => compile('function f(x: number) { return x; }', 'bad.tpr')).toThrow(
        'unsupported type TSNumberKeyword; use Int or Float'
      );
    });
  });
});
