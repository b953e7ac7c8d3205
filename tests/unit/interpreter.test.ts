/**
 * Tests for the abstract interpreter
 */

import { describe, it, expect } from 'vitest';
import { compile } from '../../src/frontend/compile.js';
import { AbstractInterpreter, type RunResult } from '../../src/analysis/interpreter.js';
import type { InterpreterOptions } from '../../src/analysis/context.js';
import { collectErrors } from '../../src/utils/frame-utils.js';
import type { CallFrame } from '../../src/types/index.js';

function analyze(source: string, options: InterpreterOptions = {}): RunResult {
  return new AbstractInterpreter(compile(source, 'test.tpr'), options).run();
}

function entryFrame(run: RunResult, index = 0): CallFrame {
  const outcome = run.outcomes[index];
  if (outcome?.kind !== 'frame') {
    throw new Error(`entry ${index} did not produce a frame`);
  }
  return outcome.frame;
}

function messages(frame: CallFrame): string[] {
  return collectErrors(frame).map((e) => `${e.kind}: ${e.message}`);
}

describe('AbstractInterpreter', () => {
  describe('recursion', () => {
    it('should converge on naive fib', () => {
      const run = analyze(`
        function fib(n) {
          return n <= 2 ? 1 : fib(n - 1) + fib(n - 2);
        }
        fib(1000);
      `);
      const frame = entryFrame(run);
      expect(frame.returnType.id).toBe('Int');
      expect(messages(frame)).toEqual([]);
    });

    it('should terminate on recursion that never returns', () => {
      const run = analyze(`
        function spin(n) { return spin(n + 1); }
        spin(1);
      `);
      const frame = entryFrame(run);
      expect(frame.returnType.id).toBe('Bottom');
      expect(messages(frame)).toEqual([]);
    });

    it('should terminate when the argument type keeps growing', () => {
      const run = analyze(`
        function grow(x) { return grow([x]); }
        grow(1);
      `);
      expect(run.outcomes[0]?.kind).toBe('frame');
      expect(messages(entryFrame(run))).toEqual([]);
    });

    function cycle(size: number): string {
      const lines: string[] = [];
      for (let i = 0; i < size; i++) {
        const next = `f${(i + 1) % size}`;
        lines.push(`function f${i}(n) { return n <= 0 ? 0 : ${next}(n - 1) + ${next}(n - 2); }`);
      }
      lines.push('f0(10);');
      return lines.join('\n');
    }

    it('should reuse cycle members within one fixpoint iteration', () => {
      const run = analyze(cycle(20));
      const frame = entryFrame(run);
      expect(frame.returnType.id).toBe('Int');
      expect(messages(frame)).toEqual([]);
    });

    it('should charge rebuilt cycle members against the cache cap', () => {
      const run = analyze(cycle(20), { maxCacheEntries: 30 });
      expect(run.outcomes[0]).toEqual({
        kind: 'failure',
        call: 'f0(::Int)',
        loc: { file: 'test.tpr', line: 21, column: 0 },
        message: 'inference cache exceeded 30 entries',
      });
    });

    it('should resolve mutual recursion', () => {
      const run = analyze(`
        function isEven(n) { return n == 0 ? true : isOdd(n - 1); }
        function isOdd(n) { return n == 0 ? false : isEven(n - 1); }
        isEven(10);
      `);
      expect(entryFrame(run).returnType.id).toBe('Bool');
    });
  });

  describe('dispatch errors', () => {
    it('should report a missing method without expanding children', () => {
      const run = analyze(`
        function f(x: String) { return x; }
        f(1);
      `);
      const frame = entryFrame(run);
      expect(messages(frame)).toEqual(['NoMatchingMethod: no method matching f(::Int)']);
      expect(frame.children).toEqual([]);
      expect(frame.returnType.id).toBe('Bottom');
    });

    it('should report ambiguous methods with their candidates', () => {
      const run = analyze(
        ['function g(x: Int, y: Real) { return 1; }', 'function g(x: Real, y: Int) { return 2; }', 'g(1, 2);'].join(
          '\n'
        )
      );
      const frame = entryFrame(run);
      expect(messages(frame)).toEqual([
        'AmbiguousMethod: g(::Int, ::Int) is ambiguous; candidates: g(x::Int, y::Real) @ test.tpr:1; g(x::Real, y::Int) @ test.tpr:2',
      ]);
      expect(frame.returnType.id).toBe('Any');
    });

    it('should report undefined names without calling through them', () => {
      const run = analyze(`
        function f() { return y + 1; }
        f();
      `);
      const frame = entryFrame(run);
      expect(messages(frame)).toEqual(['UndefinedBinding: y not defined']);
      expect(frame.children).toEqual([]);
    });

    it('should report a type without a constructor as a missing method', () => {
      const run = analyze(`
        function f() { return Int(3); }
        f();
      `);
      expect(messages(entryFrame(run))).toEqual(['NoMatchingMethod: no method matching Int(::Int)']);
    });

    it('should keep analyzing after a failed call', () => {
      const run = analyze(`
        function f(s) {
          const a = s - 1;
          const b = s * 2;
          return 0;
        }
        f("x");
      `);
      expect(messages(entryFrame(run))).toEqual([
        'NoMatchingMethod: no method matching -(::String, ::Int)',
        'NoMatchingMethod: no method matching *(::String, ::Int)',
      ]);
    });
  });

  describe('narrowing', () => {
    it('should skip a branch the argument type cannot reach', () => {
      const run = analyze(`
        function f(x) {
          if (x instanceof Int) {
            return x + 1;
          }
          return length(x);
        }
        f(1);
      `);
      const frame = entryFrame(run);
      expect(messages(frame)).toEqual([]);
      expect(frame.returnType.id).toBe('Int');
    });

    it('should narrow a union on both arms', () => {
      const run = analyze(`
        declare function pick(): Int | String;
        function g() {
          const v = pick();
          if (v instanceof Int) {
            return v + 1;
          }
          return length(v);
        }
        g();
      `);
      const frame = entryFrame(run);
      expect(messages(frame)).toEqual([]);
      expect(frame.returnType.id).toBe('Int');
    });
  });

  describe('unions', () => {
    it('should keep every error when an argument is broadened to a union', () => {
      const source = `
        declare function pick(): Int | String;
        function h(x) { return x + 1; }
        h("a");
        h(pick());
      `;
      const run = analyze(source);
      const narrow = messages(entryFrame(run, 0));
      const broad = messages(entryFrame(run, 1));

      expect(narrow).toEqual(['NoMatchingMethod: no method matching +(::String, ::Int)']);
      expect(broad).toEqual(expect.arrayContaining(narrow));
    });

    it('should look up every member combination past the split limit', () => {
      const source = `
        declare function pa(): Int | String | Float;
        declare function pb(): Int | Float | Bool;
        function h(x, y) { return x + y; }
        h("a", 1);
        h(pa(), pb());
      `;
      const run = analyze(source);
      const narrow = messages(entryFrame(run, 0));
      const broad = messages(entryFrame(run, 1));

      expect(narrow).toEqual(['NoMatchingMethod: no method matching +(::String, ::Int)']);
      expect(broad).toEqual([
        'NoMatchingMethod: no method matching +(::Float, ::Bool)',
        'NoMatchingMethod: no method matching +(::Int, ::Bool)',
        'NoMatchingMethod: no method matching +(::String, ::Bool)',
        'NoMatchingMethod: no method matching +(::String, ::Float)',
        'NoMatchingMethod: no method matching +(::String, ::Int)',
      ]);
    });

    it('should give looked-up combinations no children', () => {
      const run = analyze(`
        declare function pa(): Int | String | Float;
        declare function pb(): Int | Float | Bool;
        function h(x, y) { return x + y; }
        h(pa(), pb());
      `);
      const failing = entryFrame(run).children.filter((c) => c.status === 'errored');
      expect(failing).toHaveLength(5);
      expect(failing.every((c) => c.children.length === 0 && c.returnType.id === 'Bottom')).toBe(true);
    });

    it('should split union arguments into one frame per member', () => {
      const run = analyze(`
        declare function pick(): Int | String;
        function h(x) { return x; }
        h(pick());
      `);
      const frame = entryFrame(run);
      const calls = frame.children.filter((c) => c.site.callee === 'h').map((c) => c.argTypes.map((t) => t.id));
      expect(calls).toEqual([['Int'], ['String']]);
      expect(frame.returnType.id).toBe('Union{Int, String}');
    });
  });

  describe('conversions', () => {
    it('should check constructor arguments against field types', () => {
      const run = analyze(`
        class Point { x: Int; y: Int; }
        Point(1, "a");
      `);
      const [error] = collectErrors(entryFrame(run));
      expect(error?.kind).toBe('TypeConversionFailure');
      expect(error?.message).toBe('cannot convert String to Int');
      expect(error?.call).toBe('Point(::Int, ::String)');
    });

    it('should convert numbers assigned to typed locals', () => {
      const run = analyze(`
        function f() {
          let y: Int = 1.5;
          return y;
        }
        f();
      `);
      const frame = entryFrame(run);
      expect(messages(frame)).toEqual([]);
      expect(frame.returnType.id).toBe('Int');
    });

    it('should report impossible conversions to typed locals', () => {
      const run = analyze(`
        function f() {
          let s: String = 1;
          return s;
        }
        f();
      `);
      const [error] = collectErrors(entryFrame(run));
      expect(error?.message).toBe('cannot convert Int to String');
      expect(error?.call).toBe('convert(::Type{String}, ::Int)');
    });

    it('should report non-boolean conditions', () => {
      const run = analyze(`
        function f(x) {
          if (x) { return 1; }
          return 2;
        }
        f(1);
      `);
      expect(messages(entryFrame(run))).toEqual([
        'TypeConversionFailure: non-boolean (Int) used in boolean context',
      ]);
    });
  });

  describe('logical operators', () => {
    it('should check the right operand as a condition', () => {
      const run = analyze(`
        function f(a) { return a && 1; }
        f(true);
      `);
      expect(messages(entryFrame(run))).toEqual([
        'TypeConversionFailure: non-boolean (Int) used in boolean context',
      ]);
    });

    it('should accept boolean operands on both sides', () => {
      const run = analyze(`
        function f(a, b) { return a || b; }
        f(true, false);
      `);
      const frame = entryFrame(run);
      expect(messages(frame)).toEqual([]);
      expect(frame.returnType.id).toBe('Bool');
    });
  });

  describe('builtin calls', () => {
    it('should reject field access on a builtin type', () => {
      const run = analyze(`
        function f() { return (1).x; }
        f();
      `);
      const [error] = collectErrors(entryFrame(run));
      expect(error?.kind).toBe('InvalidBuiltinCall');
      expect(error?.message).toBe('cannot access field x of builtin type Int');
      expect(error?.call).toBe('getfield(::Int, :x)');
    });

    it('should reject field access on an abstract type without struct subtypes', () => {
      const run = analyze(`
        abstract class Shape {}
        declare function make(): Shape;
        function area() {
          const s = make();
          return s.side;
        }
        area();
      `);
      expect(messages(entryFrame(run))).toEqual([
        'InvalidBuiltinCall: cannot access field side of Shape, which has no struct subtypes',
      ]);
    });

    it('should reject calling a value that is not callable', () => {
      const run = analyze(`
        function f(x) { return x(1); }
        f(2);
      `);
      const [error] = collectErrors(entryFrame(run));
      expect(error?.kind).toBe('InvalidBuiltinCall');
      expect(error?.message).toBe('x::Int is not callable');
      expect(error?.call).toBe('x(::Int)');
    });
  });

  describe('fields', () => {
    it('should report a misspelled field once per access', () => {
      const run = analyze(`
        class Point { x: Int; y: Int; }
        function norm(p) { return p.x * p.x + p.yy * p.yy; }
        norm(Point(1, 2));
      `);
      expect(messages(entryFrame(run))).toEqual([
        'InvalidFieldAccess: type Point has no field yy',
        'InvalidFieldAccess: type Point has no field yy',
      ]);
    });

    it('should read fields through type parameters', () => {
      const run = analyze(`
        class Box<out T> { value: T; }
        function unbox(b) { return b.value; }
        unbox(Box(1.5));
      `);
      expect(entryFrame(run).returnType.id).toBe('Float');
    });
  });

  describe('loops', () => {
    it('should reach a fixpoint for variables that change type', () => {
      const run = analyze(`
        function total(n) {
          let t = 0;
          for (let i = 0; i < n; i = i + 1) {
            t = t + 0.5;
          }
          return t;
        }
        total(10);
      `);
      const frame = entryFrame(run);
      expect(messages(frame)).toEqual([]);
      expect(frame.returnType.id).toBe('Union{Float, Int}');
    });

    it('should take the element type of a vector', () => {
      const run = analyze(`
        function first(xs) {
          for (const x of xs) {
            return x;
          }
          return 0;
        }
        first([1.5, 2.5]);
      `);
      expect(entryFrame(run).returnType.id).toBe('Union{Float, Int}');
    });
  });

  describe('resource limits', () => {
    const chain = `
      function a(x) { return b(x); }
      function b(x) { return c(x); }
      function c(x) { return x; }
      a(1);
      c(2);
    `;

    it('should end only the entry call that exceeds the depth cap', () => {
      const run = analyze(chain, { maxCallDepth: 2 });
      expect(run.outcomes[0]).toEqual({
        kind: 'failure',
        call: 'a(::Int)',
        loc: { file: 'test.tpr', line: 5, column: 6 },
        message: 'call depth exceeded 2 frames',
      });
      expect(entryFrame(run, 1).returnType.id).toBe('Int');
    });

    it('should end the entry call that exceeds the cache cap', () => {
      const run = analyze(chain, { maxCacheEntries: 2 });
      expect(run.outcomes[0]?.kind).toBe('failure');
      expect(run.outcomes[0]?.kind === 'failure' ? run.outcomes[0].message : '').toBe(
        'inference cache exceeded 2 entries'
      );
    });

    it('should start every run on an empty cache', () => {
      const interpreter = new AbstractInterpreter(compile(chain, 'test.tpr'));
      const first = interpreter.run();
      const second = interpreter.run();
      expect(second.cacheEntries).toBe(first.cacheEntries);
      expect(first.cacheEntries).toBe(3);
    });
  });
});
