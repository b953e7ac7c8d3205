/**
 * Tests for the parser module
 */

import { describe, it, expect } from 'vitest';
import { parse } from '../../src/parser/index.js';

describe('Parser', () => {
  describe('parse', () => {
    it('should parse a function with typed parameters', () => {
      const result = parse('function area(w: Int, h: Int): Int { return w * h; }');
      expect(result.errors).toHaveLength(0);
      expect(result.ast.program.body[0]?.type).toBe('FunctionDeclaration');
    });

    it('should parse struct declarations with fields', () => {
      const result = parse(`
        abstract class Shape {}
        class Square extends Shape {
          side: Float;
        }
      `);
      expect(result.errors).toHaveLength(0);
      expect(result.ast.program.body.map((s) => s.type)).toEqual(['ClassDeclaration', 'ClassDeclaration']);
    });

    it('should parse covariant type parameters', () => {
      const result = parse('class Box<out T> { value: T; }');
      expect(result.errors).toHaveLength(0);
    });

    it('should accept several methods of one function', () => {
      const result = parse(`
        function describe(x: Int) { return "int"; }
        function describe(x: String) { return "string"; }
      `);
      expect(result.errors).toHaveLength(0);
      expect(result.ast.program.body).toHaveLength(2);
    });

    it('should parse bodiless declarations', () => {
      const result = parse('declare function parseInt(s: String): Int;');
      expect(result.errors).toHaveLength(0);
      expect(result.ast.program.body[0]?.type).toBe('TSDeclareFunction');
    });
  });

  describe('errors', () => {
    it('should report syntax errors with a position', () => {
      const result = parse('function f( {');
      expect(result.errors.length).toBeGreaterThan(0);
      expect(result.errors[0]?.line).toBe(1);
    });

    it('should report errors on later lines', () => {
      const result = parse('f(1);\nconst = 2;');
      expect(result.errors.length).toBeGreaterThan(0);
      expect(result.errors[0]?.line).toBe(2);
    });
  });
});
