/**
 * Tests for report pruning and rendering
 */

import { describe, it, expect } from 'vitest';
import { buildReport, formatHeader, formatReport, formatReportJSON } from '../../src/output/report.js';
import type { RunResult } from '../../src/analysis/interpreter.js';
import { Types } from '../../src/utils/type-factory.js';
import type { CallFrame, ErrorRecord, SourceLocation } from '../../src/types/index.js';

const Int = Types.concrete('Int');
const Str = Types.concrete('String');

function at(line: number, column = 0): SourceLocation {
  return { file: 'r.tpr', line, column };
}

function frame(callee: string, argTypes: CallFrame['argTypes'], loc: SourceLocation, children: CallFrame[] = [], errors: ErrorRecord[] = []): CallFrame {
  return {
    site: { callee, loc },
    argTypes,
    returnType: Int,
    children,
    errors,
    status: errors.length > 0 ? 'errored' : 'resolved',
    origin: 'interpreted',
  };
}

function noMethod(call: string, loc: SourceLocation): ErrorRecord {
  return { kind: 'NoMatchingMethod', message: `no method matching ${call}`, call, loc };
}

function run(...frames: CallFrame[]): RunResult {
  return { file: 'r.tpr', outcomes: frames.map((f) => ({ kind: 'frame' as const, frame: f })), cacheEntries: 0 };
}

describe('Report', () => {
  describe('formatHeader', () => {
    it('should count errors', () => {
      expect(formatHeader(0)).toBe('No errors detected');
      expect(formatHeader(1)).toBe('═════ 1 possible error found ═════');
      expect(formatHeader(6)).toBe('═════ 6 possible errors found ═════');
    });
  });

  describe('buildReport', () => {
    it('should prune frames that lead to no error', () => {
      const clean = frame('g', [Int], at(3));
      const failing = frame('-', [Str, Int], at(4), [], [noMethod('-(::String, ::Int)', at(4))]);
      const report = buildReport(run(frame('f', [Str], at(10), [clean, failing]), frame('ok', [Int], at(11))));

      expect(report.errorCount).toBe(1);
      expect(report.entries).toHaveLength(1);
      expect(report.entries[0]?.children.map((c) => c.site.callee)).toEqual(['-']);
    });

    it('should list failures separately without counting them', () => {
      const report = buildReport({
        file: 'r.tpr',
        outcomes: [{ kind: 'failure', call: 'deep(::Int)', loc: at(9), message: 'call depth exceeded 2 frames' }],
        cacheEntries: 0,
      });
      expect(report.errorCount).toBe(0);
      expect(formatReport(report).split('\n')).toEqual([
        'No errors detected',
        '1 entry call(s) could not be profiled:',
        '  @ r.tpr:9  deep(::Int): call depth exceeded 2 frames',
      ]);
    });
  });

  describe('formatReport', () => {
    it('should draw nested frames with rails', () => {
      const inner = frame('-', [Str, Int], at(2, 8), [], [noMethod('-(::String, ::Int)', at(2, 8))]);
      const middle = frame('g', [Str], at(5, 2), [inner]);
      const report = buildReport(run(frame('f', [Str], at(7), [middle])));

      expect(formatReport(report).split('\n')).toEqual([
        '═════ 1 possible error found ═════',
        '┌ @ r.tpr:7  f(::String)',
        '│┌ @ r.tpr:5  g(::String)',
        '││┌ @ r.tpr:2  -(::String, ::Int)',
        '│││ NoMatchingMethod: no method matching -(::String, ::Int)',
        '││└',
        '│└',
        '└',
      ]);
    });

    it('should order siblings by source position and print own errors first', () => {
      const later = frame('b', [Int], at(4, 10), [], [noMethod('b(::Int)', at(4, 10))]);
      const earlier = frame('a', [Int], at(4, 2), [], [noMethod('a(::Int)', at(4, 2))]);
      const own: ErrorRecord = { kind: 'UndefinedBinding', message: 'q not defined', call: 'q', loc: at(3) };
      const report = buildReport(run(frame('f', [], at(8), [later, earlier], [own])));

      expect(formatReport(report).split('\n')).toEqual([
        '═════ 3 possible errors found ═════',
        '┌ @ r.tpr:8  f()',
        '│ UndefinedBinding: q not defined',
        '│┌ @ r.tpr:4  a(::Int)',
        '││ NoMatchingMethod: no method matching a(::Int)',
        '│└',
        '│┌ @ r.tpr:4  b(::Int)',
        '││ NoMatchingMethod: no method matching b(::Int)',
        '│└',
        '└',
      ]);
    });

    it('should render field access frames with the field name', () => {
      const field: CallFrame = {
        ...frame('getfield', [Types.concrete('Point')], at(2, 4)),
        site: { callee: 'getfield', loc: at(2, 4), field: 'yy' },
        errors: [
          { kind: 'InvalidFieldAccess', message: 'type Point has no field yy', call: 'getfield(::Point, :yy)', loc: at(2, 4) },
        ],
      };
      const report = buildReport(run(frame('f', [], at(5), [field])));
      expect(formatReport(report, { showFile: false }).split('\n')).toEqual([
        '═════ 1 possible error found ═════',
        '┌ @ line 5  f()',
        '│┌ @ line 2  getfield(::Point, :yy)',
        '││ InvalidFieldAccess: type Point has no field yy',
        '│└',
        '└',
      ]);
    });
  });

  describe('formatReportJSON', () => {
    it('should serialize the pruned tree', () => {
      const inner = frame('-', [Str, Int], at(2, 8), [], [noMethod('-(::String, ::Int)', at(2, 8))]);
      const report = buildReport(run(frame('f', [Str], at(7), [inner, frame('g', [Int], at(3))])));
      const json: unknown = JSON.parse(formatReportJSON(report));

      expect(json).toEqual({
        file: 'r.tpr',
        errorCount: 1,
        entries: [
          {
            call: 'f(::String)',
            file: 'r.tpr',
            line: 7,
            column: 0,
            returnType: 'Int',
            errors: [],
            children: [
              {
                call: '-(::String, ::Int)',
                file: 'r.tpr',
                line: 2,
                column: 8,
                returnType: 'Int',
                errors: [
                  {
                    kind: 'NoMatchingMethod',
                    message: 'no method matching -(::String, ::Int)',
                    call: '-(::String, ::Int)',
                    line: 2,
                    column: 8,
                  },
                ],
                children: [],
              },
            ],
          },
        ],
        failures: [],
      });
    });
  });
});
