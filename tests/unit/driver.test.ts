/**
 * Tests for profiling runs and the file watcher
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { runOnce } from '../../src/driver/driver.js';
import { watch, type FileWatchHandle } from '../../src/driver/watch.js';
import { formatReport } from '../../src/output/report.js';
import { MalformedInputError } from '../../src/errors.js';
import type { Report } from '../../src/output/report.js';

const DEMO = [
  'function fib(n) {',
  '  return n <= 2 ? 1 : fib(n - 1) + fib(n - 2);',
  '}',
  '',
  'class Point {',
  '  x: Int;',
  '  y: Int;',
  '}',
  '',
  'function sumsq(p) {',
  '  return p.x * p.x + p.yy * p.yy;',
  '}',
  '',
  'fib(1000);',
  'fib(m);',
  'fib("1000");',
  'sumsq(Point(1, 2));',
].join('\n');

const FIXED = DEMO.replace('p.yy * p.yy', 'p.y * p.y')
  .replace('fib("1000");', 'fib(length("1000"));')
  .replace('fib(1000);', 'const m = 20;\nfib(1000);');

describe('runOnce', () => {
  it('should find the six errors of the demo', () => {
    const report = runOnce({ path: 'demo.tpr', text: DEMO });

    expect(report.errorCount).toBe(6);
    expect(formatReport(report).split('\n')).toEqual([
      '═════ 6 possible errors found ═════',
      '┌ @ demo.tpr:15  fib(::Bottom)',
      '│ UndefinedBinding: m not defined',
      '└',
      '┌ @ demo.tpr:16  fib(::String)',
      '│┌ @ demo.tpr:2  <=(::String, ::Int)',
      '││ NoMatchingMethod: no method matching <=(::String, ::Int)',
      '│└',
      '│┌ @ demo.tpr:2  -(::String, ::Int)',
      '││ NoMatchingMethod: no method matching -(::String, ::Int)',
      '│└',
      '│┌ @ demo.tpr:2  -(::String, ::Int)',
      '││ NoMatchingMethod: no method matching -(::String, ::Int)',
      '│└',
      '└',
      '┌ @ demo.tpr:17  sumsq(::Point)',
      '│┌ @ demo.tpr:11  getfield(::Point, :yy)',
      '││ InvalidFieldAccess: type Point has no field yy',
      '│└',
      '│┌ @ demo.tpr:11  getfield(::Point, :yy)',
      '││ InvalidFieldAccess: type Point has no field yy',
      '│└',
      '└',
    ]);
  });

  it('should place a cached dispatch error at the new call site', () => {
    const report = runOnce({ path: 'demo.tpr', text: DEMO });
    const minus = report.entries[1]?.children.filter((c) => c.site.callee === '-') ?? [];
    expect(minus.map((c) => c.errors[0]?.loc.column)).toEqual([26, 39]);
    expect(minus.map((c) => c.origin)).toEqual(['interpreted', 'cached']);
  });

  it('should find no errors in the fixed source', () => {
    const report = runOnce({ path: 'demo.tpr', text: FIXED });
    expect(report.errorCount).toBe(0);
    expect(formatReport(report)).toBe('No errors detected');
  });

  it('should produce identical reports for identical input', () => {
    const first = formatReport(runOnce({ path: 'demo.tpr', text: DEMO }));
    const second = formatReport(runOnce({ path: 'demo.tpr', text: DEMO }));
    expect(second).toBe(first);
  });

  it('should log progress through the hook', () => {
    const log = vi.fn();
    runOnce({ path: 'demo.tpr', text: FIXED }, { log });
    expect(log).toHaveBeenCalledTimes(2);
    expect(log.mock.calls[0]?.[0]).toBe('Compiled demo.tpr: 3 methods, 4 entry calls');
  });

  it('should throw on malformed input', () => {
    expect(() => runOnce({ path: 'bad.tpr', text: 'fib(' })).toThrow(MalformedInputError);
  });
});

describe('watch', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  function fakeFile(initial: string) {
    let text = initial;
    let onChange: (() => void) | null = null;
    const closed = vi.fn();
    return {
      write(next: string) {
        text = next;
        onChange?.();
      },
      readSource: () => text,
      subscribe: (_path: string, listener: () => void): FileWatchHandle => {
        onChange = listener;
        return { close: closed };
      },
      closed,
    };
  }

  it('should run once at start and once per burst of changes', () => {
    vi.useFakeTimers();
    const file = fakeFile(DEMO);
    const reports: Report[] = [];
    const watcher = watch('demo.tpr', {
      debounceMs: 50,
      onReport: (report) => reports.push(report),
      readSource: file.readSource,
      subscribe: file.subscribe,
    });

    expect(reports.map((r) => r.errorCount)).toEqual([6]);

    file.write(DEMO);
    vi.advanceTimersByTime(20);
    file.write(FIXED);
    vi.advanceTimersByTime(49);
    expect(reports).toHaveLength(1);

    vi.advanceTimersByTime(1);
    expect(reports.map((r) => r.errorCount)).toEqual([6, 0]);

    watcher.close();
    expect(file.closed).toHaveBeenCalledTimes(1);
  });

  it('should keep watching after malformed input', () => {
    vi.useFakeTimers();
    const file = fakeFile('fib(');
    const reports: Report[] = [];
    const errors: unknown[] = [];
    const watcher = watch('demo.tpr', {
      debounceMs: 10,
      onReport: (report) => reports.push(report),
      onError: (error) => errors.push(error),
      readSource: file.readSource,
      subscribe: file.subscribe,
    });

    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(MalformedInputError);

    file.write(FIXED);
    vi.advanceTimersByTime(10);
    expect(reports.map((r) => r.errorCount)).toEqual([0]);
    watcher.close();
  });

  it('should cancel the pending run on close', () => {
    vi.useFakeTimers();
    const file = fakeFile(FIXED);
    const reports: Report[] = [];
    const watcher = watch('demo.tpr', {
      debounceMs: 10,
      onReport: (report) => reports.push(report),
      readSource: file.readSource,
      subscribe: file.subscribe,
    });

    file.write(DEMO);
    watcher.close();
    vi.advanceTimersByTime(100);
    expect(reports.map((r) => r.errorCount)).toEqual([0]);
  });
});
