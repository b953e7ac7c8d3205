/**
 * Error Report Builder - prunes the call trees of a run and renders them
 *
 * Only frames that hold or lead to an ErrorRecord survive. The text form
 * draws one block per erroring entry call:
 *
 *   ═════ 1 possible error found ═════
 *   ┌ @ demo.tpr:9  area(::Point)
 *   │┌ @ demo.tpr:5  getfield(::Point, :w)
 *   ││ InvalidFieldAccess: type Point has no field w
 *   │└
 *   └
 */

import type { CallFrame, ErrorRecord, SourceLocation } from '../types/index.js';
import type { RunResult } from '../analysis/interpreter.js';
import { cloneErrorPaths, countErrors, hasErrors } from '../utils/frame-utils.js';
import { formatCall } from './formatter.js';

/**
 * Entry call that ended on a tool-internal failure
 */
export interface ReportFailure {
  readonly call: string;
  readonly loc: SourceLocation;
  readonly message: string;
}

export interface Report {
  readonly file: string;
  /** Number of ErrorRecords across all entries */
  readonly errorCount: number;
  /** Pruned call trees of the entries that have errors, in entry order */
  readonly entries: readonly CallFrame[];
  readonly failures: readonly ReportFailure[];
}

export interface ReportOptions {
  /** Include the source file in frame locations */
  showFile?: boolean;
}

const DEFAULT_REPORT_OPTIONS: Required<ReportOptions> = {
  showFile: true,
};

export function buildReport(run: RunResult): Report {
  const entries: CallFrame[] = [];
  const failures: ReportFailure[] = [];
  for (const outcome of run.outcomes) {
    if (outcome.kind === 'failure') {
      failures.push({ call: outcome.call, loc: outcome.loc, message: outcome.message });
    } else if (hasErrors(outcome.frame)) {
      entries.push(cloneErrorPaths(outcome.frame));
    }
  }
  return {
    file: run.file,
    errorCount: entries.reduce((sum, frame) => sum + countErrors(frame), 0),
    entries,
    failures,
  };
}

function compareLocations(a: SourceLocation, b: SourceLocation): number {
  return a.line - b.line || a.column - b.column;
}

/**
 * Children in source order; call order breaks ties
 */
function orderedChildren(frame: CallFrame): CallFrame[] {
  return [...frame.children].sort((a, b) => compareLocations(a.site.loc, b.site.loc));
}

// ============================================================================
// Text
// ============================================================================

export function formatHeader(errorCount: number): string {
  if (errorCount === 0) return 'No errors detected';
  const noun = errorCount === 1 ? 'error' : 'errors';
  return `═════ ${errorCount} possible ${noun} found ═════`;
}

function formatLocation(loc: SourceLocation, opts: Required<ReportOptions>): string {
  return opts.showFile ? `${loc.file}:${loc.line}` : `line ${loc.line}`;
}

function formatFrame(frame: CallFrame, depth: number, opts: Required<ReportOptions>, lines: string[]): void {
  const rail = '│'.repeat(depth);
  lines.push(`${rail}┌ @ ${formatLocation(frame.site.loc, opts)}  ${formatCall(frame.site, frame.argTypes)}`);
  for (const error of frame.errors) {
    lines.push(`${rail}│ ${error.kind}: ${error.message}`);
  }
  for (const child of orderedChildren(frame)) {
    formatFrame(child, depth + 1, opts, lines);
  }
  lines.push(`${rail}└`);
}

/**
 * Render a report as text, one line per frame, diagnostic and closing rail
 */
export function formatReport(report: Report, options: ReportOptions = {}): string {
  const opts = { ...DEFAULT_REPORT_OPTIONS, ...options };
  const lines = [formatHeader(report.errorCount)];
  for (const entry of report.entries) {
    formatFrame(entry, 0, opts, lines);
  }
  if (report.failures.length > 0) {
    lines.push(`${report.failures.length} entry call(s) could not be profiled:`);
    for (const failure of report.failures) {
      lines.push(`  @ ${formatLocation(failure.loc, opts)}  ${failure.call}: ${failure.message}`);
    }
  }
  return lines.join('\n');
}

// ============================================================================
// JSON
// ============================================================================

interface ErrorJSON {
  kind: string;
  message: string;
  call: string;
  line: number;
  column: number;
}

interface FrameJSON {
  call: string;
  file: string;
  line: number;
  column: number;
  returnType: string;
  errors: ErrorJSON[];
  children: FrameJSON[];
}

function errorToJSON(error: ErrorRecord): ErrorJSON {
  return {
    kind: error.kind,
    message: error.message,
    call: error.call,
    line: error.loc.line,
    column: error.loc.column,
  };
}

function frameToJSON(frame: CallFrame): FrameJSON {
  return {
    call: formatCall(frame.site, frame.argTypes),
    file: frame.site.loc.file,
    line: frame.site.loc.line,
    column: frame.site.loc.column,
    returnType: frame.returnType.id,
    errors: frame.errors.map(errorToJSON),
    children: orderedChildren(frame).map(frameToJSON),
  };
}

/**
 * Same pruned tree as `formatReport`, as indented JSON
 */
export function formatReportJSON(report: Report): string {
  return JSON.stringify(
    {
      file: report.file,
      errorCount: report.errorCount,
      entries: report.entries.map(frameToJSON),
      failures: report.failures.map((f) => ({
        call: f.call,
        line: f.loc.line,
        column: f.loc.column,
        message: f.message,
      })),
    },
    null,
    2
  );
}
