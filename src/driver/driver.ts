/**
 * Driver - one profiling run over a source unit
 */

import { compile } from '../frontend/compile.js';
import { AbstractInterpreter } from '../analysis/interpreter.js';
import type { InterpreterOptions } from '../analysis/context.js';
import { buildReport, type Report } from '../output/report.js';

export interface SourceUnit {
  /** Path shown in report locations */
  readonly path: string;
  readonly text: string;
}

export interface DriverOptions extends InterpreterOptions {
  /** Progress messages; library code is otherwise silent */
  log?: (message: string) => void;
}

/**
 * Compile `source` and profile every entry call on a fresh inference cache.
 * Malformed input throws a MalformedInputError; a resource limit only ends
 * the entry call that hit it and is listed in the report's failures.
 */
export function runOnce(source: SourceUnit, options: DriverOptions = {}): Report {
  const { log, ...interpreterOptions } = options;
  const startTime = Date.now();

  const unit = compile(source.text, source.path);
  log?.(
    `Compiled ${source.path}: ${unit.program.methods.length} methods, ${unit.program.entries.length} entry calls`
  );

  const interpreter = new AbstractInterpreter(unit, interpreterOptions);
  const run = interpreter.run();
  const report = buildReport(run);

  log?.(
    `Profiled ${source.path} in ${Date.now() - startTime}ms ` +
      `(${run.cacheEntries} cache entries, ${report.errorCount} errors)`
  );
  return report;
}
