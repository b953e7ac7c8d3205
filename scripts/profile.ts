#!/usr/bin/env npx tsx
/**
 * CLI script to profile a source unit for type-level errors
 * Usage: npx tsx scripts/profile.ts <file.tpr> [options]
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { runOnce, watch, type DriverOptions } from '../src/driver/index.js';
import { formatReport, formatReportJSON, type Report } from '../src/output/index.js';
import { MalformedInputError } from '../src/errors.js';

function usage(): never {
  console.log('Usage: npx tsx scripts/profile.ts <file.tpr> [options]');
  console.log('');
  console.log('Options:');
  console.log('  --format=text     Call-tree report (default)');
  console.log('  --format=json     Machine-readable JSON output');
  console.log('  --watch           Re-run whenever the file changes');
  console.log('  --max-depth=N     Maximum abstract call depth');
  console.log('  --max-entries=N   Maximum inference cache entries');
  console.log('  --widening=N      Distinct types before widening');
  process.exit(1);
}

function numberOption(arg: string, name: string): number {
  const value = Number(arg.slice(name.length + 1));
  if (!Number.isInteger(value) || value <= 0) {
    console.error(`Error: ${name} expects a positive integer`);
    process.exit(1);
  }
  return value;
}

function main() {
  const args = process.argv.slice(2);
  if (args.length === 0) usage();

  let filePath = '';
  let format = 'text';
  let watchMode = false;
  const options: DriverOptions = { log: (message) => console.error(message) };

  for (const arg of args) {
    if (arg.startsWith('--format=')) {
      format = arg.slice('--format='.length);
    } else if (arg === '--watch') {
      watchMode = true;
    } else if (arg.startsWith('--max-depth=')) {
      options.maxCallDepth = numberOption(arg, '--max-depth');
    } else if (arg.startsWith('--max-entries=')) {
      options.maxCacheEntries = numberOption(arg, '--max-entries');
    } else if (arg.startsWith('--widening=')) {
      options.wideningThreshold = numberOption(arg, '--widening');
    } else if (!arg.startsWith('-')) {
      filePath = arg;
    } else {
      console.error(`Error: Unknown option '${arg}'`);
      usage();
    }
  }

  if (!filePath) {
    console.error('Error: No file path provided');
    process.exit(1);
  }
  if (format !== 'text' && format !== 'json') {
    console.error(`Error: Unknown format '${format}'`);
    process.exit(1);
  }

  const absolutePath = resolve(process.cwd(), filePath);
  const print = (report: Report): void => {
    console.log(format === 'json' ? formatReportJSON(report) : formatReport(report));
  };

  if (watchMode) {
    console.error(`Watching ${filePath}...`);
    const watcher = watch(absolutePath, { ...options, onReport: print });
    process.on('SIGINT', () => {
      watcher.close();
      process.exit(0);
    });
    return;
  }

  let source: string;
  try {
    source = readFileSync(absolutePath, 'utf-8');
  } catch {
    console.error(`Error: Could not read file '${absolutePath}'`);
    process.exit(1);
  }

  console.error(`Profiling ${filePath}...`);
  let report: Report;
  try {
    report = runOnce({ path: filePath, text: source }, options);
  } catch (err) {
    if (!(err instanceof MalformedInputError)) throw err;
    console.error(`Error: ${err.message}`);
    process.exit(1);
  }
  print(report);
  if (report.errorCount > 0 || report.failures.length > 0) {
    process.exitCode = 1;
  }
}

main();
