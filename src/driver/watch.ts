/**
 * Watcher - re-profile a source file whenever it changes
 *
 * Change events are debounced: a burst of modifications cancels the pending
 * run and schedules one fresh run after the burst. Errors are passed to
 * `onError` and watching continues.
 */

import { readFileSync, watch as watchFile } from 'node:fs';
import type { Report } from '../output/report.js';
import { runOnce, type DriverOptions } from './driver.js';

export interface FileWatchHandle {
  close(): void;
}

export interface WatchOptions extends DriverOptions {
  /** Quiet period after the last change before a run starts */
  debounceMs?: number;
  onReport: (report: Report) => void;
  onError?: (error: unknown) => void;
  /** Source reader; defaults to reading the file as UTF-8 */
  readSource?: (path: string) => string;
  /** Change subscription; defaults to `fs.watch` */
  subscribe?: (path: string, onChange: () => void) => FileWatchHandle;
}

export interface Watcher {
  /** Stop watching and cancel any pending run */
  close(): void;
}

export const DEFAULT_DEBOUNCE_MS = 100;

function defaultSubscribe(path: string, onChange: () => void): FileWatchHandle {
  return watchFile(path, () => onChange());
}

function defaultReadSource(path: string): string {
  return readFileSync(path, 'utf-8');
}

/**
 * Profile `path` once, then again after every burst of changes
 */
export function watch(path: string, options: WatchOptions): Watcher {
  const {
    debounceMs = DEFAULT_DEBOUNCE_MS,
    onReport,
    onError,
    readSource = defaultReadSource,
    subscribe = defaultSubscribe,
    ...driverOptions
  } = options;
  const log = driverOptions.log;

  let pending: ReturnType<typeof setTimeout> | null = null;
  let closed = false;

  const runNow = (): void => {
    pending = null;
    if (closed) return;
    try {
      onReport(runOnce({ path, text: readSource(path) }, driverOptions));
    } catch (error) {
      log?.(`Run failed: ${error instanceof Error ? error.message : String(error)}`);
      onError?.(error);
    }
  };

  const handle = subscribe(path, () => {
    if (closed) return;
    if (pending) {
      clearTimeout(pending);
      log?.(`Change in ${path}, pending run cancelled`);
    }
    pending = setTimeout(runNow, debounceMs);
  });

  runNow();

  return {
    close(): void {
      closed = true;
      if (pending) {
        clearTimeout(pending);
        pending = null;
      }
      handle.close();
    },
  };
}
