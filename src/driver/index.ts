/**
 * Driver module exports
 */

export { runOnce, type SourceUnit, type DriverOptions } from './driver.js';
export {
  watch,
  DEFAULT_DEBOUNCE_MS,
  type Watcher,
  type WatchOptions,
  type FileWatchHandle,
} from './watch.js';
