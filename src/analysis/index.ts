/**
 * Analysis module exports
 */

export {
  AbstractInterpreter,
  type InterpreterInput,
  type EntryOutcome,
  type RunResult,
} from './interpreter.js';
export { InferenceCache, type CacheEntry, type Placeholder, type SealedEntry } from './cache.js';
export { DEFAULT_INTERPRETER_OPTIONS, type InterpreterOptions } from './context.js';
export { convertType } from './calls.js';
export {
  createEnv,
  lookupBinding,
  updateBinding,
  joinEnvironments,
  envsEqual,
} from './state.js';
