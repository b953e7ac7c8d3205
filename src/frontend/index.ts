/**
 * Front end - surface syntax to IR
 */

export { compile, type CompiledUnit } from './compile.js';
export { lowerProgram } from './lower.js';
export {
  loadPrelude,
  buildPrelude,
  readPreludeData,
  PRELUDE_FILE,
  type Prelude,
  type PreludeData,
} from './prelude.js';
export { lowerType, parseTypeString, resolveTypeName, type TypeScope } from './types.js';
