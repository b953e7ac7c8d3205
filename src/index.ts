/**
 * typeprobe - type-level bug finder for a multiple-dispatch language
 *
 * Abstract interpretation over the call graph reachable from toplevel entry
 * calls, reporting every call chain that cannot resolve to a valid method.
 */

export * from './types/index.js';
export * from './utils/index.js';
export * from './parser/index.js';
export * from './frontend/index.js';
export * from './output/index.js';
export * from './analysis/index.js';
export * from './driver/index.js';

export { TypeHierarchy } from './lattice/hierarchy.js';
export { TypeLattice, DEFAULT_WIDENING_THRESHOLD } from './lattice/lattice.js';
export {
  MethodTable,
  type MethodMatch,
  type DispatchResult,
  type Applicability,
} from './dispatch/method-table.js';
export {
  TypeprobeError,
  TypeprobeErrorCode,
  MalformedInputError,
  ResourceLimitError,
  type ResourceLimit,
} from './errors.js';
