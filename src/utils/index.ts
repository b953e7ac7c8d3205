/**
 * Utils module exports
 */

export { Types } from './type-factory.js';
export {
  isTypeKind,
  getUnionMembers,
  isBottom,
  typesEqual,
  substituteTypeVars,
  eraseTypeVars,
  hasTypeVars,
  splitUnionArgs,
  unionCaseCount,
  unionCombinations,
} from './type-utils.js';
export { hasErrors, collectErrors, countErrors, cloneErrorPaths } from './frame-utils.js';
