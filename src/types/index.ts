/**
 * Type definitions exports
 */

export * from './types.js';
export * from './ir.js';
export * from './analysis.js';
