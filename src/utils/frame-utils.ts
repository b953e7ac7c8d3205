/**
 * Call-tree utilities: error collection and pruning
 */

import type { CallFrame, ErrorRecord } from '../types/index.js';

/**
 * Whether a frame holds or leads to at least one ErrorRecord
 */
export function hasErrors(frame: CallFrame): boolean {
  return frame.errors.length > 0 || frame.children.some(hasErrors);
}

/**
 * Every ErrorRecord in the subtree, the frame's own first, then children in
 * call order
 */
export function collectErrors(frame: CallFrame): ErrorRecord[] {
  const result: ErrorRecord[] = [...frame.errors];
  for (const child of frame.children) {
    result.push(...collectErrors(child));
  }
  return result;
}

export function countErrors(frame: CallFrame): number {
  return frame.children.reduce((sum, child) => sum + countErrors(child), frame.errors.length);
}

/**
 * Deep copy of a frame keeping only the children that lead to errors
 */
export function cloneErrorPaths(frame: CallFrame): CallFrame {
  return {
    ...frame,
    children: frame.children.filter(hasErrors).map(cloneErrorPaths),
    errors: [...frame.errors],
  };
}
