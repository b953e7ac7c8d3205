/**
 * Inference Cache - memoized (function, argument types) results for one run
 *
 * An entry is either an in-progress placeholder, owned by a frame on the
 * abstract call stack, or a sealed result. Recursive re-entry into a key
 * shares its placeholder.
 */

import type { InferenceResult, Type } from '../types/index.js';
import { Types } from '../utils/type-factory.js';
import { ResourceLimitError } from '../errors.js';

export interface Placeholder {
  readonly state: 'in-progress';
  readonly key: string;
  /** Stack index of the owning frame */
  readonly depth: number;
  /** Best-effort return type of the current fixpoint iteration */
  returnType: Type;
  /** Return types across fixpoint iterations, for widening */
  readonly history: Type[];
  /** Set when the key was re-entered during the current iteration */
  reentered: boolean;
}

export interface SealedEntry {
  readonly state: 'sealed';
  readonly key: string;
  readonly result: InferenceResult;
}

export type CacheEntry = Placeholder | SealedEntry;

export class InferenceCache {
  private readonly entries = new Map<string, CacheEntry>();
  /** Entries dropped by `discard`; they count against the cap */
  private discarded = 0;

  constructor(readonly maxEntries: number) {}

  /**
   * Canonical key: `callee(argId, ...)`
   */
  static keyOf(callee: string, argTypes: readonly Type[]): string {
    return `${callee}(${argTypes.map((t) => t.id).join(', ')})`;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Distinct entries plus every discarded one; bounded by `maxEntries`
   */
  get charged(): number {
    return this.entries.size + this.discarded;
  }

  get(key: string): CacheEntry | undefined {
    return this.entries.get(key);
  }

  /**
   * Insert a placeholder for a key about to be interpreted
   */
  begin(key: string, depth: number): Placeholder {
    if (!this.entries.has(key) && this.charged >= this.maxEntries) {
      throw new ResourceLimitError('cache-entries', this.maxEntries);
    }
    const placeholder: Placeholder = {
      state: 'in-progress',
      key,
      depth,
      returnType: Types.bottom,
      history: [],
      reentered: false,
    };
    this.entries.set(key, placeholder);
    return placeholder;
  }

  /**
   * Replace a placeholder by its final result
   */
  seal(key: string, result: InferenceResult): void {
    const entry = this.entries.get(key);
    if (entry?.state === 'sealed') {
      throw new Error(`cache entry ${key} is already sealed`);
    }
    this.entries.set(key, { state: 'sealed', key, result });
  }

  /**
   * Drop an entry whose result depended on an unfinished fixpoint
   */
  discard(key: string): void {
    if (this.entries.get(key)?.state === 'in-progress') {
      this.entries.delete(key);
      this.discarded++;
    }
  }

  /**
   * Drop every placeholder; used after an entry call aborts mid-stack
   */
  discardPlaceholders(): void {
    for (const [key, entry] of this.entries) {
      if (entry.state === 'in-progress') {
        this.entries.delete(key);
      }
    }
  }

  clear(): void {
    this.entries.clear();
    this.discarded = 0;
  }
}
