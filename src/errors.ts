/**
 * Tool-internal failures.
 *
 * These are distinct from the diagnostics typeprobe reports about the
 * analyzed program: they are thrown, and abort either the run (malformed
 * input) or a single entry call (resource limits).
 */

import type { SourceLocation } from './types/index.js';

/** Error codes */
export const TypeprobeErrorCode = {
  MALFORMED_INPUT: 'MALFORMED_INPUT',
  RESOURCE_LIMIT: 'RESOURCE_LIMIT',
} as const;

export type TypeprobeErrorCode = (typeof TypeprobeErrorCode)[keyof typeof TypeprobeErrorCode];

export class TypeprobeError extends Error {
  public readonly file?: string;
  public readonly line?: number;
  public readonly column?: number;

  constructor(
    message: string,
    public readonly code: TypeprobeErrorCode,
    loc?: SourceLocation
  ) {
    super(loc ? `${loc.file}:${loc.line}:${loc.column}: ${message}` : message);
    this.name = 'TypeprobeError';
    this.file = loc?.file;
    this.line = loc?.line;
    this.column = loc?.column;
  }
}

/**
 * Parse errors, unsupported syntax and invalid declarations
 */
export class MalformedInputError extends TypeprobeError {
  constructor(message: string, loc?: SourceLocation) {
    super(message, TypeprobeErrorCode.MALFORMED_INPUT, loc);
    this.name = 'MalformedInputError';
  }
}

export type ResourceLimit = 'cache-entries' | 'call-depth';

/**
 * Cache-entry cap or call-depth cap exceeded
 */
export class ResourceLimitError extends TypeprobeError {
  constructor(
    public readonly limit: ResourceLimit,
    public readonly max: number
  ) {
    super(
      limit === 'cache-entries'
        ? `inference cache exceeded ${max} entries`
        : `call depth exceeded ${max} frames`,
      TypeprobeErrorCode.RESOURCE_LIMIT
    );
    this.name = 'ResourceLimitError';
  }
}
