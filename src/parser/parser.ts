/**
 * Source parser wrapper
 *
 * Uses @babel/parser (typescript plugin, script mode) to parse source units
 * into a Babel AST. Script mode lets one generic function carry several
 * `function` declarations of the same name, one per method.
 */

import { parse as babelParse, type ParserOptions } from '@babel/parser';
import * as t from '@babel/types';

export interface ParseOptions {
  /** Source filename (for error messages) */
  filename?: string;
}

export interface ParseResult {
  /** The parsed AST */
  ast: t.File;
  /** Any parsing errors */
  errors: ParseError[];
}

export interface ParseError {
  message: string;
  line: number;
  column: number;
}

/**
 * Recoverable errors that are not errors in this language: repeated
 * `function` declarations define additional methods.
 */
const ACCEPTED_REASON_CODES = new Set(['VarRedeclaration']);

function reasonCodeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'reasonCode' in error) {
    const code = error.reasonCode;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Parse a source unit into an AST
 */
export function parse(source: string, options: ParseOptions = {}): ParseResult {
  const parserOptions: ParserOptions = {
    sourceType: 'script',
    sourceFilename: options.filename,
    errorRecovery: true, // Continue parsing after errors
    plugins: ['typescript'],
  };

  try {
    const ast = babelParse(source, parserOptions);

    // Extract errors from AST
    const errors: ParseError[] = (ast.errors ?? [])
      .filter((err) => !ACCEPTED_REASON_CODES.has(reasonCodeOf(err) ?? ''))
      .map(toParseError);

    return { ast, errors };
  } catch (error) {
    // Unrecoverable syntax errors still throw with errorRecovery enabled
    if (error instanceof SyntaxError) {
      return {
        ast: t.file(t.program([], [], 'script')),
        errors: [toParseError(error)],
      };
    }
    throw error;
  }
}

function toParseError(error: object): ParseError {
  const message = error instanceof Error ? error.message : String(error);
  const loc = 'loc' in error ? error.loc : undefined;
  if (typeof loc === 'object' && loc !== null && 'line' in loc && 'column' in loc) {
    return { message, line: Number(loc.line), column: Number(loc.column) };
  }
  return { message, line: 0, column: 0 };
}
