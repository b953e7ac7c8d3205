/**
 * Parser module exports
 */

export { parse } from './parser.js';
export type { ParseOptions, ParseResult, ParseError } from './parser.js';
