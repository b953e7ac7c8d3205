/**
 * Compile a source unit: parse, lower, and build the read-only method table
 */

import type { Program } from '../types/index.js';
import { parse } from '../parser/index.js';
import { TypeHierarchy } from '../lattice/hierarchy.js';
import { TypeLattice } from '../lattice/lattice.js';
import { MethodTable } from '../dispatch/method-table.js';
import { MalformedInputError } from '../errors.js';
import { loadPrelude } from './prelude.js';
import { lowerProgram } from './lower.js';

export interface CompiledUnit {
  readonly program: Program;
  readonly hierarchy: TypeHierarchy;
  readonly lattice: TypeLattice;
  /** Sealed; prelude methods first, then the unit's in declaration order */
  readonly methodTable: MethodTable;
}

export function compile(source: string, file: string): CompiledUnit {
  const { ast, errors } = parse(source, { filename: file });
  const firstError = errors[0];
  if (firstError) {
    throw new MalformedInputError(firstError.message, {
      file,
      line: firstError.line,
      column: firstError.column,
    });
  }

  const prelude = loadPrelude();
  const hierarchy = new TypeHierarchy(prelude.types);
  const program = lowerProgram(ast, file, hierarchy);
  const lattice = new TypeLattice(hierarchy);
  const methodTable = new MethodTable(lattice);
  for (const method of [...prelude.methods, ...program.methods]) {
    methodTable.register(method);
  }
  methodTable.seal();

  return { program, hierarchy, lattice, methodTable };
}
