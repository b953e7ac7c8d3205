/**
 * Type Narrowing - Narrow bindings based on branch conditions
 *
 * `narrow` returns the environment on the arm where `test` evaluates to
 * `truthy`, or null when that arm cannot be reached.
 */

import type { Expr, TypeEnvironment } from '../types/index.js';
import type { TypeLattice } from '../lattice/lattice.js';
import { joinFlows, lookupBinding, updateBinding } from './state.js';

export function narrow(
  lattice: TypeLattice,
  env: TypeEnvironment,
  test: Expr,
  truthy: boolean
): TypeEnvironment | null {
  switch (test.kind) {
    case 'literal':
      if (test.value === undefined) return env;
      return test.value === truthy ? env : null;

    case 'isa': {
      if (test.subject.kind !== 'name') return env;
      const binding = lookupBinding(env, test.subject.name);
      if (!binding || binding.type.kind === 'bottom') return env;
      const narrowed = truthy
        ? lattice.meet(binding.type, test.test)
        : lattice.subtract(binding.type, test.test);
      if (narrowed.kind === 'bottom') return null;
      return updateBinding(env, binding.name, narrowed, 'local');
    }

    case 'call': {
      const operand = test.args[0];
      if (test.callee === '!' && operand && test.args.length === 1) {
        return narrow(lattice, env, operand, !truthy);
      }
      return env;
    }

    case 'logical': {
      const { left, right } = test;
      if (test.operator === '&&') {
        const leftTrue = narrow(lattice, env, left, true);
        if (truthy) {
          return leftTrue && narrow(lattice, leftTrue, right, true);
        }
        return joinFlows(lattice, [
          narrow(lattice, env, left, false),
          leftTrue && narrow(lattice, leftTrue, right, false),
        ]);
      }
      const leftFalse = narrow(lattice, env, left, false);
      if (truthy) {
        return joinFlows(lattice, [
          narrow(lattice, env, left, true),
          leftFalse && narrow(lattice, leftFalse, right, true),
        ]);
      }
      return leftFalse && narrow(lattice, leftFalse, right, false);
    }

    default:
      return env;
  }
}
