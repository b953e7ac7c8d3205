/**
 * Diagnostics - ErrorRecord builders for the analyzed program
 */

import type {
  CallSite,
  ErrorRecord,
  MethodSignature,
  SourceLocation,
  Type,
} from '../types/index.js';
import { formatCall, formatSignature, formatType } from '../output/formatter.js';

export function undefinedBinding(name: string, loc: SourceLocation): ErrorRecord {
  return {
    kind: 'UndefinedBinding',
    message: `${name} not defined`,
    call: name,
    loc,
  };
}

export function noMatchingMethod(site: CallSite, argTypes: readonly Type[]): ErrorRecord {
  const call = formatCall(site, argTypes);
  return {
    kind: 'NoMatchingMethod',
    message: `no method matching ${call}`,
    call,
    loc: site.loc,
  };
}

export function ambiguousMethod(
  site: CallSite,
  argTypes: readonly Type[],
  candidates: readonly MethodSignature[]
): ErrorRecord {
  const call = formatCall(site, argTypes);
  const listed = candidates
    .map((m) => `${formatSignature(m)} @ ${m.loc.file}:${m.loc.line}`)
    .join('; ');
  return {
    kind: 'AmbiguousMethod',
    message: `${call} is ambiguous; candidates: ${listed}`,
    call,
    loc: site.loc,
  };
}

export function invalidFieldAccess(site: CallSite, argTypes: readonly Type[], object: Type): ErrorRecord {
  const field = site.field ?? '';
  return {
    kind: 'InvalidFieldAccess',
    message:
      object.kind === 'abstract'
        ? `no subtype of ${formatType(object)} has field ${field}`
        : `type ${formatType(object)} has no field ${field}`,
    call: formatCall(site, argTypes),
    loc: site.loc,
  };
}

export function invalidBuiltinCall(call: string, message: string, loc: SourceLocation): ErrorRecord {
  return {
    kind: 'InvalidBuiltinCall',
    message,
    call,
    loc,
  };
}

export function typeConversionFailure(from: Type, to: Type, call: string, loc: SourceLocation): ErrorRecord {
  return {
    kind: 'TypeConversionFailure',
    message: `cannot convert ${formatType(from)} to ${formatType(to)}`,
    call,
    loc,
  };
}

export function nonBooleanCondition(type: Type, loc: SourceLocation): ErrorRecord {
  return {
    kind: 'TypeConversionFailure',
    message: `non-boolean (${formatType(type)}) used in boolean context`,
    call: `Bool(::${formatType(type)})`,
    loc,
  };
}
