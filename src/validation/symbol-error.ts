// Semantic and type errors reported by the analyzer and the type checker

import { Position, SourceLocation } from '../types';

export type InheritanceProblem =
  | 'interfaceAsSuperclass'
  | 'notAClass'
  | 'notAnInterface'
  | 'final'
  | 'sealed'
  | 'circular';

export type SymbolErrorDetail =
  | { code: 'duplicateDefinition'; name: string; previous?: Position }
  | { code: 'undefinedSymbol'; name: string }
  | { code: 'undefinedType'; name: string }
  | { code: 'undefinedMember'; typeName: string; member: string }
  | { code: 'typeMismatch'; expected: string; got: string }
  | { code: 'interfaceConformance'; typeName: string; requiredBy: string; missing: string[] }
  | { code: 'invalidInheritance'; typeName: string; baseName: string; problem: InheritanceProblem }
  | { code: 'invalidOverride'; typeName: string; method: string; problem: 'noSuperMethod' | 'finalMethod' }
  | { code: 'argumentCount'; callee: string; min: number; max: number; got: number }
  | { code: 'constantAssignment'; name: string }
  | { code: 'invalidOperation'; message: string };

export type SymbolErrorCode = SymbolErrorDetail['code'];

function quoteList(names: string[]): string {
  return names.map(name => `'${name}'`).join(', ');
}

function describeInheritance(typeName: string, baseName: string, problem: InheritanceProblem): string {
  switch (problem) {
    case 'interfaceAsSuperclass':
      return `'${baseName}' is an interface and cannot be the superclass of '${typeName}'`;
    case 'notAClass':
      return `'${typeName}' cannot inherit from '${baseName}', which is not a class`;
    case 'notAnInterface':
      return `'${typeName}' cannot implement '${baseName}', which is not an interface`;
    case 'final':
      return `'${typeName}' cannot extend final class '${baseName}'`;
    case 'sealed':
      return `'${typeName}' is not permitted to extend sealed class '${baseName}'`;
    case 'circular':
      return `Circular inheritance between '${typeName}' and '${baseName}'`;
  }
}

function describeArity(min: number, max: number): string {
  const expected = min === max ? `${min}` : `${min} to ${max}`;
  return `${expected} argument${max === 1 && min === max ? '' : 's'}`;
}

export function describeSymbolError(detail: SymbolErrorDetail): string {
  switch (detail.code) {
    case 'duplicateDefinition':
      return detail.previous
        ? `Symbol '${detail.name}' was already defined at line ${detail.previous.line}, column ${detail.previous.column}`
        : `Symbol '${detail.name}' conflicts with a built-in definition`;
    case 'undefinedSymbol':
      return `Undefined symbol '${detail.name}'`;
    case 'undefinedType':
      return `Undefined type '${detail.name}'`;
    case 'undefinedMember':
      return `Type '${detail.typeName}' has no member '${detail.member}'`;
    case 'typeMismatch':
      return `Type mismatch: expected '${detail.expected}', got '${detail.got}'`;
    case 'interfaceConformance':
      return `'${detail.typeName}' does not implement ${quoteList(detail.missing)} required by '${detail.requiredBy}'`;
    case 'invalidInheritance':
      return describeInheritance(detail.typeName, detail.baseName, detail.problem);
    case 'invalidOverride':
      return detail.problem === 'finalMethod'
        ? `'${detail.typeName}.${detail.method}' cannot override a final method`
        : `'${detail.typeName}.${detail.method}' is marked override but no supertype declares '${detail.method}'`;
    case 'argumentCount':
      return `'${detail.callee}' expects ${describeArity(detail.min, detail.max)}, got ${detail.got}`;
    case 'constantAssignment':
      return `Cannot assign to constant '${detail.name}'`;
    case 'invalidOperation':
      return detail.message;
  }
}

export class SymbolError extends Error {
  constructor(
    public detail: SymbolErrorDetail,
    public location?: SourceLocation
  ) {
    super(describeSymbolError(detail));
    this.name = 'SymbolError';
  }

  get code(): SymbolErrorCode {
    return this.detail.code;
  }
}

export function invalidOperation(message: string, location?: SourceLocation): SymbolError {
  return new SymbolError({ code: 'invalidOperation', message }, location);
}

// Orders errors by source position; errors without a location sort last
export function compareSymbolErrors(a: SymbolError, b: SymbolError): number {
  if (!a.location || !b.location) {
    return (a.location ? 0 : 1) - (b.location ? 0 : 1);
  }
  return a.location.start.line - b.location.start.line || a.location.start.column - b.location.start.column;
}
