// Maps type names and annotations to canonical type definitions

import { SourceLocation, TypeNode } from '../types';
import { ANY, INT, NEVER, NULL_TYPE, PRIMITIVE_ALIASES, VOID } from './primitive-types';
import { SymbolError } from './symbol-error';
import { SymbolTable } from './symbol-table';
import { TypeDefinition } from './type-definition';

const ARRAY_TYPE_NAME = 'Array';

export class TypeResolver {
  private readonly arrayTypes: Map<TypeDefinition, TypeDefinition> = new Map();
  private readonly instantiations: Map<string, TypeDefinition> = new Map();

  constructor(private readonly symbolTable: SymbolTable) {}

  canonicalName(name: string): string {
    return PRIMITIVE_ALIASES.get(name) ?? name;
  }

  // Resolves a bare name from the current scope outward
  resolveName(name: string): TypeDefinition | undefined {
    return this.symbolTable.resolveType(this.canonicalName(name));
  }

  /**
   * Resolves a type annotation. Throws a SymbolError naming the first unresolvable
   * type, or describing a generic argument count that does not match.
   */
  resolve(node: TypeNode): TypeDefinition {
    switch (node.kind) {
      case 'namedType':
        return this.require(node.name, node.location);
      case 'arrayType':
        return this.arrayOf(this.resolve(node.elementType));
      case 'genericType': {
        const typeArguments = node.typeArguments.map(argument => this.resolve(argument));
        if (node.name === ARRAY_TYPE_NAME) {
          this.expectArity(ARRAY_TYPE_NAME, 1, typeArguments.length, node.location);
          return this.arrayOf(typeArguments[0]);
        }
        const base = this.require(node.name, node.location);
        this.expectArity(base.name, base.typeParameters.length, typeArguments.length, node.location);
        return this.instantiate(base, typeArguments);
      }
    }
  }

  private require(name: string, location: SourceLocation): TypeDefinition {
    const type = this.resolveName(name);
    if (!type) {
      throw new SymbolError({ code: 'undefinedType', name }, location);
    }
    return type;
  }

  private expectArity(name: string, expected: number, got: number, location: SourceLocation): void {
    if (expected !== got) {
      throw new SymbolError({
        code: 'invalidOperation',
        message: `Type '${name}' expects ${expected} type argument${expected === 1 ? '' : 's'}, got ${got}`
      }, location);
    }
  }

  // One array type per element type and compilation unit
  arrayOf(elementType: TypeDefinition): TypeDefinition {
    const existing = this.arrayTypes.get(elementType);
    if (existing) return existing;

    const arrayType = new TypeDefinition({
      name: `${ARRAY_TYPE_NAME}<${elementType.name}>`,
      category: 'array',
      elementType,
      irType: 'ptr'
    });
    arrayType.properties.set('length', {
      name: 'length', kind: 'constant', type: INT, scopeId: 0, owner: arrayType, modifiers: []
    });
    arrayType.methods.set('append', {
      name: 'append',
      kind: 'function',
      signature: { parameters: [{ name: 'element', type: elementType, hasDefault: false }], returnType: VOID, hasBody: true },
      scopeId: 0,
      owner: arrayType,
      modifiers: []
    });

    this.arrayTypes.set(elementType, arrayType);
    return arrayType;
  }

  // Generic instantiations are cached by display name, so Box<Int> is created once
  instantiate(base: TypeDefinition, typeArguments: TypeDefinition[]): TypeDefinition {
    if (typeArguments.length === 0) return base;

    const name = `${base.name}<${typeArguments.map(argument => argument.name).join(', ')}>`;
    const existing = this.instantiations.get(name);
    if (existing) return existing;

    const instance = new TypeDefinition({
      name,
      category: 'generic',
      genericBase: base,
      typeArguments,
      modifiers: base.modifiers,
      declaredAt: base.declaredAt
    });
    this.instantiations.set(name, instance);
    return instance;
  }

  createTypeParameter(name: string, declaredAt: SourceLocation): TypeDefinition {
    return new TypeDefinition({ name, category: 'typeParameter', declaredAt });
  }

  irTypeOf(type: TypeDefinition): string {
    return type.irType ?? 'ptr';
  }

  isNumeric(type: TypeDefinition): boolean {
    return type.numeric !== undefined;
  }

  isInteger(type: TypeDefinition): boolean {
    return type.numeric?.kind === 'integer';
  }

  /**
   * Whether a value of type `from` may be stored where `to` is expected: identical types,
   * subtypes, lossless numeric widening, integers into floating types, null into reference types.
   * Type parameters and Any are accepted both ways, since generics are checked only by name.
   */
  isAssignable(from: TypeDefinition, to: TypeDefinition): boolean {
    if (from === to) return true;
    if (to === ANY || from === NEVER) return true;
    if (from.category === 'typeParameter' || to.category === 'typeParameter' || from === ANY) return true;

    if (from === NULL_TYPE) {
      return !to.isPrimitive || to.name === 'String';
    }

    if (from.numeric && to.numeric) {
      return this.isNumericWidening(from, to);
    }

    if (from.category === 'array' && to.category === 'array' && from.elementType && to.elementType) {
      return from.elementType === to.elementType || to.elementType === ANY;
    }

    if (from.category === 'generic' && to.category === 'generic') {
      return from.genericBase === to.genericBase
        && from.typeArguments.every((argument, index) => this.isAssignable(argument, to.typeArguments[index]));
    }

    return from.isSubtypeOf(to);
  }

  private isNumericWidening(from: TypeDefinition, to: TypeDefinition): boolean {
    const source = from.numeric;
    const target = to.numeric;
    if (!source || !target) return false;

    switch (target.kind) {
      case 'decimal':
        return source.kind !== 'float';
      case 'float':
        return source.kind === 'integer' || (source.kind === 'float' && source.bits <= target.bits);
      case 'integer':
        if (source.kind !== 'integer') return false;
        if (source.signed && !target.signed) return false;
        // Unsigned values fit in a signed type only when it is strictly wider
        return source.signed === target.signed ? source.bits <= target.bits : source.bits < target.bits;
    }
  }

  /**
   * The common type of two operands, preferring the wider one. Undefined when neither
   * converts to the other.
   */
  commonType(left: TypeDefinition, right: TypeDefinition): TypeDefinition | undefined {
    if (this.isAssignable(left, right)) return right;
    if (this.isAssignable(right, left)) return left;
    return undefined;
  }
}
