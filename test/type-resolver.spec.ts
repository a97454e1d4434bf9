import { describe, it, expect, beforeEach } from 'vitest';
import { TypeResolver } from '../src/validation/type-resolver';
import { SymbolTable } from '../src/validation/symbol-table';
import { SymbolError } from '../src/validation/symbol-error';
import { TypeDefinition } from '../src/validation/type-definition';
import {
  ANY, BOOL, DOUBLE, FLOAT, INT, INT64, NEVER, NULL_TYPE, PRIMITIVE_TYPES, STRING, UINT64, VOID, fitsInteger, integerLiteralType
} from '../src/validation/primitive-types';
import { SourceLocation, TypeNode } from '../src/types';

const loc: SourceLocation = { start: { line: 1, column: 1 }, end: { line: 1, column: 2 } };

function named(name: string): TypeNode {
  return { kind: 'namedType', name, location: loc };
}

function primitive(name: string): TypeDefinition {
  const type = PRIMITIVE_TYPES.get(name);
  if (!type) throw new Error(`Unknown primitive ${name}`);
  return type;
}

describe('TypeResolver', () => {
  let table: SymbolTable;
  let resolver: TypeResolver;

  beforeEach(() => {
    table = new SymbolTable();
    resolver = new TypeResolver(table);
  });

  function declareClass(name: string, typeParameters: string[] = []): TypeDefinition {
    const type = new TypeDefinition({ name, category: 'class', declaredAt: loc });
    type.typeParameters = typeParameters.map(p => resolver.createTypeParameter(p, loc));
    table.define({ name, kind: 'type', type, declaredAt: loc, modifiers: [] });
    return type;
  }

  describe('resolve', () => {
    it('should resolve primitive names and aliases to the same definition', () => {
      expect(resolver.resolve(named('Int'))).toBe(INT);
      expect(resolver.resolve(named('int'))).toBe(INT);
      expect(resolver.resolve(named('Int32'))).toBe(INT);
      expect(resolver.resolve(named('double'))).toBe(DOUBLE);
    });

    it('should report undefined types', () => {
      try {
        resolver.resolve(named('Widget'));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(SymbolError);
        if (error instanceof SymbolError) {
          expect(error.detail).toEqual({ code: 'undefinedType', name: 'Widget' });
          expect(error.location).toEqual(loc);
        }
      }
    });

    it('should share one array type per element type', () => {
      const first = resolver.resolve({ kind: 'arrayType', elementType: named('Int'), location: loc });
      const second = resolver.resolve({ kind: 'genericType', name: 'Array', typeArguments: [named('int')], location: loc });
      expect(first).toBe(second);
      expect(first.name).toBe('Array<Int>');
      expect(first.category).toBe('array');
      expect(first.elementType).toBe(INT);
    });

    it('should give arrays a length and an append method', () => {
      const array = resolver.arrayOf(STRING);
      expect(array.findProperty('length')?.type).toBe(INT);
      expect(array.findMethod('append')?.signature).toEqual({
        parameters: [{ name: 'element', type: STRING, hasDefault: false }],
        returnType: VOID,
        hasBody: true
      });
    });

    it('should check the argument count of Array', () => {
      expect(() => resolver.resolve({
        kind: 'genericType', name: 'Array', typeArguments: [named('Int'), named('Int')], location: loc
      })).toThrow("Type 'Array' expects 1 type argument, got 2");
    });

    it('should instantiate user generics once per argument list', () => {
      const box = declareClass('Box', ['T']);
      const node: TypeNode = { kind: 'genericType', name: 'Box', typeArguments: [named('Int')], location: loc };
      const instance = resolver.resolve(node);

      expect(instance.name).toBe('Box<Int>');
      expect(instance.category).toBe('generic');
      expect(instance.genericBase).toBe(box);
      expect(instance.typeArguments).toEqual([INT]);
      expect(resolver.resolve(node)).toBe(instance);
    });

    it('should check the argument count of user generics', () => {
      declareClass('Pair', ['A', 'B']);
      expect(() => resolver.resolve({
        kind: 'genericType', name: 'Pair', typeArguments: [named('Int')], location: loc
      })).toThrow("Type 'Pair' expects 2 type arguments, got 1");
    });

    it('should return the base type when instantiated without arguments', () => {
      const plain = declareClass('Plain');
      expect(resolver.instantiate(plain, [])).toBe(plain);
    });
  });

  describe('isAssignable', () => {
    it('should accept identical types and anything into Any', () => {
      expect(resolver.isAssignable(INT, INT)).toBe(true);
      expect(resolver.isAssignable(STRING, ANY)).toBe(true);
      expect(resolver.isAssignable(NEVER, BOOL)).toBe(true);
      expect(resolver.isAssignable(BOOL, INT)).toBe(false);
    });

    it('should widen integers losslessly', () => {
      expect(resolver.isAssignable(primitive('Int8'), INT)).toBe(true);
      expect(resolver.isAssignable(INT, primitive('Int64'))).toBe(true);
      expect(resolver.isAssignable(primitive('Int64'), INT)).toBe(false);
    });

    it('should not mix signedness unless the signed type is wider', () => {
      expect(resolver.isAssignable(INT, primitive('UInt'))).toBe(false);
      expect(resolver.isAssignable(primitive('UInt'), INT)).toBe(false);
      expect(resolver.isAssignable(primitive('UInt'), primitive('Int64'))).toBe(true);
      expect(resolver.isAssignable(primitive('UInt8'), primitive('UInt16'))).toBe(true);
    });

    it('should widen into floating point and decimal types', () => {
      expect(resolver.isAssignable(INT, DOUBLE)).toBe(true);
      expect(resolver.isAssignable(FLOAT, DOUBLE)).toBe(true);
      expect(resolver.isAssignable(DOUBLE, FLOAT)).toBe(false);
      expect(resolver.isAssignable(DOUBLE, INT)).toBe(false);
      expect(resolver.isAssignable(primitive('Int64'), primitive('Decimal'))).toBe(true);
      expect(resolver.isAssignable(DOUBLE, primitive('Decimal'))).toBe(false);
    });

    it('should accept null for references and strings only', () => {
      expect(resolver.isAssignable(NULL_TYPE, STRING)).toBe(true);
      expect(resolver.isAssignable(NULL_TYPE, declareClass('Node'))).toBe(true);
      expect(resolver.isAssignable(NULL_TYPE, INT)).toBe(false);
    });

    it('should compare arrays by element type', () => {
      expect(resolver.isAssignable(resolver.arrayOf(INT), resolver.arrayOf(INT))).toBe(true);
      expect(resolver.isAssignable(resolver.arrayOf(INT), resolver.arrayOf(ANY))).toBe(true);
      expect(resolver.isAssignable(resolver.arrayOf(INT), resolver.arrayOf(DOUBLE))).toBe(false);
    });

    it('should accept subclasses and implemented interfaces', () => {
      const drawable = new TypeDefinition({ name: 'Drawable', category: 'interface' });
      const shape = declareClass('Shape');
      const circle = declareClass('Circle');
      circle.superclass = shape;
      shape.interfaces = [drawable];

      expect(resolver.isAssignable(circle, shape)).toBe(true);
      expect(resolver.isAssignable(circle, drawable)).toBe(true);
      expect(resolver.isAssignable(shape, circle)).toBe(false);
    });

    it('should compare generic instances argument by argument', () => {
      const box = declareClass('Box', ['T']);
      const boxOfInt = resolver.instantiate(box, [INT]);
      expect(resolver.isAssignable(boxOfInt, resolver.instantiate(box, [primitive('Int64')]))).toBe(true);
      expect(resolver.isAssignable(boxOfInt, resolver.instantiate(box, [STRING]))).toBe(false);
    });

    it('should accept type parameters in either direction', () => {
      const t = resolver.createTypeParameter('T', loc);
      expect(resolver.isAssignable(t, INT)).toBe(true);
      expect(resolver.isAssignable(STRING, t)).toBe(true);
    });
  });

  describe('commonType', () => {
    it('should prefer the wider operand', () => {
      expect(resolver.commonType(INT, DOUBLE)).toBe(DOUBLE);
      expect(resolver.commonType(DOUBLE, INT)).toBe(DOUBLE);
      expect(resolver.commonType(INT, INT)).toBe(INT);
    });

    it('should be undefined for unrelated types', () => {
      expect(resolver.commonType(STRING, BOOL)).toBeUndefined();
    });
  });

  describe('helpers', () => {
    it('should classify numeric types', () => {
      expect(resolver.isNumeric(DOUBLE)).toBe(true);
      expect(resolver.isInteger(DOUBLE)).toBe(false);
      expect(resolver.isInteger(primitive('UInt16'))).toBe(true);
      expect(resolver.isNumeric(STRING)).toBe(false);
    });

    it('should report the low-level representation', () => {
      expect(resolver.irTypeOf(INT)).toBe('i32');
      expect(resolver.irTypeOf(BOOL)).toBe('i1');
      expect(resolver.irTypeOf(declareClass('Thing'))).toBe('ptr');
    });

    it('should check integer values against the width of a type', () => {
      const int8 = { kind: 'integer', bits: 8, signed: true } as const;
      const uint8 = { kind: 'integer', bits: 8, signed: false } as const;
      expect([-129n, -128n, 127n, 128n].map(value => fitsInteger(value, int8))).toEqual([false, true, true, false]);
      expect([-1n, 0n, 255n, 256n].map(value => fitsInteger(value, uint8))).toEqual([false, true, true, false]);
    });

    it('should pick the narrowest of Int, Int64 and UInt64 for a literal', () => {
      expect(integerLiteralType(-2147483648n)).toBe(INT);
      expect(integerLiteralType(2147483648n)).toBe(INT64);
      expect(integerLiteralType(-9223372036854775808n)).toBe(INT64);
      expect(integerLiteralType(9223372036854775808n)).toBe(UINT64);
    });
  });
});
