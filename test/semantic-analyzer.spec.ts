import { describe, it, expect } from 'vitest';
import { scanTokens } from '../src/parser/lexer';
import { parse } from '../src/parser/parser';
import { SemanticAnalyzer, analyze } from '../src/validation/semantic-analyzer';
import { SymbolError } from '../src/validation/symbol-error';
import { BOOL, INT } from '../src/validation/primitive-types';
import { Declaration, TypeDeclaration, isTypeDeclaration } from '../src/types';
import { errorMessages, errorsInclude } from './helpers/error-helpers';

interface Analysis {
  analyzer: SemanticAnalyzer;
  declarations: Declaration[];
  messages: string[];
}

function analyzeSource(source: string): Analysis {
  const declarations = parse(scanTokens(source));
  const analyzer = new SemanticAnalyzer();
  analyzer.analyze(declarations);
  return { analyzer, declarations, messages: analyzer.errors.map(error => error.message) };
}

function typeDecl(declarations: Declaration[], name: string): TypeDeclaration {
  const decl = declarations.find(d => d.name === name);
  if (!decl || !isTypeDeclaration(decl)) {
    throw new Error(`No type named ${name}`);
  }
  return decl;
}

describe('SemanticAnalyzer', () => {
  describe('declarations', () => {
    it('should accept a well-formed program', () => {
      const { messages } = analyzeSource(`
        interface Shape { func area() -> Double; }
        class Square implements Shape {
          var side: Double;
          init(side: Double) { this.side = side; }
          func area() -> Double { return side * side; }
        }
        func total(shapes: Shape[]) -> Double {
          var sum = 0.0;
          for (var i = 0; i < shapes.length; i += 1) { sum += shapes[i].area(); }
          return sum;
        }
      `);
      expect(messages).toEqual([]);
    });

    it('should allow references to later declarations', () => {
      const { messages } = analyzeSource('func a() -> Int { return b(); } func b() -> Int { return 1; }');
      expect(messages).toEqual([]);
    });

    it('should report duplicate top-level names', () => {
      const { analyzer } = analyzeSource('var x = 1; var x = 2;');
      expect(analyzer.errors).toHaveLength(1);
      expect(analyzer.errors[0].code).toBe('duplicateDefinition');
      expect(analyzer.errors[0].message).toBe("Symbol 'x' was already defined at line 1, column 1");
      expect(analyzer.errors[0].location?.start).toEqual({ line: 1, column: 12 });
    });

    it('should report duplicate parameters', () => {
      const { analyzer } = analyzeSource('func f(a: Int, a: Int) {}');
      expect(analyzer.errors.map(error => error.code)).toEqual(['duplicateDefinition']);
    });

    it('should report undefined types in annotations', () => {
      const { analyzer } = analyzeSource('var x: Widget;');
      expect(analyzer.errors.map(error => error.detail)).toEqual([{ code: 'undefinedType', name: 'Widget' }]);
    });

    it('should resolve enum cases as static constants of the enum', () => {
      const { analyzer, declarations } = analyzeSource('enum Color { Red, Green }');
      const color = analyzer.definitionOf(typeDecl(declarations, 'Color'));
      expect(color?.category).toBe('enum');
      expect([...(color?.properties.keys() ?? [])]).toEqual(['Red', 'Green']);
      expect(color?.properties.get('Red')?.type).toBe(color);
      expect(color?.properties.get('Red')?.modifiers).toEqual(['static']);
    });

    it('should record member signatures', () => {
      const { analyzer, declarations, messages } = analyzeSource(
        'class P { var x: Int; func m(a: Int = 1) -> Bool { return true; } }'
      );
      expect(messages).toEqual([]);
      const p = analyzer.definitionOf(typeDecl(declarations, 'P'));
      expect(p?.properties.get('x')?.type).toBe(INT);
      expect(p?.methods.get('m')?.signature).toEqual({
        parameters: [{ name: 'a', type: INT, hasDefault: true }],
        returnType: BOOL,
        hasBody: true
      });
    });

    it('should record the owner of each method', () => {
      const { analyzer, declarations } = analyzeSource('class Owner { func run() {} } func free() {}');
      const owner = typeDecl(declarations, 'Owner');
      if (owner.kind !== 'classDecl') throw new Error('Expected a class');
      expect(analyzer.ownerOf(owner.methods[0])).toBe(analyzer.definitionOf(owner));

      const free = declarations[1];
      if (free.kind !== 'functionDecl') throw new Error('Expected a function');
      expect(analyzer.ownerOf(free)).toBeUndefined();
    });

    it('should scope type parameters to their declaration', () => {
      const { analyzer, declarations, messages } = analyzeSource(
        'class Box<T> { var value: T; } func id<U>(v: U) -> U { return v; }'
      );
      expect(messages).toEqual([]);
      const box = analyzer.definitionOf(typeDecl(declarations, 'Box'));
      expect(box?.typeParameters.map(t => t.name)).toEqual(['T']);
      expect(box?.properties.get('value')?.type?.category).toBe('typeParameter');

      const id = declarations[1];
      if (id.kind !== 'functionDecl') throw new Error('Expected a function');
      expect(analyzer.signatureOf(id)?.returnType?.category).toBe('typeParameter');
    });

    it('should not leak type parameters into the global scope', () => {
      const { messages } = analyzeSource('class Box<T> { } var stray: T;');
      expect(messages).toEqual(["Undefined type 'T'"]);
    });
  });

  describe('inheritance', () => {
    it('should reject an interface in superclass position', () => {
      const { analyzer, declarations, messages } = analyzeSource('interface I {} class A: I {}');
      expect(messages).toEqual(["'I' is an interface and cannot be the superclass of 'A'"]);
      expect(analyzer.errors[0].detail).toEqual({
        code: 'invalidInheritance', typeName: 'A', baseName: 'I', problem: 'interfaceAsSuperclass'
      });
      expect(analyzer.definitionOf(typeDecl(declarations, 'A'))?.superclass).toBeUndefined();
    });

    it('should reject a struct as superclass', () => {
      const { messages } = analyzeSource('struct S {} class A: S {}');
      expect(messages).toEqual(["'A' cannot inherit from 'S', which is not a class"]);
    });

    it('should reject a class in interface position', () => {
      const { messages } = analyzeSource('class B {} class A: B, B {}');
      expect(messages).toEqual(["'A' cannot implement 'B', which is not an interface"]);
    });

    it('should reject extending a final class but keep the link', () => {
      const { analyzer, declarations, messages } = analyzeSource('final class B {} class A: B {}');
      expect(messages).toEqual(["'A' cannot extend final class 'B'"]);
      const b = analyzer.definitionOf(typeDecl(declarations, 'B'));
      expect(analyzer.definitionOf(typeDecl(declarations, 'A'))?.superclass).toBe(b);
    });

    it('should only let permitted classes extend a sealed class', () => {
      const { messages } = analyzeSource(
        'sealed class Shape permits Circle {} class Circle: Shape {} class Square: Shape {}'
      );
      expect(messages).toEqual(["'Square' is not permitted to extend sealed class 'Shape'"]);
    });

    it('should let nothing extend a sealed class without a permits list', () => {
      const { messages } = analyzeSource('sealed class S {} class T: S {}');
      expect(messages).toEqual(["'T' is not permitted to extend sealed class 'S'"]);
    });

    it('should report an inheritance cycle once', () => {
      const { analyzer, messages } = analyzeSource('class A: B {} class B: A {}');
      expect(messages).toEqual(["Circular inheritance between 'A' and 'B'"]);
      expect(analyzer.errors[0].location?.start).toEqual({ line: 1, column: 1 });
    });

    it('should reject abstract final types', () => {
      const { messages } = analyzeSource('abstract final class X {}');
      expect(messages).toEqual(["'X' cannot be both abstract and final"]);
    });

    it('should report undefined supertypes', () => {
      const { messages } = analyzeSource('class A: Missing {}');
      expect(messages).toEqual(["Undefined type 'Missing'"]);
    });
  });

  describe('conformance and overrides', () => {
    it('should require interface methods to be implemented', () => {
      const { analyzer, messages } = analyzeSource('interface Animal { func speak() -> String; } class Dog implements Animal {}');
      expect(messages).toEqual(["'Dog' does not implement 'speak' required by 'Animal'"]);
      expect(analyzer.errors[0].detail).toEqual({
        code: 'interfaceConformance', typeName: 'Dog', requiredBy: 'Animal', missing: ['speak']
      });
    });

    it('should accept an implementation', () => {
      const { messages } = analyzeSource(
        'interface Animal { func speak() -> String; } class Cat implements Animal { func speak() -> String { return "meow"; } }'
      );
      expect(messages).toEqual([]);
    });

    it('should count implementations inherited from a superclass', () => {
      const { messages } = analyzeSource(
        'interface Runner { func run(); } class Base { func run() {} } class Child extends Base implements Runner {}'
      );
      expect(messages).toEqual([]);
    });

    it('should require concrete subclasses to implement abstract methods', () => {
      const { messages } = analyzeSource('abstract class Base { abstract func run(); } class Impl: Base {}');
      expect(messages).toEqual(["'Impl' does not implement 'run' required by 'Base'"]);
    });

    it('should require bodies for methods of concrete types', () => {
      const { messages } = analyzeSource('class A { func f(); }');
      expect(messages).toEqual(["Method 'A.f' must have a body"]);
    });

    it('should reject overriding a final method', () => {
      const { messages } = analyzeSource('class B { final func f() {} } class A: B { func f() {} }');
      expect(messages).toEqual(["'A.f' cannot override a final method"]);
    });

    it('should reject override without an inherited method', () => {
      const { messages } = analyzeSource('class A { override func f() {} }');
      expect(messages).toEqual(["'A.f' is marked override but no supertype declares 'f'"]);
    });
  });

  describe('variables', () => {
    it('should require a type or an initializer', () => {
      const { messages } = analyzeSource('var x;');
      expect(messages).toEqual(["Variable 'x' needs a type annotation or an initializer"]);
    });

    it('should require constants to be initialized outside types', () => {
      expect(analyzeSource('const k: Int;').messages).toEqual(["Constant 'k' must be initialized"]);
      expect(analyzeSource('func f() { const k: Int; }').messages).toEqual(["Constant 'k' must be initialized"]);
      expect(analyzeSource('class A { const k: Int; }').messages).toEqual([]);
    });
  });

  describe('name resolution', () => {
    it('should report undefined names', () => {
      const { analyzer } = analyzeSource('func f() { y = 1; }');
      expect(analyzer.errors.map(error => error.detail)).toEqual([{ code: 'undefinedSymbol', name: 'y' }]);
      expect(analyzer.errors[0].location?.start).toEqual({ line: 1, column: 12 });
    });

    it('should end block scopes at the closing brace', () => {
      const { messages } = analyzeSource('func f() { if (true) { var t = 1; } t = 2; }');
      expect(messages).toEqual(["Undefined symbol 't'"]);
    });

    it('should scope for-loop variables to the loop', () => {
      const { messages } = analyzeSource('func f() { for (var i = 0; i < 3; i += 1) {} i = 0; }');
      expect(messages).toEqual(["Undefined symbol 'i'"]);
    });

    it('should resolve a local initializer against the outer binding', () => {
      const { analyzer, declarations, messages } = analyzeSource('var x = 1; func f() { var x = x; }');
      expect(messages).toEqual([]);

      const fn = declarations[1];
      if (fn.kind !== 'functionDecl') throw new Error('Expected a function');
      const local = fn.body?.statements[0];
      if (local?.kind !== 'varDecl' || !local.initializer) throw new Error('Expected a local variable');
      expect(analyzer.bindingOf(local.initializer)).toBe(analyzer.bindingOf(declarations[0]));
      expect(analyzer.bindingOf(local)).not.toBe(analyzer.bindingOf(declarations[0]));
    });

    it('should see own and inherited members by bare name', () => {
      const { messages } = analyzeSource(
        'class B { var n: Int = 0; } class C: B { var m: Int = 1; func g() -> Int { return n + m; } }'
      );
      expect(messages).toEqual([]);
    });

    it('should allow nested functions', () => {
      const { messages } = analyzeSource('func outer() { func inner() {} inner(); }');
      expect(messages).toEqual([]);
    });

    it('should accept primitive aliases as names', () => {
      const { messages } = analyzeSource('func f() -> Int { return int(2.5); }');
      expect(messages).toEqual([]);
    });

    it('should sort errors by position', () => {
      const { messages } = analyzeSource('func f() {\n  zed = 1;\n}\nvar q: Missing;');
      expect(messages).toEqual(["Undefined symbol 'zed'", "Undefined type 'Missing'"]);
    });
  });

  describe('analyze', () => {
    it('should return the declarations when there are no errors', () => {
      const declarations = parse(scanTokens('var x: Int = 1;'));
      expect(analyze(declarations)).toBe(declarations);
    });

    it('should throw the first error', () => {
      const declarations = parse(scanTokens('func f() { a = 1; b = 2; }'));
      expect(() => analyze(declarations)).toThrow(SymbolError);
      expect(() => analyze(declarations)).toThrow("Undefined symbol 'a'");
    });

    it('should format errors with their locations', () => {
      const { analyzer } = analyzeSource('var x: Widget;');
      expect(errorMessages(analyzer.errors)).toEqual(["1:8: Undefined type 'Widget'"]);
    });

    it('should prefix the filename when the source has one', () => {
      const analyzer = new SemanticAnalyzer();
      analyzer.analyze(parse(scanTokens('var y = missing;', 'main.em'), 'main.em'));
      expect(errorMessages(analyzer.errors)).toEqual(["main.em:1:9: Undefined symbol 'missing'"]);
      expect(errorsInclude(analyzer.errors, 'missing')).toBe(true);
    });
  });
});
