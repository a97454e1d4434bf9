import { describe, it, expect } from 'vitest';
import { scanTokens } from '../src/parser/lexer';
import { parse } from '../src/parser/parser';
import { TypeChecker, check } from '../src/validation/type-checker';
import { Declaration } from '../src/types';

function declarationsOf(source: string): Declaration[] {
  return parse(scanTokens(source));
}

function messages(source: string): string[] {
  return check(declarationsOf(source)).map(error => error.message);
}

// The type recorded for a global variable after checking
function globalType(source: string, name: string): string | undefined {
  const declarations = declarationsOf(source);
  const checker = new TypeChecker();
  checker.check(declarations);
  const decl = declarations.find(d => d.kind === 'varDecl' && d.name === name);
  return decl ? checker.semanticAnalyzer.bindingOf(decl)?.type?.name : undefined;
}

describe('TypeChecker', () => {
  describe('programs', () => {
    it('should accept a complete program', () => {
      expect(messages(`
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
        func main() {
          var squares: Shape[] = [Square(1.5), Square(2)];
          var result = total(squares);
          if (result > 10 && !(result == 0)) { return; }
        }
      `)).toEqual([]);
    });

    it('should report a mismatched initializer', () => {
      const errors = check(declarationsOf('var x: String = 42;'));
      expect(errors).toHaveLength(1);
      expect(errors[0].detail).toEqual({ code: 'typeMismatch', expected: 'String', got: 'Int' });
      expect(errors[0].location?.start).toEqual({ line: 1, column: 17 });
    });

    it('should include analyzer errors once', () => {
      expect(messages('var x: Widget = 1;')).toEqual(["Undefined type 'Widget'"]);
    });
  });

  describe('literals and inference', () => {
    it('should infer variable types from initializers', () => {
      expect(globalType('var s = "a" + "b";', 's')).toBe('String');
      expect(globalType('var c = \'c\';', 'c')).toBe('Char');
      expect(globalType('var d = 1 + 2.5;', 'd')).toBe('Double');
      expect(globalType('var b = 1 < 2;', 'b')).toBe('Bool');
    });

    it('should use inferred types in later declarations', () => {
      expect(messages('var s = "a"; var n: Int = s;')).toEqual(["Type mismatch: expected 'Int', got 'String'"]);
    });

    it('should let numeric literals adapt to narrower numeric types', () => {
      expect(messages('var small: Int8 = -5; var f: Float = 2.5; var d: Double = 1;')).toEqual([]);
    });

    it('should not let float literals into integer types', () => {
      expect(messages('var i: Int = 1.5;')).toEqual(["Type mismatch: expected 'Int', got 'Double'"]);
    });

    it('should only let integer literals into types that can hold them', () => {
      expect(messages('var a: Int8 = -128; var b: Int8 = 127; var u: UInt8 = 255;')).toEqual([]);
      expect(messages('var b: Int8 = 1000;')).toEqual(["Type mismatch: expected 'Int8', got 'Int'"]);
      expect(messages('var c: Int8 = 128;')).toEqual(["Type mismatch: expected 'Int8', got 'Int'"]);
      expect(messages('var u: UInt8 = -1;')).toEqual(["Type mismatch: expected 'UInt8', got 'Int'"]);
      expect(messages('var d: Double = 3000000000;')).toEqual([]);
    });

    it('should widen integer literals that do not fit Int', () => {
      expect(globalType('var n = 3000000000;', 'n')).toBe('Int64');
      expect(globalType('var m = -2147483648;', 'm')).toBe('Int');
      expect(globalType('var u = 18446744073709551615;', 'u')).toBe('UInt64');
      expect(messages('var big: Int64 = 9223372036854775807;')).toEqual([]);
      expect(messages('var c: Int = 3000000000;')).toEqual(["Type mismatch: expected 'Int', got 'Int64'"]);
    });

    it('should reject initializing from a void call', () => {
      expect(messages('func g() {} var v = g();')).toEqual(["Cannot initialize 'v' with a value of type 'Void'"]);
    });

    it('should record expression types', () => {
      const declarations = declarationsOf('func f(a: Int, b: Double) -> Double { return a * b + 1; }');
      const checker = new TypeChecker();
      expect(checker.check(declarations)).toEqual([]);

      const fn = declarations[0];
      if (fn.kind !== 'functionDecl') throw new Error('Expected a function');
      const ret = fn.body?.statements[0];
      if (ret?.kind !== 'return' || !ret.value) throw new Error('Expected a return value');
      expect(checker.typeOf(ret.value)?.name).toBe('Double');
    });
  });

  describe('operators', () => {
    it('should only concatenate strings with strings', () => {
      expect(messages('var s = "a" + 1;')).toEqual(["Operator '+' cannot be applied to 'String' and 'Int'"]);
    });

    it('should require Bool operands for logical operators', () => {
      expect(messages('var b = 1 && true;')).toEqual(["Type mismatch: expected 'Bool', got 'Int'"]);
    });

    it('should compare numbers, strings and characters', () => {
      expect(messages('var c = "a" < "b"; var k = \'a\' >= \'b\';')).toEqual([]);
      expect(messages('var d = "a" < 1;')).toEqual(["Operator '<' cannot be applied to 'String' and 'Int'"]);
    });

    it('should require comparable operands for equality', () => {
      expect(messages('var e = 1 == "x";')).toEqual(["Type mismatch: expected 'Int', got 'String'"]);
      expect(messages('var e = 1 == 1.0;')).toEqual([]);
    });

    it('should require integers for bitwise operators', () => {
      expect(messages('var m = 1.5 & 2;')).toEqual(["Operator '&' cannot be applied to 'Double' and 'Int'"]);
      expect(globalType('var m = 6 & 3 << 1;', 'm')).toBe('Int');
    });

    it('should take the right type when coalescing null', () => {
      expect(messages('var name: String = null ?? "anon";')).toEqual([]);
    });

    it('should check unary operands', () => {
      expect(messages('var u = !5;')).toEqual(["Type mismatch: expected 'Bool', got 'Int'"]);
      expect(messages('var v = -"s";')).toEqual(["Operator '-' cannot be applied to 'String'"]);
      expect(messages('var w = ~1.5;')).toEqual(["Operator '~' cannot be applied to 'Double'"]);
    });

    it('should report one error for a chain of bad operations', () => {
      expect(messages('var s = ("a" + 1) * 2 - 3;')).toEqual(["Operator '+' cannot be applied to 'String' and 'Int'"]);
    });
  });

  describe('statements', () => {
    it('should require Bool conditions', () => {
      expect(messages('func f() { if (1) {} }')).toEqual(["Type mismatch: expected 'Bool', got 'Int'"]);
      expect(messages('func f() { while ("x") {} }')).toEqual(["Type mismatch: expected 'Bool', got 'String'"]);
    });

    it('should require a return on every path', () => {
      expect(messages('func f(x: Int) -> Int { if (x > 0) { return 1; } }'))
        .toEqual(["Function 'f' must return a value of type 'Int' on every path"]);
      expect(messages('func f(x: Int) -> Int { if (x > 0) { return 1; } else { return 2; } }')).toEqual([]);
    });

    it('should treat infinite loops without break as returning', () => {
      expect(messages('func g() -> Int { while (true) { } }')).toEqual([]);
      expect(messages('func g() -> Int { for (;;) { } }')).toEqual([]);
      expect(messages('func h() -> Int { while (true) { break; } }'))
        .toEqual(["Function 'h' must return a value of type 'Int' on every path"]);
    });

    it('should check return values against the declared type', () => {
      expect(messages('func f() { return 1; }')).toEqual(["Type mismatch: expected 'Void', got 'Int'"]);
      expect(messages('func g() -> Int { return; }')).toEqual(["Type mismatch: expected 'Int', got 'Void'"]);
      expect(messages('func h() -> String { return 1; }')).toEqual(["Type mismatch: expected 'String', got 'Int'"]);
    });

    it('should reject break and continue outside loops', () => {
      expect(messages('func f() { break; }')).toEqual(["'break' can only be used inside a loop"]);
      expect(messages('func f() { continue; }')).toEqual(["'continue' can only be used inside a loop"]);
      expect(messages('func f() { for (;;) { if (true) { continue; } break; } }')).toEqual([]);
    });

    it('should not let a nested function break out of an enclosing loop', () => {
      expect(messages('func f() { while (true) { func g() { break; } break; } }'))
        .toEqual(["'break' can only be used inside a loop"]);
    });

    it('should check enum raw values and default arguments', () => {
      expect(messages('enum E { A = 1, B = "x" }')).toEqual(["Type mismatch: expected 'Int', got 'String'"]);
      expect(messages('func f(a: Int = "x") {}')).toEqual(["Type mismatch: expected 'Int', got 'String'"]);
    });
  });

  describe('names and assignment', () => {
    it('should reject this outside a type', () => {
      expect(messages('func f() { this; }')).toEqual(["'this' can only be used inside a type"]);
    });

    it('should check uses of super', () => {
      expect(messages('class A { func f() { super.f(); } }')).toEqual(["'super' used in 'A', which has no superclass"]);
      expect(messages('func f() { super.g(); }')).toEqual(["'super' can only be used inside a type"]);
      expect(messages('class B { func g() {} } class A: B { func f() { super.g(); var x = super.g; } }'))
        .toEqual(["Method 'g' must be called"]);
    });

    it('should reject types and functions used as values', () => {
      expect(messages('class P {} func f() { var p = P; }')).toEqual(["Type 'P' cannot be used as a value"]);
      expect(messages('func g() {} func f() { var h = g; }')).toEqual(["Function 'g' must be called"]);
      expect(messages('func g() {} func f() { g = 1; }')).toEqual(["Cannot assign to 'g'"]);
    });

    it('should reject assignment to constants', () => {
      expect(messages('const k = 1; func f() { k = 2; }')).toEqual(["Cannot assign to constant 'k'"]);
    });

    it('should let an initializer assign its own constant properties', () => {
      expect(messages(
        'class P { const id: Int; init(id: Int) { this.id = id; } func reset() { this.id = 0; } }'
      )).toEqual(["Cannot assign to constant 'P.id'"]);
    });

    it('should check assigned values', () => {
      expect(messages('var n = 1; func f() { n = "x"; }')).toEqual(["Type mismatch: expected 'Int', got 'String'"]);
    });
  });

  describe('calls and construction', () => {
    it('should check argument counts and types', () => {
      expect(messages(
        'func add(a: Int, b: Int = 0) -> Int { return a + b; } var r = add(); var s = add(1, 2, 3); var t: String = add(1);'
      )).toEqual([
        "'add' expects 1 to 2 arguments, got 0",
        "'add' expects 1 to 2 arguments, got 3",
        "Type mismatch: expected 'String', got 'Int'"
      ]);
      expect(messages('func f(s: String) {} func g() { f(1); }')).toEqual(["Type mismatch: expected 'String', got 'Int'"]);
    });

    it('should refuse to instantiate interfaces, enums and abstract classes', () => {
      expect(messages('interface I {} func f() { var i = I(); }')).toEqual(["Cannot instantiate interface 'I'"]);
      expect(messages('enum E { A } func f() { var e = E(); }')).toEqual(["Cannot instantiate enum 'E'"]);
      expect(messages('abstract class A {} func f() { var a = A(); }')).toEqual(["Cannot instantiate abstract class 'A'"]);
    });

    it('should construct structs memberwise', () => {
      expect(messages('struct Point { var x: Int; var y: Int = 0; } var p = Point(1); var q = Point();'))
        .toEqual(["'Point' expects 1 to 2 arguments, got 0"]);
      expect(globalType('struct Point { var x: Int; } var p = Point(1);', 'p')).toBe('Point');
    });

    it('should construct classes through their initializer', () => {
      expect(messages('class C {} var c = C(1);')).toEqual(["'C' expects 0 arguments, got 1"]);
      expect(messages('class C { init(n: Int) {} } var c = C("x");')).toEqual(["Type mismatch: expected 'Int', got 'String'"]);
    });

    it('should treat primitive names as conversions', () => {
      expect(messages('var n = Int(2.5); var m = Int();')).toEqual(["'Int' expects 1 argument, got 0"]);
      expect(globalType('var n = Int(2.5);', 'n')).toBe('Int');
    });

    it('should accept generic values', () => {
      expect(messages(
        'class Box<T> { var value: T; init(value: T) { this.value = value; } } var b = Box(1); var n: Int = b.value;'
      )).toEqual([]);
      expect(messages('func id<T>(v: T) -> T { return v; } var s: String = id("a");')).toEqual([]);
    });

    it('should accept subclasses where a superclass is expected', () => {
      expect(messages('class Animal {} class Dog: Animal {} var a: Animal = Dog();')).toEqual([]);
      expect(messages('class Animal {} class Dog: Animal {} var d: Dog = Animal();'))
        .toEqual(["Type mismatch: expected 'Dog', got 'Animal'"]);
    });

    it('should reject calling values', () => {
      expect(messages('var n = 1; var m = n();')).toEqual(["Value of type 'Int' is not callable"]);
    });
  });

  describe('members', () => {
    it('should report unknown members', () => {
      expect(messages('struct P { var x: Int; } func f(p: P) -> Int { return p.y; }')).toEqual(["Type 'P' has no member 'y'"]);
      expect(messages('struct P { var x: Int; } func f(p: P) { p.nope(); }')).toEqual(["Type 'P' has no member 'nope'"]);
    });

    it('should require methods to be called and properties not to be', () => {
      expect(messages('class C { func m() {} } func f(c: C) { var z = c.m; }')).toEqual(["Method 'C.m' must be called"]);
      expect(messages('struct P { var x: Int; } func f(p: P) { p.x(); }')).toEqual(["'P.x' is not callable"]);
    });

    it('should allow static access to enum cases', () => {
      expect(messages('enum Color { Red, Green } var c: Color = Color.Red;')).toEqual([]);
    });

    it('should type built-in members', () => {
      expect(messages('var n: Int = "abc".length;')).toEqual([]);
      expect(messages('var xs = [1, 2, 3]; var n: Int = xs.length; func f() { xs.append(4); xs.append("s"); }'))
        .toEqual(["Type mismatch: expected 'Int', got 'String'"]);
    });

    it('should call methods that use bare member names', () => {
      expect(messages(
        'class Counter { var count: Int = 0; func increment() -> Int { count += 1; return count; } } ' +
        'func f(c: Counter) -> Int { return c.increment(); }'
      )).toEqual([]);
    });

    it('should check compound assignment to members and elements', () => {
      const types = 'class Box { var n: Int = 0; var s: String = ""; } ';
      expect(messages(types + 'func f(b: Box, xs: Int[]) { b.n += 1; xs[0] *= 2; b.s += "x"; }')).toEqual([]);
      expect(messages(types + 'func f(b: Box) { b.s -= "x"; }'))
        .toEqual(["Operator '-' cannot be applied to 'String' and 'String'"]);
      expect(messages(types + 'func f(b: Box) { b.n += 1.5; }')).toEqual(["Type mismatch: expected 'Int', got 'Double'"]);
    });
  });

  describe('arrays and indexing', () => {
    it('should infer element types', () => {
      expect(globalType('var ws = [1, 2.5];', 'ws')).toBe('Array<Double>');
      expect(globalType('var e = [];', 'e')).toBe('Array<Any>');
      expect(messages('var xs = [1, "a"];')).toEqual(["Type mismatch: expected 'Int', got 'String'"]);
    });

    it('should check elements against an annotation', () => {
      expect(messages('var ys: Double[] = [1, 2.5];')).toEqual([]);
      expect(messages('var zs: Int[] = [1.5];')).toEqual(["Type mismatch: expected 'Int', got 'Double'"]);
    });

    it('should report arrays whose elements cannot be typed', () => {
      expect(messages('var bad = [missing];')).toEqual([
        'Cannot infer the element type of this array',
        "Undefined symbol 'missing'"
      ]);
    });

    it('should check indexing', () => {
      expect(messages('var xs = [1]; var a = xs["0"];')).toEqual(["Type mismatch: expected 'Int', got 'String'"]);
      expect(messages('var c: Char = "abc"[0];')).toEqual([]);
      expect(messages('var n = 5[0];')).toEqual(["Type 'Int' cannot be indexed"]);
      expect(messages('func f() { var s = "abc"; s[0] = \'x\'; }')).toEqual(["Cannot assign to a character of a 'String'"]);
      expect(messages('func f() { var xs = [1]; xs[0] = "x"; }')).toEqual(["Type mismatch: expected 'Int', got 'String'"]);
    });
  });

  describe('conditional expressions', () => {
    it('should require matching branches and a Bool condition', () => {
      expect(messages('var c = true ? 1 : "a";')).toEqual(["Type mismatch: expected 'Int', got 'String'"]);
      expect(messages('var d = 1 ? 2 : 3;')).toEqual(["Type mismatch: expected 'Bool', got 'Int'"]);
      expect(globalType('var e = false ? 1 : 2.5;', 'e')).toBe('Double');
    });
  });
});
