// Expression and statement typing over an analyzed compilation unit

import {
  BinaryExpression, BinaryOperator, CallExpression, Declaration, Expression, FunctionDeclaration, GetExpression,
  SetExpression, SetIndexExpression, SourceLocation, Statement, TypeDeclaration, UnaryExpression, VarDeclaration,
  isTypeDeclaration
} from '../types';
import { ANY, BOOL, CHAR, DOUBLE, INT, NULL_TYPE, STRING, VOID, fitsInteger, integerLiteralType } from './primitive-types';
import { SemanticAnalyzer } from './semantic-analyzer';
import { SymbolError, compareSymbolErrors, invalidOperation } from './symbol-error';
import { TypeResolver } from './type-resolver';
import { ParameterInfo, SemanticSymbol, TypeDefinition } from './type-definition';

interface FunctionContext {
  name: string;
  // Absent when the declared return type failed to resolve
  returnType?: TypeDefinition;
  owner?: TypeDefinition;
  isInitializer: boolean;
  loopDepth: number;
}

type NumericLiteral = { kind: 'integer'; value: bigint } | { kind: 'float' };

// Sees through grouping and sign so that `-(1)` still counts as the integer literal -1
function numericLiteral(expression: Expression): NumericLiteral | undefined {
  switch (expression.kind) {
    case 'literal':
      if (expression.value.kind === 'integer') return expression.value;
      return expression.value.kind === 'float' ? { kind: 'float' } : undefined;
    case 'grouping':
      return numericLiteral(expression.expression);
    case 'unary': {
      if (expression.operator !== '-' && expression.operator !== '+') return undefined;
      const operand = numericLiteral(expression.operand);
      return operand?.kind === 'integer' && expression.operator === '-' ? { kind: 'integer', value: -operand.value } : operand;
    }
    default:
      return undefined;
  }
}

function isLiteralTrue(expression: Expression | undefined): boolean {
  if (!expression) return true;
  if (expression.kind === 'grouping') return isLiteralTrue(expression.expression);
  return expression.kind === 'literal' && expression.value.kind === 'boolean' && expression.value.value;
}

// Whether a break inside this statement leaves the enclosing loop (nested loops capture their own)
function containsBreak(statement: Statement): boolean {
  switch (statement.kind) {
    case 'break':
      return true;
    case 'block':
      return statement.statements.some(containsBreak);
    case 'if':
      return containsBreak(statement.thenBranch) || (statement.elseBranch !== undefined && containsBreak(statement.elseBranch));
    default:
      return false;
  }
}

function alwaysReturns(statement: Statement): boolean {
  switch (statement.kind) {
    case 'return':
      return true;
    case 'block':
      return statement.statements.some(alwaysReturns);
    case 'if':
      return statement.elseBranch !== undefined && alwaysReturns(statement.thenBranch) && alwaysReturns(statement.elseBranch);
    case 'while':
      return isLiteralTrue(statement.condition) && !containsBreak(statement.body);
    case 'for':
      return isLiteralTrue(statement.condition) && !containsBreak(statement.body);
    default:
      return false;
  }
}

/**
 * Assigns a type to every expression it can and reports every mismatch it finds.
 * An expression whose type cannot be determined is left untyped; operations on it are not
 * reported again, so one mistake yields one diagnostic.
 */
export class TypeChecker {
  private readonly analyzer = new SemanticAnalyzer();
  private readonly resolver: TypeResolver = this.analyzer.resolver;
  private readonly errors: SymbolError[] = [];
  private readonly expressionTypes: Map<Expression, TypeDefinition> = new Map();
  private readonly typeDeclarations: Map<TypeDefinition, TypeDeclaration> = new Map();
  private context: FunctionContext | undefined;

  check(declarations: Declaration[]): SymbolError[] {
    this.analyzer.analyze(declarations);

    const typeDecls = declarations.filter(isTypeDeclaration);
    for (const decl of typeDecls) {
      const type = this.analyzer.definitionOf(decl);
      if (type) this.typeDeclarations.set(type, decl);
    }

    // Globals and properties first, so inferred types are known inside function bodies
    for (const decl of declarations) {
      if (decl.kind === 'varDecl') this.checkVariable(decl);
    }
    for (const decl of typeDecls) {
      this.checkTypeMembers(decl);
    }
    for (const decl of typeDecls) {
      const owner = this.analyzer.definitionOf(decl);
      if (!owner) continue;
      for (const method of decl.methods) {
        this.checkFunction(method, owner);
      }
    }
    for (const decl of declarations) {
      if (decl.kind === 'functionDecl') this.checkFunction(decl, undefined);
    }

    return [...this.analyzer.errors, ...this.errors].sort(compareSymbolErrors);
  }

  // The type inferred for an expression during the last check
  typeOf(expression: Expression): TypeDefinition | undefined {
    return this.expressionTypes.get(expression);
  }

  get semanticAnalyzer(): SemanticAnalyzer {
    return this.analyzer;
  }

  private report(error: SymbolError): void {
    this.errors.push(error);
  }

  private mismatch(expected: TypeDefinition, got: TypeDefinition, location: SourceLocation): void {
    this.report(new SymbolError({ code: 'typeMismatch', expected: expected.name, got: got.name }, location));
  }

  // Numeric literals adapt to any numeric type that can hold their value
  private isCompatible(expression: Expression, from: TypeDefinition, to: TypeDefinition): boolean {
    const literal = numericLiteral(expression);
    if (literal && to.numeric) {
      if (to.numeric.kind !== 'integer') return true;
      return literal.kind === 'integer' && fitsInteger(literal.value, to.numeric);
    }
    return this.resolver.isAssignable(from, to);
  }

  private expectCompatible(expression: Expression, expected: TypeDefinition | undefined): TypeDefinition | undefined {
    const actual = this.infer(expression, expected);
    if (expected && actual && !this.isCompatible(expression, actual, expected)) {
      this.mismatch(expected, actual, expression.location);
    }
    return actual;
  }

  private expectBool(expression: Expression): void {
    const actual = this.infer(expression);
    if (actual && actual !== BOOL) {
      this.mismatch(BOOL, actual, expression.location);
    }
  }

  // Declarations

  private checkTypeMembers(decl: TypeDeclaration): void {
    const owner = this.analyzer.definitionOf(decl);
    if (!owner) return;

    this.withContext({ name: decl.name, owner, isInitializer: false, loopDepth: 0 }, () => {
      if (decl.kind === 'enumDecl') {
        this.checkRawValues(decl.cases.flatMap(enumCase => enumCase.rawValue ? [enumCase.rawValue] : []));
      } else if (decl.kind !== 'interfaceDecl') {
        for (const property of decl.properties) {
          this.checkVariable(property);
        }
      }
    });
  }

  // Every raw value in one enum must have the same type
  private checkRawValues(rawValues: Expression[]): void {
    let first: TypeDefinition | undefined;
    for (const rawValue of rawValues) {
      const type = this.infer(rawValue);
      if (!type) continue;
      if (!first) {
        first = type;
      } else if (type !== first && !this.isCompatible(rawValue, type, first)) {
        this.mismatch(first, type, rawValue.location);
      }
    }
  }

  private checkVariable(decl: VarDeclaration): void {
    const symbol = this.analyzer.bindingOf(decl);
    if (!decl.initializer) return;

    if (decl.typeAnnotation) {
      this.expectCompatible(decl.initializer, symbol?.type);
      return;
    }

    const inferred = this.infer(decl.initializer);
    if (inferred === VOID) {
      this.report(invalidOperation(`Cannot initialize '${decl.name}' with a value of type 'Void'`, decl.initializer.location));
    } else if (symbol && inferred) {
      symbol.type = inferred;
    }
  }

  private checkFunction(decl: FunctionDeclaration, owner: TypeDefinition | undefined): void {
    const signature = this.analyzer.signatureOf(decl);

    decl.parameters.forEach((parameter, index) => {
      if (parameter.defaultValue) {
        this.expectCompatible(parameter.defaultValue, signature?.parameters[index]?.type);
      }
    });

    const body = decl.body;
    if (!body) return;

    const context: FunctionContext = {
      name: decl.name,
      returnType: signature?.returnType,
      owner,
      isInitializer: owner !== undefined && decl.name === 'init',
      loopDepth: 0
    };
    this.withContext(context, () => {
      for (const statement of body.statements) {
        this.checkStatement(statement);
      }
    });

    const returnType = signature?.returnType;
    if (returnType && returnType !== VOID && !alwaysReturns(body)) {
      this.report(invalidOperation(
        `Function '${decl.name}' must return a value of type '${returnType.name}' on every path`,
        decl.location
      ));
    }
  }

  private withContext(context: FunctionContext, body: () => void): void {
    const saved = this.context;
    this.context = context;
    try {
      body();
    } finally {
      this.context = saved;
    }
  }

  // Statements

  private checkStatement(statement: Statement): void {
    switch (statement.kind) {
      case 'varDecl':
        this.checkVariable(statement);
        break;
      case 'functionDecl':
        this.checkFunction(statement, this.context?.owner);
        break;
      case 'expressionStmt':
        this.infer(statement.expression);
        break;
      case 'block':
        statement.statements.forEach(inner => this.checkStatement(inner));
        break;
      case 'if':
        this.expectBool(statement.condition);
        this.checkStatement(statement.thenBranch);
        if (statement.elseBranch) this.checkStatement(statement.elseBranch);
        break;
      case 'while':
        this.expectBool(statement.condition);
        this.checkLoopBody(statement.body);
        break;
      case 'for':
        if (statement.initializer) this.checkStatement(statement.initializer);
        if (statement.condition) this.expectBool(statement.condition);
        if (statement.increment) this.infer(statement.increment);
        this.checkLoopBody(statement.body);
        break;
      case 'return':
        this.checkReturn(statement.value, statement.location);
        break;
      case 'break':
      case 'continue':
        if (!this.context || this.context.loopDepth === 0) {
          this.report(invalidOperation(`'${statement.kind}' can only be used inside a loop`, statement.location));
        }
        break;
    }
  }

  private checkLoopBody(body: Statement): void {
    const context = this.context;
    if (!context) return;
    context.loopDepth++;
    try {
      this.checkStatement(body);
    } finally {
      context.loopDepth--;
    }
  }

  private checkReturn(value: Expression | undefined, location: SourceLocation): void {
    const returnType = this.context?.returnType;

    if (!value) {
      if (returnType && returnType !== VOID) {
        this.mismatch(returnType, VOID, location);
      }
      return;
    }

    if (returnType === VOID) {
      const actual = this.infer(value);
      if (actual) this.mismatch(VOID, actual, value.location);
      return;
    }
    this.expectCompatible(value, returnType);
  }

  // Expressions

  private infer(expression: Expression, expected?: TypeDefinition): TypeDefinition | undefined {
    const type = this.inferUncached(expression, expected);
    if (type) this.expressionTypes.set(expression, type);
    return type;
  }

  private inferUncached(expression: Expression, expected: TypeDefinition | undefined): TypeDefinition | undefined {
    switch (expression.kind) {
      case 'literal':
        switch (expression.value.kind) {
          case 'integer': return integerLiteralType(expression.value.value);
          case 'float': return DOUBLE;
          case 'string': return STRING;
          case 'character': return CHAR;
          case 'boolean': return BOOL;
          case 'null': return NULL_TYPE;
          case 'none': return undefined;
        }
        break;
      case 'grouping':
        return this.infer(expression.expression, expected);
      case 'binary':
        return this.inferBinary(expression);
      case 'unary':
        return this.inferUnary(expression);
      case 'variable':
        return this.inferVariable(expression.name, this.analyzer.bindingOf(expression), expression.location);
      case 'assign':
        return this.inferAssignment(expression.name, this.analyzer.bindingOf(expression), expression.value);
      case 'call':
        return this.inferCall(expression);
      case 'get':
        return this.inferGet(expression);
      case 'set':
        return this.inferSet(expression);
      case 'this':
        if (!this.context?.owner) {
          this.report(invalidOperation(`'this' can only be used inside a type`, expression.location));
        }
        return this.context?.owner;
      case 'super': {
        const member = this.superMember(expression.member, expression.location);
        if (member?.kind === 'function') {
          this.report(invalidOperation(`Method '${expression.member}' must be called`, expression.location));
          return undefined;
        }
        return member?.type;
      }
      case 'arrayLiteral':
        return this.inferArrayLiteral(expression.elements, expected, expression.location);
      case 'index':
        return this.inferIndex(expression.object, expression.index, expression.location);
      case 'setIndex': {
        const objectType = this.infer(expression.object);
        if (objectType === STRING) {
          this.report(invalidOperation(`Cannot assign to a character of a 'String'`, expression.location));
          this.infer(expression.index);
          this.infer(expression.value);
          return undefined;
        }
        const elementType = this.inferIndex(expression.object, expression.index, expression.location, objectType);
        this.expectAssignedValue(expression, elementType);
        return elementType;
      }
      case 'conditional': {
        this.expectBool(expression.condition);
        const thenType = this.infer(expression.thenBranch, expected);
        const elseType = this.infer(expression.elseBranch, expected);
        if (!thenType || !elseType) return undefined;
        const common = this.unify(expression.thenBranch, thenType, expression.elseBranch, elseType);
        if (!common) this.mismatch(thenType, elseType, expression.elseBranch.location);
        return common;
      }
    }
  }

  // The wider of two operand types, letting numeric literals take the other side's type
  private unify(left: Expression, leftType: TypeDefinition, right: Expression, rightType: TypeDefinition): TypeDefinition | undefined {
    const common = this.resolver.commonType(leftType, rightType);
    if (common) return common;
    if (this.isCompatible(left, leftType, rightType)) return rightType;
    if (this.isCompatible(right, rightType, leftType)) return leftType;
    return undefined;
  }

  private inferBinary(expression: BinaryExpression): TypeDefinition | undefined {
    const { operator, left, right } = expression;

    if (operator === '&&' || operator === '||') {
      this.expectBool(left);
      this.expectBool(right);
      return BOOL;
    }

    const leftType = this.infer(left);
    const rightType = this.infer(right);
    if (!leftType || !rightType) return undefined;
    return this.binaryResult(operator, left, leftType, right, rightType, expression.location);
  }

  private binaryResult(
    operator: BinaryOperator,
    left: Expression,
    leftType: TypeDefinition,
    right: Expression,
    rightType: TypeDefinition,
    location: SourceLocation
  ): TypeDefinition | undefined {
    const invalid = (): undefined => {
      this.report(invalidOperation(
        `Operator '${operator}' cannot be applied to '${leftType.name}' and '${rightType.name}'`,
        location
      ));
      return undefined;
    };
    const numeric = this.resolver.isNumeric(leftType) && this.resolver.isNumeric(rightType);

    switch (operator) {
      case '&&':
      case '||':
        return leftType === BOOL && rightType === BOOL ? BOOL : invalid();
      case '+':
        if (leftType === STRING && rightType === STRING) return STRING;
        return numeric ? this.unify(left, leftType, right, rightType) ?? invalid() : invalid();
      case '-':
      case '*':
      case '/':
      case '%':
      case '**':
        return numeric ? this.unify(left, leftType, right, rightType) ?? invalid() : invalid();
      case '<':
      case '<=':
      case '>':
      case '>=':
        if (numeric) return this.unify(left, leftType, right, rightType) ? BOOL : invalid();
        if ((leftType === STRING || leftType === CHAR) && leftType === rightType) return BOOL;
        return invalid();
      case '==':
      case '!=':
        if (!this.unify(left, leftType, right, rightType)) {
          this.mismatch(leftType, rightType, right.location);
        }
        return BOOL;
      case '&':
      case '|':
      case '^':
      case '<<':
      case '>>':
        if (this.resolver.isInteger(leftType) && this.resolver.isInteger(rightType)) {
          return this.unify(left, leftType, right, rightType) ?? invalid();
        }
        return invalid();
      case '??': {
        if (leftType === NULL_TYPE) return rightType;
        const common = this.unify(left, leftType, right, rightType);
        if (!common) this.mismatch(leftType, rightType, right.location);
        return common;
      }
    }
  }

  private inferUnary(expression: UnaryExpression): TypeDefinition | undefined {
    const operandType = this.infer(expression.operand);
    if (!operandType) return undefined;

    const literal = numericLiteral(expression);
    if (literal?.kind === 'integer') return integerLiteralType(literal.value);

    const valid = expression.operator === '!'
      ? operandType === BOOL
      : expression.operator === '~'
        ? this.resolver.isInteger(operandType)
        : this.resolver.isNumeric(operandType);

    if (valid) return operandType;

    if (expression.operator === '!') {
      this.mismatch(BOOL, operandType, expression.operand.location);
    } else {
      this.report(invalidOperation(`Operator '${expression.operator}' cannot be applied to '${operandType.name}'`, expression.location));
    }
    return undefined;
  }

  private inferVariable(name: string, symbol: SemanticSymbol | undefined, location: SourceLocation): TypeDefinition | undefined {
    if (!symbol) return undefined;
    if (symbol.kind === 'type') {
      this.report(invalidOperation(`Type '${name}' cannot be used as a value`, location));
      return undefined;
    }
    if (symbol.kind === 'function') {
      this.report(invalidOperation(`Function '${name}' must be called`, location));
      return undefined;
    }
    return symbol.type;
  }

  // Constants may be assigned only by an initializer of the type that owns them
  private canAssign(symbol: SemanticSymbol): boolean {
    return symbol.kind !== 'constant'
      || (this.context?.isInitializer === true && symbol.owner !== undefined && symbol.owner === this.context.owner);
  }

  private inferAssignment(name: string, symbol: SemanticSymbol | undefined, value: Expression): TypeDefinition | undefined {
    if (!symbol) {
      this.infer(value);
      return undefined;
    }
    if (symbol.kind === 'type' || symbol.kind === 'function') {
      this.report(invalidOperation(`Cannot assign to '${name}'`, value.location));
      this.infer(value);
      return undefined;
    }
    if (!this.canAssign(symbol)) {
      this.report(new SymbolError({ code: 'constantAssignment', name }, value.location));
    }
    this.expectCompatible(value, symbol.type);
    return symbol.type;
  }

  // Calls

  private checkParameters(callee: string, parameters: ParameterInfo[], args: Expression[], location: SourceLocation): void {
    const min = parameters.filter(parameter => !parameter.hasDefault).length;
    const max = parameters.length;
    if (args.length < min || args.length > max) {
      this.report(new SymbolError({ code: 'argumentCount', callee, min, max, got: args.length }, location));
    }

    args.forEach((argument, index) => {
      this.expectCompatible(argument, parameters[index]?.type);
    });
  }

  private inferArgumentsOnly(args: Expression[]): undefined {
    args.forEach(argument => this.infer(argument));
    return undefined;
  }

  private callMember(owner: string, member: SemanticSymbol | undefined, memberName: string, call: CallExpression): TypeDefinition | undefined {
    if (!member) {
      this.report(new SymbolError({ code: 'undefinedMember', typeName: owner, member: memberName }, call.callee.location));
      return this.inferArgumentsOnly(call.arguments);
    }
    if (member.kind !== 'function' || !member.signature) {
      this.report(invalidOperation(`'${owner}.${memberName}' is not callable`, call.callee.location));
      return this.inferArgumentsOnly(call.arguments);
    }
    this.checkParameters(`${owner}.${memberName}`, member.signature.parameters, call.arguments, call.location);
    return member.signature.returnType;
  }

  private inferCall(call: CallExpression): TypeDefinition | undefined {
    const { callee } = call;

    if (callee.kind === 'variable') {
      const symbol = this.analyzer.bindingOf(callee);
      if (!symbol) return this.inferArgumentsOnly(call.arguments);

      if (symbol.kind === 'type' && symbol.type) {
        return this.construct(symbol.type, call);
      }
      if (symbol.kind === 'function' && symbol.signature) {
        this.checkParameters(callee.name, symbol.signature.parameters, call.arguments, call.location);
        return symbol.signature.returnType;
      }
      if (symbol.kind === 'function') {
        return this.inferArgumentsOnly(call.arguments);
      }
    }

    if (callee.kind === 'get') {
      const receiver = this.receiverOf(callee);
      if (!receiver) return this.inferArgumentsOnly(call.arguments);
      if (receiver.category === 'typeParameter') return this.inferArgumentsOnly(call.arguments);
      return this.callMember(receiver.name, receiver.findMethod(callee.name) ?? receiver.findProperty(callee.name), callee.name, call);
    }

    if (callee.kind === 'super') {
      const superclass = this.superclassInContext(callee.location);
      if (!superclass) return this.inferArgumentsOnly(call.arguments);
      return this.callMember(superclass.name, superclass.findMethod(callee.member), callee.member, call);
    }

    const calleeType = this.infer(callee);
    if (calleeType) {
      this.report(invalidOperation(`Value of type '${calleeType.name}' is not callable`, callee.location));
    }
    return this.inferArgumentsOnly(call.arguments);
  }

  private construct(type: TypeDefinition, call: CallExpression): TypeDefinition | undefined {
    const refuse = (what: string): undefined => {
      this.report(invalidOperation(`Cannot instantiate ${what} '${type.name}'`, call.location));
      return this.inferArgumentsOnly(call.arguments);
    };

    switch (type.category) {
      case 'interface':
        return refuse('interface');
      case 'enum':
        return refuse('enum');
      case 'typeParameter':
        return refuse('type parameter');
      case 'primitive':
        // Conversions such as Int(x) take exactly one argument of any type
        this.checkParameters(type.name, [{ name: 'value', type: ANY, hasDefault: false }], call.arguments, call.location);
        return type;
      default:
        break;
    }
    if (type.isAbstract) return refuse('abstract class');

    const initializer = type.findMethod('init');
    if (initializer?.signature) {
      this.checkParameters(type.name, initializer.signature.parameters, call.arguments, call.location);
    } else {
      this.checkParameters(type.name, this.memberwiseParameters(type), call.arguments, call.location);
    }
    return type;
  }

  // Structs without an initializer take their stored properties in order; classes take nothing
  private memberwiseParameters(type: TypeDefinition): ParameterInfo[] {
    const decl = this.typeDeclarations.get(type.genericBase ?? type);
    if (decl?.kind !== 'structDecl') return [];
    return decl.properties
      .filter(property => !property.modifiers.includes('static'))
      .map(property => ({
        name: property.name,
        type: this.analyzer.bindingOf(property)?.type,
        hasDefault: property.initializer !== undefined
      }));
  }

  // Members

  // The type whose members a `.name` access looks into; a type name on the left gives static access
  private receiverOf(expression: GetExpression | SetExpression): TypeDefinition | undefined {
    const { object } = expression;
    if (object.kind === 'variable') {
      const symbol = this.analyzer.bindingOf(object);
      if (symbol?.kind === 'type') return symbol.type;
    }
    return this.infer(object);
  }

  private inferGet(expression: GetExpression): TypeDefinition | undefined {
    const receiver = this.receiverOf(expression);
    if (!receiver || receiver.category === 'typeParameter') return undefined;

    const property = receiver.findProperty(expression.name);
    if (property) return property.type;

    if (receiver.findMethod(expression.name)) {
      this.report(invalidOperation(`Method '${receiver.name}.${expression.name}' must be called`, expression.location));
    } else {
      this.report(new SymbolError({ code: 'undefinedMember', typeName: receiver.name, member: expression.name }, expression.location));
    }
    return undefined;
  }

  private inferSet(expression: SetExpression): TypeDefinition | undefined {
    const receiver = this.receiverOf(expression);
    if (!receiver || receiver.category === 'typeParameter') {
      this.infer(expression.value);
      return undefined;
    }

    const property = receiver.findProperty(expression.name);
    if (!property) {
      this.report(new SymbolError({ code: 'undefinedMember', typeName: receiver.name, member: expression.name }, expression.location));
      this.infer(expression.value);
      return undefined;
    }

    if (!this.canAssign(property)) {
      this.report(new SymbolError({ code: 'constantAssignment', name: `${receiver.name}.${expression.name}` }, expression.location));
    }
    this.expectAssignedValue(expression, property.type);
    return property.type;
  }

  // `target op= value` is checked as `target = target op value`
  private expectAssignedValue(expression: SetExpression | SetIndexExpression, target: TypeDefinition | undefined): void {
    if (!expression.operator) {
      this.expectCompatible(expression.value, target);
      return;
    }
    const valueType = this.infer(expression.value);
    if (!target || !valueType) return;
    const result = this.binaryResult(expression.operator, expression, target, expression.value, valueType, expression.location);
    if (result && !this.resolver.isAssignable(result, target)) {
      this.mismatch(target, result, expression.location);
    }
  }

  private superclassInContext(location: SourceLocation): TypeDefinition | undefined {
    const owner = this.context?.owner;
    if (!owner) {
      this.report(invalidOperation(`'super' can only be used inside a type`, location));
      return undefined;
    }
    if (!owner.superclass) {
      this.report(invalidOperation(`'super' used in '${owner.name}', which has no superclass`, location));
      return undefined;
    }
    return owner.superclass;
  }

  private superMember(name: string, location: SourceLocation): SemanticSymbol | undefined {
    const superclass = this.superclassInContext(location);
    if (!superclass) return undefined;

    const member = superclass.findProperty(name) ?? superclass.findMethod(name);
    if (!member) {
      this.report(new SymbolError({ code: 'undefinedMember', typeName: superclass.name, member: name }, location));
    }
    return member;
  }

  // Collections

  private inferArrayLiteral(elements: Expression[], expected: TypeDefinition | undefined, location: SourceLocation): TypeDefinition | undefined {
    const expectedElement = expected?.category === 'array' ? expected.elementType : undefined;

    if (expected && expectedElement) {
      elements.forEach(element => this.expectCompatible(element, expectedElement));
      return expected;
    }
    if (elements.length === 0) {
      return this.resolver.arrayOf(ANY);
    }

    let elementType: TypeDefinition | undefined;
    let first: Expression | undefined;
    for (const element of elements) {
      const type = this.infer(element);
      if (!type) continue;
      if (!elementType || !first) {
        elementType = type;
        first = element;
        continue;
      }
      const common = this.unify(first, elementType, element, type);
      if (common) {
        elementType = common;
      } else {
        this.mismatch(elementType, type, element.location);
      }
    }

    if (!elementType) {
      this.report(invalidOperation('Cannot infer the element type of this array', location));
      return undefined;
    }
    return this.resolver.arrayOf(elementType);
  }

  private inferIndex(
    object: Expression,
    index: Expression,
    location: SourceLocation,
    knownObjectType?: TypeDefinition
  ): TypeDefinition | undefined {
    const objectType = knownObjectType ?? this.infer(object);
    const indexType = this.infer(index);
    if (indexType && !this.resolver.isInteger(indexType)) {
      this.mismatch(INT, indexType, index.location);
    }

    if (!objectType) return undefined;
    if (objectType.category === 'array') return objectType.elementType;
    if (objectType === STRING) return CHAR;
    if (objectType.category === 'typeParameter' || objectType === ANY) return undefined;

    this.report(invalidOperation(`Type '${objectType.name}' cannot be indexed`, location));
    return undefined;
  }
}

/**
 * Analyzes and type-checks a compilation unit, returning every diagnostic ordered by source
 * position. A well-typed unit yields an empty list.
 */
export function check(declarations: Declaration[]): SymbolError[] {
  return new TypeChecker().check(declarations);
}
