// Declaration-level analysis: builds the symbol table and enforces inheritance and conformance rules

import {
  ASTNode, ClassDeclaration, Declaration, Expression, FunctionDeclaration, SourceLocation, Statement,
  TypeDeclaration, TypeNode, TypeReference, VarDeclaration, isTypeDeclaration
} from '../types';
import { VOID } from './primitive-types';
import { InheritanceProblem, SymbolError, compareSymbolErrors, invalidOperation } from './symbol-error';
import { Scope, SymbolInit, SymbolTable } from './symbol-table';
import { TypeResolver } from './type-resolver';
import { FunctionSignature, SemanticSymbol, TypeCategory, TypeDefinition } from './type-definition';

interface TypeInfo {
  decl: TypeDeclaration;
  type: TypeDefinition;
  // Holds type parameters and own members; its parent is the global scope
  scope: Scope;
}

const CATEGORIES: Record<TypeDeclaration['kind'], TypeCategory> = {
  classDecl: 'class',
  structDecl: 'struct',
  enumDecl: 'enum',
  interfaceDecl: 'interface'
};

/**
 * Walks declarations in five passes so that sibling declarations may refer to each other
 * regardless of order:
 *
 * 1. declare every top-level type, function and global
 * 2. resolve type parameters and inheritance clauses
 * 3. declare members and resolve signatures and annotations
 * 4. enforce declaration rules (conformance, overrides, modifiers)
 * 5. resolve names inside bodies and initializers
 *
 * Errors are collected rather than thrown; a declaration whose name clashes is reported
 * and left out of the later passes.
 */
export class SemanticAnalyzer {
  readonly symbolTable = new SymbolTable();
  readonly resolver = new TypeResolver(this.symbolTable);
  readonly errors: SymbolError[] = [];

  private readonly types: TypeInfo[] = [];
  private readonly definitions: Map<TypeDeclaration, TypeDefinition> = new Map();
  private readonly bindings: Map<ASTNode, SemanticSymbol> = new Map();
  // Scope in which a function's parameters and body are resolved
  private readonly functionScopes: Map<FunctionDeclaration, Scope> = new Map();
  private readonly owners: Map<FunctionDeclaration, TypeDefinition> = new Map();

  analyze(declarations: Declaration[]): Declaration[] {
    this.declareTopLevel(declarations);
    this.resolveHeaders();
    this.declareMembers(declarations);
    this.enforceRules(declarations);
    this.resolveBodies(declarations);
    this.errors.sort(compareSymbolErrors);
    return declarations;
  }

  // The symbol a variable reference, assignment, declaration or parameter was bound to
  bindingOf(node: ASTNode): SemanticSymbol | undefined {
    return this.bindings.get(node);
  }

  definitionOf(decl: TypeDeclaration): TypeDefinition | undefined {
    return this.definitions.get(decl);
  }

  // The type whose body declares this function, directly or through an enclosing method
  ownerOf(decl: FunctionDeclaration): TypeDefinition | undefined {
    return this.owners.get(decl);
  }

  signatureOf(decl: FunctionDeclaration): FunctionSignature | undefined {
    return this.bindings.get(decl)?.signature;
  }

  // Runs a step, recording a SymbolError instead of propagating it
  private attempt<T>(step: () => T): T | undefined {
    try {
      return step();
    } catch (error) {
      if (error instanceof SymbolError) {
        this.errors.push(error);
        return undefined;
      }
      throw error;
    }
  }

  private report(error: SymbolError): void {
    this.errors.push(error);
  }

  private define(node: ASTNode, init: SymbolInit): SemanticSymbol | undefined {
    const symbol = this.attempt(() => this.symbolTable.define(init));
    if (symbol) this.bindings.set(node, symbol);
    return symbol;
  }

  private resolveType(node: TypeNode): TypeDefinition | undefined {
    return this.attempt(() => this.resolver.resolve(node));
  }

  // Pass 1

  private declareTopLevel(declarations: Declaration[]): void {
    for (const decl of declarations) {
      if (isTypeDeclaration(decl)) {
        this.declareType(decl);
      } else if (decl.kind === 'functionDecl') {
        this.define(decl, { name: decl.name, kind: 'function', declaredAt: decl.location, modifiers: decl.modifiers });
      } else {
        this.define(decl, {
          name: decl.name,
          kind: decl.isConstant ? 'constant' : 'variable',
          declaredAt: decl.location,
          modifiers: decl.modifiers
        });
      }
    }
  }

  private declareType(decl: TypeDeclaration): void {
    const type = new TypeDefinition({
      name: decl.name,
      category: CATEGORIES[decl.kind],
      declaredAt: decl.location,
      modifiers: decl.modifiers,
      irType: 'ptr'
    });
    if (decl.kind === 'classDecl') {
      type.permits = decl.permits.map(reference => reference.name);
    }

    const symbol = this.define(decl, { name: decl.name, kind: 'type', type, declaredAt: decl.location, modifiers: decl.modifiers });
    if (!symbol) return;

    this.definitions.set(decl, type);
    this.types.push({ decl, type, scope: this.symbolTable.createScope(this.symbolTable.globalScope, type) });
  }

  // Pass 2

  private resolveHeaders(): void {
    for (const { decl, type, scope } of this.types) {
      if (decl.kind !== 'enumDecl') {
        type.typeParameters = decl.typeParameters.flatMap(name => {
          const parameter = this.resolver.createTypeParameter(name, decl.location);
          const symbol = this.attempt(() => scope.define({ name, kind: 'type', type: parameter, declaredAt: decl.location, modifiers: [] }));
          return symbol ? [parameter] : [];
        });
      }

      switch (decl.kind) {
        case 'classDecl':
          this.resolveSuperclass(decl, type);
          type.interfaces = this.resolveInterfaces(type, decl.interfaces);
          break;
        case 'structDecl':
          type.interfaces = this.resolveInterfaces(type, decl.interfaces);
          break;
        case 'interfaceDecl':
          type.interfaces = this.resolveInterfaces(type, decl.parents);
          break;
        case 'enumDecl':
          break;
      }

      if (type.isAbstract && type.isFinal) {
        this.report(invalidOperation(`'${type.name}' cannot be both abstract and final`, decl.location));
      }
    }

    this.breakInheritanceCycles();
  }

  private inheritanceError(type: TypeDefinition, reference: TypeReference, problem: InheritanceProblem): SymbolError {
    return new SymbolError({ code: 'invalidInheritance', typeName: type.name, baseName: reference.name, problem }, reference.location);
  }

  private resolveReference(reference: TypeReference): TypeDefinition | undefined {
    const resolved = this.resolver.resolveName(reference.name);
    if (!resolved) {
      this.report(new SymbolError({ code: 'undefinedType', name: reference.name }, reference.location));
    }
    return resolved;
  }

  // The first inherited name must denote a class; an interface there is reported, not reinterpreted
  private resolveSuperclass(decl: ClassDeclaration, type: TypeDefinition): void {
    if (!decl.superclass) return;
    const base = this.resolveReference(decl.superclass);
    if (!base) return;

    if (base.isInterface) {
      this.report(this.inheritanceError(type, decl.superclass, 'interfaceAsSuperclass'));
      return;
    }
    if (base.category !== 'class') {
      this.report(this.inheritanceError(type, decl.superclass, 'notAClass'));
      return;
    }
    if (base.isFinal) {
      this.report(this.inheritanceError(type, decl.superclass, 'final'));
    } else if (base.isSealed && !base.permits.includes(type.name)) {
      this.report(this.inheritanceError(type, decl.superclass, 'sealed'));
    }
    type.superclass = base;
  }

  private resolveInterfaces(type: TypeDefinition, references: TypeReference[]): TypeDefinition[] {
    const interfaces: TypeDefinition[] = [];
    for (const reference of references) {
      const resolved = this.resolveReference(reference);
      if (!resolved) continue;
      if (!resolved.isInterface) {
        this.report(this.inheritanceError(type, reference, 'notAnInterface'));
        continue;
      }
      interfaces.push(resolved);
    }
    return interfaces;
  }

  // Each cycle is reported once, at the type whose link closes it, and that link is removed
  private breakInheritanceCycles(): void {
    for (const { decl, type } of this.types) {
      for (const supertype of type.supertypes()) {
        if (!supertype.isSubtypeOf(type)) continue;

        this.report(new SymbolError(
          { code: 'invalidInheritance', typeName: type.name, baseName: supertype.name, problem: 'circular' },
          decl.location
        ));
        if (type.superclass === supertype) {
          type.superclass = undefined;
        } else {
          type.interfaces = type.interfaces.filter(candidate => candidate !== supertype);
        }
      }
    }
  }

  // Pass 3

  private declareMembers(declarations: Declaration[]): void {
    for (const { decl, type, scope } of this.types) {
      this.symbolTable.within(scope, () => {
        if (decl.kind === 'enumDecl') {
          for (const enumCase of decl.cases) {
            const symbol = this.define(enumCase, {
              name: enumCase.name, kind: 'constant', type, declaredAt: enumCase.location, owner: type, modifiers: ['static']
            });
            if (symbol) type.properties.set(symbol.name, symbol);
          }
        } else if (decl.kind !== 'interfaceDecl') {
          for (const property of decl.properties) {
            const symbol = this.declareVariable(property, type);
            if (symbol) type.properties.set(symbol.name, symbol);
          }
        }

        for (const method of decl.methods) {
          const symbol = this.declareFunction(method, type);
          if (symbol) type.methods.set(symbol.name, symbol);
        }
      });
    }

    for (const decl of declarations) {
      const symbol = this.bindings.get(decl);
      if (!symbol) continue;
      if (decl.kind === 'functionDecl') {
        symbol.signature = this.resolveSignature(decl, this.symbolTable.globalScope);
      } else if (decl.kind === 'varDecl' && decl.typeAnnotation) {
        symbol.type = this.resolveType(decl.typeAnnotation);
      }
    }
  }

  private declareVariable(decl: VarDeclaration, owner?: TypeDefinition): SemanticSymbol | undefined {
    return this.define(decl, {
      name: decl.name,
      kind: decl.isConstant ? 'constant' : 'variable',
      type: decl.typeAnnotation ? this.resolveType(decl.typeAnnotation) : undefined,
      declaredAt: decl.location,
      owner,
      modifiers: decl.modifiers
    });
  }

  private declareFunction(decl: FunctionDeclaration, owner?: TypeDefinition): SemanticSymbol | undefined {
    const symbol = this.define(decl, { name: decl.name, kind: 'function', declaredAt: decl.location, owner, modifiers: decl.modifiers });
    if (symbol) {
      symbol.signature = this.resolveSignature(decl, this.symbolTable.currentScope);
    }
    return symbol;
  }

  // Generic functions get their own scope for type parameters, reused when the body is resolved
  private resolveSignature(decl: FunctionDeclaration, enclosing: Scope): FunctionSignature {
    let scope = enclosing;
    if (decl.typeParameters.length > 0) {
      scope = this.symbolTable.createScope(enclosing);
      for (const name of decl.typeParameters) {
        const parameter = this.resolver.createTypeParameter(name, decl.location);
        this.attempt(() => scope.define({ name, kind: 'type', type: parameter, declaredAt: decl.location, modifiers: [] }));
      }
    }
    this.functionScopes.set(decl, scope);

    return this.symbolTable.within(scope, () => ({
      parameters: decl.parameters.map(parameter => ({
        name: parameter.name,
        type: this.resolveType(parameter.type),
        hasDefault: parameter.defaultValue !== undefined
      })),
      returnType: decl.returnType ? this.resolveType(decl.returnType) : VOID,
      hasBody: decl.body !== undefined
    }));
  }

  // Pass 4

  private enforceRules(declarations: Declaration[]): void {
    for (const { decl, type } of this.types) {
      if (decl.kind !== 'interfaceDecl' && !type.isAbstract) {
        this.checkConformance(decl, type);
        for (const method of decl.methods) {
          if (!method.body) {
            this.report(invalidOperation(`Method '${type.name}.${method.name}' must have a body`, method.location));
          }
        }
      }

      for (const method of decl.methods) {
        this.checkOverride(type, method);
      }

      if (decl.kind === 'classDecl' || decl.kind === 'structDecl') {
        for (const property of decl.properties) {
          this.checkVariableRules(property, false);
        }
      }
    }

    for (const decl of declarations) {
      if (decl.kind === 'varDecl') {
        this.checkVariableRules(decl, true);
      }
    }
  }

  private ancestorsOf(type: TypeDefinition): TypeDefinition[] {
    const ancestors: TypeDefinition[] = [];
    const pending = type.supertypes();
    while (pending.length > 0) {
      const current = pending.shift();
      if (!current || ancestors.includes(current)) continue;
      ancestors.push(current);
      pending.push(...current.supertypes());
    }
    return ancestors;
  }

  // An abstract method counts as implemented when any type in the hierarchy provides a body
  private checkConformance(decl: TypeDeclaration, type: TypeDefinition): void {
    const hierarchy = [type, ...this.ancestorsOf(type)];
    const hasImplementation = (name: string): boolean =>
      hierarchy.some(candidate => candidate.methods.get(name)?.signature?.hasBody === true);

    for (const ancestor of hierarchy.slice(1)) {
      const missing = [...ancestor.methods.values()]
        .filter(method => method.signature?.hasBody === false && !hasImplementation(method.name))
        .map(method => method.name);

      if (missing.length > 0) {
        this.report(new SymbolError(
          { code: 'interfaceConformance', typeName: type.name, requiredBy: ancestor.name, missing },
          decl.location
        ));
      }
    }
  }

  private checkOverride(type: TypeDefinition, method: FunctionDeclaration): void {
    const inherited = type.supertypes()
      .map(supertype => supertype.findMethod(method.name))
      .find(candidate => candidate !== undefined);

    if (inherited?.modifiers.includes('final')) {
      this.report(new SymbolError(
        { code: 'invalidOverride', typeName: type.name, method: method.name, problem: 'finalMethod' },
        method.location
      ));
    } else if (!inherited && method.modifiers.includes('override')) {
      this.report(new SymbolError(
        { code: 'invalidOverride', typeName: type.name, method: method.name, problem: 'noSuperMethod' },
        method.location
      ));
    }
  }

  // Properties may be initialized by an initializer, so only non-member constants need a value here
  private checkVariableRules(decl: VarDeclaration, requireConstantValue: boolean): void {
    if (!decl.typeAnnotation && !decl.initializer) {
      this.report(invalidOperation(`Variable '${decl.name}' needs a type annotation or an initializer`, decl.location));
    } else if (decl.isConstant && requireConstantValue && !decl.initializer) {
      this.report(invalidOperation(`Constant '${decl.name}' must be initialized`, decl.location));
    }
  }

  // Pass 5

  private resolveBodies(declarations: Declaration[]): void {
    for (const { decl, type, scope } of this.types) {
      this.symbolTable.within(scope, () => {
        if (decl.kind === 'enumDecl') {
          for (const enumCase of decl.cases) {
            if (enumCase.rawValue) this.resolveExpression(enumCase.rawValue);
          }
        } else if (decl.kind !== 'interfaceDecl') {
          for (const property of decl.properties) {
            if (property.initializer) this.resolveExpression(property.initializer);
          }
        }
        for (const method of decl.methods) {
          this.resolveFunctionBody(method, type);
        }
      });
    }

    for (const decl of declarations) {
      if (decl.kind === 'functionDecl') {
        this.resolveFunctionBody(decl, undefined);
      } else if (decl.kind === 'varDecl' && decl.initializer) {
        this.resolveExpression(decl.initializer);
      }
    }
  }

  private resolveFunctionBody(decl: FunctionDeclaration, owner: TypeDefinition | undefined): void {
    if (owner) this.owners.set(decl, owner);

    for (const parameter of decl.parameters) {
      if (parameter.defaultValue) this.resolveExpression(parameter.defaultValue);
    }

    const signature = this.signatureOf(decl);
    const scope = this.functionScopes.get(decl) ?? this.symbolTable.currentScope;
    this.symbolTable.within(scope, () => this.symbolTable.scoped(() => {
      decl.parameters.forEach((parameter, index) => {
        this.define(parameter, {
          name: parameter.name,
          kind: 'variable',
          type: signature?.parameters[index]?.type,
          declaredAt: parameter.location,
          modifiers: []
        });
      });
      if (decl.body) {
        for (const statement of decl.body.statements) {
          this.resolveStatement(statement, owner);
        }
      }
    }));
  }

  private resolveStatement(statement: Statement, owner: TypeDefinition | undefined): void {
    switch (statement.kind) {
      case 'varDecl':
        // The initializer is resolved before the name is in scope, so `var x = x;` sees an outer x
        if (statement.initializer) this.resolveExpression(statement.initializer);
        this.checkVariableRules(statement, true);
        this.declareVariable(statement);
        break;
      case 'functionDecl':
        this.declareFunction(statement);
        this.resolveFunctionBody(statement, owner);
        break;
      case 'expressionStmt':
        this.resolveExpression(statement.expression);
        break;
      case 'block':
        this.symbolTable.scoped(() => {
          for (const inner of statement.statements) {
            this.resolveStatement(inner, owner);
          }
        });
        break;
      case 'if':
        this.resolveExpression(statement.condition);
        this.resolveNested(statement.thenBranch, owner);
        if (statement.elseBranch) this.resolveNested(statement.elseBranch, owner);
        break;
      case 'while':
        this.resolveExpression(statement.condition);
        this.resolveNested(statement.body, owner);
        break;
      case 'for':
        this.symbolTable.scoped(() => {
          if (statement.initializer) this.resolveStatement(statement.initializer, owner);
          if (statement.condition) this.resolveExpression(statement.condition);
          if (statement.increment) this.resolveExpression(statement.increment);
          this.resolveNested(statement.body, owner);
        });
        break;
      case 'return':
        if (statement.value) this.resolveExpression(statement.value);
        break;
      case 'break':
      case 'continue':
        break;
    }
  }

  // A single statement used as a branch or loop body gets its own scope, like a block
  private resolveNested(statement: Statement, owner: TypeDefinition | undefined): void {
    this.symbolTable.scoped(() => this.resolveStatement(statement, owner));
  }

  private resolveName(node: ASTNode, name: string, location: SourceLocation): void {
    const symbol = this.symbolTable.resolve(name) ?? this.symbolTable.resolve(this.resolver.canonicalName(name));
    if (symbol) {
      this.bindings.set(node, symbol);
    } else {
      this.report(new SymbolError({ code: 'undefinedSymbol', name }, location));
    }
  }

  private resolveExpression(expression: Expression): void {
    switch (expression.kind) {
      case 'variable':
        this.resolveName(expression, expression.name, expression.location);
        break;
      case 'assign':
        this.resolveName(expression, expression.name, expression.location);
        this.resolveExpression(expression.value);
        break;
      case 'binary':
        this.resolveExpression(expression.left);
        this.resolveExpression(expression.right);
        break;
      case 'grouping':
        this.resolveExpression(expression.expression);
        break;
      case 'unary':
        this.resolveExpression(expression.operand);
        break;
      case 'call':
        this.resolveExpression(expression.callee);
        expression.arguments.forEach(argument => this.resolveExpression(argument));
        break;
      case 'get':
        this.resolveExpression(expression.object);
        break;
      case 'set':
        this.resolveExpression(expression.object);
        this.resolveExpression(expression.value);
        break;
      case 'arrayLiteral':
        expression.elements.forEach(element => this.resolveExpression(element));
        break;
      case 'index':
        this.resolveExpression(expression.object);
        this.resolveExpression(expression.index);
        break;
      case 'setIndex':
        this.resolveExpression(expression.object);
        this.resolveExpression(expression.index);
        this.resolveExpression(expression.value);
        break;
      case 'conditional':
        this.resolveExpression(expression.condition);
        this.resolveExpression(expression.thenBranch);
        this.resolveExpression(expression.elseBranch);
        break;
      case 'literal':
      case 'this':
      case 'super':
        // Members and receivers are checked by the type checker
        break;
    }
  }
}

/**
 * Analyzes a compilation unit and returns the declarations unchanged. Throws the first
 * error by source position; use SemanticAnalyzer directly to collect all of them.
 */
export function analyze(declarations: Declaration[]): Declaration[] {
  const analyzer = new SemanticAnalyzer();
  analyzer.analyze(declarations);
  const [first] = analyzer.errors;
  if (first) {
    throw first;
  }
  return declarations;
}
