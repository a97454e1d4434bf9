// Indented tree rendering of the AST, one node per line

import {
  CompoundOperator, Declaration, Expression, FunctionDeclaration, LiteralValue, Modifier, Parameter, Statement, TypeNode, TypeReference,
  VarDeclaration
} from './types';

export function typeNodeToString(type: TypeNode): string {
  switch (type.kind) {
    case 'namedType':
      return type.name;
    case 'arrayType':
      return `${typeNodeToString(type.elementType)}[]`;
    case 'genericType':
      return `${type.name}<${type.typeArguments.map(typeNodeToString).join(', ')}>`;
  }
}

export function literalToString(value: LiteralValue): string {
  switch (value.kind) {
    case 'integer':
      return String(value.value);
    case 'float':
      return Number.isInteger(value.value) ? value.value.toFixed(1) : String(value.value);
    case 'string':
      return JSON.stringify(value.value);
    case 'character':
      return `'${value.value}'`;
    case 'boolean':
      return String(value.value);
    case 'null':
      return 'null';
    case 'none':
      return '';
  }
}

function compoundSuffix(operator: CompoundOperator | undefined): string {
  return operator ? ` ${operator}=` : '';
}

function withModifiers(modifiers: Modifier[], text: string): string {
  return modifiers.length > 0 ? `${modifiers.join(' ')} ${text}` : text;
}

function referenceList(references: TypeReference[]): string {
  return references.map(reference => reference.name).join(', ');
}

function typeParameterList(names: string[]): string {
  return names.length > 0 ? `<${names.join(', ')}>` : '';
}

class AstPrinter {
  private readonly lines: string[] = [];
  private indentLevel = 0;

  constructor(private readonly indentSize: number) {}

  getResult(): string {
    return this.lines.join('\n');
  }

  private line(text: string): void {
    this.lines.push(' '.repeat(this.indentLevel * this.indentSize) + text);
  }

  private indented(body: () => void): void {
    this.indentLevel++;
    try {
      body();
    } finally {
      this.indentLevel--;
    }
  }

  // A header line followed by indented children
  private node(text: string, children: () => void = () => undefined): void {
    this.line(text);
    this.indented(children);
  }

  declaration(decl: Declaration): void {
    switch (decl.kind) {
      case 'varDecl':
        this.variable(decl);
        break;
      case 'functionDecl':
        this.function(decl);
        break;
      case 'classDecl': {
        let header = `Class ${decl.name}${typeParameterList(decl.typeParameters)}`;
        if (decl.superclass) header += ` extends ${decl.superclass.name}`;
        if (decl.interfaces.length > 0) header += ` implements ${referenceList(decl.interfaces)}`;
        if (decl.permits.length > 0) header += ` permits ${referenceList(decl.permits)}`;
        this.node(withModifiers(decl.modifiers, header), () => {
          decl.properties.forEach(property => this.variable(property));
          decl.methods.forEach(method => this.function(method));
        });
        break;
      }
      case 'structDecl': {
        let header = `Struct ${decl.name}${typeParameterList(decl.typeParameters)}`;
        if (decl.interfaces.length > 0) header += ` implements ${referenceList(decl.interfaces)}`;
        this.node(withModifiers(decl.modifiers, header), () => {
          decl.properties.forEach(property => this.variable(property));
          decl.methods.forEach(method => this.function(method));
        });
        break;
      }
      case 'enumDecl':
        this.node(withModifiers(decl.modifiers, `Enum ${decl.name}`), () => {
          for (const enumCase of decl.cases) {
            const rawValue = enumCase.rawValue;
            this.node(`Case ${enumCase.name}`, () => {
              if (rawValue) this.expression(rawValue);
            });
          }
          decl.methods.forEach(method => this.function(method));
        });
        break;
      case 'interfaceDecl': {
        let header = `Interface ${decl.name}${typeParameterList(decl.typeParameters)}`;
        if (decl.parents.length > 0) header += ` extends ${referenceList(decl.parents)}`;
        this.node(withModifiers(decl.modifiers, header), () => {
          decl.methods.forEach(method => this.function(method));
        });
        break;
      }
    }
  }

  private variable(decl: VarDeclaration): void {
    const annotation = decl.typeAnnotation ? `: ${typeNodeToString(decl.typeAnnotation)}` : '';
    const initializer = decl.initializer;
    this.node(withModifiers(decl.modifiers, `${decl.isConstant ? 'Const' : 'Var'} ${decl.name}${annotation}`), () => {
      if (initializer) this.expression(initializer);
    });
  }

  private parameter(parameter: Parameter): string {
    return `${parameter.name}: ${typeNodeToString(parameter.type)}${parameter.defaultValue ? ' = ...' : ''}`;
  }

  private function(decl: FunctionDeclaration): void {
    const returns = decl.returnType ? ` -> ${typeNodeToString(decl.returnType)}` : '';
    const header = `Function ${decl.name}${typeParameterList(decl.typeParameters)}(${decl.parameters.map(p => this.parameter(p)).join(', ')})${returns}`;
    const body = decl.body;

    this.node(withModifiers(decl.modifiers, header), () => {
      for (const parameter of decl.parameters) {
        const defaultValue = parameter.defaultValue;
        if (defaultValue) this.node(`Default ${parameter.name}`, () => this.expression(defaultValue));
      }
      if (body) this.statement(body);
    });
  }

  private statement(statement: Statement): void {
    switch (statement.kind) {
      case 'varDecl':
        this.variable(statement);
        break;
      case 'functionDecl':
        this.function(statement);
        break;
      case 'expressionStmt':
        this.node('ExpressionStmt', () => this.expression(statement.expression));
        break;
      case 'block':
        this.node('Block', () => statement.statements.forEach(inner => this.statement(inner)));
        break;
      case 'if': {
        const elseBranch = statement.elseBranch;
        this.node('If', () => {
          this.expression(statement.condition);
          this.statement(statement.thenBranch);
          if (elseBranch) this.node('Else', () => this.statement(elseBranch));
        });
        break;
      }
      case 'while':
        this.node('While', () => {
          this.expression(statement.condition);
          this.statement(statement.body);
        });
        break;
      case 'for': {
        const { initializer, condition, increment } = statement;
        this.node('For', () => {
          if (initializer) this.node('Init', () => this.statement(initializer));
          if (condition) this.node('Condition', () => this.expression(condition));
          if (increment) this.node('Increment', () => this.expression(increment));
          this.statement(statement.body);
        });
        break;
      }
      case 'return': {
        const value = statement.value;
        this.node('Return', () => {
          if (value) this.expression(value);
        });
        break;
      }
      case 'break':
        this.line('Break');
        break;
      case 'continue':
        this.line('Continue');
        break;
    }
  }

  private expression(expression: Expression): void {
    switch (expression.kind) {
      case 'literal':
        this.line(`Literal ${literalToString(expression.value)}`);
        break;
      case 'variable':
        this.line(`Variable ${expression.name}`);
        break;
      case 'this':
        this.line('This');
        break;
      case 'super':
        this.line(`Super ${expression.member}`);
        break;
      case 'grouping':
        this.node('Grouping', () => this.expression(expression.expression));
        break;
      case 'binary':
        this.node(`Binary ${expression.operator}`, () => {
          this.expression(expression.left);
          this.expression(expression.right);
        });
        break;
      case 'unary':
        this.node(`Unary ${expression.operator}`, () => this.expression(expression.operand));
        break;
      case 'assign':
        this.node(`Assign ${expression.name}`, () => this.expression(expression.value));
        break;
      case 'call':
        this.node('Call', () => {
          this.expression(expression.callee);
          expression.arguments.forEach(argument => this.expression(argument));
        });
        break;
      case 'get':
        this.node(`Get ${expression.name}`, () => this.expression(expression.object));
        break;
      case 'set':
        this.node(`Set ${expression.name}${compoundSuffix(expression.operator)}`, () => {
          this.expression(expression.object);
          this.expression(expression.value);
        });
        break;
      case 'arrayLiteral':
        this.node('ArrayLiteral', () => expression.elements.forEach(element => this.expression(element)));
        break;
      case 'index':
        this.node('Index', () => {
          this.expression(expression.object);
          this.expression(expression.index);
        });
        break;
      case 'setIndex':
        this.node(`SetIndex${compoundSuffix(expression.operator)}`, () => {
          this.expression(expression.object);
          this.expression(expression.index);
          this.expression(expression.value);
        });
        break;
      case 'conditional':
        this.node('Conditional', () => {
          this.expression(expression.condition);
          this.expression(expression.thenBranch);
          this.expression(expression.elseBranch);
        });
        break;
    }
  }
}

export function printAst(declarations: Declaration[], indentSize = 2): string {
  const printer = new AstPrinter(indentSize);
  declarations.forEach(decl => printer.declaration(decl));
  return printer.getResult();
}
