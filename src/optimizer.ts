// AST-to-AST rewrites applied after type checking

import {
  BinaryExpression, BlockStatement, Declaration, Expression, FunctionDeclaration, LiteralExpression, LiteralValue,
  SourceLocation, Statement, UnaryExpression, VarDeclaration
} from './types';

export interface Optimizer {
  // Must not mutate its input, and optimizing the result again must change nothing
  optimize(declarations: Declaration[]): Declaration[];
}

// Integer literals fold as Int, so every folded result must fit 32 bits
const INT32_MIN = -(1n << 31n);
const INT32_MAX = (1n << 31n) - 1n;

function literal(value: LiteralValue, location: SourceLocation): LiteralExpression {
  return { kind: 'literal', value, location };
}

function isInt32(value: bigint): boolean {
  return value >= INT32_MIN && value <= INT32_MAX;
}

function numberOf(value: LiteralValue): number | undefined {
  if (value.kind === 'integer') return Number(value.value);
  return value.kind === 'float' ? value.value : undefined;
}

function booleanOf(expression: Expression): boolean | undefined {
  return expression.kind === 'literal' && expression.value.kind === 'boolean' ? expression.value.value : undefined;
}

function integerResult(value: bigint): LiteralValue | undefined {
  return isInt32(value) ? { kind: 'integer', value } : undefined;
}

function floatResult(value: number): LiteralValue | undefined {
  return Number.isFinite(value) ? { kind: 'float', value } : undefined;
}

function foldIntegers(operator: BinaryExpression['operator'], left: bigint, right: bigint): LiteralValue | undefined {
  const comparison = foldComparison(operator, compare(left, right));
  if (comparison) return comparison;
  if (!isInt32(left) || !isInt32(right)) return undefined;

  switch (operator) {
    case '+': return integerResult(left + right);
    case '-': return integerResult(left - right);
    case '*': return integerResult(left * right);
    // bigint division already truncates toward zero
    case '/': return right === 0n ? undefined : integerResult(left / right);
    case '%': return right === 0n ? undefined : integerResult(left % right);
    // Any exponent above 31 overflows unless the base is -1, 0 or 1
    case '**': return right < 0n || (right > 31n && left * left > 1n) ? undefined : integerResult(left ** right);
    case '&': return integerResult(left & right);
    case '|': return integerResult(left | right);
    case '^': return integerResult(left ^ right);
    // Shift counts outside 0..31 have no portable meaning
    case '<<': return right >= 0n && right < 32n ? integerResult(left << right) : undefined;
    case '>>': return right >= 0n && right < 32n ? integerResult(left >> right) : undefined;
    default: return undefined;
  }
}

function foldFloats(operator: BinaryExpression['operator'], left: number, right: number): LiteralValue | undefined {
  switch (operator) {
    case '+': return floatResult(left + right);
    case '-': return floatResult(left - right);
    case '*': return floatResult(left * right);
    case '/': return right === 0 ? undefined : floatResult(left / right);
    case '**': return floatResult(left ** right);
    default: return foldComparison(operator, compare(left, right));
  }
}

// `order` is negative, zero or positive as the left operand sorts before, equal to or after the right
function foldComparison(operator: BinaryExpression['operator'], order: number, ordered = true): LiteralValue | undefined {
  switch (operator) {
    case '==': return { kind: 'boolean', value: order === 0 };
    case '!=': return { kind: 'boolean', value: order !== 0 };
    case '<': return ordered ? { kind: 'boolean', value: order < 0 } : undefined;
    case '<=': return ordered ? { kind: 'boolean', value: order <= 0 } : undefined;
    case '>': return ordered ? { kind: 'boolean', value: order > 0 } : undefined;
    case '>=': return ordered ? { kind: 'boolean', value: order >= 0 } : undefined;
    default: return undefined;
  }
}

function compare<T extends bigint | number | string>(left: T, right: T): number {
  return left === right ? 0 : left < right ? -1 : 1;
}

function foldLiterals(operator: BinaryExpression['operator'], left: LiteralValue, right: LiteralValue): LiteralValue | undefined {
  if (left.kind === 'integer' && right.kind === 'integer') {
    return foldIntegers(operator, left.value, right.value);
  }

  const leftNumber = numberOf(left);
  const rightNumber = numberOf(right);
  if (leftNumber !== undefined && rightNumber !== undefined) {
    return foldFloats(operator, leftNumber, rightNumber);
  }

  if (left.kind === 'string' && right.kind === 'string') {
    return operator === '+' ? { kind: 'string', value: left.value + right.value } : foldComparison(operator, compare(left.value, right.value));
  }
  if (left.kind === 'character' && right.kind === 'character') {
    return foldComparison(operator, compare(left.value, right.value));
  }
  if (left.kind === 'boolean' && right.kind === 'boolean') {
    return foldComparison(operator, left.value === right.value ? 0 : 1, false);
  }
  return undefined;
}

/**
 * Folds operations on literals, removes parentheses around literals, and prunes branches and
 * loops whose condition is a boolean literal. Operations that would overflow, divide by zero
 * or lose their meaning at run time are left as written.
 */
export class ConstantFolder implements Optimizer {
  optimize(declarations: Declaration[]): Declaration[] {
    return declarations.map(decl => this.declaration(decl));
  }

  private declaration(decl: Declaration): Declaration {
    switch (decl.kind) {
      case 'varDecl':
        return this.variable(decl);
      case 'functionDecl':
        return this.function(decl);
      case 'classDecl':
      case 'structDecl':
        return {
          ...decl,
          properties: decl.properties.map(property => this.variable(property)),
          methods: decl.methods.map(method => this.function(method))
        };
      case 'enumDecl':
        return {
          ...decl,
          cases: decl.cases.map(enumCase => enumCase.rawValue ? { ...enumCase, rawValue: this.expression(enumCase.rawValue) } : enumCase),
          methods: decl.methods.map(method => this.function(method))
        };
      case 'interfaceDecl':
        return { ...decl, methods: decl.methods.map(method => this.function(method)) };
    }
  }

  private variable(decl: VarDeclaration): VarDeclaration {
    return decl.initializer ? { ...decl, initializer: this.expression(decl.initializer) } : decl;
  }

  private function(decl: FunctionDeclaration): FunctionDeclaration {
    return {
      ...decl,
      parameters: decl.parameters.map(parameter =>
        parameter.defaultValue ? { ...parameter, defaultValue: this.expression(parameter.defaultValue) } : parameter),
      body: decl.body ? this.block(decl.body) : undefined
    };
  }

  private block(block: BlockStatement): BlockStatement {
    return { ...block, statements: this.statements(block.statements) };
  }

  private statements(statements: Statement[]): Statement[] {
    return statements.flatMap(statement => {
      const optimized = this.statement(statement);
      return optimized ? [optimized] : [];
    });
  }

  // Where a statement is required but was pruned, an empty block takes its place
  private required(statement: Statement): Statement {
    return this.statement(statement) ?? { kind: 'block', statements: [], location: statement.location };
  }

  // A declaration lifted out of a pruned branch keeps its own scope
  private scopedBranch(statement: Statement): Statement {
    if (statement.kind === 'varDecl' || statement.kind === 'functionDecl') {
      return { kind: 'block', statements: [statement], location: statement.location };
    }
    return statement;
  }

  private statement(statement: Statement): Statement | undefined {
    switch (statement.kind) {
      case 'varDecl':
        return this.variable(statement);
      case 'functionDecl':
        return this.function(statement);
      case 'expressionStmt':
        return { ...statement, expression: this.expression(statement.expression) };
      case 'block':
        return this.block(statement);
      case 'if': {
        const condition = this.expression(statement.condition);
        const constant = booleanOf(condition);
        if (constant === true) {
          return this.scopedBranch(this.required(statement.thenBranch));
        }
        if (constant === false) {
          return statement.elseBranch ? this.scopedBranch(this.required(statement.elseBranch)) : undefined;
        }
        return {
          ...statement,
          condition,
          thenBranch: this.required(statement.thenBranch),
          elseBranch: statement.elseBranch ? this.required(statement.elseBranch) : undefined
        };
      }
      case 'while': {
        const condition = this.expression(statement.condition);
        if (booleanOf(condition) === false) return undefined;
        return { ...statement, condition, body: this.required(statement.body) };
      }
      case 'for': {
        const initializer = statement.initializer ? this.statement(statement.initializer) : undefined;
        return {
          ...statement,
          initializer: initializer?.kind === 'varDecl' || initializer?.kind === 'expressionStmt' ? initializer : undefined,
          condition: statement.condition ? this.expression(statement.condition) : undefined,
          increment: statement.increment ? this.expression(statement.increment) : undefined,
          body: this.required(statement.body)
        };
      }
      case 'return':
        return statement.value ? { ...statement, value: this.expression(statement.value) } : statement;
      case 'break':
      case 'continue':
        return statement;
    }
  }

  private expression(expression: Expression): Expression {
    switch (expression.kind) {
      case 'literal':
      case 'variable':
      case 'this':
      case 'super':
        return expression;
      case 'grouping': {
        const inner = this.expression(expression.expression);
        return inner.kind === 'literal' ? literal(inner.value, expression.location) : { ...expression, expression: inner };
      }
      case 'binary':
        return this.binary(expression);
      case 'unary':
        return this.unary(expression);
      case 'assign':
        return { ...expression, value: this.expression(expression.value) };
      case 'call':
        return { ...expression, callee: this.expression(expression.callee), arguments: expression.arguments.map(argument => this.expression(argument)) };
      case 'get':
        return { ...expression, object: this.expression(expression.object) };
      case 'set':
        return { ...expression, object: this.expression(expression.object), value: this.expression(expression.value) };
      case 'arrayLiteral':
        return { ...expression, elements: expression.elements.map(element => this.expression(element)) };
      case 'index':
        return { ...expression, object: this.expression(expression.object), index: this.expression(expression.index) };
      case 'setIndex':
        return {
          ...expression,
          object: this.expression(expression.object),
          index: this.expression(expression.index),
          value: this.expression(expression.value)
        };
      case 'conditional': {
        const condition = this.expression(expression.condition);
        const constant = booleanOf(condition);
        if (constant !== undefined) {
          return this.expression(constant ? expression.thenBranch : expression.elseBranch);
        }
        return {
          ...expression,
          condition,
          thenBranch: this.expression(expression.thenBranch),
          elseBranch: this.expression(expression.elseBranch)
        };
      }
    }
  }

  private binary(expression: BinaryExpression): Expression {
    const left = this.expression(expression.left);
    const right = this.expression(expression.right);
    const folded: BinaryExpression = { ...expression, left, right };

    // Logical operators short-circuit, so a constant left side decides alone
    const leftConstant = booleanOf(left);
    if (expression.operator === '&&' && leftConstant !== undefined) {
      return leftConstant ? right : literal({ kind: 'boolean', value: false }, expression.location);
    }
    if (expression.operator === '||' && leftConstant !== undefined) {
      return leftConstant ? literal({ kind: 'boolean', value: true }, expression.location) : right;
    }

    if (left.kind !== 'literal') return folded;

    if (expression.operator === '??') {
      return left.value.kind === 'null' ? right : left;
    }
    if (right.kind !== 'literal') return folded;

    const value = foldLiterals(expression.operator, left.value, right.value);
    return value ? literal(value, expression.location) : folded;
  }

  private unary(expression: UnaryExpression): Expression {
    const operand = this.expression(expression.operand);
    const folded: UnaryExpression = { ...expression, operand };
    if (operand.kind !== 'literal') return folded;

    const { value } = operand;
    switch (expression.operator) {
      case '-':
        if (value.kind === 'integer') {
          const negated = integerResult(-value.value);
          return negated ? literal(negated, expression.location) : folded;
        }
        if (value.kind === 'float') return literal({ kind: 'float', value: -value.value }, expression.location);
        return folded;
      case '+':
        return value.kind === 'integer' || value.kind === 'float' ? literal(value, expression.location) : folded;
      case '!':
        return value.kind === 'boolean' ? literal({ kind: 'boolean', value: !value.value }, expression.location) : folded;
      case '~':
        return value.kind === 'integer' && isInt32(value.value) ? literal({ kind: 'integer', value: ~value.value }, expression.location) : folded;
    }
  }
}

export function optimize(declarations: Declaration[]): Declaration[] {
  return new ConstantFolder().optimize(declarations);
}
