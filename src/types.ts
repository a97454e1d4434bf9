// AST and core type definitions for the Ember front end

export interface Position {
  line: number;
  column: number;
}

export interface SourceLocation {
  start: Position;
  end: Position;
  filename?: string;
}

// Literal payloads carried by tokens and literal expressions
export type LiteralValue =
  | { kind: 'integer'; value: bigint }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'character'; value: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null' }
  | { kind: 'none' };

export interface ASTNode {
  kind: string;
  location: SourceLocation;
}

export type Modifier =
  | 'public' | 'private' | 'protected' | 'internal' | 'fileprivate'
  | 'static' | 'final' | 'abstract' | 'sealed' | 'override' | 'async';

// Type annotations
export interface NamedTypeNode extends ASTNode {
  kind: 'namedType';
  name: string;
}

export interface ArrayTypeNode extends ASTNode {
  kind: 'arrayType';
  elementType: TypeNode;
}

export interface GenericTypeNode extends ASTNode {
  kind: 'genericType';
  name: string;
  typeArguments: TypeNode[];
}

export type TypeNode = NamedTypeNode | ArrayTypeNode | GenericTypeNode;

// A type named in an inheritance clause, resolved during semantic analysis
export interface TypeReference {
  name: string;
  location: SourceLocation;
}

// Declarations
export interface VarDeclaration extends ASTNode {
  kind: 'varDecl';
  name: string;
  isConstant: boolean;
  typeAnnotation?: TypeNode;
  initializer?: Expression;
  modifiers: Modifier[];
}

export interface Parameter extends ASTNode {
  kind: 'parameter';
  name: string;
  type: TypeNode;
  defaultValue?: Expression;
}

export interface FunctionDeclaration extends ASTNode {
  kind: 'functionDecl';
  name: string;
  typeParameters: string[];
  parameters: Parameter[];
  returnType?: TypeNode;
  // Absent for interface and abstract method signatures
  body?: BlockStatement;
  modifiers: Modifier[];
}

export interface ClassDeclaration extends ASTNode {
  kind: 'classDecl';
  name: string;
  typeParameters: string[];
  superclass?: TypeReference;
  interfaces: TypeReference[];
  properties: VarDeclaration[];
  methods: FunctionDeclaration[];
  modifiers: Modifier[];
  permits: TypeReference[];
}

export interface StructDeclaration extends ASTNode {
  kind: 'structDecl';
  name: string;
  typeParameters: string[];
  interfaces: TypeReference[];
  properties: VarDeclaration[];
  methods: FunctionDeclaration[];
  modifiers: Modifier[];
}

export interface EnumCase extends ASTNode {
  kind: 'enumCase';
  name: string;
  rawValue?: Expression;
}

export interface EnumDeclaration extends ASTNode {
  kind: 'enumDecl';
  name: string;
  cases: EnumCase[];
  methods: FunctionDeclaration[];
  modifiers: Modifier[];
}

export interface InterfaceDeclaration extends ASTNode {
  kind: 'interfaceDecl';
  name: string;
  typeParameters: string[];
  parents: TypeReference[];
  methods: FunctionDeclaration[];
  modifiers: Modifier[];
}

export type TypeDeclaration = ClassDeclaration | StructDeclaration | EnumDeclaration | InterfaceDeclaration;

export type Declaration = VarDeclaration | FunctionDeclaration | TypeDeclaration;

// Statements
export interface ExpressionStatement extends ASTNode {
  kind: 'expressionStmt';
  expression: Expression;
}

export interface BlockStatement extends ASTNode {
  kind: 'block';
  statements: Statement[];
}

export interface IfStatement extends ASTNode {
  kind: 'if';
  condition: Expression;
  thenBranch: Statement;
  elseBranch?: Statement;
}

export interface WhileStatement extends ASTNode {
  kind: 'while';
  condition: Expression;
  body: Statement;
}

export interface ForStatement extends ASTNode {
  kind: 'for';
  initializer?: VarDeclaration | ExpressionStatement;
  condition?: Expression;
  increment?: Expression;
  body: Statement;
}

export interface ReturnStatement extends ASTNode {
  kind: 'return';
  value?: Expression;
}

export interface BreakStatement extends ASTNode {
  kind: 'break';
}

export interface ContinueStatement extends ASTNode {
  kind: 'continue';
}

export type Statement =
  | VarDeclaration
  | FunctionDeclaration
  | ExpressionStatement
  | BlockStatement
  | IfStatement
  | WhileStatement
  | ForStatement
  | ReturnStatement
  | BreakStatement
  | ContinueStatement;

// Expressions
export type BinaryOperator =
  | '+' | '-' | '*' | '/' | '%' | '**'
  | '==' | '!=' | '<' | '<=' | '>' | '>='
  | '&&' | '||' | '??'
  | '&' | '|' | '^' | '<<' | '>>';

// Operators with an assigning form such as `+=`
export type CompoundOperator = '+' | '-' | '*' | '/' | '%';

export type UnaryOperator = '-' | '+' | '!' | '~';

export interface BinaryExpression extends ASTNode {
  kind: 'binary';
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

export interface GroupingExpression extends ASTNode {
  kind: 'grouping';
  expression: Expression;
}

export interface LiteralExpression extends ASTNode {
  kind: 'literal';
  value: LiteralValue;
}

export interface UnaryExpression extends ASTNode {
  kind: 'unary';
  operator: UnaryOperator;
  operand: Expression;
}

export interface VariableExpression extends ASTNode {
  kind: 'variable';
  name: string;
}

export interface AssignExpression extends ASTNode {
  kind: 'assign';
  name: string;
  value: Expression;
}

export interface CallExpression extends ASTNode {
  kind: 'call';
  callee: Expression;
  arguments: Expression[];
}

export interface GetExpression extends ASTNode {
  kind: 'get';
  object: Expression;
  name: string;
}

export interface SetExpression extends ASTNode {
  kind: 'set';
  object: Expression;
  name: string;
  // Set for compound assignment; the object is evaluated once
  operator?: CompoundOperator;
  value: Expression;
}

export interface ThisExpression extends ASTNode {
  kind: 'this';
}

export interface SuperExpression extends ASTNode {
  kind: 'super';
  member: string;
}

export interface ArrayLiteralExpression extends ASTNode {
  kind: 'arrayLiteral';
  elements: Expression[];
}

export interface IndexExpression extends ASTNode {
  kind: 'index';
  object: Expression;
  index: Expression;
}

export interface SetIndexExpression extends ASTNode {
  kind: 'setIndex';
  object: Expression;
  index: Expression;
  operator?: CompoundOperator;
  value: Expression;
}

export interface ConditionalExpression extends ASTNode {
  kind: 'conditional';
  condition: Expression;
  thenBranch: Expression;
  elseBranch: Expression;
}

export type Expression =
  | BinaryExpression
  | GroupingExpression
  | LiteralExpression
  | UnaryExpression
  | VariableExpression
  | AssignExpression
  | CallExpression
  | GetExpression
  | SetExpression
  | ThisExpression
  | SuperExpression
  | ArrayLiteralExpression
  | IndexExpression
  | SetIndexExpression
  | ConditionalExpression;

export function isTypeDeclaration(decl: Declaration): decl is TypeDeclaration {
  return decl.kind === 'classDecl' || decl.kind === 'structDecl'
    || decl.kind === 'enumDecl' || decl.kind === 'interfaceDecl';
}

export type LexerErrorCode =
  | 'invalidCharacter'
  | 'unterminatedString'
  | 'unterminatedChar'
  | 'invalidEscapeSequence'
  | 'unterminatedBlockComment'
  | 'invalidNumber'
  | 'invalidCharLiteral';

export class LexerError extends Error {
  constructor(
    public code: LexerErrorCode,
    message: string,
    public location: SourceLocation
  ) {
    super(message);
    this.name = 'LexerError';
  }
}

export type ParseErrorCode =
  | 'unexpectedToken'
  | 'expectedToken'
  | 'invalidAssignmentTarget'
  | 'tooManyArguments'
  | 'nestingTooDeep';

export class ParseError extends Error {
  constructor(
    message: string,
    public location: SourceLocation,
    public code: ParseErrorCode = 'expectedToken'
  ) {
    super(message);
    this.name = 'ParseError';
  }
}
