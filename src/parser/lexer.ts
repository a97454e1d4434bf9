// Lexer for the Ember language

import { LexerError, LexerErrorCode, LiteralValue, Position, SourceLocation } from '../types';
import keywordList from './keywords.json';

export enum TokenType {
  // Literals
  INTEGER = 'INTEGER',
  FLOAT = 'FLOAT',
  STRING = 'STRING',
  CHAR = 'CHAR',

  // Identifiers and keywords
  IDENTIFIER = 'IDENTIFIER',

  // Keywords
  CLASS = 'class',
  STRUCT = 'struct',
  ENUM = 'enum',
  INTERFACE = 'interface',
  VAR = 'var',
  CONST = 'const',
  FUNC = 'func',
  INIT = 'init',
  EXTENSION = 'extension',
  TYPEALIAS = 'typealias',
  PROTOCOL = 'protocol',
  IF = 'if',
  ELSE = 'else',
  SWITCH = 'switch',
  CASE = 'case',
  DEFAULT = 'default',
  FOR = 'for',
  IN = 'in',
  WHILE = 'while',
  DO = 'do',
  BREAK = 'break',
  CONTINUE = 'continue',
  RETURN = 'return',
  THROW = 'throw',
  THROWS = 'throws',
  RETHROWS = 'rethrows',
  TRY = 'try',
  CATCH = 'catch',
  FINALLY = 'finally',
  TRUE = 'true',
  FALSE = 'false',
  NULL = 'null',
  PUBLIC = 'public',
  PRIVATE = 'private',
  PROTECTED = 'protected',
  INTERNAL = 'internal',
  FILEPRIVATE = 'fileprivate',
  STATIC = 'static',
  FINAL = 'final',
  ABSTRACT = 'abstract',
  SEALED = 'sealed',
  OVERRIDE = 'override',
  LAZY = 'lazy',
  ASYNC = 'async',
  AWAIT = 'await',
  GET = 'get',
  SET = 'set',
  WILL_SET = 'willSet',
  DID_SET = 'didSet',
  IS = 'is',
  AS = 'as',
  EXTENDS = 'extends',
  IMPLEMENTS = 'implements',
  SUPER = 'super',
  THIS = 'this',
  IMPORT = 'import',
  PACKAGE = 'package',
  MODULE = 'module',
  YIELD = 'yield',
  DEFER = 'defer',

  // Operators
  PLUS = '+',
  MINUS = '-',
  MULTIPLY = '*',
  DIVIDE = '/',
  MODULO = '%',
  POWER = '**',
  ASSIGN = '=',
  PLUS_ASSIGN = '+=',
  MINUS_ASSIGN = '-=',
  MULTIPLY_ASSIGN = '*=',
  DIVIDE_ASSIGN = '/=',
  MODULO_ASSIGN = '%=',

  // Comparison
  EQUAL = '==',
  NOT_EQUAL = '!=',
  LESS_THAN = '<',
  LESS_EQUAL = '<=',
  GREATER_THAN = '>',
  GREATER_EQUAL = '>=',

  // Logical
  AND = '&&',
  OR = '||',
  NOT = '!',
  NULL_COALESCE = '??',

  // Bitwise
  BITWISE_AND = '&',
  BITWISE_OR = '|',
  BITWISE_XOR = '^',
  BITWISE_NOT = '~',
  LEFT_SHIFT = '<<',
  RIGHT_SHIFT = '>>',

  // Punctuation
  SEMICOLON = ';',
  COMMA = ',',
  DOT = '.',
  COLON = ':',
  QUESTION = '?',
  ARROW = '->',
  FAT_ARROW = '=>',
  RANGE = '..',
  ELLIPSIS = '...',

  // Brackets
  LEFT_PAREN = '(',
  RIGHT_PAREN = ')',
  LEFT_BRACE = '{',
  RIGHT_BRACE = '}',
  LEFT_BRACKET = '[',
  RIGHT_BRACKET = ']',

  // Special
  EOF = 'EOF'
}

export interface Token {
  type: TokenType;
  lexeme: string;
  literal: LiteralValue;
  location: SourceLocation;
}

const TOKEN_TYPES: ReadonlySet<string> = new Set(Object.values(TokenType));

function isTokenType(value: string): value is TokenType {
  return TOKEN_TYPES.has(value);
}

// Use a Map for keywords to avoid prototype collisions (e.g. toString)
const KEYWORDS: Map<string, TokenType> = new Map();
for (const word of keywordList) {
  if (!isTokenType(word)) {
    throw new Error(`Keyword '${word}' has no token type`);
  }
  KEYWORDS.set(word, word);
}

const THREE_CHAR_OPERATORS: Map<string, TokenType> = new Map([
  ['...', TokenType.ELLIPSIS]
]);

const TWO_CHAR_OPERATORS: Map<string, TokenType> = new Map([
  ['==', TokenType.EQUAL],
  ['!=', TokenType.NOT_EQUAL],
  ['<=', TokenType.LESS_EQUAL],
  ['>=', TokenType.GREATER_EQUAL],
  ['+=', TokenType.PLUS_ASSIGN],
  ['-=', TokenType.MINUS_ASSIGN],
  ['*=', TokenType.MULTIPLY_ASSIGN],
  ['/=', TokenType.DIVIDE_ASSIGN],
  ['%=', TokenType.MODULO_ASSIGN],
  ['&&', TokenType.AND],
  ['||', TokenType.OR],
  ['??', TokenType.NULL_COALESCE],
  ['**', TokenType.POWER],
  ['->', TokenType.ARROW],
  ['=>', TokenType.FAT_ARROW],
  ['<<', TokenType.LEFT_SHIFT],
  ['>>', TokenType.RIGHT_SHIFT],
  ['..', TokenType.RANGE]
]);

const SINGLE_CHAR_OPERATORS: Map<string, TokenType> = new Map([
  ['+', TokenType.PLUS],
  ['-', TokenType.MINUS],
  ['*', TokenType.MULTIPLY],
  ['/', TokenType.DIVIDE],
  ['%', TokenType.MODULO],
  ['=', TokenType.ASSIGN],
  ['<', TokenType.LESS_THAN],
  ['>', TokenType.GREATER_THAN],
  ['!', TokenType.NOT],
  ['&', TokenType.BITWISE_AND],
  ['|', TokenType.BITWISE_OR],
  ['^', TokenType.BITWISE_XOR],
  ['~', TokenType.BITWISE_NOT],
  [';', TokenType.SEMICOLON],
  [',', TokenType.COMMA],
  ['.', TokenType.DOT],
  [':', TokenType.COLON],
  ['?', TokenType.QUESTION],
  ['(', TokenType.LEFT_PAREN],
  [')', TokenType.RIGHT_PAREN],
  ['{', TokenType.LEFT_BRACE],
  ['}', TokenType.RIGHT_BRACE],
  ['[', TokenType.LEFT_BRACKET],
  [']', TokenType.RIGHT_BRACKET]
]);

const NO_LITERAL: LiteralValue = { kind: 'none' };

// Every literal must fit UInt64; negative literals are a unary minus applied to one
const MAX_INTEGER_LITERAL = (1n << 64n) - 1n;

const RADIX_PREFIXES: Map<string, { radix: number; digit: RegExp }> = new Map([
  ['x', { radix: 16, digit: /[0-9a-fA-F]/ }],
  ['b', { radix: 2, digit: /[01]/ }],
  ['o', { radix: 8, digit: /[0-7]/ }]
]);

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function isIdentifierStart(char: string): boolean {
  return /[A-Za-z_]/.test(char);
}

function isIdentifierPart(char: string): boolean {
  return /[A-Za-z0-9_]/.test(char);
}

export class Lexer {
  private input: string;
  private position: number = 0;
  private line: number = 1;
  private column: number = 1;
  private filename?: string;

  constructor(input: string, filename?: string) {
    this.input = input;
    this.filename = filename;
  }

  private current(): string {
    return this.input[this.position] || '';
  }

  private peek(offset: number = 1): string {
    return this.input[this.position + offset] || '';
  }

  private isAtEnd(): boolean {
    return this.position >= this.input.length;
  }

  private advance(): string {
    const char = this.current();
    this.position++;
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  private createPosition(): Position {
    return { line: this.line, column: this.column };
  }

  private createLocation(start: Position): SourceLocation {
    return {
      start,
      end: this.createPosition(),
      filename: this.filename
    };
  }

  private error(code: LexerErrorCode, message: string, start: Position): LexerError {
    return new LexerError(code, message, this.createLocation(start));
  }

  private makeToken(type: TokenType, start: Position, startOffset: number, literal: LiteralValue = NO_LITERAL): Token {
    return {
      type,
      lexeme: this.input.slice(startOffset, this.position),
      literal,
      location: this.createLocation(start)
    };
  }

  private skipLineComment(): void {
    while (this.current() !== '\n' && !this.isAtEnd()) {
      this.advance();
    }
  }

  // Block comments do not nest: the first */ closes the comment
  private skipBlockComment(start: Position): void {
    this.advance(); // /
    this.advance(); // *

    while (!(this.current() === '*' && this.peek() === '/')) {
      if (this.isAtEnd()) {
        throw this.error('unterminatedBlockComment', 'Unterminated block comment', start);
      }
      this.advance();
    }

    this.advance(); // *
    this.advance(); // /
  }

  // Reads one escape sequence starting at the backslash and returns the decoded text
  private readEscape(onEnd: () => LexerError): string {
    const start = this.createPosition();
    this.advance(); // backslash

    if (this.isAtEnd()) {
      throw onEnd();
    }

    const escaped = this.advance();
    switch (escaped) {
      case 'n': return '\n';
      case 't': return '\t';
      case 'r': return '\r';
      case '0': return '\0';
      case '\\': return '\\';
      case '"': return '"';
      case "'": return "'";
      case 'u': return this.readUnicodeEscape(start);
      default:
        throw this.error('invalidEscapeSequence', `Invalid escape sequence '\\${escaped}'`, start);
    }
  }

  private readUnicodeEscape(start: Position): string {
    if (this.current() !== '{') {
      throw this.error('invalidEscapeSequence', "Expected '{' in unicode escape", start);
    }
    this.advance();

    let digits = '';
    while (/[0-9a-fA-F]/.test(this.current()) && digits.length < 8) {
      digits += this.advance();
    }

    if (digits.length === 0 || this.current() !== '}') {
      throw this.error('invalidEscapeSequence', 'Malformed unicode escape', start);
    }
    this.advance();

    const codePoint = parseInt(digits, 16);
    if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
      throw this.error('invalidEscapeSequence', `Invalid unicode scalar value U+${digits.toUpperCase()}`, start);
    }
    return String.fromCodePoint(codePoint);
  }

  private readString(start: Position, startOffset: number): Token {
    const tripleQuoted = this.peek() === '"' && this.peek(2) === '"';
    const unterminated = (): LexerError => this.error('unterminatedString', 'Unterminated string', start);

    if (tripleQuoted) {
      this.advance();
      this.advance();
    }
    this.advance(); // Skip opening quote

    let value = '';
    for (;;) {
      if (this.isAtEnd()) {
        throw unterminated();
      }

      const char = this.current();
      if (char === '"') {
        if (!tripleQuoted) {
          this.advance();
          break;
        }
        if (this.peek() === '"' && this.peek(2) === '"') {
          this.advance();
          this.advance();
          this.advance();
          break;
        }
      }

      if (char === '\n' && !tripleQuoted) {
        throw unterminated();
      }

      if (char === '\\') {
        value += this.readEscape(unterminated);
      } else {
        value += this.advance();
      }
    }

    return this.makeToken(TokenType.STRING, start, startOffset, { kind: 'string', value });
  }

  private readChar(start: Position, startOffset: number): Token {
    const unterminated = (): LexerError => this.error('unterminatedChar', 'Unterminated character literal', start);
    this.advance(); // Skip opening quote

    if (this.isAtEnd() || this.current() === '\n') {
      throw unterminated();
    }
    if (this.current() === "'") {
      this.advance();
      throw this.error('invalidCharLiteral', 'Empty character literal', start);
    }

    let value: string;
    if (this.current() === '\\') {
      value = this.readEscape(unterminated);
    } else {
      const codePoint = this.input.codePointAt(this.position) ?? 0;
      value = String.fromCodePoint(codePoint);
      for (let i = 0; i < value.length; i++) {
        this.advance();
      }
    }

    if (this.isAtEnd() || this.current() === '\n') {
      throw unterminated();
    }
    if (this.current() !== "'") {
      throw this.error('invalidCharLiteral', 'Character literal must contain exactly one character', start);
    }
    this.advance(); // Skip closing quote

    return this.makeToken(TokenType.CHAR, start, startOffset, { kind: 'character', value });
  }

  private readDigits(digit: RegExp): string {
    let digits = '';
    while (digit.test(this.current()) || this.current() === '_') {
      const char = this.advance();
      if (char !== '_') {
        digits += char;
      }
    }
    return digits;
  }

  private readNumber(start: Position, startOffset: number): Token {
    const invalid = (message: string): LexerError => this.error('invalidNumber', message, start);
    const prefixKey = this.peek().toLowerCase();
    const prefix = RADIX_PREFIXES.get(prefixKey);

    if (this.current() === '0' && prefix) {
      this.advance(); // 0
      this.advance(); // x, b or o
      const digits = this.readDigits(prefix.digit);
      if (digits.length === 0 || isIdentifierPart(this.current())) {
        throw invalid(`Invalid base-${prefix.radix} literal`);
      }
      return this.integerToken(BigInt(`0${prefixKey}${digits}`), start, startOffset);
    }

    let text = this.readDigits(/[0-9]/);
    let isFloat = false;

    // A '.' only starts a fraction when a digit follows, so 1..5 stays a range
    if (this.current() === '.' && isDigit(this.peek())) {
      isFloat = true;
      text += this.advance();
      text += this.readDigits(/[0-9]/);
    }

    if (this.current() === 'e' || this.current() === 'E') {
      const signed = this.peek() === '+' || this.peek() === '-';
      if (!isDigit(this.peek(signed ? 2 : 1))) {
        throw invalid('Exponent requires digits');
      }
      isFloat = true;
      text += this.advance();
      if (signed) {
        text += this.advance();
      }
      text += this.readDigits(/[0-9]/);
    }

    if (isIdentifierPart(this.current())) {
      throw invalid(`Invalid character '${this.current()}' in number literal`);
    }

    if (isFloat) {
      return this.makeToken(TokenType.FLOAT, start, startOffset, { kind: 'float', value: Number(text) });
    }
    return this.integerToken(BigInt(text), start, startOffset);
  }

  private integerToken(value: bigint, start: Position, startOffset: number): Token {
    if (value > MAX_INTEGER_LITERAL) {
      throw this.error('invalidNumber', 'Integer literal is too large', start);
    }
    return this.makeToken(TokenType.INTEGER, start, startOffset, { kind: 'integer', value });
  }

  private readIdentifier(start: Position, startOffset: number): Token {
    while (isIdentifierPart(this.current())) {
      this.advance();
    }

    const text = this.input.slice(startOffset, this.position);
    const type = KEYWORDS.get(text) ?? TokenType.IDENTIFIER;

    switch (type) {
      case TokenType.TRUE:
        return this.makeToken(type, start, startOffset, { kind: 'boolean', value: true });
      case TokenType.FALSE:
        return this.makeToken(type, start, startOffset, { kind: 'boolean', value: false });
      case TokenType.NULL:
        return this.makeToken(type, start, startOffset, { kind: 'null' });
      default:
        return this.makeToken(type, start, startOffset);
    }
  }

  // Longest match first: '...' before '..' before '.'
  private readOperator(): TokenType | undefined {
    const three = this.input.slice(this.position, this.position + 3);
    const threeType = THREE_CHAR_OPERATORS.get(three);
    if (threeType) {
      this.advance();
      this.advance();
      this.advance();
      return threeType;
    }

    const twoType = TWO_CHAR_OPERATORS.get(this.current() + this.peek());
    if (twoType) {
      this.advance();
      this.advance();
      return twoType;
    }

    const singleType = SINGLE_CHAR_OPERATORS.get(this.current());
    if (singleType) {
      this.advance();
      return singleType;
    }

    return undefined;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];

    while (!this.isAtEnd()) {
      const start = this.createPosition();
      const startOffset = this.position;
      const char = this.current();

      if (/\s/.test(char)) {
        this.advance();
        continue;
      }

      // Comments
      if (char === '/' && this.peek() === '/') {
        this.skipLineComment();
        continue;
      }
      if (char === '/' && this.peek() === '*') {
        this.skipBlockComment(start);
        continue;
      }

      if (char === '"') {
        tokens.push(this.readString(start, startOffset));
        continue;
      }
      if (char === "'") {
        tokens.push(this.readChar(start, startOffset));
        continue;
      }

      if (isDigit(char)) {
        tokens.push(this.readNumber(start, startOffset));
        continue;
      }

      if (isIdentifierStart(char)) {
        tokens.push(this.readIdentifier(start, startOffset));
        continue;
      }

      const operator = this.readOperator();
      if (operator) {
        tokens.push(this.makeToken(operator, start, startOffset));
        continue;
      }

      this.advance();
      throw this.error('invalidCharacter', `Unexpected character '${char}'`, start);
    }

    tokens.push({
      type: TokenType.EOF,
      lexeme: '',
      literal: NO_LITERAL,
      location: this.createLocation(this.createPosition())
    });

    return tokens;
  }
}

export function scanTokens(source: string, filename?: string): Token[] {
  return new Lexer(source, filename).tokenize();
}
