// Parser for the Ember language

import { Token, TokenType } from './lexer';
import { Declaration, ParseError, ParseErrorCode, SourceLocation } from '../types';
import { parseDeclaration } from './parser-declarations';

// Nested expressions and statements deeper than this are rejected instead of exhausting the stack
export const MAX_NESTING_DEPTH = 256;

export interface RecoveredParse {
  declarations: Declaration[];
  errors: ParseError[];
}

export class Parser {
  public tokens: Token[];
  public current: number = 0;
  public filename?: string;
  private depth = 0;

  constructor(tokens: Token[], filename?: string) {
    this.tokens = tokens.length > 0 && tokens[tokens.length - 1].type === TokenType.EOF
      ? [...tokens]
      : [...tokens, endOfInput(tokens)];
    this.filename = filename ?? this.tokens[0].location.filename;
  }

  // Fails on the first malformed construct
  parse(): Declaration[] {
    this.current = 0;
    const declarations: Declaration[] = [];

    while (!this.isAtEnd()) {
      declarations.push(parseDeclaration(this));
    }

    return declarations;
  }

  // Skips to the next statement boundary after each error and keeps going
  parseWithRecovery(): RecoveredParse {
    this.current = 0;
    const declarations: Declaration[] = [];
    const errors: ParseError[] = [];

    while (!this.isAtEnd()) {
      try {
        declarations.push(parseDeclaration(this));
      } catch (error) {
        if (error instanceof ParseError) {
          errors.push(error);
          this.depth = 0;
          this.synchronize();
        } else {
          throw error;
        }
      }
    }

    return { declarations, errors };
  }

  public match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  public check(type: TokenType): boolean {
    if (this.isAtEnd()) return type === TokenType.EOF;
    return this.peek().type === type;
  }

  public checkNext(type: TokenType): boolean {
    return this.peek(1).type === type;
  }

  public advance(): Token {
    if (!this.isAtEnd()) this.current++;
    return this.previous();
  }

  public isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  public peek(offset: number = 0): Token {
    return this.tokens[Math.min(this.current + offset, this.tokens.length - 1)];
  }

  public previous(): Token {
    return this.tokens[Math.max(this.current - 1, 0)];
  }

  public consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    throw this.error(`${message}. Got ${describeToken(this.peek())}`);
  }

  public error(message: string, code: ParseErrorCode = 'expectedToken', token: Token = this.peek()): ParseError {
    return new ParseError(message, this.locationOf(token), code);
  }

  // Tracks nesting so pathological input fails with a ParseError
  public nested<T>(callback: () => T): T {
    if (this.depth >= MAX_NESTING_DEPTH) {
      throw this.error('Nesting is too deep', 'nestingTooDeep');
    }
    this.depth++;
    try {
      return callback();
    } finally {
      this.depth--;
    }
  }

  public synchronize(): void {
    this.advance();

    while (!this.isAtEnd()) {
      if (this.previous().type === TokenType.SEMICOLON || this.previous().type === TokenType.RIGHT_BRACE) return;

      switch (this.peek().type) {
        case TokenType.CLASS:
        case TokenType.STRUCT:
        case TokenType.ENUM:
        case TokenType.INTERFACE:
        case TokenType.FUNC:
        case TokenType.VAR:
        case TokenType.CONST:
        case TokenType.FOR:
        case TokenType.IF:
        case TokenType.WHILE:
        case TokenType.RETURN:
          return;
      }

      this.advance();
    }
  }

  public getLocation(): SourceLocation {
    return this.locationOf(this.peek());
  }

  // Location spanning from a start token to the most recently consumed token
  public spanFrom(start: Token): SourceLocation {
    const end = this.previous();
    return {
      start: start.location.start,
      end: end.location.end,
      filename: this.filename
    };
  }

  public locationOf(token: Token): SourceLocation {
    return { ...token.location, filename: this.filename };
  }
}

function endOfInput(tokens: Token[]): Token {
  const last = tokens[tokens.length - 1];
  const position = last ? last.location.end : { line: 1, column: 1 };
  return {
    type: TokenType.EOF,
    lexeme: '',
    literal: { kind: 'none' },
    location: { start: position, end: position, filename: last?.location.filename }
  };
}

export function describeToken(token: Token): string {
  return token.type === TokenType.EOF ? 'end of input' : `'${token.lexeme}'`;
}

export function parse(tokens: Token[], filename?: string): Declaration[] {
  return new Parser(tokens, filename).parse();
}
