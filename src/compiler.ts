// Compilation pipeline: lexing, parsing, analysis, type checking and optional optimization

import { promises as fs } from 'fs';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { Logger, logger as defaultLogger } from './logger';
import { ConstantFolder } from './optimizer';
import { Token, scanTokens } from './parser/lexer';
import { Parser } from './parser/parser';
import { Declaration, LexerError, ParseError, SourceLocation } from './types';
import { SymbolError } from './validation/symbol-error';
import { TypeChecker } from './validation/type-checker';

export interface CompilerOptions {
  filename?: string;
  optimize?: boolean;
  verbose?: boolean;
  // Checked between stages; an aborted compilation rejects without a result
  signal?: AbortSignal;
  logger?: Logger;
}

export type DiagnosticStage = 'lexer' | 'parser' | 'semantic';

export interface CompilerDiagnostic {
  filename: string;
  line?: number;
  column?: number;
  endLine?: number;
  endColumn?: number;
  message: string;
  severity: 'error' | 'warning' | 'info';
  stage: DiagnosticStage;
}

export interface CompileResult {
  tokens?: Token[];
  // Absent when lexing or parsing failed
  declarations?: Declaration[];
  diagnostics: CompilerDiagnostic[];
  // Expression types from the last type check, available once parsing succeeded
  checker?: TypeChecker;
}

export function toDiagnostic(
  error: LexerError | ParseError | SymbolError,
  filename: string,
  stage: DiagnosticStage
): CompilerDiagnostic {
  const location: SourceLocation | undefined = error.location;
  return {
    filename: location?.filename ?? filename,
    line: location?.start.line,
    column: location?.start.column,
    endLine: location?.end.line,
    endColumn: location?.end.column,
    message: error.message,
    severity: 'error',
    stage
  };
}

export class Compiler {
  private readonly options: Required<Omit<CompilerOptions, 'signal'>> & Pick<CompilerOptions, 'signal'>;

  constructor(options: CompilerOptions = {}) {
    // An option passed as undefined still takes its default
    this.options = {
      filename: options.filename ?? 'input',
      optimize: options.optimize ?? false,
      verbose: options.verbose ?? false,
      logger: options.logger ?? defaultLogger,
      signal: options.signal
    };
  }

  /**
   * Runs every stage over one source text. Lexer and parser errors end the compilation with
   * a single diagnostic; semantic and type errors are all reported. The event loop gets a
   * turn between stages so that many compilations can share one thread.
   */
  async compile(source: string): Promise<CompileResult> {
    const { filename } = this.options;

    await this.checkpoint();
    let tokens: Token[];
    try {
      tokens = scanTokens(source, filename);
    } catch (error) {
      if (error instanceof LexerError) {
        this.trace(`Lexing ${filename} failed: ${error.message}`);
        return { diagnostics: [toDiagnostic(error, filename, 'lexer')] };
      }
      throw error;
    }
    this.trace(`Scanned ${tokens.length} tokens from ${filename}`);

    await this.checkpoint();
    let declarations: Declaration[];
    try {
      declarations = new Parser(tokens, filename).parse();
    } catch (error) {
      if (error instanceof ParseError) {
        this.trace(`Parsing ${filename} failed: ${error.message}`);
        return { tokens, diagnostics: [toDiagnostic(error, filename, 'parser')] };
      }
      throw error;
    }
    this.trace(`Parsed ${declarations.length} declarations`);

    await this.checkpoint();
    const checker = new TypeChecker();
    const diagnostics = checker.check(declarations).map(error => toDiagnostic(error, filename, 'semantic'));
    this.trace(`Type checking reported ${diagnostics.length} diagnostics`);

    if (this.options.optimize && diagnostics.length === 0) {
      await this.checkpoint();
      declarations = new ConstantFolder().optimize(declarations);
      this.trace('Optimized declarations');
    }

    return { tokens, declarations, diagnostics, checker };
  }

  async compileFile(path: string): Promise<CompileResult> {
    const source = await fs.readFile(path, 'utf-8');
    const compiler = new Compiler({ ...this.options, filename: path });
    return compiler.compile(source);
  }

  private async checkpoint(): Promise<void> {
    await yieldToEventLoop();
    this.options.signal?.throwIfAborted();
  }

  private trace(message: string): void {
    const line = `[Compiler] ${message}`;
    if (this.options.verbose) {
      this.options.logger.info(line);
    } else {
      this.options.logger.debug(line);
    }
  }
}

export function compile(source: string, options: CompilerOptions = {}): Promise<CompileResult> {
  return new Compiler(options).compile(source);
}

export function compileFile(path: string, options: CompilerOptions = {}): Promise<CompileResult> {
  return new Compiler(options).compileFile(path);
}
