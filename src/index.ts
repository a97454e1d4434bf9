// Public API of the Ember compiler front end

export * from './types';
export { Lexer, TokenType, scanTokens } from './parser/lexer';
export type { Token } from './parser/lexer';
export { MAX_NESTING_DEPTH, Parser, describeToken, parse } from './parser/parser';
export type { RecoveredParse } from './parser/parser';
export { SymbolError, describeSymbolError } from './validation/symbol-error';
export type { SymbolErrorCode, SymbolErrorDetail } from './validation/symbol-error';
export { Scope, SymbolTable } from './validation/symbol-table';
export { TypeDefinition } from './validation/type-definition';
export type { SemanticSymbol, FunctionSignature, ParameterInfo, TypeCategory } from './validation/type-definition';
export { PRIMITIVE_TYPES, PRIMITIVE_ALIASES } from './validation/primitive-types';
export { TypeResolver } from './validation/type-resolver';
export { SemanticAnalyzer, analyze } from './validation/semantic-analyzer';
export { TypeChecker, check } from './validation/type-checker';
export { ConstantFolder, optimize } from './optimizer';
export type { Optimizer } from './optimizer';
export { Compiler, compile, compileFile, toDiagnostic } from './compiler';
export type { CompilerOptions, CompileResult, CompilerDiagnostic, DiagnosticStage } from './compiler';
export { toLspDiagnostic, toLspDiagnostics, formatDiagnostic } from './diagnostics';
export { printAst, typeNodeToString } from './ast-printer';
export { Logger, LogLevel, logger } from './logger';
export type { LogSink } from './logger';
