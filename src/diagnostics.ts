// Translation of compiler diagnostics into Language Server Protocol diagnostics

import { Diagnostic, DiagnosticSeverity, Range } from 'vscode-languageserver-types';
import { CompilerDiagnostic } from './compiler';

export const DIAGNOSTIC_SOURCE = 'ember';

const SEVERITIES: Record<CompilerDiagnostic['severity'], DiagnosticSeverity> = {
  error: DiagnosticSeverity.Error,
  warning: DiagnosticSeverity.Warning,
  info: DiagnosticSeverity.Information
};

// Compiler positions are 1-based with an exclusive end; LSP positions are 0-based
function toRange(diagnostic: CompilerDiagnostic): Range {
  const line = (diagnostic.line ?? 1) - 1;
  const character = (diagnostic.column ?? 1) - 1;
  return Range.create(
    line,
    character,
    diagnostic.endLine !== undefined ? diagnostic.endLine - 1 : line,
    diagnostic.endColumn !== undefined ? diagnostic.endColumn - 1 : character
  );
}

export function toLspDiagnostic(diagnostic: CompilerDiagnostic): Diagnostic {
  return Diagnostic.create(toRange(diagnostic), diagnostic.message, SEVERITIES[diagnostic.severity], diagnostic.stage, DIAGNOSTIC_SOURCE);
}

export function toLspDiagnostics(diagnostics: CompilerDiagnostic[]): Diagnostic[] {
  return diagnostics.map(toLspDiagnostic);
}

// One diagnostic per line, as printed by the CLI
export function formatDiagnostic(diagnostic: CompilerDiagnostic): string {
  const position = diagnostic.line !== undefined && diagnostic.column !== undefined
    ? `${diagnostic.line}:${diagnostic.column}:`
    : '';
  return `${diagnostic.filename}:${position} ${diagnostic.severity}: ${diagnostic.message}`;
}
