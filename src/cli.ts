#!/usr/bin/env node

// CLI for the Ember compiler front end

import { promises as fs, readFileSync } from 'fs';
import path from 'path';
import { printAst } from './ast-printer';
import { CompilerDiagnostic, compileFile } from './compiler';
import { formatDiagnostic } from './diagnostics';
import { logger, LogLevel } from './logger';
import { Token } from './parser/lexer';

// Get version from package.json
export function getVersion(): string {
  // Walk up to find package.json (handles both src/ and dist/)
  let dir = __dirname;
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json');
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
      return '0.0.0';
    } catch {
      dir = path.dirname(dir);
    }
  }
  return '0.0.0';
}

export interface CliOptions {
  inputs?: string[];
  help?: boolean;
  version?: boolean;
  verbose?: boolean;
  optimize?: boolean;
  tokens?: boolean;
  ast?: boolean;
  json?: boolean;
}

export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
}

const consoleOutput: CliOutput = {
  out: text => console.log(text),
  err: text => console.error(text)
};

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {};

  for (const arg of args) {
    switch (arg) {
      case '--verbose':
        options.verbose = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '-v':
      case '--version':
        options.version = true;
        break;
      case '-O':
      case '--optimize':
        options.optimize = true;
        break;
      case '--tokens':
        options.tokens = true;
        break;
      case '--ast':
        options.ast = true;
        break;
      case '--json':
        options.json = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        options.inputs = options.inputs || [];
        options.inputs.push(arg);
        break;
    }
  }
  return options;
}

export function helpText(): string {
  return `
ember - front end for the Ember language: lexing, parsing, semantic analysis and type checking

Usage: ember [options] <input-file>...

Options:
  -h, --help              Show this help message
  -v, --version           Show version number
  -O, --optimize          Fold constants after a successful type check
  --tokens                Print the token stream of each file
  --ast                   Print the syntax tree of each file
  --json                  Print diagnostics as JSON
  --verbose               Print debug output from each compiler stage

Examples:
  ember main.em
  ember --ast --optimize main.em
  ember --json src/*.em
`;
}

export function showHelp(output: CliOutput = consoleOutput): void {
  output.out(helpText());
}

export function showVersion(output: CliOutput = consoleOutput): void {
  output.out(`ember ${getVersion()}`);
}

export function formatToken(token: Token): string {
  const { line, column } = token.location.start;
  return `${line}:${column} ${token.type} ${JSON.stringify(token.lexeme)}`;
}

/**
 * Runs the CLI and resolves with the process exit code: 0 when every file compiled cleanly,
 * 1 when any diagnostic was reported or the arguments were invalid.
 */
export async function runCli(args: string[], output: CliOutput = consoleOutput): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    output.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    output.err('Use --help for usage information');
    return 1;
  }

  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  if (options.help) {
    showHelp(output);
    return 0;
  }

  if (options.version) {
    showVersion(output);
    return 0;
  }

  const inputFiles = options.inputs ?? [];
  if (inputFiles.length === 0) {
    output.err('Error: No input files specified');
    output.err('Use --help for usage information');
    return 1;
  }

  // Check if input files exist
  for (const inputFile of inputFiles) {
    try {
      await fs.access(inputFile);
    } catch {
      output.err(`Error: Input file '${inputFile}' does not exist`);
      return 1;
    }
  }

  const diagnostics: CompilerDiagnostic[] = [];
  for (const inputFile of inputFiles) {
    const result = await compileFile(inputFile, { optimize: options.optimize, verbose: options.verbose });

    if (options.tokens && result.tokens) {
      result.tokens.forEach(token => output.out(formatToken(token)));
    }
    if (options.ast && result.declarations) {
      output.out(printAst(result.declarations));
    }
    diagnostics.push(...result.diagnostics);
  }

  if (options.json) {
    output.out(JSON.stringify(diagnostics, null, 2));
  } else {
    diagnostics.forEach(diagnostic => output.err(formatDiagnostic(diagnostic)));
  }

  return diagnostics.length > 0 ? 1 : 0;
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(code => {
    process.exitCode = code;
  }).catch(error => {
    console.error(`Error: ${error instanceof Error ? error.message : error}`);
    process.exitCode = 1;
  });
}
