// Lexical scopes and the symbol table built for one compilation unit

import { SourceLocation } from '../types';
import { PRIMITIVE_TYPES } from './primitive-types';
import { SymbolError } from './symbol-error';
import { SemanticSymbol, TypeDefinition } from './type-definition';

export type SymbolInit = Omit<SemanticSymbol, 'scopeId'>;

export class Scope {
  private readonly symbols: Map<string, SemanticSymbol> = new Map();

  constructor(
    public readonly id: number,
    public readonly parent?: Scope,
    // Set on the scope holding a type's own members
    public readonly memberOf?: TypeDefinition
  ) {}

  // Shadowing an outer scope's name is allowed; redefining within this scope is not
  define(init: SymbolInit): SemanticSymbol {
    const existing = this.symbols.get(init.name);
    if (existing) {
      throw new SymbolError(
        { code: 'duplicateDefinition', name: init.name, previous: existing.declaredAt?.start },
        init.declaredAt
      );
    }

    const symbol: SemanticSymbol = { ...init, scopeId: this.id };
    this.symbols.set(symbol.name, symbol);
    return symbol;
  }

  resolveLocal(name: string): SemanticSymbol | undefined {
    return this.symbols.get(name) ?? this.inheritedMember(name);
  }

  // Innermost match wins
  resolve(name: string): SemanticSymbol | undefined {
    for (let scope: Scope | undefined = this; scope; scope = scope.parent) {
      const symbol = scope.resolveLocal(name);
      if (symbol) return symbol;
    }
    return undefined;
  }

  // Non-type symbols do not hide types of the same name in outer scopes
  resolveType(name: string): TypeDefinition | undefined {
    for (let scope: Scope | undefined = this; scope; scope = scope.parent) {
      const symbol = scope.symbols.get(name);
      if (symbol?.kind === 'type' && symbol.type) return symbol.type;
    }
    return undefined;
  }

  // The type whose body encloses this scope, if any
  get enclosingType(): TypeDefinition | undefined {
    for (let scope: Scope | undefined = this; scope; scope = scope.parent) {
      if (scope.memberOf) return scope.memberOf;
    }
    return undefined;
  }

  names(): string[] {
    return [...this.symbols.keys()];
  }

  // Members inherited from supertypes are visible by bare name inside a type body
  private inheritedMember(name: string): SemanticSymbol | undefined {
    if (!this.memberOf) return undefined;
    for (const supertype of this.memberOf.supertypes()) {
      const member = supertype.findProperty(name) ?? supertype.findMethod(name);
      if (member) return member;
    }
    return undefined;
  }
}

export class SymbolTable {
  readonly globalScope: Scope;
  private current: Scope;
  private nextScopeId = 0;

  constructor() {
    this.globalScope = new Scope(this.nextScopeId++);
    this.current = this.globalScope;

    for (const type of PRIMITIVE_TYPES.values()) {
      this.globalScope.define({ name: type.name, kind: 'type', type, modifiers: [] });
    }
  }

  get currentScope(): Scope {
    return this.current;
  }

  enterScope(memberOf?: TypeDefinition): Scope {
    this.current = this.createScope(this.current, memberOf);
    return this.current;
  }

  exitScope(): void {
    if (!this.current.parent) {
      throw new Error('Cannot exit the global scope');
    }
    this.current = this.current.parent;
  }

  // Creates a scope without entering it, for type bodies that are revisited later
  createScope(parent: Scope, memberOf?: TypeDefinition): Scope {
    return new Scope(this.nextScopeId++, parent, memberOf);
  }

  scoped<T>(callback: (scope: Scope) => T, memberOf?: TypeDefinition): T {
    const scope = this.enterScope(memberOf);
    try {
      return callback(scope);
    } finally {
      this.exitScope();
    }
  }

  // Temporarily makes an existing scope current
  within<T>(scope: Scope, callback: () => T): T {
    const saved = this.current;
    this.current = scope;
    try {
      return callback();
    } finally {
      this.current = saved;
    }
  }

  define(init: SymbolInit): SemanticSymbol {
    return this.current.define(init);
  }

  resolve(name: string): SemanticSymbol | undefined {
    return this.current.resolve(name);
  }

  resolveType(name: string): TypeDefinition | undefined {
    return this.current.resolveType(name);
  }

  isDefinedLocally(name: string): boolean {
    return this.current.resolveLocal(name) !== undefined;
  }

  locationOf(name: string): SourceLocation | undefined {
    return this.resolve(name)?.declaredAt;
  }
}
