// Canonical type definitions shared by the symbol table, resolver, analyzer and checker

import { Modifier, SourceLocation } from '../types';

export type TypeCategory =
  | 'primitive'
  | 'class'
  | 'struct'
  | 'enum'
  | 'interface'
  | 'array'
  | 'generic'
  | 'typeParameter';

export type NumericKind = 'integer' | 'float' | 'decimal';

export interface NumericInfo {
  kind: NumericKind;
  bits: number;
  signed: boolean;
}

export type SymbolKind = 'variable' | 'constant' | 'function' | 'type';

export interface ParameterInfo {
  name: string;
  // Absent when the annotation failed to resolve; the failure is already reported
  type?: TypeDefinition;
  hasDefault: boolean;
}

export interface FunctionSignature {
  parameters: ParameterInfo[];
  returnType?: TypeDefinition;
  hasBody: boolean;
}

export interface SemanticSymbol {
  name: string;
  kind: SymbolKind;
  type?: TypeDefinition;
  signature?: FunctionSignature;
  // Absent for built-in symbols
  declaredAt?: SourceLocation;
  scopeId: number;
  owner?: TypeDefinition;
  modifiers: Modifier[];
}

export interface TypeDefinitionInit {
  name: string;
  category: TypeCategory;
  declaredAt?: SourceLocation;
  modifiers?: Modifier[];
  numeric?: NumericInfo;
  irType?: string;
  elementType?: TypeDefinition;
  genericBase?: TypeDefinition;
  typeArguments?: TypeDefinition[];
}

export class TypeDefinition {
  readonly name: string;
  readonly category: TypeCategory;
  readonly declaredAt?: SourceLocation;
  readonly modifiers: Modifier[];
  readonly numeric?: NumericInfo;
  readonly irType?: string;
  readonly elementType?: TypeDefinition;
  readonly genericBase?: TypeDefinition;
  readonly typeArguments: TypeDefinition[];

  typeParameters: TypeDefinition[] = [];
  superclass?: TypeDefinition;
  interfaces: TypeDefinition[] = [];
  permits: string[] = [];
  readonly properties: Map<string, SemanticSymbol> = new Map();
  readonly methods: Map<string, SemanticSymbol> = new Map();

  constructor(init: TypeDefinitionInit) {
    this.name = init.name;
    this.category = init.category;
    this.declaredAt = init.declaredAt;
    this.modifiers = init.modifiers ?? [];
    this.numeric = init.numeric;
    this.irType = init.irType;
    this.elementType = init.elementType;
    this.genericBase = init.genericBase;
    this.typeArguments = init.typeArguments ?? [];
  }

  get isInterface(): boolean {
    return this.category === 'interface';
  }

  get isPrimitive(): boolean {
    return this.category === 'primitive';
  }

  get isAbstract(): boolean {
    return this.modifiers.includes('abstract');
  }

  get isSealed(): boolean {
    return this.modifiers.includes('sealed');
  }

  get isFinal(): boolean {
    return this.modifiers.includes('final');
  }

  // Class, struct and interface members may be accessed through instances
  get hasMembers(): boolean {
    return this.category !== 'primitive' && this.category !== 'typeParameter';
  }

  // Generic instantiations share members with the type they instantiate
  private get memberSource(): TypeDefinition {
    return this.genericBase ?? this;
  }

  /**
   * Direct supertypes: the superclass first, then interfaces. A generic instantiation
   * inherits the supertypes of its base declaration.
   */
  supertypes(): TypeDefinition[] {
    const source = this.memberSource;
    return source.superclass ? [source.superclass, ...source.interfaces] : [...source.interfaces];
  }

  isSubtypeOf(other: TypeDefinition): boolean {
    const visited = new Set<TypeDefinition>();
    const pending: TypeDefinition[] = [this];

    while (pending.length > 0) {
      const current = pending.pop();
      if (!current || visited.has(current)) continue;
      if (current === other || (current.genericBase !== undefined && current.genericBase === other)) return true;
      visited.add(current);
      pending.push(...current.supertypes());
    }

    return false;
  }

  findProperty(name: string): SemanticSymbol | undefined {
    return this.findMember(name, type => type.properties);
  }

  findMethod(name: string): SemanticSymbol | undefined {
    return this.findMember(name, type => type.methods);
  }

  // Searches own members, then the superclass chain, then interfaces
  private findMember(name: string, table: (type: TypeDefinition) => Map<string, SemanticSymbol>): SemanticSymbol | undefined {
    const visited = new Set<TypeDefinition>();
    const queue: TypeDefinition[] = [this.memberSource];

    while (queue.length > 0) {
      const current = queue.shift();
      if (!current || visited.has(current)) continue;
      visited.add(current);

      const member = table(current).get(name);
      if (member) return member;

      queue.push(...current.supertypes());
    }

    return undefined;
  }

  toString(): string {
    return this.name;
  }
}
