// Built-in primitive types, created once when the module loads and never mutated afterwards

import { NumericInfo, NumericKind, TypeDefinition } from './type-definition';
import primitiveTable from './primitives.json';

interface PrimitiveEntry {
  name: string;
  irType: string;
  numeric?: NumericInfo;
  properties: [string, string][];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumericKind(value: unknown): value is NumericKind {
  return value === 'integer' || value === 'float' || value === 'decimal';
}

function readNumeric(value: unknown, name: string): NumericInfo | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value) || !isNumericKind(value.kind) || typeof value.bits !== 'number' || typeof value.signed !== 'boolean') {
    throw new Error(`Invalid numeric description for primitive '${name}'`);
  }
  return { kind: value.kind, bits: value.bits, signed: value.signed };
}

function readStringMap(value: unknown, context: string): [string, string][] {
  if (value === undefined) return [];
  if (!isRecord(value)) {
    throw new Error(`Expected an object for ${context}`);
  }
  return Object.entries(value).map(([key, entry]): [string, string] => {
    if (typeof entry !== 'string') {
      throw new Error(`Expected a string for ${context}.${key}`);
    }
    return [key, entry];
  });
}

function readPrimitiveEntries(table: unknown): { entries: PrimitiveEntry[]; aliases: [string, string][] } {
  if (!isRecord(table) || !Array.isArray(table.primitives)) {
    throw new Error('Primitive table must list primitives');
  }

  const entries = table.primitives.map((entry: unknown): PrimitiveEntry => {
    if (!isRecord(entry) || typeof entry.name !== 'string' || typeof entry.irType !== 'string') {
      throw new Error('Primitive entries need a name and an irType');
    }
    return {
      name: entry.name,
      irType: entry.irType,
      numeric: readNumeric(entry.numeric, entry.name),
      properties: readStringMap(entry.properties, `${entry.name}.properties`)
    };
  });

  return { entries, aliases: readStringMap(table.aliases, 'aliases') };
}

function buildPrimitives(): { types: Map<string, TypeDefinition>; aliases: Map<string, string> } {
  const { entries, aliases } = readPrimitiveEntries(primitiveTable);
  const types = new Map<string, TypeDefinition>();

  for (const entry of entries) {
    types.set(entry.name, new TypeDefinition({
      name: entry.name,
      category: 'primitive',
      irType: entry.irType,
      numeric: entry.numeric
    }));
  }

  // Member types may name any primitive, so they are attached once every primitive exists
  for (const entry of entries) {
    const owner = types.get(entry.name);
    for (const [propertyName, typeName] of entry.properties) {
      const type = types.get(typeName);
      if (!owner || !type) {
        throw new Error(`Unknown primitive '${typeName}' in ${entry.name}.${propertyName}`);
      }
      owner.properties.set(propertyName, {
        name: propertyName,
        kind: 'constant',
        type,
        scopeId: 0,
        owner,
        modifiers: []
      });
    }
  }

  for (const [alias, target] of aliases) {
    if (!types.has(target)) {
      throw new Error(`Alias '${alias}' refers to unknown primitive '${target}'`);
    }
  }

  return { types, aliases: new Map(aliases) };
}

const primitives = buildPrimitives();

export const PRIMITIVE_TYPES: ReadonlyMap<string, TypeDefinition> = primitives.types;
export const PRIMITIVE_ALIASES: ReadonlyMap<string, string> = primitives.aliases;

function primitive(name: string): TypeDefinition {
  const type = PRIMITIVE_TYPES.get(name);
  if (!type) {
    throw new Error(`Missing primitive type '${name}'`);
  }
  return type;
}

export const INT = primitive('Int');
export const INT64 = primitive('Int64');
export const UINT64 = primitive('UInt64');
export const FLOAT = primitive('Float');
export const DOUBLE = primitive('Double');
export const BOOL = primitive('Bool');
export const CHAR = primitive('Char');
export const STRING = primitive('String');
export const VOID = primitive('Void');
export const ANY = primitive('Any');
export const NEVER = primitive('Never');

export function fitsInteger(value: bigint, numeric: NumericInfo): boolean {
  const bits = BigInt(numeric.bits);
  const min = numeric.signed ? -(1n << (bits - 1n)) : 0n;
  const max = numeric.signed ? (1n << (bits - 1n)) - 1n : (1n << bits) - 1n;
  return value >= min && value <= max;
}

// An integer literal is an Int unless its value needs a wider type
export function integerLiteralType(value: bigint): TypeDefinition {
  return [INT, INT64].find(type => type.numeric !== undefined && fitsInteger(value, type.numeric)) ?? UINT64;
}

// The type of the null literal; it has no name in source code
export const NULL_TYPE = new TypeDefinition({ name: 'Null', category: 'primitive', irType: 'ptr' });
