import { duplicateDefinition, unknownLocation, type SourceLocation } from './errors.js';
import { type Type } from './types.js';

export type SymbolKind = 'function' | 'struct' | 'enum' | 'variable' | 'parameter' | 'const';

export interface FunctionSignature {
  name: string;
  /** Identifier the function has in emitted C. */
  cName: string;
  params: Type[];
  returnType: Type;
  variadic: boolean;
  module?: string;
  exported?: boolean;
  extern?: boolean;
}

export interface SymbolInfo {
  name: string;
  kind: SymbolKind;
  type: Type;
  mutable?: boolean;
  location?: SourceLocation;
  signature?: FunctionSignature;
  /** C identifier of a module-level variable. */
  cName?: string;
}

export type StructLayout = Map<string, Type>;
export type EnumLayout = Map<string, number>;

/**
 * Lexically scoped symbol table plus the struct and enum layout tables.
 * Scopes are pushed on entry to a function body or block and popped on exit.
 */
export class TypeEnvironment {
  private readonly scopes: Map<string, SymbolInfo>[] = [new Map()];
  private readonly structs = new Map<string, StructLayout>();
  private readonly enums = new Map<string, EnumLayout>();
  currentReturnType: Type | null = null;

  pushScope(): void {
    this.scopes.push(new Map());
  }

  popScope(): void {
    if (this.scopes.length === 1) {
      throw new Error('cannot pop the global scope');
    }
    this.scopes.pop();
  }

  get depth(): number {
    return this.scopes.length;
  }

  /** Throws `DuplicateDefinition` when the innermost scope already has `symbol.name`. */
  define(symbol: SymbolInfo): void {
    const scope = this.scopes[this.scopes.length - 1];
    const previous = scope.get(symbol.name);
    if (previous) {
      const location = symbol.location ?? unknownLocation();
      throw duplicateDefinition(symbol.name, location, previous.location ?? location);
    }
    scope.set(symbol.name, symbol);
  }

  lookup(name: string): SymbolInfo | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const symbol = this.scopes[i].get(name);
      if (symbol) return symbol;
    }
    return undefined;
  }

  lookupLocal(name: string): SymbolInfo | undefined {
    return this.scopes[this.scopes.length - 1].get(name);
  }

  defineStruct(name: string, fields: StructLayout): void {
    this.structs.set(name, fields);
  }

  defineEnum(name: string, variants: EnumLayout): void {
    this.enums.set(name, variants);
  }

  structFields(name: string): StructLayout | undefined {
    return this.structs.get(name);
  }

  enumVariants(name: string): EnumLayout | undefined {
    return this.enums.get(name);
  }

  isStruct(name: string): boolean {
    return this.structs.has(name);
  }

  isEnum(name: string): boolean {
    return this.enums.has(name);
  }
}

/**
 * What a module sees of its imports. Functions and layouts are keyed by both
 * `name` and `prefix.name`, where the prefix is the import alias or module path.
 */
export interface ImportedSymbols {
  functions: Map<string, FunctionSignature>;
  structs: Map<string, StructLayout>;
  enums: Map<string, EnumLayout>;
  /** Import prefixes in scope. */
  modules: Set<string>;
  /** `prefix.name` of functions a module defines without exporting, mapped to the module path. */
  hidden: Map<string, string>;
}

export const emptyImports = (): ImportedSymbols => ({
  functions: new Map(),
  structs: new Map(),
  enums: new Map(),
  modules: new Set(),
  hidden: new Map(),
});
