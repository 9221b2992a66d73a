import { CompilerError, unknownLocation, type SourceLocation } from './errors.js';
import { genericType, type GenericType, type Type } from './types.js';

export interface BuiltinVariant {
  name: string;
  hasValue: boolean;
  valueParam?: string;
}

export interface BuiltinGenericType {
  name: string;
  typeParams: readonly string[];
  variants: readonly BuiltinVariant[];
}

export type SubstituteResult = { ok: true; type: GenericType } | { ok: false; error: CompilerError };

const optionType: BuiltinGenericType = {
  name: 'Option',
  typeParams: ['T'],
  variants: [
    { name: 'Some', hasValue: true, valueParam: 'T' },
    { name: 'None', hasValue: false },
  ],
};

const resultType: BuiltinGenericType = {
  name: 'Result',
  typeParams: ['T', 'E'],
  variants: [
    { name: 'Ok', hasValue: true, valueParam: 'T' },
    { name: 'Err', hasValue: true, valueParam: 'E' },
  ],
};

const plural = (count: number, noun: string) => `${count} ${noun}${count === 1 ? '' : 's'}`;

/** The closed set of parametric sum types the language ships with. */
export class BuiltinGenericRegistry {
  private readonly types: ReadonlyMap<string, BuiltinGenericType>;

  constructor(types: readonly BuiltinGenericType[] = [optionType, resultType]) {
    this.types = new Map(types.map((t) => [t.name, t]));
  }

  isBuiltin(name: string): boolean {
    return this.types.has(name);
  }

  get(name: string): BuiltinGenericType | undefined {
    return this.types.get(name);
  }

  names(): string[] {
    return Array.from(this.types.keys());
  }

  variant(name: string, variantName: string): BuiltinVariant | undefined {
    return this.types.get(name)?.variants.find((v) => v.name === variantName);
  }

  substitute(name: string, args: Type[], location: SourceLocation = unknownLocation()): SubstituteResult {
    const builtin = this.types.get(name);
    if (!builtin) {
      return {
        ok: false,
        error: new CompilerError('UndefinedType', `\`${name}\` is not a builtin generic type`, location),
      };
    }
    if (args.length !== builtin.typeParams.length) {
      return {
        ok: false,
        error: new CompilerError(
          'WrongArgumentCount',
          `type \`${name}\` expects ${plural(builtin.typeParams.length, 'type parameter')}, got ${args.length}`,
          location
        ).withSuggestion(`write \`${name}<${builtin.typeParams.join(', ')}>\` with concrete types`),
      };
    }
    return { ok: true, type: genericType(name, args) };
  }

  /** Index of the type parameter a variant's payload is declared against. */
  valueParamIndex(name: string, variantName: string): number {
    const builtin = this.types.get(name);
    const variant = this.variant(name, variantName);
    if (!builtin || !variant?.valueParam) return -1;
    return builtin.typeParams.indexOf(variant.valueParam);
  }

  variantValueType(name: string, variantName: string, args: readonly Type[]): Type | undefined {
    const idx = this.valueParamIndex(name, variantName);
    return idx === -1 ? undefined : args[idx];
  }

  /** The variant that `?` unwraps (`Some`, `Ok`). */
  successVariant(name: string): BuiltinVariant | undefined {
    return this.types.get(name)?.variants[0];
  }

  /** The variant that `?` propagates (`None`, `Err`). */
  failureVariant(name: string): BuiltinVariant | undefined {
    const variants = this.types.get(name)?.variants;
    return variants ? variants[variants.length - 1] : undefined;
  }
}

export const builtinGenerics = new BuiltinGenericRegistry();
