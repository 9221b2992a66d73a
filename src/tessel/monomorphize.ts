import { CompilerError, internalError, unknownLocation } from './errors.js';
import type { CheckedModule } from './semantic.js';
import { formatType, type GenericType, mangleType, type Type, unqualifiedName } from './types.js';

/**
 * Concrete generic types keyed by mangled name. Identical instantiations
 * collapse, and nested ones are inserted before the types that contain them.
 */
export class InstantiationSet {
  private readonly generics = new Map<string, GenericType>();
  private readonly dynamicArrays = new Map<string, Type>();

  add(type: Type): void {
    switch (type.kind) {
      case 'primitive':
      case 'struct':
      case 'enum':
        return;
      case 'pointer':
        this.add(type.to);
        return;
      case 'array':
        this.add(type.element);
        return;
      case 'dynamicArray':
        this.add(type.element);
        if (!this.dynamicArrays.has(mangleType(type.element))) {
          this.dynamicArrays.set(mangleType(type.element), type.element);
        }
        return;
      case 'generic': {
        for (const arg of type.args) this.add(arg);
        const key = mangleType(type);
        if (!this.generics.has(key)) this.generics.set(key, type);
        return;
      }
      case 'typeParam':
        throw internalError(`unresolved type parameter \`${type.name}\` reached lowering`);
    }
  }

  has(mangled: string): boolean {
    return this.generics.has(mangled);
  }

  get size(): number {
    return this.generics.size;
  }

  /** Instantiations in collection order. */
  values(): GenericType[] {
    return Array.from(this.generics.values());
  }

  /** Element types of every `DynamicArray` in use, in collection order. */
  dynamicArrayElements(): Type[] {
    return Array.from(this.dynamicArrays.values());
  }
}

/** Gathers every type a set of checked modules mentions. */
export function collectInstantiations(modules: readonly CheckedModule[]): InstantiationSet {
  const set = new InstantiationSet();
  for (const module of modules) {
    for (const layout of module.structs.values()) {
      for (const type of layout.values()) set.add(type);
    }
    for (const signature of [...module.externs.values(), ...module.functions.values()]) {
      for (const param of signature.params) set.add(param);
      set.add(signature.returnType);
    }
    for (const type of module.bindingTypes.values()) set.add(type);
    for (const type of module.armBindings.values()) set.add(type);
    for (const type of module.exprTypes.values()) set.add(type);
  }
  return set;
}

export type TypeDefinition =
  | { kind: 'struct'; name: string; fields: [string, Type][] }
  | { kind: 'generic'; type: GenericType };

const definitionKey = (def: TypeDefinition): string =>
  def.kind === 'struct' ? unqualifiedName(def.name) : mangleType(def.type);

// Types a definition embeds by value. Pointers, arrays and dynamic arrays only hold addresses.
function byValueKeys(type: Type, out: string[]): void {
  if (type.kind === 'struct' && type.name !== 'str') out.push(unqualifiedName(type.name));
  if (type.kind === 'generic') out.push(mangleType(type));
}

function dependencies(def: TypeDefinition): string[] {
  const keys: string[] = [];
  if (def.kind === 'struct') {
    for (const [, type] of def.fields) byValueKeys(type, keys);
  } else {
    for (const arg of def.type.args) byValueKeys(arg, keys);
  }
  return keys;
}

/**
 * Orders struct and generic definitions so every type is defined before any
 * type that embeds it by value. Unrelated items keep their input order.
 */
export function orderDefinitions(definitions: readonly TypeDefinition[]): TypeDefinition[] {
  const byKey = new Map(definitions.map((def) => [definitionKey(def), def]));
  const done = new Set<string>();
  const visiting = new Set<string>();
  const ordered: TypeDefinition[] = [];

  const visit = (def: TypeDefinition, path: string[]) => {
    const key = definitionKey(def);
    if (done.has(key)) return;
    if (visiting.has(key)) {
      const label = def.kind === 'struct' ? def.name : formatType(def.type);
      throw new CompilerError(
        'UnsupportedFeature',
        `type \`${label}\` contains itself by value (${[...path, key].join(' -> ')})`,
        unknownLocation()
      ).withSuggestion('break the cycle with a pointer field');
    }
    visiting.add(key);
    for (const dep of dependencies(def)) {
      const target = byKey.get(dep);
      if (target) visit(target, [...path, key]);
    }
    visiting.delete(key);
    done.add(key);
    ordered.push(def);
  };

  for (const def of definitions) visit(def, []);
  return ordered;
}
