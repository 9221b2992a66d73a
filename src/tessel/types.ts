export type PrimitiveName = 'int' | 'float' | 'bool' | 'char' | 'string' | 'void';

export const primitiveNames: ReadonlySet<string> = new Set<PrimitiveName>([
  'int',
  'float',
  'bool',
  'char',
  'string',
  'void',
]);

export type Type =
  | { kind: 'primitive'; name: PrimitiveName }
  | { kind: 'pointer'; to: Type }
  | { kind: 'array'; element: Type; length?: number }
  | { kind: 'dynamicArray'; element: Type }
  | { kind: 'struct'; name: string }
  | { kind: 'enum'; name: string }
  | { kind: 'generic'; name: string; args: Type[] }
  | { kind: 'typeParam'; name: string };

export type GenericType = Extract<Type, { kind: 'generic' }>;

const prim = (name: PrimitiveName): Type => ({ kind: 'primitive', name });

export const INT = prim('int');
export const FLOAT = prim('float');
export const BOOL = prim('bool');
export const CHAR = prim('char');
export const STRING = prim('string');
export const VOID = prim('void');

export const pointerTo = (to: Type): Type => ({ kind: 'pointer', to });
export const arrayOf = (element: Type, length?: number): Type =>
  length === undefined ? { kind: 'array', element } : { kind: 'array', element, length };
export const dynamicArrayOf = (element: Type): Type => ({ kind: 'dynamicArray', element });
export const structType = (name: string): Type => ({ kind: 'struct', name });
export const enumType = (name: string): Type => ({ kind: 'enum', name });
export const genericType = (name: string, args: Type[]): GenericType => ({ kind: 'generic', name, args });

export const isPrimitive = (type: Type, name: PrimitiveName): boolean =>
  type.kind === 'primitive' && type.name === name;

export const isNumeric = (type: Type): boolean => isPrimitive(type, 'int') || isPrimitive(type, 'float');

/** `string` and the legacy struct spelling `str` are the same type. */
export const isStringLike = (type: Type): boolean =>
  isPrimitive(type, 'string') || (type.kind === 'struct' && type.name === 'str');

export const isGenericOf = (type: Type, family: string): type is GenericType =>
  type.kind === 'generic' && type.name === family;

export const unqualifiedName = (name: string): string => {
  const idx = name.lastIndexOf('.');
  return idx === -1 ? name : name.slice(idx + 1);
};

/** Structural equality. Array length is metadata and never compared. */
export function typesEqual(a: Type, b: Type): boolean {
  switch (a.kind) {
    case 'primitive':
      return b.kind === 'primitive' && a.name === b.name;
    case 'pointer':
      return b.kind === 'pointer' && typesEqual(a.to, b.to);
    case 'array':
      return b.kind === 'array' && typesEqual(a.element, b.element);
    case 'dynamicArray':
      return b.kind === 'dynamicArray' && typesEqual(a.element, b.element);
    case 'struct':
    case 'enum':
      return b.kind === a.kind && a.name === b.name;
    case 'generic':
      return (
        b.kind === 'generic' &&
        a.name === b.name &&
        a.args.length === b.args.length &&
        a.args.every((arg, i) => typesEqual(arg, b.args[i]))
      );
    case 'typeParam':
      return b.kind === 'typeParam' && a.name === b.name;
  }
}

const namedTypeName = (type: Type): string | null =>
  type.kind === 'struct' || type.kind === 'enum' ? type.name : null;

/**
 * Assignment compatibility. Reflexive and symmetric but not transitive:
 * `a.Point` ~ `Point` ~ `b.Point` does not make `a.Point` ~ `b.Point`.
 */
export function compatible(a: Type, b: Type): boolean {
  if (typesEqual(a, b)) return true;

  const left = namedTypeName(a);
  const right = namedTypeName(b);
  if (left !== null && right !== null && left === right) return true;

  if (isStringLike(a) && isStringLike(b)) return true;

  if (a.kind === 'pointer' && b.kind === 'pointer') return compatible(a.to, b.to);
  if (a.kind === 'array' && b.kind === 'array') return compatible(a.element, b.element);
  if (a.kind === 'dynamicArray' && b.kind === 'dynamicArray') return compatible(a.element, b.element);

  if (left !== null && right !== null) {
    if (left.includes('.') && !right.includes('.')) return unqualifiedName(left) === right;
    if (right.includes('.') && !left.includes('.')) return unqualifiedName(right) === left;
  }
  return false;
}

export function formatType(type: Type): string {
  switch (type.kind) {
    case 'primitive':
      return type.name;
    case 'pointer':
      return `*${formatType(type.to)}`;
    case 'array':
      return type.length === undefined
        ? `[${formatType(type.element)}]`
        : `[${formatType(type.element)}; ${type.length}]`;
    case 'dynamicArray':
      return `DynamicArray[${formatType(type.element)}]`;
    case 'struct':
    case 'enum':
    case 'typeParam':
      return type.name;
    case 'generic':
      return `${type.name}<${type.args.map(formatType).join(', ')}>`;
  }
}

const sanitizeTypeSegment = (value: string): string =>
  value.replace(/[^A-Za-z0-9_]/g, '_').replace(/_+/g, '_').replace(/^_+|_+$/g, '') || 'Type';

/**
 * Stable identifier fragment for a type. Instantiations are keyed by this,
 * so the same type must mangle identically everywhere.
 */
export function mangleType(type: Type): string {
  switch (type.kind) {
    case 'primitive':
      return type.name;
    case 'pointer':
      return `ptr_${mangleType(type.to)}`;
    case 'array':
      return `arr_${mangleType(type.element)}`;
    case 'dynamicArray':
      return `vec_${mangleType(type.element)}`;
    case 'struct':
      return type.name === 'str' ? 'string' : sanitizeTypeSegment(unqualifiedName(type.name));
    case 'enum':
      return sanitizeTypeSegment(unqualifiedName(type.name));
    case 'generic':
      return [type.name, ...type.args.map(mangleType)].join('_');
    case 'typeParam':
      return sanitizeTypeSegment(type.name);
  }
}

export function containsTypeParam(type: Type): boolean {
  switch (type.kind) {
    case 'typeParam':
      return true;
    case 'pointer':
      return containsTypeParam(type.to);
    case 'array':
    case 'dynamicArray':
      return containsTypeParam(type.element);
    case 'generic':
      return type.args.some(containsTypeParam);
    default:
      return false;
  }
}
