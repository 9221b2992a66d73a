import { BOOL, dynamicArrayOf, INT, isStringLike, STRING, VOID, type Type } from './types.js';

export type Capability =
  | 'SupportsLength'
  | 'SupportsPush'
  | 'SupportsPop'
  | 'SupportsSubstring'
  | 'SupportsContains'
  | 'SupportsTrim'
  | 'SupportsSplit';

export type MethodOp =
  | 'string.length'
  | 'string.substring'
  | 'string.contains'
  | 'string.trim'
  | 'string.split'
  | 'array.length'
  | 'array.push'
  | 'array.pop';

export interface MethodSpec {
  op: MethodOp;
  capability: Capability;
  params: (receiver: Type) => Type[];
  result: (receiver: Type) => Type;
}

const elementOf = (receiver: Type): Type => (receiver.kind === 'dynamicArray' ? receiver.element : VOID);

const stringCapabilities: readonly Capability[] = [
  'SupportsLength',
  'SupportsSubstring',
  'SupportsContains',
  'SupportsTrim',
  'SupportsSplit',
];
const arrayCapabilities: readonly Capability[] = ['SupportsLength', 'SupportsPush', 'SupportsPop'];

export function capabilitiesOf(type: Type): readonly Capability[] {
  if (isStringLike(type)) return stringCapabilities;
  if (type.kind === 'dynamicArray') return arrayCapabilities;
  return [];
}

// Candidates per method name, tried in order against the receiver's capabilities.
const methodTable: Record<string, MethodSpec[]> = {
  length: [
    { op: 'string.length', capability: 'SupportsLength', params: () => [], result: () => INT },
    { op: 'array.length', capability: 'SupportsLength', params: () => [], result: () => INT },
  ],
  substring: [
    { op: 'string.substring', capability: 'SupportsSubstring', params: () => [INT, INT], result: () => STRING },
  ],
  contains: [{ op: 'string.contains', capability: 'SupportsContains', params: () => [STRING], result: () => BOOL }],
  trim: [{ op: 'string.trim', capability: 'SupportsTrim', params: () => [], result: () => STRING }],
  split: [
    {
      op: 'string.split',
      capability: 'SupportsSplit',
      params: () => [STRING],
      result: () => dynamicArrayOf(STRING),
    },
  ],
  push: [{ op: 'array.push', capability: 'SupportsPush', params: (r) => [elementOf(r)], result: () => VOID }],
  pop: [{ op: 'array.pop', capability: 'SupportsPop', params: () => [], result: elementOf }],
};

const receiverFamily = (op: MethodOp): 'string' | 'array' => (op.startsWith('string.') ? 'string' : 'array');

export function resolveMethod(receiver: Type, name: string): MethodSpec | undefined {
  if (!Object.prototype.hasOwnProperty.call(methodTable, name)) return undefined;
  const caps = capabilitiesOf(receiver);
  const family = isStringLike(receiver) ? 'string' : 'array';
  return methodTable[name].find((entry) => caps.includes(entry.capability) && receiverFamily(entry.op) === family);
}
