import intrinsicTable from './intrinsics.json';
import { FLOAT, INT, pointerTo, STRING, type Type, VOID } from './types.js';

const returnSpellings = new Map<string, Type>([
  ['int', INT],
  ['float', FLOAT],
  ['string', STRING],
  ['void', VOID],
  ['*void', pointerTo(VOID)],
]);

/** C library functions callable without an `extern` declaration, with their return types. */
const intrinsics: ReadonlyMap<string, Type> = new Map(
  Object.entries(intrinsicTable).map(([name, spelling]): [string, Type] => {
    const type = returnSpellings.get(spelling);
    if (!type) throw new Error(`intrinsic \`${name}\` has an unknown return type \`${spelling}\``);
    return [name, type];
  })
);

export function isIntrinsic(name: string): boolean {
  return intrinsics.has(name);
}

export function intrinsicReturnType(name: string): Type | undefined {
  return intrinsics.get(name);
}
