import { InstantiationSet, orderDefinitions, type TypeDefinition } from '../src/tessel/monomorphize.js';
import { INT, STRING, dynamicArrayOf, genericType, mangleType, pointerTo, structType } from '../src/tessel/types.js';
import { catchCompilerError } from './helpers.js';

const names = (defs: TypeDefinition[]) => defs.map((d) => (d.kind === 'struct' ? d.name : mangleType(d.type)));

describe('InstantiationSet', () => {
  test('identical instantiations collapse', () => {
    const set = new InstantiationSet();
    set.add(genericType('Option', [INT]));
    set.add(genericType('Option', [INT]));
    set.add(pointerTo(genericType('Option', [INT])));
    expect(set.size).toBe(1);
    expect(set.has('Option_int')).toBe(true);
  });

  test('nested instantiations come before their containers', () => {
    const set = new InstantiationSet();
    set.add(genericType('Result', [genericType('Option', [INT]), STRING]));
    expect(set.values().map(mangleType)).toEqual(['Option_int', 'Result_Option_int_string']);
  });

  test('dynamic arrays record their element types', () => {
    const set = new InstantiationSet();
    set.add(dynamicArrayOf(genericType('Option', [INT])));
    set.add(dynamicArrayOf(INT));
    set.add(dynamicArrayOf(INT));
    expect(set.dynamicArrayElements().map(mangleType)).toEqual(['Option_int', 'int']);
    expect(set.values().map(mangleType)).toEqual(['Option_int']);
  });

  test('an unresolved type parameter is an internal error', () => {
    const error = catchCompilerError(() => new InstantiationSet().add(genericType('Option', [{ kind: 'typeParam', name: 'T' }])));
    expect(error.kind).toBe('InternalError');
    expect(error.message).toBe('unresolved type parameter `T` reached lowering');
  });
});

describe('orderDefinitions', () => {
  test('embedded structs are defined first', () => {
    const defs: TypeDefinition[] = [
      { kind: 'struct', name: 'Line', fields: [['a', structType('Point')], ['b', structType('Point')]] },
      { kind: 'struct', name: 'Point', fields: [['x', INT]] },
    ];
    expect(names(orderDefinitions(defs))).toEqual(['Point', 'Line']);
  });

  test('a generic follows the struct it carries', () => {
    const defs: TypeDefinition[] = [
      { kind: 'generic', type: genericType('Option', [structType('Point')]) },
      { kind: 'struct', name: 'Point', fields: [['x', INT]] },
    ];
    expect(names(orderDefinitions(defs))).toEqual(['Point', 'Option_Point']);
  });

  test('pointers do not create an ordering constraint', () => {
    const defs: TypeDefinition[] = [
      { kind: 'struct', name: 'Node', fields: [['next', pointerTo(structType('Node'))]] },
      { kind: 'struct', name: 'List', fields: [['head', pointerTo(structType('Node'))]] },
    ];
    expect(names(orderDefinitions(defs))).toEqual(['Node', 'List']);
  });

  test('a by-value cycle is unsupported', () => {
    const defs: TypeDefinition[] = [
      { kind: 'struct', name: 'A', fields: [['b', structType('B')]] },
      { kind: 'struct', name: 'B', fields: [['a', structType('A')]] },
    ];
    const error = catchCompilerError(() => orderDefinitions(defs));
    expect(error.kind).toBe('UnsupportedFeature');
    expect(error.message).toBe('type `A` contains itself by value (A -> B -> A)');
  });
});
