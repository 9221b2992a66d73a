import {
  BOOL,
  CHAR,
  FLOAT,
  INT,
  STRING,
  VOID,
  arrayOf,
  compatible,
  containsTypeParam,
  dynamicArrayOf,
  enumType,
  formatType,
  genericType,
  mangleType,
  pointerTo,
  structType,
  typesEqual,
  type Type,
} from '../src/tessel/types.js';

describe('type model', () => {
  const samples: Type[] = [
    INT,
    FLOAT,
    BOOL,
    CHAR,
    STRING,
    VOID,
    pointerTo(INT),
    arrayOf(INT, 3),
    dynamicArrayOf(STRING),
    structType('Point'),
    structType('geo.Point'),
    structType('str'),
    enumType('Color'),
    genericType('Option', [INT]),
    genericType('Result', [INT, STRING]),
  ];

  test('compatibility is reflexive and symmetric', () => {
    for (const a of samples) {
      expect(compatible(a, a)).toBe(true);
      for (const b of samples) {
        expect(compatible(a, b)).toBe(compatible(b, a));
      }
    }
  });

  test('array length is not part of type identity', () => {
    expect(typesEqual(arrayOf(INT, 3), arrayOf(INT, 5))).toBe(true);
    expect(typesEqual(arrayOf(INT, 3), arrayOf(INT))).toBe(true);
    expect(typesEqual(arrayOf(INT), arrayOf(FLOAT))).toBe(false);
  });

  test('str and string are interchangeable', () => {
    expect(compatible(structType('str'), STRING)).toBe(true);
    expect(typesEqual(structType('str'), STRING)).toBe(false);
  });

  test('qualified names match their unqualified form but not each other', () => {
    const a = structType('a.Point');
    const plain = structType('Point');
    const b = structType('b.Point');
    expect(compatible(a, plain)).toBe(true);
    expect(compatible(plain, b)).toBe(true);
    expect(compatible(a, b)).toBe(false);
  });

  test('struct and enum of the same name are compatible', () => {
    expect(compatible(structType('Color'), enumType('Color'))).toBe(true);
    expect(compatible(structType('Color'), enumType('Shade'))).toBe(false);
  });

  test('containers compare elementwise', () => {
    expect(compatible(pointerTo(structType('str')), pointerTo(STRING))).toBe(true);
    expect(compatible(dynamicArrayOf(INT), dynamicArrayOf(FLOAT))).toBe(false);
    expect(compatible(genericType('Option', [INT]), genericType('Option', [FLOAT]))).toBe(false);
    expect(compatible(genericType('Option', [INT]), genericType('Option', [INT]))).toBe(true);
    expect(compatible(INT, FLOAT)).toBe(false);
  });

  test('formats types as they are written', () => {
    expect(formatType(pointerTo(INT))).toBe('*int');
    expect(formatType(arrayOf(FLOAT, 4))).toBe('[float; 4]');
    expect(formatType(arrayOf(FLOAT))).toBe('[float]');
    expect(formatType(dynamicArrayOf(CHAR))).toBe('DynamicArray[char]');
    expect(formatType(genericType('Result', [genericType('Option', [INT]), STRING]))).toBe(
      'Result<Option<int>, string>'
    );
  });

  test('mangles types into C identifier fragments', () => {
    expect(mangleType(genericType('Option', [INT]))).toBe('Option_int');
    expect(mangleType(genericType('Result', [genericType('Option', [INT]), STRING]))).toBe(
      'Result_Option_int_string'
    );
    expect(mangleType(pointerTo(structType('geo.Point')))).toBe('ptr_Point');
    expect(mangleType(structType('str'))).toBe('string');
    expect(mangleType(dynamicArrayOf(FLOAT))).toBe('vec_float');
    expect(mangleType(arrayOf(BOOL, 2))).toBe('arr_bool');
  });

  test('detects unresolved type parameters', () => {
    expect(containsTypeParam(genericType('Option', [{ kind: 'typeParam', name: 'T' }]))).toBe(true);
    expect(containsTypeParam(pointerTo(arrayOf(INT)))).toBe(false);
  });
});
