import { cType, enumConstant, escapeC, variantMacro } from '../src/tessel/codegen-c.js';
import { compileSource } from '../src/tessel/compile.js';
import type { CompilerError } from '../src/tessel/errors.js';
import { BOOL, FLOAT, INT, STRING, arrayOf, dynamicArrayOf, genericType, pointerTo, structType } from '../src/tessel/types.js';

function compile(source: string): string {
  const result = compileSource(source, { file: 'main.tsl' });
  if (!result.ok) throw result.error;
  return result.code;
}

function compileError(source: string): CompilerError {
  const result = compileSource(source, { file: 'main.tsl' });
  if (result.ok) throw new Error('expected compilation to fail');
  return result.error;
}

const lines = (code: string) => code.split('\n');
const countStarting = (code: string, prefix: string) => lines(code).filter((l) => l.startsWith(prefix)).length;

describe('C type mapping', () => {
  test('primitives and containers', () => {
    expect([INT, BOOL, FLOAT, STRING].map(cType)).toEqual(['int', 'int', 'double', 'char*']);
    expect(cType(pointerTo(structType('Point')))).toBe('Point*');
    expect(cType(arrayOf(INT, 3))).toBe('int*');
    expect(cType(dynamicArrayOf(STRING))).toBe('DynamicArray_charptr');
    expect(cType(dynamicArrayOf(FLOAT))).toBe('DynamicArray_double');
    expect(cType(structType('geo.Point'))).toBe('Point');
    expect(cType(structType('str'))).toBe('char*');
    expect(cType(genericType('Result', [INT, STRING]))).toBe('Result_int_string');
  });

  test('enum constants and value-less variant macros', () => {
    expect(enumConstant('Color', 'Red')).toBe('COLOR_RED');
    expect(variantMacro(genericType('Option', [INT]), 'None')).toBe('OPTION_INT_NONE');
  });

  test('escapes string and char literals', () => {
    expect(escapeC('a"b\n', '"')).toBe('a\\"b\\n');
    expect(escapeC("it's", "'")).toBe("it\\'s");
    expect(escapeC("it's", '"')).toBe("it's");
    expect(escapeC('\u0001', '"')).toBe('\\001');
  });
});

describe('C lowering', () => {
  const safeDiv = [
    'fn safe_div(a: int, b: int) -> Result<int, string> {',
    '  if b == 0 { return Result::Err("div by zero"); }',
    '  return Result::Ok(a / b);',
    '}',
  ].join('\n');

  test('a fallible function gets one Result definition and tagged returns', () => {
    const code = compile(
      `${safeDiv}\nfn main() {\n  let r = safe_div(10, 2);\n  match r { Result::Ok(v) => println(v), Result::Err(e) => println(e) }\n}`
    );
    expect(countStarting(code, 'typedef struct Result_int_string {')).toBe(1);
    expect(lines(code)).toContain(
      'typedef enum { Result_int_string_Ok, Result_int_string_Err } Result_int_string_Tag;'
    );
    expect(lines(code)).toContain(
      'typedef struct Result_int_string { Result_int_string_Tag tag; union { int ok_value; char* err_value; } data; } Result_int_string;'
    );
    expect(lines(code)).toContain('Result_int_string safe_div(int a, int b);');
    expect(lines(code)).toContain('  if ((b == 0)) {');
    expect(lines(code)).toContain(
      '    return ((Result_int_string){ .tag = Result_int_string_Err, .data = { .err_value = "div by zero" } });'
    );
    expect(lines(code)).toContain(
      '  return ((Result_int_string){ .tag = Result_int_string_Ok, .data = { .ok_value = (a / b) } });'
    );
    expect(lines(code)).toContain('  Result_int_string r = safe_div(10, 2);');
    expect(lines(code)).toContain(
      '  ({ Result_int_string __match_0 = r; switch (__match_0.tag) { ' +
        'case Result_int_string_Ok: { int v = __match_0.data.ok_value; printf("%d\\n", v); break; } ' +
        'case Result_int_string_Err: { char* e = __match_0.data.err_value; printf("%s\\n", e); break; } } });'
    );
  });

  test('an Option match becomes a switch on the tag with a result temporary', () => {
    const code = compile('fn get(opt: Option<int>) -> int {\n  return match opt { Option::Some(v) => v, Option::None => 0 };\n}');
    expect(lines(code)).toContain(
      '  return ({ Option_int __match_0 = opt; int __result_0; switch (__match_0.tag) { ' +
        'case Option_int_Some: { int v = __match_0.data.some_value; __result_0 = v; break; } ' +
        'case Option_int_None: { __result_0 = 0; break; } } __result_0; });'
    );
    expect(lines(code)).toContain('#define OPTION_INT_NONE ((Option_int){ .tag = Option_int_None })');
  });

  test('the same instantiation used in many places is defined once', () => {
    const code = compile(
      [
        'fn first(xs: [int; 2]) -> Option<int> { return Option::Some(xs[0]); }',
        'fn none() -> Option<int> { return Option::None; }',
        'fn main() {',
        '  let a: Option<int> = Option::Some(1);',
        '  let b = none();',
        '}',
      ].join('\n')
    );
    expect(countStarting(code, 'typedef struct Option_int {')).toBe(1);
    expect(countStarting(code, 'typedef struct Option_int Option_int;')).toBe(1);
    expect(lines(code)).toContain('  return OPTION_INT_NONE;');
    expect(lines(code)).toContain('  Option_int a = ((Option_int){ .tag = Option_int_Some, .data = { .some_value = 1 } });');
  });

  test('push and pop grow and shrink a dynamic array', () => {
    const code = compile('fn main() {\n  let xs = new [int]();\n  xs.push(4);\n  let last = xs.pop();\n}');
    expect(lines(code)).toContain('  DynamicArray_int xs = ((DynamicArray_int){ .data = NULL, .size = 0, .capacity = 0 });');
    expect(lines(code)).toContain(
      '  ({ if (xs.size == xs.capacity) { size_t new_cap = xs.capacity ? xs.capacity * 2 : 4; ' +
        'xs.data = realloc(xs.data, new_cap * sizeof(xs.data[0])); xs.capacity = new_cap; } xs.data[xs.size++] = 4; });'
    );
    expect(lines(code)).toContain('  int last = (xs.size > 0 ? xs.data[--xs.size] : 0);');
  });

  test('dynamic arrays of dynamic arrays push and pop through the outer array', () => {
    const code = compile(
      [
        'fn main() {',
        '  let outer = new [DynamicArray[int]]();',
        '  outer.push(new [int]());',
        '  outer[0].push(2);',
        '  let inner = outer.pop();',
        '  let n = inner.pop();',
        '}',
      ].join('\n')
    );
    expect(lines(code)).toContain('typedef struct { DynamicArray_int* data; size_t size; size_t capacity; } DynamicArray_vec_int;');
    expect(lines(code)).toContain(
      '  DynamicArray_vec_int outer = ((DynamicArray_vec_int){ .data = NULL, .size = 0, .capacity = 0 });'
    );
    expect(lines(code)).toContain(
      '  ({ if (outer.size == outer.capacity) { size_t new_cap = outer.capacity ? outer.capacity * 2 : 4; ' +
        'outer.data = realloc(outer.data, new_cap * sizeof(outer.data[0])); outer.capacity = new_cap; } ' +
        'outer.data[outer.size++] = ((DynamicArray_int){ .data = NULL, .size = 0, .capacity = 0 }); });'
    );
    expect(lines(code)).toContain(
      '  ({ if (outer.data[0].size == outer.data[0].capacity) { size_t new_cap = outer.data[0].capacity ? outer.data[0].capacity * 2 : 4; ' +
        'outer.data[0].data = realloc(outer.data[0].data, new_cap * sizeof(outer.data[0].data[0])); outer.data[0].capacity = new_cap; } ' +
        'outer.data[0].data[outer.data[0].size++] = 2; });'
    );
    expect(lines(code)).toContain(
      '  DynamicArray_int inner = (outer.size > 0 ? outer.data[--outer.size] : ((DynamicArray_int){0}));'
    );
    expect(lines(code)).toContain('  int n = (inner.size > 0 ? inner.data[--inner.size] : 0);');
  });

  test('a wildcard-only match on a struct lowers to a plain block', () => {
    const code = compile('struct P { a: int }\nfn main() {\n  let p = P { a: 1 };\n  let x = match p { _ => 2 };\n}');
    expect(lines(code)).toContain('  int x = ({ P __match_0 = p; int __result_0; { __result_0 = 2; } __result_0; });');
    expect(code).not.toContain('switch (__match_0)');
  });

  test('try unwraps or returns the failure', () => {
    const code = compile(
      [
        'fn parse(s: string) -> Result<int, string> { return Result::Ok(1); }',
        'fn twice(s: string) -> Result<int, string> {',
        '  let v = parse(s)?;',
        '  return Result::Ok(v * 2);',
        '}',
      ].join('\n')
    );
    expect(lines(code)).toContain(
      '  int v = ({ Result_int_string __try_0 = parse(s); int __try_value_0; switch (__try_0.tag) { ' +
        'case Result_int_string_Ok: __try_value_0 = __try_0.data.ok_value; break; ' +
        'case Result_int_string_Err: return ((Result_int_string){ .tag = Result_int_string_Err, .data = { .err_value = __try_0.data.err_value } }); } ' +
        '__try_value_0; });'
    );
  });

  test('try on an Option returns the None macro', () => {
    const code = compile(
      'fn inc(o: Option<int>) -> Option<int> {\n  let v = o?;\n  return Option::Some(v + 1);\n}'
    );
    expect(lines(code)).toContain(
      '  int v = ({ Option_int __try_0 = o; int __try_value_0; switch (__try_0.tag) { ' +
        'case Option_int_Some: __try_value_0 = __try_0.data.some_value; break; ' +
        'case Option_int_None: return OPTION_INT_NONE; } __try_value_0; });'
    );
  });

  test('string concatenation allocates a new buffer', () => {
    const code = compile('fn main() {\n  let s = "a" + "b";\n}');
    expect(lines(code)).toContain(
      '  char* s = ({ char* __concat_0 = malloc(strlen("a") + strlen("b") + 1); strcpy(__concat_0, "a"); strcat(__concat_0, "b"); __concat_0; });'
    );
  });

  test('strings compare through strcmp', () => {
    const code = compile('fn same(s: string) -> bool {\n  return s == "x";\n}');
    expect(lines(code)).toContain('  return (strcmp(s, "x") == 0);');
    expect(lines(code)).toContain('int same(char* s);');
  });

  test('print picks a format from the argument type', () => {
    const code = compile('fn main() {\n  print(3.5);\n  println("hi");\n  println();\n  let n = len("abc");\n}');
    expect(lines(code)).toContain('  printf("%f", 3.5);');
    expect(lines(code)).toContain('  printf("%s\\n", "hi");');
    expect(lines(code)).toContain('  printf("\\n");');
    expect(lines(code)).toContain('  int n = strlen("abc");');
  });

  test('fixed arrays print element by element', () => {
    const code = compile('fn main() {\n  let xs = [1, 2];\n  println(xs);\n}');
    expect(lines(code)).toContain('  int* xs = (int[]){1, 2};');
    expect(lines(code)).toContain(
      '  ({ int* __print_0 = xs; printf("["); for (int __i_0 = 0; __i_0 < 2; __i_0++) ' +
        '{ if (__i_0 > 0) printf(", "); printf("%d", __print_0[__i_0]); } printf("]\\n"); });'
    );
  });

  test('range loops become counted for loops', () => {
    const code = compile('fn main() {\n  for i: 0..3 {\n    print(i);\n  }\n}');
    expect(code).toContain(['  for (int i = 0; i < 3; i++) {', '    printf("%d", i);', '  }'].join('\n'));
  });

  test('enums, structs, externs and globals', () => {
    const code = compile(
      [
        'enum Color { Red, Green = 5, Blue }',
        'struct Point { x: int, y: int }',
        'extern fn log_line(level: int, ...) -> int;',
        'let limit: int = 10;',
        'fn main() { let p = Point { x: 1, y: 2 }; }',
      ].join('\n')
    );
    expect(lines(code)).toContain('typedef enum { COLOR_RED = 0, COLOR_GREEN = 5, COLOR_BLUE = 6 } Color;');
    expect(lines(code)).toContain('typedef struct Point Point;');
    expect(code).toContain(['struct Point {', '  int x;', '  int y;', '};'].join('\n'));
    expect(lines(code)).toContain('int log_line(int level, ...);');
    expect(lines(code)).toContain('static int limit = 10;');
    expect(lines(code)).toContain('  Point p = ((Point){ .x = 1, .y = 2 });');
  });

  test('the entry point wraps the program main', () => {
    const code = compile('fn main() {\n  println("hi");\n}');
    expect(lines(code)).toContain('void tessel_main(void);');
    expect(code).toContain(
      ['int main(int argc, char* argv[]) {', '  __tessel_argc = argc;', '  __tessel_argv = argv;', '  tessel_main();', '  return 0;', '}'].join(
        '\n'
      )
    );
  });

  test('an int main returns its value', () => {
    const code = compile('fn main() -> int {\n  return 3;\n}');
    expect(lines(code)).toContain('  return tessel_main();');
  });

  test('math.h is included only when a math function is called', () => {
    expect(lines(compile('fn main() {\n  let n = abs(-2);\n}'))).not.toContain('#include <math.h>');
    const code = compile('fn main() {\n  let r = sqrt(2.0);\n}');
    expect(lines(code)).toContain('#include <math.h>');
    expect(lines(code)).toContain('  double r = sqrt(2.0);');
  });

  test('intrinsic calls take their listed return types', () => {
    const code = compile('fn main() {\n  let p = malloc(8);\n  let s = strdup("x");\n  free(p);\n}');
    expect(lines(code)).toContain('  void* p = malloc(8);');
    expect(lines(code)).toContain('  char* s = strdup("x");');
    expect(lines(code)).toContain('  free(p);');
  });

  test('string helpers are emitted only when used', () => {
    const code = compile('fn main() {\n  let s = " x ";\n  let t = s.trim();\n}');
    expect(lines(code)).toContain('char* tessel_trim(const char* s) {');
    expect(lines(code)).not.toContain('char* tessel_substring(const char* s, int start, int end) {');
    expect(lines(code)).toContain('  char* t = tessel_trim(s);');
  });

  describe('unsupported constructs', () => {
    test('globals need constant initializers', () => {
      const error = compileError('fn f() -> int { return 1; }\nlet g = f();');
      expect(error.kind).toBe('UnsupportedFeature');
      expect(error.message).toBe('global `g` must be initialized with a constant expression');
    });

    test('structs cannot be compared directly', () => {
      const error = compileError(
        'struct P { x: int }\nfn same(a: P, b: P) -> bool {\n  return a == b;\n}'
      );
      expect(error.kind).toBe('UnsupportedFeature');
      expect(error.message).toBe('values of type `P` cannot be compared with `==`');
    });
  });
});
