import type { Expr } from '../src/tessel/ast.js';
import { tokenize } from '../src/tessel/lexer.js';
import { Parser, parseTessel } from '../src/tessel/parser.js';
import { formatType } from '../src/tessel/types.js';
import { catchCompilerError } from './helpers.js';

function show(e: Expr): string {
  switch (e.type) {
    case 'Literal':
      return String(e.literal.value);
    case 'Identifier':
      return e.name;
    case 'Binary':
      return `(${e.op} ${show(e.left)} ${show(e.right)})`;
    case 'Unary':
      return `(${e.op}${show(e.operand)})`;
    case 'Call':
      return `${show(e.callee)}(${e.args.map(show).join(', ')})`;
    case 'Member':
      return `${show(e.object)}.${e.property}`;
    case 'Index':
      return `${show(e.object)}[${show(e.index)}]`;
    case 'Cast':
      return `(${show(e.value)} as ${formatType(e.targetType)})`;
    case 'Try':
      return `${show(e.value)}?`;
    case 'Ternary':
      return `(${show(e.condition)} ? ${show(e.whenTrue)} : ${show(e.whenFalse)})`;
    case 'Range':
      return `${show(e.start)}..${show(e.end)}`;
    case 'EnumAccess':
      return `${e.enumName}::${e.variant}`;
    default:
      return e.type;
  }
}

const expr = (source: string) => show(new Parser(tokenize(source, 'expr.tsl'), 'expr.tsl').parseExpression());

describe('Tessel parser', () => {
  test('parses every kind of top-level item', () => {
    const program = parseTessel(
      [
        'import geo.shapes as gs;',
        'export fn area(w: int, h: int) -> int { return w * h; }',
        'struct Point { x: int, y: int }',
        'enum Color { Red, Green = 5, Blue }',
        'extern fn printf(fmt: string, ...) -> int;',
        'let limit: int = 10;',
        'export { Point };',
      ].join('\n')
    );
    expect(program.imports).toMatchObject([{ type: 'Import', module: 'geo.shapes', alias: 'gs' }]);
    expect(program.exports.map((e) => [e.kind, e.name])).toEqual([
      ['function', 'area'],
      [undefined, 'Point'],
    ]);
    expect(program.functions[0]).toMatchObject({ name: 'area', exported: true });
    expect(program.functions[0]?.params.map((p) => p.name)).toEqual(['w', 'h']);
    expect(program.structs[0]?.fields.map((f) => f.name)).toEqual(['x', 'y']);
    expect(program.enums[0]?.variants.map((v) => [v.name, v.value])).toEqual([
      ['Red', 0],
      ['Green', 5],
      ['Blue', 6],
    ]);
    expect(program.externs[0]).toMatchObject({ name: 'printf', variadic: true });
    expect(program.externs[0]?.params).toHaveLength(1);
    expect(program.globals[0]).toMatchObject({ type: 'Let', name: 'limit', mutable: false });
  });

  test('negative enum values restart the count', () => {
    const program = parseTessel('enum Level { Low = -1, Mid, High }');
    expect(program.enums[0]?.variants.map((v) => v.value)).toEqual([-1, 0, 1]);
  });

  test('binary operators follow precedence and associate left', () => {
    expect(expr('1 + 2 * 3 == 7 && !done')).toBe('(&& (== (+ 1 (* 2 3)) 7) (!done))');
    expect(expr('a - b - c')).toBe('(- (- a b) c)');
    expect(expr('a || b && c')).toBe('(|| a (&& b c))');
  });

  test('postfix forms', () => {
    expect(expr('p->x')).toBe('(*p).x');
    expect(expr('items[i + 1].name')).toBe('items[(+ i 1)].name');
    expect(expr('s.substring(0, 2)')).toBe('s.substring(0, 2)');
    expect(expr('Color::Red')).toBe('Color::Red');
  });

  test('a question mark is try unless an expression follows', () => {
    expect(expr('f(x)?')).toBe('f(x)?');
    expect(expr('ok ? 1 : 2')).toBe('(ok ? 1 : 2)');
    expect(expr('f(x)? == 1')).toBe('(== f(x)? 1)');
  });

  test('a star after a cast type is multiplication when an operand follows', () => {
    expect(expr('x as float * 2.0')).toBe('(* (x as float) 2)');
  });

  test('ranges bind looser than arithmetic', () => {
    expect(expr('-1..n + 1')).toBe('(-1)..(+ n 1)');
  });

  test('parses type annotations', () => {
    const program = parseTessel(
      [
        'let a: [int; 3];',
        'let b: DynamicArray[string];',
        'let c: Result<Option<int>, string>;',
        'let d: *Point;',
        'let e: Point*;',
        'let f: geo.Point;',
        'let g: [float];',
      ].join('\n')
    );
    expect(program.globals.map((g) => (g.typeName ? formatType(g.typeName) : '?'))).toEqual([
      '[int; 3]',
      'DynamicArray[string]',
      'Result<Option<int>, string>',
      '*Point',
      '*Point',
      'geo.Point',
      '[float]',
    ]);
  });

  test('else if chains nest in the else block', () => {
    const program = parseTessel('fn main() {\n  if a { x = 1; } else if b { x = 2; } else { x = 3; }\n}');
    const stmt = program.functions[0]?.body[0];
    expect(stmt?.type).toBe('If');
    if (stmt?.type !== 'If') return;
    const nested = stmt.elseBlock?.[0];
    expect(nested?.type).toBe('If');
    if (nested?.type !== 'If') return;
    expect(nested.elseBlock).toHaveLength(1);
    expect(nested.thenBlock[0]).toMatchObject({ type: 'Assign', target: { type: 'Identifier', name: 'x' } });
  });

  test('struct literals are not read inside a condition', () => {
    const program = parseTessel('fn main() {\n  if Ready { go(); }\n  let p = Point { x: 1, y: 2 };\n}');
    const [cond, decl] = program.functions[0]?.body ?? [];
    expect(cond).toMatchObject({ type: 'If', condition: { type: 'Identifier', name: 'Ready' } });
    expect(decl).toMatchObject({ type: 'Let', value: { type: 'StructLiteral', name: 'Point' } });
    if (decl?.type === 'Let' && decl.value?.type === 'StructLiteral') {
      expect(decl.value.fields.map((f) => f.name)).toEqual(['x', 'y']);
    }
  });

  test('for loops and new arrays', () => {
    const program = parseTessel('fn main() {\n  let xs = new [int]();\n  for i: 0..10 { xs.push(i); }\n}');
    const [decl, loop] = program.functions[0]?.body ?? [];
    expect(decl).toMatchObject({ type: 'Let', value: { type: 'NewArray' } });
    expect(loop).toMatchObject({ type: 'For', variable: 'i', iterable: { type: 'Range' } });
  });

  test('match arms take variant, literal and wildcard patterns', () => {
    const program = parseTessel(
      'fn main() {\n  let r = match opt { Option::Some(v) => v, Option::None => 0, };\n  match n { -1 => 0, "a" => 1, _ => 2 }\n}'
    );
    const [first, second] = program.functions[0]?.body ?? [];
    expect(first?.type).toBe('Let');
    if (first?.type !== 'Let' || first.value?.type !== 'Match') throw new Error('expected a match binding');
    expect(first.value.arms.map((a) => a.pattern)).toMatchObject([
      { kind: 'variant', enumName: 'Option', variant: 'Some', binding: 'v' },
      { kind: 'variant', enumName: 'Option', variant: 'None' },
    ]);
    expect(second?.type).toBe('ExprStmt');
    if (second?.type !== 'ExprStmt' || second.expr.type !== 'Match') throw new Error('expected a match statement');
    expect(second.expr.arms.map((a) => a.pattern)).toMatchObject([
      { kind: 'literal', literal: { kind: 'int', value: -1 } },
      { kind: 'literal', literal: { kind: 'string', value: 'a' } },
      { kind: 'wildcard' },
    ]);
  });

  test('every node records its span', () => {
    const program = parseTessel('let x = 42;');
    expect(program.globals[0]?.location).toEqual({
      start: { line: 1, column: 1, offset: 0 },
      end: { line: 1, column: 12, offset: 11 },
    });
  });

  describe('errors', () => {
    test('missing semicolon points just past the statement', () => {
      const error = catchCompilerError(() => parseTessel('fn main() {\n  let x = 1\n  return x;\n}', { file: 'main.tsl' }));
      expect(error.kind).toBe('MissingSemicolon');
      expect(error.message).toBe('expected `;` after statement');
      expect(error.location).toEqual({ file: 'main.tsl', line: 2, column: 12, length: 1 });
    });

    test('unclosed blocks point at the opening brace', () => {
      const error = catchCompilerError(() => parseTessel('fn main() {\n  let x = 1;\n', { file: 'main.tsl' }));
      expect(error.kind).toBe('UnclosedDelimiter');
      expect(error.message).toBe('unclosed delimiter `{`');
      expect(error.location).toEqual({ file: 'main.tsl', line: 1, column: 11, length: 1 });
    });

    test('expected punctuation', () => {
      const error = catchCompilerError(() => parseTessel('struct P { x int }'));
      expect(error.kind).toBe('ExpectedToken');
      expect(error.message).toBe('expected `:`, found `int`');
    });

    test('unexpected tokens name what was wanted', () => {
      expect(catchCompilerError(() => parseTessel('fn main( {}')).message).toBe(
        'expected parameter name, found `{`'
      );
      expect(catchCompilerError(() => parseTessel('return 1;')).message).toBe(
        'expected a top-level declaration, found `return`'
      );
      expect(catchCompilerError(() => parseTessel('let x = ;')).message).toBe('expected an expression, found `;`');
    });

    test('only externs may be variadic', () => {
      const error = catchCompilerError(() => parseTessel('fn f(...) {}'));
      expect(error.kind).toBe('InvalidSyntax');
      expect(error.message).toBe('only `extern fn` declarations can be variadic');
    });
  });
});
