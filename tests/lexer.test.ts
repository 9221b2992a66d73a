import { tokenize } from '../src/tessel/lexer.js';
import { catchCompilerError } from './helpers.js';

const kinds = (source: string) => tokenize(source).map((t) => `${t.type}:${t.text}`);

describe('Tessel lexer', () => {
  test('splits ranges from integers', () => {
    expect(kinds('let x = 1..5;')).toEqual([
      'keyword:let',
      'identifier:x',
      'op:=',
      'integer:1',
      'dotdot:..',
      'integer:5',
      'semicolon:;',
      'eof:',
    ]);
  });

  test('prefers longer punctuation', () => {
    expect(kinds('a::b -> c => d ... e == f')).toEqual([
      'identifier:a',
      'coloncolon:::',
      'identifier:b',
      'arrow:->',
      'identifier:c',
      'fatArrow:=>',
      'identifier:d',
      'ellipsis:...',
      'identifier:e',
      'op:==',
      'identifier:f',
      'eof:',
    ]);
  });

  test('tracks lines, columns and offsets', () => {
    const tokens = tokenize('fn main() {\n  return 1;\n}');
    const ret = tokens[5];
    expect(ret).toMatchObject({ type: 'keyword', text: 'return', line: 2, col: 3, offset: 14 });
    const close = tokens[8];
    expect(close).toMatchObject({ type: 'rbrace', line: 3, col: 1, offset: 24 });
    expect(tokens[9]).toEqual({ type: 'eof', text: '', value: '', offset: 25, line: 3, col: 2 });
  });

  test('skips line and block comments', () => {
    const tokens = tokenize('// hi\nlet /* block\n */ x');
    expect(tokens.map((t) => [t.text, t.line, t.col])).toEqual([
      ['let', 2, 1],
      ['x', 3, 5],
      ['', 3, 6],
    ]);
  });

  test('decodes escapes in strings and chars', () => {
    const [str, ch] = tokenize(`"a\\tb\\"" '\\n'`);
    expect(str).toMatchObject({ type: 'string', text: '"a\\tb\\""', value: 'a\tb"' });
    expect(ch).toMatchObject({ type: 'char', value: '\n' });
  });

  test('reads floats with exponents', () => {
    expect(kinds('3.14 2.5e3')).toEqual(['float:3.14', 'float:2.5e3', 'eof:']);
  });

  test('void is an identifier, not a keyword', () => {
    expect(kinds('void')).toEqual(['identifier:void', 'eof:']);
  });

  test('reports unexpected characters', () => {
    const error = catchCompilerError(() => tokenize('let x = 1 @ 2;', 'main.tsl'));
    expect(error.kind).toBe('UnexpectedCharacter');
    expect(error.message).toBe("unexpected character '@'");
    expect(error.location).toEqual({ file: 'main.tsl', line: 1, column: 11, length: 1 });
  });

  test('reports unterminated strings', () => {
    const error = catchCompilerError(() => tokenize('let s = "abc', 'main.tsl'));
    expect(error.kind).toBe('UnterminatedString');
    expect(error.code).toBe('E002');
    expect(error.location).toEqual({ file: 'main.tsl', line: 1, column: 9, length: 4 });
  });

  test('reports bad escapes at the backslash', () => {
    const error = catchCompilerError(() => tokenize('"\\q"', 'main.tsl'));
    expect(error.kind).toBe('InvalidEscapeSequence');
    expect(error.message).toBe('unknown escape sequence `\\q`');
    expect(error.location).toEqual({ file: 'main.tsl', line: 1, column: 2, length: 2 });
  });

  test('rejects multi-character char literals', () => {
    const error = catchCompilerError(() => tokenize("let c = 'ab';"));
    expect(error.kind).toBe('InvalidSyntax');
    expect(error.message).toBe('char literal must contain exactly one character');
  });

  test('rejects integers beyond the safe range', () => {
    expect(catchCompilerError(() => tokenize('9007199254740993')).kind).toBe('InvalidNumber');
  });
});
