import moo from 'moo';
import { CompilerError } from './errors.js';

export type TokenType =
  | 'ws'
  | 'comment'
  | 'newline'
  | 'lbrace'
  | 'rbrace'
  | 'lparen'
  | 'rparen'
  | 'lbracket'
  | 'rbracket'
  | 'comma'
  | 'semicolon'
  | 'coloncolon'
  | 'colon'
  | 'ellipsis'
  | 'dotdot'
  | 'dot'
  | 'arrow'
  | 'fatArrow'
  | 'question'
  | 'op'
  | 'keyword'
  | 'float'
  | 'integer'
  | 'string'
  | 'unterminatedString'
  | 'char'
  | 'unterminatedChar'
  | 'identifier'
  | 'error';

export const keywords = [
  'fn', 'let', 'const', 'mut', 'if', 'else', 'while', 'for', 'return', 'break', 'continue',
  'match', 'struct', 'enum', 'new', 'delete', 'import', 'as', 'export', 'extern',
  'int', 'float', 'bool', 'char', 'string', 'true', 'false',
] as const;

export interface TesselToken {
  type: Exclude<TokenType, 'ws' | 'comment' | 'newline' | 'unterminatedString' | 'unterminatedChar' | 'error'>;
  /** Source text of the token. */
  text: string;
  /** Decoded value of string and char literals; source text otherwise. */
  value: string;
  offset: number;
  line: number;
  col: number;
}

export interface EofToken {
  type: 'eof';
  text: '';
  value: '';
  offset: number;
  line: number;
  col: number;
}

export type Token = TesselToken | EofToken;

const skipped: ReadonlySet<string> = new Set(['ws', 'comment', 'newline']);

type PlainTokenType = Exclude<TesselToken['type'], 'string' | 'char' | 'integer'>;

const plainTokenTypes: readonly PlainTokenType[] = [
  'lbrace', 'rbrace', 'lparen', 'rparen', 'lbracket', 'rbracket', 'comma', 'semicolon', 'coloncolon',
  'colon', 'ellipsis', 'dotdot', 'dot', 'arrow', 'fatArrow', 'question', 'op', 'keyword', 'float', 'identifier',
];

const isPlainTokenType = (type: string): type is PlainTokenType => plainTokenTypes.some((t) => t === type);

function createMooLexer(): moo.Lexer {
  return moo.compile({
    ws: /[ \t\r]+/,
    comment: [
      { match: /\/\*[\s\S]*?\*\//, lineBreaks: true },
      { match: /\/\/[^\n]*/, lineBreaks: false },
    ],
    newline: { match: /\n/, lineBreaks: true },
    lbrace: '{',
    rbrace: '}',
    lparen: '(',
    rparen: ')',
    lbracket: '[',
    rbracket: ']',
    comma: ',',
    semicolon: ';',
    coloncolon: '::',
    colon: ':',
    ellipsis: '...',
    dotdot: '..',
    dot: '.',
    arrow: '->',
    fatArrow: '=>',
    question: '?',
    op: ['==', '!=', '<=', '>=', '&&', '||', '+', '-', '*', '/', '%', '=', '<', '>', '!', '&', '|'],
    float: /[0-9]+\.[0-9]+(?:[eE][+-]?[0-9]+)?/,
    integer: /[0-9]+/,
    string: /"(?:\\.|[^"\\\n])*"/,
    unterminatedString: /"(?:\\.|[^"\\\n])*/,
    char: /'(?:\\.|[^'\\\n])*'/,
    unterminatedChar: /'(?:\\.|[^'\\\n])*/,
    identifier: {
      match: /[A-Za-z_][A-Za-z0-9_]*/,
      type: moo.keywords({ keyword: Array.from(keywords) }),
    },
    error: moo.error,
  });
}

const escapes: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '0': '\0',
  '\\': '\\',
  '"': '"',
  "'": "'",
};

const at = (file: string, token: moo.Token, length = token.text.length) => ({
  file,
  line: token.line,
  column: token.col,
  length,
});

function decodeEscapes(body: string, file: string, token: moo.Token): string {
  let out = '';
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch !== '\\') {
      out += ch;
      continue;
    }
    const next = body[i + 1];
    const decoded = escapes[next];
    if (decoded === undefined) {
      throw new CompilerError(
        'InvalidEscapeSequence',
        `unknown escape sequence \`\\${next}\``,
        { file, line: token.line, column: token.col + i + 1, length: 2 }
      ).withSuggestion('supported escapes are \\n, \\t, \\r, \\0, \\\\, \\" and \\\'');
    }
    out += decoded;
    i++;
  }
  return out;
}

function toToken(token: moo.Token, file: string): TesselToken | null {
  const type = token.type ?? 'error';
  if (skipped.has(type)) return null;
  const base = { text: token.text, value: token.text, offset: token.offset, line: token.line, col: token.col };

  switch (type) {
    case 'error':
      throw new CompilerError('UnexpectedCharacter', `unexpected character '${token.text[0]}'`, at(file, token, 1))
        .withSuggestion('remove or replace the unexpected character');
    case 'unterminatedString':
      throw new CompilerError('UnterminatedString', 'unterminated string literal', at(file, token))
        .withSuggestion('add a closing double quote (") to complete the string');
    case 'unterminatedChar':
      throw new CompilerError('UnterminatedString', 'unterminated char literal', at(file, token))
        .withSuggestion("add a closing single quote (') to complete the char literal");
    case 'string':
      return { ...base, type: 'string', value: decodeEscapes(token.text.slice(1, -1), file, token) };
    case 'char': {
      const value = decodeEscapes(token.text.slice(1, -1), file, token);
      if (value.length !== 1) {
        throw new CompilerError('InvalidSyntax', 'char literal must contain exactly one character', at(file, token))
          .withSuggestion('use double quotes for strings', '"hello"');
      }
      return { ...base, type: 'char', value };
    }
    case 'integer':
      if (!Number.isSafeInteger(Number(token.text))) {
        throw new CompilerError('InvalidNumber', `invalid integer literal '${token.text}'`, at(file, token))
          .withSuggestion('integer literals must fit in a 53-bit safe integer');
      }
      return { ...base, type: 'integer' };
    default:
      if (isPlainTokenType(type)) return { ...base, type };
      throw new CompilerError('UnexpectedCharacter', `unexpected input '${token.text}'`, at(file, token));
  }
}

/** Tokenizes a whole source file, dropping whitespace and comments. The last token is `eof`. */
export function tokenize(source: string, file = '<input>'): Token[] {
  const lexer = createMooLexer();
  lexer.reset(source);
  const tokens: Token[] = [];
  let lastLine = 1;
  let lastCol = 1;
  for (const raw of lexer) {
    const token = toToken(raw, file);
    const lines = raw.text.split('\n');
    if (lines.length > 1) {
      lastLine = raw.line + lines.length - 1;
      lastCol = lines[lines.length - 1].length + 1;
    } else {
      lastLine = raw.line;
      lastCol = raw.col + raw.text.length;
    }
    if (token) tokens.push(token);
  }
  tokens.push({ type: 'eof', text: '', value: '', offset: source.length, line: lastLine, col: lastCol });
  return tokens;
}
