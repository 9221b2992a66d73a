import type {
  BinaryOp,
  ConstStmt,
  EnumDecl,
  EnumVariantDecl,
  Expr,
  ExternFnDecl,
  FnDecl,
  IfStmt,
  ImportDecl,
  LetStmt,
  LiteralValue,
  MatchArm,
  MatchPattern,
  Param,
  Program,
  Statement,
  StructDecl,
  StructField,
  StructLiteralField,
  UnaryOp,
} from './ast.js';
import { CompilerError, type SourceLocation } from './errors.js';
import { type Token, tokenize } from './lexer.js';
import {
  arrayOf,
  BOOL,
  CHAR,
  dynamicArrayOf,
  FLOAT,
  genericType,
  INT,
  pointerTo,
  STRING,
  structType,
  VOID,
  type Type,
} from './types.js';
import type { Location, Position } from '../utils/types.js';

export interface ParseOptions {
  /** File name used in error locations. */
  file?: string;
}

const primitiveKeywords: Record<string, Type> = {
  int: INT,
  float: FLOAT,
  bool: BOOL,
  char: CHAR,
  string: STRING,
};

// Binary precedence levels, loosest first. Ternary and range sit above these.
const binaryLevels: readonly (readonly BinaryOp[])[] = [
  ['||'],
  ['&&'],
  ['==', '!='],
  ['<', '<=', '>', '>='],
  ['+', '-'],
  ['*', '/', '%'],
];

const unaryOps: readonly UnaryOp[] = ['-', '!', '*', '&'];

const describeToken = (token: Token): string => (token.type === 'eof' ? 'end of file' : `\`${token.text}\``);

const startOf = (token: Token): Position => ({ line: token.line, column: token.col, offset: token.offset });

const endOf = (token: Token): Position => ({
  line: token.line,
  column: token.col + token.text.length,
  offset: token.offset + token.text.length,
});

/** Parses a whole source file into a `Program`. */
export function parseTessel(source: string, options: ParseOptions = {}): Program {
  const file = options.file ?? '<input>';
  return new Parser(tokenize(source, file), file).parseProgram();
}

export class Parser {
  private pos = 0;
  private lastEnd: Position = { line: 1, column: 1, offset: 0 };
  private structLiterals = true;

  constructor(
    private readonly tokens: Token[],
    private readonly file: string
  ) {}

  parseProgram(): Program {
    const program: Program = {
      type: 'Program',
      imports: [],
      exports: [],
      externs: [],
      functions: [],
      structs: [],
      enums: [],
      globals: [],
    };
    const first = this.peek();
    while (!this.at('eof')) {
      if (this.eat('semicolon')) continue;
      if (this.atKeyword('import')) {
        program.imports.push(this.parseImport());
      } else if (this.atKeyword('export')) {
        this.parseExport(program);
      } else if (this.atKeyword('extern')) {
        program.externs.push(this.parseExtern());
      } else if (this.atKeyword('let')) {
        program.globals.push(this.parseLet());
      } else if (this.atKeyword('fn')) {
        program.functions.push(this.parseFunction(false));
      } else if (this.atKeyword('struct')) {
        program.structs.push(this.parseStruct(false));
      } else if (this.atKeyword('enum')) {
        program.enums.push(this.parseEnum(false));
      } else {
        throw this.unexpected('a top-level declaration').withSuggestion(
          'top-level items are `fn`, `struct`, `enum`, `let`, `import`, `export` and `extern fn`'
        );
      }
    }
    program.location = this.span(first);
    return program;
  }

  // ---- declarations ----

  private parseImport(): ImportDecl {
    const start = this.expectKeyword('import');
    const parts = [this.expectIdentifier('module name')];
    while (this.eat('dot')) parts.push(this.expectIdentifier('module name'));
    let alias: string | undefined;
    if (this.eatKeyword('as')) alias = this.expectIdentifier('import alias');
    this.eat('semicolon');
    const decl: ImportDecl = { type: 'Import', module: parts.join('.'), location: this.span(start) };
    if (alias !== undefined) decl.alias = alias;
    return decl;
  }

  private parseExport(program: Program): void {
    this.expectKeyword('export');
    if (this.atKeyword('fn')) {
      const fn = this.parseFunction(true);
      program.functions.push(fn);
      program.exports.push({ kind: 'function', name: fn.name, location: fn.location });
    } else if (this.atKeyword('struct')) {
      const decl = this.parseStruct(true);
      program.structs.push(decl);
      program.exports.push({ kind: 'struct', name: decl.name, location: decl.location });
    } else if (this.atKeyword('enum')) {
      const decl = this.parseEnum(true);
      program.enums.push(decl);
      program.exports.push({ kind: 'enum', name: decl.name, location: decl.location });
    } else if (this.at('lbrace')) {
      const open = this.advance();
      while (!this.at('rbrace')) {
        this.checkUnclosed(open);
        const nameToken = this.peek();
        const name = this.expectIdentifier('exported name');
        program.exports.push({ name, location: this.span(nameToken) });
        if (!this.eat('comma')) break;
      }
      this.expectClosing('rbrace', '}', open);
      this.eat('semicolon');
    } else {
      throw this.unexpected('`fn`, `struct`, `enum` or `{` after `export`');
    }
  }

  private parseExtern(): ExternFnDecl {
    const start = this.expectKeyword('extern');
    this.expectKeyword('fn');
    const name = this.expectIdentifier('function name');
    const { params, variadic } = this.parseParams(true);
    const returnType = this.eat('arrow') ? this.parseType() : undefined;
    this.expectSemicolon();
    const decl: ExternFnDecl = { type: 'ExternFnDecl', name, params, variadic, location: this.span(start) };
    if (returnType) decl.returnType = returnType;
    return decl;
  }

  private parseFunction(exported: boolean): FnDecl {
    const start = this.expectKeyword('fn');
    const name = this.expectIdentifier('function name');
    const { params } = this.parseParams(false);
    const returnType = this.eat('arrow') ? this.parseType() : undefined;
    const body = this.parseBlock();
    const decl: FnDecl = { type: 'FnDecl', name, params, body, exported, location: this.span(start) };
    if (returnType) decl.returnType = returnType;
    return decl;
  }

  private parseParams(allowVariadic: boolean): { params: Param[]; variadic: boolean } {
    const open = this.expect('lparen', '(');
    const params: Param[] = [];
    let variadic = false;
    while (!this.at('rparen')) {
      this.checkUnclosed(open);
      if (this.at('ellipsis')) {
        const dots = this.advance();
        if (!allowVariadic) {
          throw new CompilerError('InvalidSyntax', 'only `extern fn` declarations can be variadic', this.here(dots));
        }
        variadic = true;
        break;
      }
      const start = this.peek();
      const name = this.expectIdentifier('parameter name');
      this.expect('colon', ':');
      const typeName = this.parseType();
      params.push({ name, typeName, location: this.span(start) });
      if (!this.eat('comma')) break;
    }
    this.expectClosing('rparen', ')', open);
    return { params, variadic };
  }

  private parseStruct(exported: boolean): StructDecl {
    const start = this.expectKeyword('struct');
    const name = this.expectIdentifier('struct name');
    const open = this.expect('lbrace', '{');
    const fields: StructField[] = [];
    while (!this.at('rbrace')) {
      this.checkUnclosed(open);
      const fieldStart = this.peek();
      const fieldName = this.expectIdentifier('field name');
      this.expect('colon', ':');
      const typeName = this.parseType();
      fields.push({ name: fieldName, typeName, location: this.span(fieldStart) });
      if (!this.eat('comma') && !this.eat('semicolon')) break;
    }
    this.expectClosing('rbrace', '}', open);
    return { type: 'StructDecl', name, fields, exported, location: this.span(start) };
  }

  private parseEnum(exported: boolean): EnumDecl {
    const start = this.expectKeyword('enum');
    const name = this.expectIdentifier('enum name');
    const open = this.expect('lbrace', '{');
    const variants: EnumVariantDecl[] = [];
    let next = 0;
    while (!this.at('rbrace')) {
      this.checkUnclosed(open);
      const variantStart = this.peek();
      const variantName = this.expectIdentifier('variant name');
      let value = next;
      if (this.eatOp('=')) {
        const negative = this.eatOp('-');
        const literal = this.expect('integer', 'integer');
        value = negative ? -Number(literal.text) : Number(literal.text);
      }
      variants.push({ name: variantName, value, location: this.span(variantStart) });
      next = value + 1;
      if (!this.eat('comma')) break;
    }
    this.expectClosing('rbrace', '}', open);
    return { type: 'EnumDecl', name, variants, exported, location: this.span(start) };
  }

  // ---- types ----

  parseType(): Type {
    let type = this.parseBaseType();
    // `T*` is a pointer unless the star is a multiplication, as in `x as int * 2`.
    while (this.atOp('*') && !this.startsExpression(this.peek(1))) {
      this.advance();
      type = pointerTo(type);
    }
    return type;
  }

  private parseBaseType(): Type {
    const token = this.peek();
    if (this.eatOp('&') || this.eatOp('*')) return pointerTo(this.parseType());
    if (token.type === 'lbracket') {
      const open = this.advance();
      const element = this.parseType();
      let length: number | undefined;
      if (this.eat('semicolon')) length = Number(this.expect('integer', 'array length').text);
      this.expectClosing('rbracket', ']', open);
      return arrayOf(element, length);
    }
    if (token.type === 'keyword' && token.text in primitiveKeywords) {
      this.advance();
      return primitiveKeywords[token.text];
    }
    if (token.type !== 'identifier') throw this.unexpected('a type');
    this.advance();
    if (token.text === 'void') return VOID;
    if (token.text === 'DynamicArray' && this.at('lbracket')) {
      const open = this.advance();
      const element = this.parseType();
      this.expectClosing('rbracket', ']', open);
      return dynamicArrayOf(element);
    }
    let name = token.text;
    while (this.at('dot') && this.peek(1).type === 'identifier') {
      this.advance();
      name += `.${this.advance().text}`;
    }
    if (this.atOp('<')) {
      this.advance();
      const args = [this.parseType()];
      while (this.eat('comma')) args.push(this.parseType());
      this.expectOp('>');
      return genericType(name, args);
    }
    return structType(name);
  }

  // ---- statements ----

  private parseBlock(): Statement[] {
    const open = this.expect('lbrace', '{');
    const statements: Statement[] = [];
    while (!this.at('rbrace')) {
      this.checkUnclosed(open);
      if (this.eat('semicolon')) continue;
      statements.push(this.parseStatement());
    }
    this.advance();
    return statements;
  }

  private parseStatement(): Statement {
    const start = this.peek();
    if (this.atKeyword('let')) return this.parseLet();
    if (this.atKeyword('const')) {
      this.advance();
      const name = this.expectIdentifier('constant name');
      const typeName = this.eat('colon') ? this.parseType() : undefined;
      this.expectOp('=');
      const value = this.parseExpression();
      this.expectSemicolon();
      const stmt: ConstStmt = { type: 'Const', name, value, location: this.span(start) };
      if (typeName) stmt.typeName = typeName;
      return stmt;
    }
    if (this.eatKeyword('return')) {
      const value = this.at('semicolon') || this.at('rbrace') ? undefined : this.parseExpression();
      this.expectSemicolon();
      return value ? { type: 'Return', value, location: this.span(start) } : { type: 'Return', location: this.span(start) };
    }
    if (this.eatKeyword('break')) {
      this.expectSemicolon();
      return { type: 'Break', location: this.span(start) };
    }
    if (this.eatKeyword('continue')) {
      this.expectSemicolon();
      return { type: 'Continue', location: this.span(start) };
    }
    if (this.atKeyword('if')) return this.parseIf();
    if (this.eatKeyword('while')) {
      const condition = this.parseHead();
      const body = this.parseBlock();
      return { type: 'While', condition, body, location: this.span(start) };
    }
    if (this.eatKeyword('for')) {
      const variable = this.expectIdentifier('loop variable');
      this.expect('colon', ':');
      const iterable = this.parseHead();
      const body = this.parseBlock();
      return { type: 'For', variable, iterable, body, location: this.span(start) };
    }

    const expr = this.parseExpression();
    if (this.eatOp('=')) {
      const value = this.parseExpression();
      this.expectSemicolon();
      return { type: 'Assign', target: expr, value, location: this.span(start) };
    }
    // A match used as a statement ends in `}` and needs no semicolon.
    if (expr.type === 'Match') this.eat('semicolon');
    else this.expectSemicolon();
    return { type: 'ExprStmt', expr, location: this.span(start) };
  }

  private parseLet(): LetStmt {
    const start = this.expectKeyword('let');
    const mutable = this.eatKeyword('mut');
    const name = this.expectIdentifier('variable name');
    const stmt: LetStmt = { type: 'Let', name, mutable };
    if (this.eat('colon')) stmt.typeName = this.parseType();
    if (this.eatOp('=')) stmt.value = this.parseExpression();
    this.expectSemicolon();
    stmt.location = this.span(start);
    return stmt;
  }

  private parseIf(): IfStmt {
    const start = this.expectKeyword('if');
    const condition = this.parseHead();
    const thenBlock = this.parseBlock();
    const stmt: IfStmt = { type: 'If', condition, thenBlock };
    if (this.eatKeyword('else')) {
      stmt.elseBlock = this.atKeyword('if') ? [this.parseIf()] : this.parseBlock();
    }
    stmt.location = this.span(start);
    return stmt;
  }

  /** Condition of `if`/`while`/`for`/`match`, where `{` opens the body rather than a struct literal. */
  private parseHead(): Expr {
    const saved = this.structLiterals;
    this.structLiterals = false;
    try {
      return this.parseExpression();
    } finally {
      this.structLiterals = saved;
    }
  }

  private nested<T>(parse: () => T): T {
    const saved = this.structLiterals;
    this.structLiterals = true;
    try {
      return parse();
    } finally {
      this.structLiterals = saved;
    }
  }

  // ---- expressions ----

  parseExpression(): Expr {
    const start = this.peek();
    const condition = this.parseRange();
    if (!this.at('question')) return condition;
    this.advance();
    const whenTrue = this.nested(() => this.parseExpression());
    this.expect('colon', ':');
    const whenFalse = this.parseExpression();
    return { type: 'Ternary', condition, whenTrue, whenFalse, location: this.span(start) };
  }

  private parseRange(): Expr {
    const start = this.peek();
    const left = this.parseBinary(0);
    if (!this.eat('dotdot')) return left;
    const right = this.parseBinary(0);
    return { type: 'Range', start: left, end: right, location: this.span(start) };
  }

  private parseBinary(level: number): Expr {
    if (level >= binaryLevels.length) return this.parseUnary();
    const start = this.peek();
    let left = this.parseBinary(level + 1);
    for (;;) {
      const token = this.peek();
      const op = binaryLevels[level].find((candidate) => token.type === 'op' && token.text === candidate);
      if (!op) return left;
      this.advance();
      const right = this.parseBinary(level + 1);
      left = { type: 'Binary', op, left, right, location: this.span(start) };
    }
  }

  private parseUnary(): Expr {
    const start = this.peek();
    const op = unaryOps.find((candidate) => start.type === 'op' && start.text === candidate);
    if (op) {
      this.advance();
      const operand = this.parseUnary();
      return { type: 'Unary', op, operand, location: this.span(start) };
    }
    if (this.eatKeyword('new')) {
      if (this.at('lbracket')) {
        const open = this.advance();
        const elementType = this.parseType();
        this.expectClosing('rbracket', ']', open);
        const paren = this.expect('lparen', '(');
        this.expectClosing('rparen', ')', paren);
        return { type: 'NewArray', elementType, location: this.span(start) };
      }
      const value = this.parseUnary();
      return { type: 'New', value, location: this.span(start) };
    }
    if (this.eatKeyword('delete')) {
      const value = this.parseUnary();
      return { type: 'Delete', value, location: this.span(start) };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): Expr {
    const start = this.peek();
    let expr = this.parsePrimary();
    for (;;) {
      if (this.at('lparen')) {
        const open = this.advance();
        const args = this.nested(() => {
          const list: Expr[] = [];
          while (!this.at('rparen')) {
            this.checkUnclosed(open);
            list.push(this.parseExpression());
            if (!this.eat('comma')) break;
          }
          return list;
        });
        this.expectClosing('rparen', ')', open);
        expr = { type: 'Call', callee: expr, args, location: this.span(start) };
      } else if (this.eat('dot')) {
        const property = this.expectIdentifier('field or method name');
        expr = { type: 'Member', object: expr, property, location: this.span(start) };
      } else if (this.eat('arrow')) {
        const property = this.expectIdentifier('field name');
        const deref: Expr = { type: 'Unary', op: '*', operand: expr, location: expr.location };
        expr = { type: 'Member', object: deref, property, location: this.span(start) };
      } else if (this.at('lbracket')) {
        const open = this.advance();
        const index = this.nested(() => this.parseExpression());
        this.expectClosing('rbracket', ']', open);
        expr = { type: 'Index', object: expr, index, location: this.span(start) };
      } else if (this.eatKeyword('as')) {
        const targetType = this.parseType();
        expr = { type: 'Cast', value: expr, targetType, location: this.span(start) };
      } else if (this.at('question') && !this.startsExpression(this.peek(1))) {
        this.advance();
        expr = { type: 'Try', value: expr, location: this.span(start) };
      } else {
        return expr;
      }
    }
  }

  private parsePrimary(): Expr {
    const token = this.peek();
    switch (token.type) {
      case 'integer':
        this.advance();
        return this.literal(token, { kind: 'int', value: Number(token.text) });
      case 'float':
        this.advance();
        return this.literal(token, { kind: 'float', value: Number(token.text) });
      case 'string':
        this.advance();
        return this.literal(token, { kind: 'string', value: token.value });
      case 'char':
        this.advance();
        return this.literal(token, { kind: 'char', value: token.value });
      case 'lparen': {
        const open = this.advance();
        const inner = this.nested(() => this.parseExpression());
        this.expectClosing('rparen', ')', open);
        return inner;
      }
      case 'lbracket': {
        const open = this.advance();
        const elements = this.nested(() => {
          const list: Expr[] = [];
          while (!this.at('rbracket')) {
            this.checkUnclosed(open);
            list.push(this.parseExpression());
            if (!this.eat('comma')) break;
          }
          return list;
        });
        this.expectClosing('rbracket', ']', open);
        return { type: 'ArrayLiteral', elements, location: this.span(token) };
      }
      case 'keyword':
        if (token.text === 'true' || token.text === 'false') {
          this.advance();
          return this.literal(token, { kind: 'bool', value: token.text === 'true' });
        }
        if (token.text === 'match') return this.parseMatch();
        break;
      case 'identifier':
        return this.parseNamed();
      default:
        break;
    }
    throw this.unexpected('an expression');
  }

  private parseNamed(): Expr {
    const token = this.advance();
    if (this.eat('coloncolon')) {
      const variant = this.expectIdentifier('variant name');
      return { type: 'EnumAccess', enumName: token.text, variant, location: this.span(token) };
    }
    if (this.structLiterals && this.at('lbrace') && /^[A-Z]/.test(token.text)) {
      const open = this.advance();
      const fields: StructLiteralField[] = [];
      this.nested(() => {
        while (!this.at('rbrace')) {
          this.checkUnclosed(open);
          const fieldStart = this.peek();
          const name = this.expectIdentifier('field name');
          this.expect('colon', ':');
          const value = this.parseExpression();
          fields.push({ name, value, location: this.span(fieldStart) });
          if (!this.eat('comma')) break;
        }
      });
      this.expectClosing('rbrace', '}', open);
      return { type: 'StructLiteral', name: token.text, fields, location: this.span(token) };
    }
    return { type: 'Identifier', name: token.text, location: this.span(token) };
  }

  private parseMatch(): Expr {
    const start = this.expectKeyword('match');
    const scrutinee = this.parseHead();
    const open = this.expect('lbrace', '{');
    const arms: MatchArm[] = [];
    while (!this.at('rbrace')) {
      this.checkUnclosed(open);
      const armStart = this.peek();
      const pattern = this.parsePattern();
      this.expect('fatArrow', '=>');
      const body = this.nested(() => this.parseExpression());
      arms.push({ pattern, body, location: this.span(armStart) });
      if (!this.eat('comma')) break;
    }
    this.expectClosing('rbrace', '}', open);
    return { type: 'Match', scrutinee, arms, location: this.span(start) };
  }

  private parsePattern(): MatchPattern {
    const token = this.peek();
    if (token.type === 'identifier' && token.text === '_') {
      this.advance();
      return { kind: 'wildcard', location: this.span(token) };
    }
    if (token.type === 'identifier') {
      this.advance();
      this.expect('coloncolon', '::');
      const variant = this.expectIdentifier('variant name');
      let binding: string | undefined;
      if (this.at('lparen')) {
        const open = this.advance();
        binding = this.expectIdentifier('pattern binding');
        this.expectClosing('rparen', ')', open);
      }
      const pattern: MatchPattern = { kind: 'variant', enumName: token.text, variant, location: this.span(token) };
      if (binding !== undefined) pattern.binding = binding;
      return pattern;
    }
    const negative = this.eatOp('-');
    const literalToken = this.peek();
    const literal = this.patternLiteral(literalToken, negative);
    this.advance();
    return { kind: 'literal', literal, location: this.span(token) };
  }

  private patternLiteral(token: Token, negative: boolean): LiteralValue {
    const sign = negative ? -1 : 1;
    if (token.type === 'integer') return { kind: 'int', value: sign * Number(token.text) };
    if (token.type === 'float') return { kind: 'float', value: sign * Number(token.text) };
    if (!negative) {
      if (token.type === 'string') return { kind: 'string', value: token.value };
      if (token.type === 'char') return { kind: 'char', value: token.value };
      if (token.type === 'keyword' && (token.text === 'true' || token.text === 'false')) {
        return { kind: 'bool', value: token.text === 'true' };
      }
    }
    throw this.unexpected('a match pattern').withSuggestion(
      'patterns are `_`, literals, `Enum::Variant` or `Enum::Variant(binding)`',
      'Option::Some(v) => v'
    );
  }

  private literal(token: Token, literal: LiteralValue): Expr {
    return { type: 'Literal', literal, location: this.span(token) };
  }

  // ---- token helpers ----

  private peek(ahead = 0): Token {
    return this.tokens[Math.min(this.pos + ahead, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== 'eof') {
      this.pos++;
      this.lastEnd = endOf(token);
    }
    return token;
  }

  private at(type: Token['type']): boolean {
    return this.peek().type === type;
  }

  private atKeyword(word: string): boolean {
    const token = this.peek();
    return token.type === 'keyword' && token.text === word;
  }

  private atOp(op: string): boolean {
    const token = this.peek();
    return token.type === 'op' && token.text === op;
  }

  private eat(type: Token['type']): boolean {
    if (!this.at(type)) return false;
    this.advance();
    return true;
  }

  private eatKeyword(word: string): boolean {
    if (!this.atKeyword(word)) return false;
    this.advance();
    return true;
  }

  private eatOp(op: string): boolean {
    if (!this.atOp(op)) return false;
    this.advance();
    return true;
  }

  private expect(type: Token['type'], what: string): Token {
    if (!this.at(type)) throw this.expected(what);
    return this.advance();
  }

  private expectKeyword(word: string): Token {
    if (!this.atKeyword(word)) throw this.expected(word);
    return this.advance();
  }

  private expectOp(op: string): Token {
    if (!this.atOp(op)) throw this.expected(op);
    return this.advance();
  }

  private expectIdentifier(what: string): string {
    const token = this.peek();
    if (token.type !== 'identifier') {
      throw this.unexpected(what);
    }
    return this.advance().text;
  }

  private expectSemicolon(): void {
    if (this.eat('semicolon')) return;
    throw new CompilerError('MissingSemicolon', 'expected `;` after statement', {
      file: this.file,
      line: this.lastEnd.line,
      column: this.lastEnd.column,
      length: 1,
    }).withSuggestion('add a semicolon at the end of the statement');
  }

  private expectClosing(type: Token['type'], text: string, open: Token): Token {
    this.checkUnclosed(open);
    if (!this.at(type)) throw this.expected(text);
    return this.advance();
  }

  private checkUnclosed(open: Token): void {
    if (!this.at('eof')) return;
    throw new CompilerError('UnclosedDelimiter', `unclosed delimiter \`${open.text}\``, this.here(open))
      .withSuggestion('add the matching closing delimiter');
  }

  private startsExpression(token: Token): boolean {
    switch (token.type) {
      case 'integer':
      case 'float':
      case 'string':
      case 'char':
      case 'identifier':
      case 'lparen':
      case 'lbracket':
        return true;
      case 'keyword':
        return ['true', 'false', 'new', 'delete', 'match'].includes(token.text);
      case 'op':
        return ['-', '!', '*', '&'].includes(token.text);
      default:
        return false;
    }
  }

  private here(token: Token): SourceLocation {
    return { file: this.file, line: token.line, column: token.col, length: Math.max(token.text.length, 1) };
  }

  private expected(what: string): CompilerError {
    const token = this.peek();
    return new CompilerError('ExpectedToken', `expected \`${what}\`, found ${describeToken(token)}`, this.here(token));
  }

  private unexpected(what: string): CompilerError {
    const token = this.peek();
    return new CompilerError('UnexpectedToken', `expected ${what}, found ${describeToken(token)}`, this.here(token));
  }

  private span(start: Token): Location {
    const from = startOf(start);
    const to = this.lastEnd.offset >= from.offset ? this.lastEnd : endOf(start);
    return { start: from, end: to };
  }
}
