import type {
  BindingNode,
  CallExpr,
  EnumAccessExpr,
  Expr,
  FnDecl,
  LiteralValue,
  MatchArm,
  MatchExpr,
  Program,
  Statement,
  StructDecl,
  TesselNode,
} from './ast.js';
import { builtinGenerics } from './builtins.js';
import {
  emptyImports,
  type EnumLayout,
  type FunctionSignature,
  type ImportedSymbols,
  type StructLayout,
  TypeEnvironment,
} from './environment.js';
import {
  CompilerError,
  duplicateDefinition,
  toSourceLocation,
  typeMismatch,
  undefinedVariable,
  type SourceLocation,
} from './errors.js';
import { intrinsicReturnType } from './intrinsics.js';
import { type MethodOp, resolveMethod } from './methods.js';
import {
  arrayOf,
  BOOL,
  CHAR,
  compatible,
  dynamicArrayOf,
  enumType,
  FLOAT,
  formatType,
  type GenericType,
  INT,
  isGenericOf,
  isNumeric,
  isPrimitive,
  isStringLike,
  pointerTo,
  STRING,
  structType,
  type Type,
  VOID,
} from './types.js';

export type CallTarget =
  | { kind: 'print'; newline: boolean }
  | { kind: 'len' }
  | { kind: 'function'; signature: FunctionSignature }
  | { kind: 'intrinsic'; name: string }
  | { kind: 'method'; op: MethodOp; receiver: Type }
  | { kind: 'variant'; family: string; variant: string };

export interface AnalyzeOptions {
  /** File name used in error locations. */
  file?: string;
  /** Dotted module path; empty for the entry module. */
  moduleName?: string;
  imports?: ImportedSymbols;
}

/** A type-checked module plus everything lowering needs to know about it. */
export interface CheckedModule {
  program: Program;
  file: string;
  /** Dotted module path; empty for the entry module. */
  name: string;
  isEntry: boolean;
  /** Prepended to the C names of this module's functions and globals. */
  cPrefix: string;
  exprTypes: Map<Expr, Type>;
  callTargets: Map<CallExpr, CallTarget>;
  bindingTypes: Map<BindingNode, Type>;
  /** Payload type bound by a match arm such as `Option::Some(v)`. */
  armBindings: Map<MatchArm, Type>;
  /** C names of identifiers that refer to a module global. */
  globalNames: Map<Expr, string>;
  functions: Map<string, FunctionSignature>;
  externs: Map<string, FunctionSignature>;
  /** Layouts this module declares, with resolved field types. */
  structs: Map<string, StructLayout>;
  enums: Map<string, EnumLayout>;
}

export const cPrefixFor = (moduleName: string): string =>
  moduleName === '' ? '' : `${moduleName.replace(/\./g, '_')}_`;

export const cFunctionName = (moduleName: string, name: string): string => {
  if (moduleName === '') return name === 'main' ? 'tessel_main' : name;
  return `${cPrefixFor(moduleName)}${name}`;
};

const plural = (count: number, noun: string) => `${count} ${noun}${count === 1 ? '' : 's'}`;

const literalType = (literal: LiteralValue): Type => {
  switch (literal.kind) {
    case 'int':
      return INT;
    case 'float':
      return FLOAT;
    case 'bool':
      return BOOL;
    case 'char':
      return CHAR;
    case 'string':
      return STRING;
  }
};

const isPrintableScalar = (type: Type): boolean =>
  (type.kind === 'primitive' && type.name !== 'void') || type.kind === 'enum' || isStringLike(type);

/** Types `print` and `println` know how to format. */
export function isPrintable(type: Type): boolean {
  if (isPrintableScalar(type)) return true;
  if (type.kind === 'array') return type.length !== undefined && isPrintableScalar(type.element);
  if (type.kind === 'dynamicArray') return isPrintableScalar(type.element);
  return false;
}

function castAllowed(from: Type, to: Type): boolean {
  if (isPrimitive(from, 'int')) {
    return isPrimitive(to, 'int') || isPrimitive(to, 'float') || isPrimitive(to, 'char') || to.kind === 'pointer';
  }
  if (isPrimitive(from, 'float')) return isPrimitive(to, 'int') || isPrimitive(to, 'float');
  if (isPrimitive(from, 'char')) return isPrimitive(to, 'int') || isPrimitive(to, 'char');
  if (from.kind === 'pointer') return to.kind === 'pointer' || isPrimitive(to, 'int');
  if (isStringLike(from)) return to.kind === 'pointer' && isPrimitive(to.to, 'char');
  return false;
}

/**
 * A block guarantees a return when it returns directly or ends in an
 * `if`/`else` whose branches both do. Loops never count.
 */
export function blockReturns(statements: readonly Statement[]): boolean {
  if (statements.some((stmt) => stmt.type === 'Return')) return true;
  const last = statements[statements.length - 1];
  if (!last || last.type !== 'If' || !last.elseBlock) return false;
  return blockReturns(last.thenBlock) && blockReturns(last.elseBlock);
}

class Checker {
  private readonly env = new TypeEnvironment();
  private readonly imports: ImportedSymbols;
  private readonly module: CheckedModule;

  constructor(program: Program, options: AnalyzeOptions) {
    const name = options.moduleName ?? '';
    this.imports = options.imports ?? emptyImports();
    this.module = {
      program,
      file: options.file ?? '<input>',
      name,
      isEntry: name === '',
      cPrefix: cPrefixFor(name),
      exprTypes: new Map(),
      callTargets: new Map(),
      bindingTypes: new Map(),
      armBindings: new Map(),
      globalNames: new Map(),
      functions: new Map(),
      externs: new Map(),
      structs: new Map(),
      enums: new Map(),
    };
  }

  run(): CheckedModule {
    const { program } = this.module;
    for (const [name, layout] of this.imports.structs) this.env.defineStruct(name, layout);
    for (const [name, layout] of this.imports.enums) this.env.defineEnum(name, layout);
    // Types come before externs so extern signatures can name them.
    this.declareTypes(program);

    for (const decl of program.externs) {
      const signature: FunctionSignature = {
        name: decl.name,
        cName: decl.name,
        params: decl.params.map((p) => this.resolveType(p.typeName, p)),
        returnType: decl.returnType ? this.resolveType(decl.returnType, decl) : VOID,
        variadic: decl.variadic,
        extern: true,
      };
      this.env.define({
        name: decl.name,
        kind: 'function',
        type: signature.returnType,
        location: this.loc(decl),
        signature,
      });
      this.module.externs.set(decl.name, signature);
    }

    for (const fn of program.functions) {
      const signature: FunctionSignature = {
        name: fn.name,
        cName: cFunctionName(this.module.name, fn.name),
        params: fn.params.map((p) => this.resolveType(p.typeName, p)),
        returnType: fn.returnType ? this.resolveType(fn.returnType, fn) : VOID,
        variadic: false,
        module: this.module.name,
        exported: fn.exported,
      };
      this.env.define({ name: fn.name, kind: 'function', type: signature.returnType, location: this.loc(fn), signature });
      this.module.functions.set(fn.name, signature);
    }

    for (const global of program.globals) {
      const type = this.bindingType(global.name, global.typeName, global.value, global);
      this.module.bindingTypes.set(global, type);
      this.env.define({
        name: global.name,
        kind: 'variable',
        type,
        mutable: true,
        location: this.loc(global),
        cName: `${this.module.cPrefix}${global.name}`,
      });
    }

    for (const fn of program.functions) this.checkFunction(fn);
    return this.module;
  }

  // ---- declarations ----

  private declareTypes(program: Program): void {
    for (const decl of program.enums) {
      this.env.define({ name: decl.name, kind: 'enum', type: enumType(decl.name), location: this.loc(decl) });
      const variants: EnumLayout = new Map();
      for (const variant of decl.variants) {
        if (variants.has(variant.name)) {
          throw duplicateDefinition(variant.name, this.loc(variant), this.loc(decl));
        }
        variants.set(variant.name, variant.value);
      }
      this.env.defineEnum(decl.name, variants);
      this.module.enums.set(decl.name, variants);
    }
    // Layouts exist before field types resolve, so structs may refer to each other.
    for (const decl of program.structs) {
      this.env.define({ name: decl.name, kind: 'struct', type: structType(decl.name), location: this.loc(decl) });
      this.env.defineStruct(decl.name, new Map());
    }
    for (const decl of program.structs) {
      const layout = this.structLayout(decl);
      this.env.defineStruct(decl.name, layout);
      this.module.structs.set(decl.name, layout);
    }
  }

  private structLayout(decl: StructDecl): StructLayout {
    const layout: StructLayout = new Map();
    const seen = new Map<string, SourceLocation>();
    for (const field of decl.fields) {
      const previous = seen.get(field.name);
      if (previous) throw duplicateDefinition(field.name, this.loc(field), previous);
      seen.set(field.name, this.loc(field));
      const type = this.resolveType(field.typeName, field);
      if (type.kind === 'struct' && type.name === decl.name) {
        throw new CompilerError(
          'InvalidOperation',
          `struct \`${decl.name}\` cannot contain itself by value`,
          this.loc(field)
        ).withSuggestion('store a pointer instead', `${field.name}: *${decl.name}`);
      }
      layout.set(field.name, type);
    }
    return layout;
  }

  /** Resolves an annotation against the declared structs, enums and builtin generics. */
  private resolveType(type: Type, node: TesselNode): Type {
    switch (type.kind) {
      case 'primitive':
        return type;
      case 'pointer':
        return pointerTo(this.resolveType(type.to, node));
      case 'array':
        return arrayOf(this.resolveType(type.element, node), type.length);
      case 'dynamicArray':
        return dynamicArrayOf(this.resolveType(type.element, node));
      case 'struct':
        if (type.name === 'str') return type;
        if (this.env.isEnum(type.name)) return enumType(type.name);
        if (this.env.isStruct(type.name)) return type;
        throw this.undefinedType(type.name, node);
      case 'enum':
        if (this.env.isEnum(type.name)) return type;
        throw this.undefinedType(type.name, node);
      case 'generic': {
        const args = type.args.map((arg) => this.resolveType(arg, node));
        const result = builtinGenerics.substitute(type.name, args, this.loc(node));
        if (!result.ok) throw result.error;
        return result.type;
      }
      case 'typeParam':
        throw this.undefinedType(type.name, node);
    }
  }

  private undefinedType(name: string, node: TesselNode): CompilerError {
    return new CompilerError('UndefinedType', `cannot find type \`${name}\` in this scope`, this.loc(node))
      .withSuggestion('declare the type with `struct` or `enum`, or import the module that exports it');
  }

  // ---- statements ----

  private checkFunction(fn: FnDecl): void {
    const signature = this.module.functions.get(fn.name);
    if (!signature) return;
    this.env.pushScope();
    this.env.currentReturnType = signature.returnType;
    fn.params.forEach((param, i) => {
      const type = signature.params[i];
      this.module.bindingTypes.set(param, type);
      this.env.define({ name: param.name, kind: 'parameter', type, mutable: true, location: this.loc(param) });
    });
    for (const stmt of fn.body) this.checkStatement(stmt);
    if (!isPrimitive(signature.returnType, 'void') && !blockReturns(fn.body)) {
      throw new CompilerError(
        'MissingReturnType',
        `function \`${fn.name}\` is declared to return \`${formatType(signature.returnType)}\` but not all paths return a value`,
        this.loc(fn)
      ).withSuggestion('add a `return` statement at the end of the function');
    }
    this.env.currentReturnType = null;
    this.env.popScope();
  }

  private checkBlock(statements: readonly Statement[], setup?: () => void): void {
    this.env.pushScope();
    setup?.();
    for (const stmt of statements) this.checkStatement(stmt);
    this.env.popScope();
  }

  private checkStatement(stmt: Statement): void {
    switch (stmt.type) {
      case 'Let': {
        const type = this.bindingType(stmt.name, stmt.typeName, stmt.value, stmt);
        this.module.bindingTypes.set(stmt, type);
        this.env.define({ name: stmt.name, kind: 'variable', type, mutable: true, location: this.loc(stmt) });
        return;
      }
      case 'Const': {
        const type = this.bindingType(stmt.name, stmt.typeName, stmt.value, stmt);
        this.module.bindingTypes.set(stmt, type);
        this.env.define({ name: stmt.name, kind: 'const', type, mutable: false, location: this.loc(stmt) });
        return;
      }
      case 'Assign':
        this.checkAssign(stmt.target, stmt.value);
        return;
      case 'Return':
        this.checkReturn(stmt.value, stmt);
        return;
      case 'If':
        this.expectBool(stmt.condition);
        this.checkBlock(stmt.thenBlock);
        if (stmt.elseBlock) this.checkBlock(stmt.elseBlock);
        return;
      case 'While':
        this.expectBool(stmt.condition);
        this.checkBlock(stmt.body);
        return;
      case 'For': {
        const element = this.iterationType(stmt.iterable);
        this.module.bindingTypes.set(stmt, element);
        this.checkBlock(stmt.body, () =>
          this.env.define({ name: stmt.variable, kind: 'variable', type: element, mutable: true, location: this.loc(stmt) })
        );
        return;
      }
      case 'Break':
      case 'Continue':
        return;
      case 'ExprStmt':
        this.infer(stmt.expr);
        return;
    }
  }

  /** Type of a `let`, `const` or global from its annotation and initializer. */
  private bindingType(name: string, annotation: Type | undefined, value: Expr | undefined, node: TesselNode): Type {
    if (annotation) {
      const declared = this.resolveType(annotation, node);
      if (!value) return declared;
      const actual = this.infer(value, declared);
      if (!compatible(declared, actual)) {
        throw typeMismatch(formatType(declared), formatType(actual), this.loc(value));
      }
      // `let xs: [int] = [1, 2]` keeps the literal's length for iteration and printing.
      if (declared.kind === 'array' && declared.length === undefined && actual.kind === 'array') {
        return arrayOf(declared.element, actual.length);
      }
      return declared;
    }
    if (value) {
      const actual = this.infer(value);
      if (isPrimitive(actual, 'void')) {
        throw new CompilerError('InvalidOperation', `cannot bind \`${name}\` to a value of type \`void\``, this.loc(value));
      }
      return actual;
    }
    throw new CompilerError(
      'InvalidSyntax',
      `variable \`${name}\` needs a type annotation or an initializer`,
      this.loc(node)
    ).withSuggestion('add a type or a value', `let ${name}: int = 0;`);
  }

  private checkAssign(target: Expr, value: Expr): void {
    const assignable =
      target.type === 'Identifier' ||
      target.type === 'Member' ||
      target.type === 'Index' ||
      (target.type === 'Unary' && target.op === '*');
    if (!assignable) {
      throw new CompilerError('InvalidOperation', 'invalid left-hand side of assignment', this.loc(target))
        .withSuggestion('assign to a variable, a field, an index or a dereferenced pointer');
    }
    if (target.type === 'Identifier') {
      const symbol = this.env.lookup(target.name);
      if (symbol?.kind === 'const') {
        throw new CompilerError(
          'ImmutableAssignment',
          `cannot assign twice to immutable variable \`${target.name}\``,
          this.loc(target)
        ).withSuggestion('declare it with `let` instead of `const`', `let ${target.name} = ...;`);
      }
    }
    const targetType = this.infer(target);
    const valueType = this.infer(value, targetType);
    if (!compatible(targetType, valueType)) {
      throw typeMismatch(formatType(targetType), formatType(valueType), this.loc(value));
    }
  }

  private checkReturn(value: Expr | undefined, node: TesselNode): void {
    const expected = this.env.currentReturnType ?? VOID;
    if (isPrimitive(expected, 'void')) {
      if (value) {
        const actual = this.infer(value);
        throw typeMismatch('void', formatType(actual), this.loc(value)).withContext(
          'the function has no declared return type'
        );
      }
      return;
    }
    if (!value) {
      throw new CompilerError(
        'MissingReturnType',
        `expected a return value of type \`${formatType(expected)}\``,
        this.loc(node)
      ).withSuggestion('return a value', 'return 0;');
    }
    const actual = this.infer(value, expected);
    if (!compatible(expected, actual)) {
      throw typeMismatch(formatType(expected), formatType(actual), this.loc(value));
    }
  }

  private expectBool(condition: Expr): void {
    const type = this.infer(condition);
    if (!isPrimitive(type, 'bool')) throw typeMismatch('bool', formatType(type), this.loc(condition));
  }

  private iterationType(iterable: Expr): Type {
    if (iterable.type === 'Range') {
      this.expectInt(iterable.start);
      this.expectInt(iterable.end);
      return INT;
    }
    const type = this.infer(iterable);
    if (type.kind === 'dynamicArray') return type.element;
    if (type.kind === 'array') {
      if (type.length === undefined) {
        throw new CompilerError(
          'InvalidOperation',
          `cannot iterate over \`${formatType(type)}\` because its length is unknown`,
          this.loc(iterable)
        ).withSuggestion('iterate over a range of indices instead', 'for i: 0..n { }');
      }
      return type.element;
    }
    throw new CompilerError('InvalidOperation', `cannot iterate over type \`${formatType(type)}\``, this.loc(iterable))
      .withSuggestion('for loops require an iterable type (range, array, or dynamic array)');
  }

  private expectInt(expr: Expr): void {
    const type = this.infer(expr);
    if (!isPrimitive(type, 'int')) throw typeMismatch('int', formatType(type), this.loc(expr));
  }

  // ---- expressions ----

  /** Infers and records the type of `expr`. `expected` is a hint, never a check. */
  private infer(expr: Expr, expected?: Type): Type {
    const type = this.inferExpr(expr, expected);
    this.module.exprTypes.set(expr, type);
    return type;
  }

  private inferExpr(expr: Expr, expected?: Type): Type {
    switch (expr.type) {
      case 'Literal':
        return literalType(expr.literal);
      case 'Identifier': {
        const symbol = this.env.lookup(expr.name);
        if (!symbol) throw undefinedVariable(expr.name, this.loc(expr));
        if (symbol.kind === 'function' || symbol.kind === 'struct' || symbol.kind === 'enum') {
          throw new CompilerError(
            'InvalidOperation',
            `\`${expr.name}\` is a ${symbol.kind}, not a value`,
            this.loc(expr)
          );
        }
        if (symbol.cName) this.module.globalNames.set(expr, symbol.cName);
        return isStringLike(symbol.type) ? STRING : symbol.type;
      }
      case 'Binary':
        return this.inferBinary(expr.op, expr.left, expr.right, expr);
      case 'Unary': {
        const operand = this.infer(expr.operand);
        switch (expr.op) {
          case '-':
            if (!isNumeric(operand)) throw this.badOperand('-', operand, expr);
            return operand;
          case '!':
            if (!isPrimitive(operand, 'bool')) throw this.badOperand('!', operand, expr);
            return BOOL;
          case '*':
            if (operand.kind !== 'pointer') {
              throw new CompilerError(
                'InvalidOperation',
                `cannot dereference a value of type \`${formatType(operand)}\``,
                this.loc(expr)
              );
            }
            return operand.to;
          case '&':
            return pointerTo(operand);
        }
      }
      case 'Call':
        return this.inferCall(expr, expected);
      case 'Member':
        return this.inferField(expr.object, expr.property, expr);
      case 'Index': {
        const object = this.infer(expr.object);
        this.expectInt(expr.index);
        const index = expr.index;
        const negative =
          (index.type === 'Literal' && index.literal.kind === 'int' && index.literal.value < 0) ||
          (index.type === 'Unary' && index.op === '-' && index.operand.type === 'Literal' &&
            index.operand.literal.kind === 'int' && index.operand.literal.value > 0);
        if (negative) {
          throw new CompilerError('InvalidOperation', 'array index cannot be negative', this.loc(index));
        }
        if (object.kind === 'array' || object.kind === 'dynamicArray') return object.element;
        if (object.kind === 'pointer') return object.to;
        if (isStringLike(object)) return CHAR;
        throw new CompilerError(
          'InvalidOperation',
          `cannot index into a value of type \`${formatType(object)}\``,
          this.loc(expr)
        );
      }
      case 'ArrayLiteral': {
        const hint = expected?.kind === 'array' ? expected.element : undefined;
        if (expr.elements.length === 0) {
          if (hint) return arrayOf(hint, 0);
          throw new CompilerError(
            'InvalidSyntax',
            'cannot infer the element type of an empty array literal',
            this.loc(expr)
          ).withSuggestion('add a type annotation', 'let xs: [int] = [];');
        }
        const [first, ...rest] = expr.elements;
        const element = this.infer(first, hint);
        for (const item of rest) {
          const type = this.infer(item, hint ?? element);
          if (!compatible(element, type)) throw typeMismatch(formatType(element), formatType(type), this.loc(item));
        }
        return arrayOf(element, expr.elements.length);
      }
      case 'NewArray':
        return dynamicArrayOf(this.resolveType(expr.elementType, expr));
      case 'StructLiteral': {
        const layout = this.env.structFields(expr.name);
        if (!layout) throw this.undefinedType(expr.name, expr);
        for (const field of expr.fields) {
          const fieldType = layout.get(field.name);
          if (!fieldType) {
            throw new CompilerError(
              'UndefinedVariable',
              `struct \`${expr.name}\` has no field named \`${field.name}\``,
              this.loc(field)
            ).withSuggestion(`available fields: ${Array.from(layout.keys()).join(', ')}`);
          }
          const actual = this.infer(field.value, fieldType);
          if (!compatible(fieldType, actual)) {
            throw typeMismatch(formatType(fieldType), formatType(actual), this.loc(field.value));
          }
        }
        return structType(expr.name);
      }
      case 'Range':
        throw new CompilerError(
          'InvalidOperation',
          'range expressions are only allowed as `for` loop iterables',
          this.loc(expr)
        ).withSuggestion('iterate over the range directly', 'for i: 0..10 { }');
      case 'New':
        return pointerTo(this.infer(expr.value));
      case 'Delete': {
        const type = this.infer(expr.value);
        if (type.kind === 'pointer' || type.kind === 'dynamicArray' || isStringLike(type)) return VOID;
        throw new CompilerError(
          'InvalidOperation',
          `cannot delete a value of type \`${formatType(type)}\``,
          this.loc(expr)
        ).withSuggestion('only pointers, strings and dynamic arrays can be deleted');
      }
      case 'Cast': {
        const from = this.infer(expr.value);
        const to = this.resolveType(expr.targetType, expr);
        if (!castAllowed(from, to)) {
          throw new CompilerError(
            'InvalidOperation',
            `cannot cast \`${formatType(from)}\` to \`${formatType(to)}\``,
            this.loc(expr)
          );
        }
        return to;
      }
      case 'Ternary': {
        this.expectBool(expr.condition);
        const whenTrue = this.infer(expr.whenTrue, expected);
        const whenFalse = this.infer(expr.whenFalse, expected ?? whenTrue);
        if (!compatible(whenTrue, whenFalse)) {
          throw typeMismatch(formatType(whenTrue), formatType(whenFalse), this.loc(expr.whenFalse));
        }
        return whenTrue;
      }
      case 'EnumAccess':
        return this.inferEnumAccess(expr, expected);
      case 'Match':
        return this.inferMatch(expr, expected);
      case 'Try':
        return this.inferTry(expr.value, expr);
    }
  }

  private badOperand(op: string, operand: Type, node: TesselNode): CompilerError {
    return new CompilerError(
      'InvalidOperation',
      `cannot apply unary operator \`${op}\` to type \`${formatType(operand)}\``,
      this.loc(node)
    );
  }

  private inferBinary(op: string, left: Expr, right: Expr, node: TesselNode): Type {
    const l = this.infer(left);
    const r = this.infer(right);
    switch (op) {
      case '+':
      case '-':
      case '*':
      case '/':
      case '%': {
        if ((op === '/' || op === '%') && right.type === 'Literal' && right.literal.kind === 'int' && right.literal.value === 0) {
          throw new CompilerError('InvalidOperation', op === '/' ? 'division by zero' : 'modulo by zero', this.loc(right));
        }
        if (isPrimitive(l, 'int') && isPrimitive(r, 'int')) return INT;
        if (isNumeric(l) && isNumeric(r)) {
          if (op === '%') {
            throw new CompilerError('InvalidOperation', '`%` requires integer operands', this.loc(node));
          }
          return FLOAT;
        }
        if (op === '+' && isStringLike(l) && isStringLike(r)) return STRING;
        throw new CompilerError(
          'InvalidOperation',
          `cannot apply \`${op}\` to \`${formatType(l)}\` and \`${formatType(r)}\``,
          this.loc(node)
        ).withSuggestion(op === '+' ? 'only numbers can be added, or two strings concatenated' : 'both operands must be numeric');
      }
      case '&&':
      case '||':
        if (!isPrimitive(l, 'bool')) throw typeMismatch('bool', formatType(l), this.loc(left));
        if (!isPrimitive(r, 'bool')) throw typeMismatch('bool', formatType(r), this.loc(right));
        return BOOL;
      default:
        if (!compatible(l, r)) throw typeMismatch(formatType(l), formatType(r), this.loc(right));
        return BOOL;
    }
  }

  private inferField(objectExpr: Expr, property: string, node: TesselNode): Type {
    const object = this.infer(objectExpr);
    if (object.kind === 'struct' && object.name !== 'str') {
      const layout = this.env.structFields(object.name);
      if (!layout) throw this.undefinedType(object.name, node);
      const field = layout.get(property);
      if (!field) {
        throw new CompilerError(
          'UndefinedVariable',
          `no field \`${property}\` on type \`${formatType(object)}\``,
          this.loc(node)
        ).withSuggestion(`available fields: ${Array.from(layout.keys()).join(', ')}`);
      }
      return field;
    }
    const error = new CompilerError(
      'InvalidOperation',
      `type \`${formatType(object)}\` has no field \`${property}\``,
      this.loc(node)
    );
    if (object.kind === 'pointer' && object.to.kind === 'struct') {
      error.withSuggestion('use `->` to access a field through a pointer', `p->${property}`);
    }
    throw error;
  }

  // ---- calls ----

  private inferCall(call: CallExpr, expected?: Type): Type {
    const { callee } = call;
    if (callee.type === 'Identifier') return this.inferNamedCall(call, callee.name);
    if (callee.type === 'Member') return this.inferQualifiedCall(call, callee.object, callee.property);
    if (callee.type === 'EnumAccess') return this.inferConstruction(call, callee, expected);
    throw new CompilerError('InvalidOperation', 'this expression is not callable', this.loc(callee));
  }

  private inferNamedCall(call: CallExpr, name: string): Type {
    if (name === 'print' || name === 'println') {
      const newline = name === 'println';
      const max = 1;
      const min = newline ? 0 : 1;
      if (call.args.length < min || call.args.length > max) {
        const expectation = newline ? 'at most 1 argument' : '1 argument';
        throw new CompilerError(
          'WrongArgumentCount',
          `\`${name}\` expects ${expectation}, got ${call.args.length}`,
          this.loc(call)
        );
      }
      const [arg] = call.args;
      if (arg) {
        const type = this.infer(arg);
        if (!isPrintable(type)) {
          throw new CompilerError('InvalidOperation', `cannot print a value of type \`${formatType(type)}\``, this.loc(arg))
            .withSuggestion('print primitives, enums, strings or arrays of them');
        }
      }
      this.module.callTargets.set(call, { kind: 'print', newline });
      return VOID;
    }
    if (name === 'len') {
      if (call.args.length !== 1) {
        throw new CompilerError('WrongArgumentCount', `\`len\` expects 1 argument, got ${call.args.length}`, this.loc(call));
      }
      const type = this.infer(call.args[0]);
      if (!isStringLike(type)) throw typeMismatch('string', formatType(type), this.loc(call.args[0]));
      this.module.callTargets.set(call, { kind: 'len' });
      return INT;
    }

    const symbol = this.env.lookup(name);
    if (symbol) {
      if (symbol.kind !== 'function' || !symbol.signature) {
        throw new CompilerError('InvalidOperation', `\`${name}\` is not a function`, this.loc(call.callee));
      }
      return this.callFunction(call, symbol.signature);
    }
    const imported = this.imports.functions.get(name);
    if (imported) return this.callFunction(call, imported);
    const intrinsic = intrinsicReturnType(name);
    if (intrinsic) {
      for (const arg of call.args) this.infer(arg);
      this.module.callTargets.set(call, { kind: 'intrinsic', name });
      return intrinsic;
    }
    throw new CompilerError('UndefinedFunction', `cannot find function \`${name}\` in this scope`, this.loc(call.callee))
      .withSuggestion('check the spelling or declare the function with `fn` or `extern fn`');
  }

  private callFunction(call: CallExpr, signature: FunctionSignature): Type {
    const fixed = signature.params.length;
    const count = call.args.length;
    if (signature.variadic ? count < fixed : count !== fixed) {
      const expectation = signature.variadic ? `at least ${plural(fixed, 'argument')}` : plural(fixed, 'argument');
      throw new CompilerError(
        'WrongArgumentCount',
        `function \`${signature.name}\` expects ${expectation}, got ${count}`,
        this.loc(call)
      );
    }
    call.args.forEach((arg, i) => {
      const param = signature.params[i];
      if (i >= fixed) {
        this.infer(arg);
        return;
      }
      const actual = this.infer(arg, param);
      if (!compatible(param, actual)) throw typeMismatch(formatType(param), formatType(actual), this.loc(arg));
    });
    this.module.callTargets.set(call, { kind: 'function', signature });
    return signature.returnType;
  }

  private inferQualifiedCall(call: CallExpr, object: Expr, member: string): Type {
    if (object.type !== 'Identifier' || this.env.lookup(object.name)) {
      return this.callMethod(call, object, member);
    }
    const key = `${object.name}.${member}`;
    const imported = this.imports.functions.get(key);
    if (imported) return this.callFunction(call, imported);
    const hiddenIn = this.imports.hidden.get(key);
    if (hiddenIn !== undefined) {
      throw new CompilerError(
        'ExportNotFound',
        `function \`${member}\` is not exported by module \`${hiddenIn}\``,
        this.loc(call.callee)
      ).withSuggestion(`mark it with \`export fn ${member}\` in \`${hiddenIn}\``);
    }
    if (this.imports.modules.has(object.name)) {
      throw new CompilerError(
        'UndefinedFunction',
        `module \`${object.name}\` has no function \`${member}\``,
        this.loc(call.callee)
      );
    }
    throw new CompilerError('UndefinedModule', `cannot find module or variable \`${object.name}\``, this.loc(object))
      .withSuggestion(`import the module first`, `import ${object.name};`);
  }

  private callMethod(call: CallExpr, object: Expr, name: string): Type {
    const receiver = this.infer(object);
    const method = resolveMethod(receiver, name);
    if (!method) {
      throw new CompilerError(
        'UndefinedFunction',
        `no method \`${name}\` on type \`${formatType(receiver)}\``,
        this.loc(call.callee)
      );
    }
    const params = method.params(receiver);
    if (call.args.length !== params.length) {
      throw new CompilerError(
        'WrongArgumentCount',
        `method \`${name}\` expects ${plural(params.length, 'argument')}, got ${call.args.length}`,
        this.loc(call)
      );
    }
    call.args.forEach((arg, i) => {
      const actual = this.infer(arg, params[i]);
      if (!compatible(params[i], actual)) throw typeMismatch(formatType(params[i]), formatType(actual), this.loc(arg));
    });
    this.module.callTargets.set(call, { kind: 'method', op: method.op, receiver });
    return method.result(receiver);
  }

  private inferConstruction(call: CallExpr, callee: EnumAccessExpr, expected?: Type): Type {
    const family = callee.enumName;
    const label = `${family}::${callee.variant}`;
    if (!builtinGenerics.isBuiltin(family)) {
      if (this.env.isEnum(family)) {
        throw new CompilerError('InvalidOperation', `enum variant \`${label}\` does not take a value`, this.loc(call))
          .withSuggestion(`write \`${label}\` without arguments`);
      }
      throw this.undefinedType(family, callee);
    }
    const variant = this.builtinVariant(family, callee.variant, callee);
    if (!variant.hasValue) {
      throw new CompilerError('InvalidOperation', `variant \`${label}\` does not carry a value`, this.loc(call))
        .withSuggestion(`write \`${label}\` without arguments`);
    }
    if (call.args.length !== 1) {
      throw new CompilerError('WrongArgumentCount', `\`${label}\` expects 1 argument, got ${call.args.length}`, this.loc(call));
    }
    const [arg] = call.args;
    this.module.callTargets.set(call, { kind: 'variant', family, variant: callee.variant });
    if (expected && isGenericOf(expected, family)) {
      const payload = builtinGenerics.variantValueType(family, callee.variant, expected.args);
      const actual = this.infer(arg, payload);
      if (payload && !compatible(payload, actual)) {
        throw typeMismatch(formatType(payload), formatType(actual), this.loc(arg));
      }
      return expected;
    }
    const actual = this.infer(arg);
    const params = builtinGenerics.get(family)?.typeParams.length ?? 0;
    if (params !== 1) {
      throw new CompilerError(
        'TypeMismatch',
        `cannot infer every type parameter of \`${family}\` from \`${label}(...)\``,
        this.loc(call)
      ).withSuggestion('specify the type explicitly', `let x: ${family}<int, string> = ${label}(...);`);
    }
    return { kind: 'generic', name: family, args: [actual] };
  }

  private builtinVariant(family: string, variantName: string, node: TesselNode) {
    const variant = builtinGenerics.variant(family, variantName);
    if (!variant) {
      const valid = builtinGenerics.get(family)?.variants.map((v) => v.name).join(', ') ?? '';
      throw new CompilerError('UndefinedType', `type \`${family}\` has no variant \`${variantName}\``, this.loc(node))
        .withSuggestion(`valid variants for ${family} are: ${valid}`);
    }
    return variant;
  }

  private inferEnumAccess(expr: EnumAccessExpr, expected?: Type): Type {
    const label = `${expr.enumName}::${expr.variant}`;
    if (builtinGenerics.isBuiltin(expr.enumName)) {
      const variant = this.builtinVariant(expr.enumName, expr.variant, expr);
      if (variant.hasValue) {
        throw new CompilerError('InvalidOperation', `variant \`${label}\` requires a value`, this.loc(expr))
          .withSuggestion('pass the payload', `${label}(value)`);
      }
      if (expected && isGenericOf(expected, expr.enumName)) return expected;
      throw new CompilerError(
        'TypeMismatch',
        `cannot use \`${label}\` without type parameters`,
        this.loc(expr)
      ).withSuggestion('specify the type explicitly', `let x: ${expr.enumName}<int> = ${label};`);
    }
    const variants = this.env.enumVariants(expr.enumName);
    if (!variants) throw this.undefinedType(expr.enumName, expr);
    if (!variants.has(expr.variant)) {
      throw new CompilerError('UndefinedType', `enum \`${expr.enumName}\` has no variant \`${expr.variant}\``, this.loc(expr))
        .withSuggestion(`valid variants are: ${Array.from(variants.keys()).join(', ')}`);
    }
    return enumType(expr.enumName);
  }

  // ---- match and try ----

  private inferMatch(expr: MatchExpr, expected?: Type): Type {
    if (expr.arms.length === 0) {
      throw new CompilerError('InvalidSyntax', 'match expression must have at least one arm', this.loc(expr));
    }
    const scrutinee = this.infer(expr.scrutinee);
    const covered = new Set<string>();
    let hasWildcard = false;
    let result: Type | undefined;

    for (const arm of expr.arms) {
      this.env.pushScope();
      const { pattern } = arm;
      const patternNode: TesselNode = pattern;
      if (pattern.kind === 'wildcard') {
        hasWildcard = true;
      } else if (pattern.kind === 'literal') {
        const type = literalType(pattern.literal);
        if (!compatible(scrutinee, type)) {
          throw typeMismatch(formatType(scrutinee), formatType(type), this.loc(patternNode));
        }
      } else if (builtinGenerics.isBuiltin(pattern.enumName)) {
        const label = `${pattern.enumName}::${pattern.variant}`;
        if (!isGenericOf(scrutinee, pattern.enumName)) {
          throw new CompilerError(
            'TypeMismatch',
            `pattern \`${label}\` cannot match a value of type \`${formatType(scrutinee)}\``,
            this.loc(patternNode)
          );
        }
        const variant = this.builtinVariant(pattern.enumName, pattern.variant, patternNode);
        if (variant.hasValue && pattern.binding === undefined) {
          throw new CompilerError('InvalidSyntax', `pattern \`${label}\` must bind its value`, this.loc(patternNode))
            .withSuggestion('name the payload', `${label}(value) => value`);
        }
        if (!variant.hasValue && pattern.binding !== undefined) {
          throw new CompilerError('InvalidSyntax', `variant \`${label}\` has no value to bind`, this.loc(patternNode));
        }
        if (pattern.binding !== undefined) {
          const bound = this.payloadType(scrutinee, pattern.variant, patternNode);
          this.module.armBindings.set(arm, bound);
          this.env.define({ name: pattern.binding, kind: 'variable', type: bound, mutable: true, location: this.loc(patternNode) });
        }
      } else {
        const variants = this.env.enumVariants(pattern.enumName);
        if (!variants) throw this.undefinedType(pattern.enumName, patternNode);
        if (!variants.has(pattern.variant)) {
          throw new CompilerError(
            'UndefinedType',
            `enum \`${pattern.enumName}\` has no variant \`${pattern.variant}\``,
            this.loc(patternNode)
          );
        }
        if (!compatible(scrutinee, enumType(pattern.enumName))) {
          throw typeMismatch(formatType(scrutinee), pattern.enumName, this.loc(patternNode));
        }
        if (pattern.binding !== undefined) {
          throw new CompilerError(
            'InvalidSyntax',
            `enum variant \`${pattern.enumName}::${pattern.variant}\` has no value to bind`,
            this.loc(patternNode)
          );
        }
        covered.add(pattern.variant);
      }

      const body = this.infer(arm.body, expected ?? result);
      this.env.popScope();
      if (result === undefined) result = body;
      else if (!compatible(result, body)) throw typeMismatch(formatType(result), formatType(body), this.loc(arm.body));
    }

    if (scrutinee.kind === 'enum' && !hasWildcard) {
      const variants = this.env.enumVariants(scrutinee.name);
      const missing = variants ? Array.from(variants.keys()).filter((name) => !covered.has(name)) : [];
      if (missing.length > 0) {
        throw new CompilerError(
          'InvalidSyntax',
          `non-exhaustive match on enum \`${scrutinee.name}\`, missing variants: ${missing.join(', ')}`,
          this.loc(expr)
        ).withSuggestion('add a wildcard pattern `_` or match all remaining variants');
      }
    }
    return result ?? VOID;
  }

  private payloadType(scrutinee: GenericType, variant: string, node: TesselNode): Type {
    const payload = builtinGenerics.variantValueType(scrutinee.name, variant, scrutinee.args);
    if (!payload) {
      throw new CompilerError('InternalError', `variant \`${scrutinee.name}::${variant}\` has no payload type`, this.loc(node));
    }
    return payload;
  }

  private inferTry(valueExpr: Expr, node: TesselNode): Type {
    const returnType = this.env.currentReturnType;
    if (!returnType) {
      throw new CompilerError('InvalidOperation', 'the `?` operator can only be used inside a function', this.loc(node));
    }
    const value = this.infer(valueExpr);
    if (!isGenericOf(value, 'Result') && !isGenericOf(value, 'Option')) {
      throw new CompilerError(
        'TypeMismatch',
        `the \`?\` operator can only be applied to \`Result\` or \`Option\`, found \`${formatType(value)}\``,
        this.loc(valueExpr)
      );
    }
    if (!isGenericOf(returnType, value.name)) {
      throw new CompilerError(
        'TypeMismatch',
        `the \`?\` operator on \`${formatType(value)}\` requires the function to return \`${value.name}\`, but it returns \`${formatType(returnType)}\``,
        this.loc(node)
      ).withSuggestion(`change the return type to \`${value.name}<...>\``);
    }
    if (value.name === 'Result' && !compatible(value.args[1], returnType.args[1])) {
      throw typeMismatch(formatType(returnType.args[1]), formatType(value.args[1]), this.loc(node)).withContext(
        'the error type of the value must match the error type the function returns'
      );
    }
    return value.args[0];
  }

  private loc(node: TesselNode): SourceLocation {
    return toSourceLocation(this.module.file, node.location);
  }
}

/** Type-checks one module. Throws the first `CompilerError` found. */
export function analyzeModule(program: Program, options: AnalyzeOptions = {}): CheckedModule {
  return new Checker(program, options).run();
}
