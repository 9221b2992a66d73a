import type { CallExpr, Expr, FnDecl, LetStmt, LiteralValue, MatchExpr, Statement } from './ast.js';
import { builtinGenerics } from './builtins.js';
import type { FunctionSignature } from './environment.js';
import { CompilerError, duplicateDefinition, internalError, type SourceLocation, toSourceLocation } from './errors.js';
import { isIntrinsic } from './intrinsics.js';
import type { MethodOp } from './methods.js';
import { collectInstantiations, type InstantiationSet, orderDefinitions, type TypeDefinition } from './monomorphize.js';
import type { CallTarget, CheckedModule } from './semantic.js';
import {
  formatType,
  type GenericType,
  isGenericOf,
  isPrimitive,
  isStringLike,
  mangleType,
  type PrimitiveName,
  type Type,
  unqualifiedName,
} from './types.js';

export interface CodegenCResult {
  code: string;
}

type RuntimeHelper = 'substring' | 'trim' | 'split';

const runtimeHelpers: Record<RuntimeHelper, string> = {
  substring: `char* tessel_substring(const char* s, int start, int end) {
  int len = (int)strlen(s);
  if (start < 0) start = 0;
  if (end > len) end = len;
  if (end < start) end = start;
  char* out = malloc((size_t)(end - start) + 1);
  memcpy(out, s + start, (size_t)(end - start));
  out[end - start] = '\\0';
  return out;
}`,
  trim: `char* tessel_trim(const char* s) {
  while (*s && isspace((unsigned char)*s)) s++;
  size_t len = strlen(s);
  while (len > 0 && isspace((unsigned char)s[len - 1])) len--;
  char* out = malloc(len + 1);
  memcpy(out, s, len);
  out[len] = '\\0';
  return out;
}`,
  split: `DynamicArray_charptr tessel_split(const char* s, const char* delim) {
  DynamicArray_charptr parts = { .data = NULL, .size = 0, .capacity = 0 };
  char* copy = strdup(s);
  for (char* token = strtok(copy, delim); token; token = strtok(NULL, delim)) {
    if (parts.size == parts.capacity) {
      size_t new_cap = parts.capacity ? parts.capacity * 2 : 4;
      parts.data = realloc(parts.data, new_cap * sizeof(parts.data[0]));
      parts.capacity = new_cap;
    }
    parts.data[parts.size++] = strdup(token);
  }
  free(copy);
  return parts;
}`,
};

const helperOrder: readonly RuntimeHelper[] = ['substring', 'trim', 'split'];

const mathIntrinsics: ReadonlySet<string> = new Set(['sqrt', 'pow', 'sin', 'cos', 'tan', 'floor', 'ceil', 'round']);

const primitiveDynamicArrays: readonly [string, string][] = [
  ['int', 'int'],
  ['double', 'double'],
  ['char', 'char'],
  ['charptr', 'char*'],
];

/** Escapes a string for a C literal delimited by `quote`. */
export function escapeC(value: string, quote: '"' | "'"): string {
  let out = '';
  for (const ch of value) {
    switch (ch) {
      case '\\':
        out += '\\\\';
        break;
      case '\n':
        out += '\\n';
        break;
      case '\t':
        out += '\\t';
        break;
      case '\r':
        out += '\\r';
        break;
      case '\0':
        out += '\\0';
        break;
      case quote:
        out += `\\${quote}`;
        break;
      default: {
        const code = ch.codePointAt(0) ?? 0;
        out += code < 0x20 ? `\\${code.toString(8).padStart(3, '0')}` : ch;
      }
    }
  }
  return out;
}

/** Suffix of the `DynamicArray_*` typedef that holds elements of `element`. */
export function dynamicArraySuffix(element: Type): string {
  if (element.kind === 'primitive') {
    switch (element.name) {
      case 'int':
      case 'bool':
        return 'int';
      case 'float':
        return 'double';
      case 'char':
        return 'char';
      case 'string':
        return 'charptr';
      case 'void':
        break;
    }
  }
  if (isStringLike(element)) return 'charptr';
  return mangleType(element);
}

const primitiveCTypes: Record<PrimitiveName, string> = {
  int: 'int',
  bool: 'int',
  float: 'double',
  char: 'char',
  string: 'char*',
  void: 'void',
};

export function cType(type: Type): string {
  switch (type.kind) {
    case 'primitive':
      return primitiveCTypes[type.name];
    case 'pointer':
      return `${cType(type.to)}*`;
    case 'array':
      return `${cType(type.element)}*`;
    case 'dynamicArray':
      return `DynamicArray_${dynamicArraySuffix(type.element)}`;
    case 'struct':
      return type.name === 'str' ? 'char*' : unqualifiedName(type.name);
    case 'enum':
      return unqualifiedName(type.name);
    case 'generic':
      return mangleType(type);
    case 'typeParam':
      throw internalError(`unresolved type parameter \`${type.name}\` reached lowering`);
  }
}

/** C enumerator for a user enum variant: `Color::Red` is `COLOR_RED`. */
export const enumConstant = (enumName: string, variant: string): string =>
  `${unqualifiedName(enumName).toUpperCase()}_${variant.toUpperCase()}`;

/** Constructor macro for a value-less builtin variant: `OPTION_INT_NONE`. */
export const variantMacro = (type: GenericType, variant: string): string =>
  `${mangleType(type).toUpperCase()}_${variant.toUpperCase()}`;

const variantTag = (type: GenericType, variant: string): string => `${mangleType(type)}_${variant}`;
const payloadField = (variant: string): string => `${variant.toLowerCase()}_value`;

function zeroValue(type: Type): string {
  if (type.kind === 'primitive') {
    if (type.name === 'float') return '0.0';
    if (type.name === 'char') return "'\\0'";
    if (type.name === 'string') return 'NULL';
    return '0';
  }
  if (type.kind === 'pointer' || type.kind === 'array' || isStringLike(type)) return 'NULL';
  if (type.kind === 'enum') return '0';
  return `((${cType(type)}){0})`;
}

function formatLiteralFloat(value: number): string {
  const text = String(value);
  return /[.eE]/.test(text) || !Number.isFinite(value) ? text : `${text}.0`;
}

/** Types C can `switch` on directly. */
const isIntegral = (type: Type): boolean =>
  type.kind === 'enum' || isPrimitive(type, 'int') || isPrimitive(type, 'bool') || isPrimitive(type, 'char');

const describeModule = (module: CheckedModule): string =>
  module.isEntry ? 'the entry module' : `module \`${module.name}\``;

/**
 * Struct and enum names are emitted unprefixed, so two modules may not
 * declare the same one.
 */
function assertUniqueTypeNames(modules: readonly CheckedModule[]): void {
  const seen = new Map<string, { module: CheckedModule; location: SourceLocation }>();
  for (const module of modules) {
    for (const decl of [...module.program.enums, ...module.program.structs]) {
      const location = toSourceLocation(module.file, decl.location);
      const previous = seen.get(decl.name);
      if (previous && previous.module !== module) {
        throw duplicateDefinition(decl.name, location, previous.location).withContext(
          `\`${decl.name}\` is also declared in ${describeModule(previous.module)}; struct and enum names are shared by every module of a program`
        );
      }
      seen.set(decl.name, { module, location });
    }
  }
}

function printfFormat(type: Type): string {
  if (isPrimitive(type, 'float')) return '%f';
  if (isPrimitive(type, 'char')) return '%c';
  if (isStringLike(type)) return '%s';
  return '%d';
}

/** Lowers a set of checked modules (dependencies first) to one C translation unit. */
export function generateC(modules: readonly CheckedModule[]): CodegenCResult {
  return { code: new CGenerator(modules).generate() };
}

class CGenerator {
  private indentLevel = 0;
  private tempCounter = 0;
  private readonly helpers = new Set<RuntimeHelper>();
  private usesMath = false;
  private readonly instantiations: InstantiationSet;
  private current: CheckedModule;
  private returnType: Type | null = null;

  constructor(private readonly modules: readonly CheckedModule[]) {
    this.instantiations = collectInstantiations(modules);
    const first = modules[0];
    if (!first) throw internalError('no modules to generate');
    this.current = first;
  }

  generate(): string {
    const entry = this.modules.find((m) => m.isEntry);
    const ordered = [...this.modules.filter((m) => !m.isEntry), ...(entry ? [entry] : [])];
    assertUniqueTypeNames(ordered);

    // Bodies first: they decide which runtime helpers and headers are needed.
    const functions: string[] = [];
    const forwards: string[] = [];
    const globals: string[] = [];
    for (const module of ordered) {
      this.current = module;
      for (const global of module.program.globals) globals.push(this.emitGlobal(global));
      for (const fn of module.program.functions) {
        const signature = module.functions.get(fn.name);
        if (!signature) throw internalError(`missing signature for \`${fn.name}\``);
        forwards.push(`${this.prototype(signature, fn.params.map((p) => p.name))};`);
        functions.push(this.emitFunction(fn, signature));
      }
    }
    const mainSignature = entry?.functions.get('main');

    const out: string[] = [];
    out.push('#include <stdio.h>', '#include <stdlib.h>', '#include <string.h>', '#include <stddef.h>', '#include <ctype.h>');
    if (this.usesMath) out.push('#include <math.h>');
    out.push('');

    if (mainSignature) {
      out.push(
        'static int __tessel_argc = 0;',
        'static char** __tessel_argv = NULL;',
        'int tessel_get_argc(void) { return __tessel_argc; }',
        'char* tessel_get_argv(int i) { return (i >= 0 && i < __tessel_argc) ? __tessel_argv[i] : NULL; }',
        ''
      );
    }

    for (const [suffix, element] of primitiveDynamicArrays) out.push(this.dynamicArrayTypedef(suffix, element));
    out.push('');

    for (const module of ordered) {
      for (const [name, variants] of module.enums) {
        const members = Array.from(variants, ([variant, value]) => `${enumConstant(name, variant)} = ${value}`);
        out.push(`typedef enum { ${members.join(', ')} } ${unqualifiedName(name)};`);
      }
    }

    const definitions: TypeDefinition[] = [];
    for (const module of ordered) {
      for (const [name, layout] of module.structs) {
        definitions.push({ kind: 'struct', name, fields: Array.from(layout) });
        out.push(`typedef struct ${unqualifiedName(name)} ${unqualifiedName(name)};`);
      }
    }
    for (const type of this.instantiations.values()) {
      definitions.push({ kind: 'generic', type });
      out.push(`typedef struct ${mangleType(type)} ${mangleType(type)};`);
    }

    const primitiveSuffixes = new Set(primitiveDynamicArrays.map(([suffix]) => suffix));
    for (const element of this.instantiations.dynamicArrayElements()) {
      const suffix = dynamicArraySuffix(element);
      if (primitiveSuffixes.has(suffix)) continue;
      primitiveSuffixes.add(suffix);
      out.push(this.dynamicArrayTypedef(suffix, cType(element)));
    }
    out.push('');

    for (const def of orderDefinitions(definitions)) {
      out.push(def.kind === 'struct' ? this.structDefinition(def.name, def.fields) : this.genericDefinition(def.type), '');
    }

    for (const module of ordered) {
      for (const [name, signature] of module.externs) {
        if (isIntrinsic(name)) continue;
        const decl = module.program.externs.find((e) => e.name === name);
        out.push(`${this.prototype(signature, decl ? decl.params.map((p) => p.name) : [])};`);
      }
    }

    for (const helper of helperOrder) {
      if (this.helpers.has(helper)) out.push(runtimeHelpers[helper], '');
    }

    out.push(...forwards, '');
    if (globals.length > 0) out.push(...globals, '');
    out.push(...functions);

    if (mainSignature) {
      const call = isPrimitive(mainSignature.returnType, 'void')
        ? ['  tessel_main();', '  return 0;']
        : ['  return tessel_main();'];
      out.push(
        'int main(int argc, char* argv[]) {',
        '  __tessel_argc = argc;',
        '  __tessel_argv = argv;',
        ...call,
        '}',
        ''
      );
    }
    return out.join('\n');
  }

  // ---- type definitions ----

  private dynamicArrayTypedef(suffix: string, element: string): string {
    return `typedef struct { ${element}* data; size_t size; size_t capacity; } DynamicArray_${suffix};`;
  }

  private structDefinition(name: string, fields: [string, Type][]): string {
    const lines = fields.map(([field, type]) => `  ${cType(type)} ${field};`);
    return [`struct ${unqualifiedName(name)} {`, ...lines, '};'].join('\n');
  }

  private genericDefinition(type: GenericType): string {
    const builtin = builtinGenerics.get(type.name);
    if (!builtin) throw internalError(`\`${type.name}\` is not a builtin generic type`);
    const name = mangleType(type);
    const tags = builtin.variants.map((v) => variantTag(type, v.name));
    const members: string[] = [];
    for (const variant of builtin.variants) {
      const payload = builtinGenerics.variantValueType(type.name, variant.name, type.args);
      if (variant.hasValue && payload) members.push(`${cType(payload)} ${payloadField(variant.name)};`);
    }
    const union = members.length > 0 ? ` union { ${members.join(' ')} } data;` : '';
    const lines = [
      `typedef enum { ${tags.join(', ')} } ${name}_Tag;`,
      `typedef struct ${name} { ${name}_Tag tag;${union} } ${name};`,
    ];
    for (const variant of builtin.variants) {
      if (!variant.hasValue) {
        lines.push(`#define ${variantMacro(type, variant.name)} ((${name}){ .tag = ${variantTag(type, variant.name)} })`);
      }
    }
    return lines.join('\n');
  }

  // ---- declarations ----

  private prototype(signature: FunctionSignature, names: string[]): string {
    const params = signature.params.map((type, i) => `${cType(type)} ${names[i] ?? `arg${i}`}`);
    if (signature.variadic) params.push('...');
    const list = params.length > 0 ? params.join(', ') : 'void';
    return `${cType(signature.returnType)} ${signature.cName}(${list})`;
  }

  private emitGlobal(global: LetStmt): string {
    const type = this.bindingType(global);
    const init = global.value ? this.constantInitializer(global.value, global.name) : zeroValue(type);
    return `static ${cType(type)} ${this.current.cPrefix}${global.name} = ${init};`;
  }

  private constantInitializer(value: Expr, name: string): string {
    if (!this.isConstant(value)) {
      throw new CompilerError(
        'UnsupportedFeature',
        `global \`${name}\` must be initialized with a constant expression`,
        this.loc(value)
      ).withSuggestion('initialize it with a literal and assign the computed value inside a function');
    }
    return this.emitExpr(value);
  }

  private isConstant(expr: Expr): boolean {
    switch (expr.type) {
      case 'Literal':
      case 'EnumAccess':
        return true;
      case 'Unary':
        return expr.op === '-' && this.isConstant(expr.operand);
      case 'StructLiteral':
        return expr.fields.every((f) => this.isConstant(f.value));
      case 'ArrayLiteral':
        return expr.elements.every((e) => this.isConstant(e));
      case 'Call':
        return this.callTarget(expr).kind === 'variant' && expr.args.every((a) => this.isConstant(a));
      default:
        return false;
    }
  }

  private emitFunction(fn: FnDecl, signature: FunctionSignature): string {
    this.returnType = signature.returnType;
    const header = this.prototype(signature, fn.params.map((p) => p.name));
    this.indentLevel = 1;
    const body = fn.body.map((stmt) => this.emitStatement(stmt));
    this.indentLevel = 0;
    this.returnType = null;
    return [`${header} {`, ...body, '}', ''].join('\n');
  }

  // ---- statements ----

  private pad(): string {
    return '  '.repeat(this.indentLevel);
  }

  private emitBlock(statements: readonly Statement[]): string[] {
    this.indentLevel++;
    const lines = statements.map((stmt) => this.emitStatement(stmt));
    this.indentLevel--;
    return lines;
  }

  private emitStatement(stmt: Statement): string {
    const pad = this.pad();
    switch (stmt.type) {
      case 'Let':
      case 'Const': {
        const type = this.bindingType(stmt);
        const init = stmt.value ? this.emitExpr(stmt.value) : zeroValue(type);
        return `${pad}${cType(type)} ${stmt.name} = ${init};`;
      }
      case 'Assign':
        return `${pad}${this.emitExpr(stmt.target)} = ${this.emitExpr(stmt.value)};`;
      case 'Return':
        return stmt.value ? `${pad}return ${this.emitExpr(stmt.value)};` : `${pad}return;`;
      case 'If': {
        const lines = [`${pad}if (${this.emitExpr(stmt.condition)}) {`, ...this.emitBlock(stmt.thenBlock)];
        if (stmt.elseBlock) lines.push(`${pad}} else {`, ...this.emitBlock(stmt.elseBlock));
        lines.push(`${pad}}`);
        return lines.join('\n');
      }
      case 'While':
        return [`${pad}while (${this.emitExpr(stmt.condition)}) {`, ...this.emitBlock(stmt.body), `${pad}}`].join('\n');
      case 'For':
        return this.emitFor(stmt.variable, stmt.iterable, stmt.body, this.bindingType(stmt));
      case 'Break':
        return `${pad}break;`;
      case 'Continue':
        return `${pad}continue;`;
      case 'ExprStmt':
        return `${pad}${this.emitExpr(stmt.expr)};`;
    }
  }

  private emitFor(variable: string, iterable: Expr, body: readonly Statement[], element: Type): string {
    const pad = this.pad();
    if (iterable.type === 'Range') {
      const start = this.emitExpr(iterable.start);
      const end = this.emitExpr(iterable.end);
      return [
        `${pad}for (int ${variable} = ${start}; ${variable} < ${end}; ${variable}++) {`,
        ...this.emitBlock(body),
        `${pad}}`,
      ].join('\n');
    }
    const type = this.typeOf(iterable);
    const n = this.nextTemp();
    const iter = `__iter_${n}`;
    const index = `__i_${n}`;
    let bound: string;
    let item: string;
    let indexType: string;
    if (type.kind === 'dynamicArray') {
      bound = `${iter}.size`;
      item = `${iter}.data[${index}]`;
      indexType = 'size_t';
    } else if (type.kind === 'array' && type.length !== undefined) {
      bound = String(type.length);
      item = `${iter}[${index}]`;
      indexType = 'int';
    } else {
      throw new CompilerError('UnsupportedFeature', `cannot lower iteration over \`${formatType(type)}\``, this.loc(iterable));
    }
    this.indentLevel++;
    const inner = this.pad();
    const lines = [
      `${pad}{`,
      `${inner}${cType(type)} ${iter} = ${this.emitExpr(iterable)};`,
      `${inner}for (${indexType} ${index} = 0; ${index} < ${bound}; ${index}++) {`,
      `${inner}  ${cType(element)} ${variable} = ${item};`,
      ...this.emitBlock(body),
      `${inner}}`,
    ];
    this.indentLevel--;
    lines.push(`${pad}}`);
    return lines.join('\n');
  }

  // ---- expressions ----

  private emitExpr(expr: Expr): string {
    switch (expr.type) {
      case 'Literal':
        return this.emitLiteral(expr.literal);
      case 'Identifier':
        return this.current.globalNames.get(expr) ?? expr.name;
      case 'Binary':
        return this.emitBinary(expr.op, expr.left, expr.right, this.typeOf(expr));
      case 'Unary':
        return `(${expr.op}${this.emitExpr(expr.operand)})`;
      case 'Call':
        return this.emitCall(expr);
      case 'Member':
        if (expr.object.type === 'Unary' && expr.object.op === '*') {
          return `${this.emitExpr(expr.object.operand)}->${expr.property}`;
        }
        return `${this.emitExpr(expr.object)}.${expr.property}`;
      case 'Index': {
        const object = this.emitExpr(expr.object);
        const index = this.emitExpr(expr.index);
        return this.typeOf(expr.object).kind === 'dynamicArray' ? `${object}.data[${index}]` : `${object}[${index}]`;
      }
      case 'ArrayLiteral': {
        const type = this.typeOf(expr);
        if (expr.elements.length === 0 || type.kind !== 'array') return 'NULL';
        const items = expr.elements.map((e) => this.emitExpr(e)).join(', ');
        return `(${cType(type.element)}[]){${items}}`;
      }
      case 'NewArray':
        return `((${cType(this.typeOf(expr))}){ .data = NULL, .size = 0, .capacity = 0 })`;
      case 'StructLiteral': {
        const fields = expr.fields.map((f) => `.${f.name} = ${this.emitExpr(f.value)}`).join(', ');
        return `((${unqualifiedName(expr.name)}){ ${fields} })`;
      }
      case 'Range':
        throw new CompilerError('UnsupportedFeature', 'a range can only be lowered as a `for` iterable', this.loc(expr));
      case 'New': {
        const type = cType(this.typeOf(expr.value));
        const temp = `__new_${this.nextTemp()}`;
        return `({ ${type}* ${temp} = malloc(sizeof(${type})); *${temp} = ${this.emitExpr(expr.value)}; ${temp}; })`;
      }
      case 'Delete': {
        const value = this.emitExpr(expr.value);
        return this.typeOf(expr.value).kind === 'dynamicArray' ? `free(${value}.data)` : `free(${value})`;
      }
      case 'Cast':
        return `((${cType(this.typeOf(expr))})${this.emitExpr(expr.value)})`;
      case 'Ternary':
        return `(${this.emitExpr(expr.condition)} ? ${this.emitExpr(expr.whenTrue)} : ${this.emitExpr(expr.whenFalse)})`;
      case 'EnumAccess': {
        const type = this.typeOf(expr);
        if (type.kind === 'generic') return variantMacro(type, expr.variant);
        return enumConstant(expr.enumName, expr.variant);
      }
      case 'Match':
        return this.emitMatch(expr);
      case 'Try':
        return this.emitTry(expr.value, expr);
    }
  }

  private emitBinary(op: string, left: Expr, right: Expr, result: Type): string {
    const l = this.emitExpr(left);
    const r = this.emitExpr(right);
    const leftType = this.typeOf(left);
    if (op === '+' && isStringLike(result)) {
      const temp = `__concat_${this.nextTemp()}`;
      return `({ char* ${temp} = malloc(strlen(${l}) + strlen(${r}) + 1); strcpy(${temp}, ${l}); strcat(${temp}, ${r}); ${temp}; })`;
    }
    if (['==', '!=', '<', '<=', '>', '>='].includes(op)) {
      if (isStringLike(leftType)) return `(strcmp(${l}, ${r}) ${op} 0)`;
      if (leftType.kind === 'struct' || leftType.kind === 'generic' || leftType.kind === 'dynamicArray') {
        throw new CompilerError(
          'UnsupportedFeature',
          `values of type \`${formatType(leftType)}\` cannot be compared with \`${op}\``,
          this.loc(left)
        ).withSuggestion('compare the fields individually, or use `match`');
      }
    }
    return `(${l} ${op} ${r})`;
  }

  // ---- calls ----

  private callTarget(call: CallExpr): CallTarget {
    const target = this.current.callTargets.get(call);
    if (!target) throw internalError('call was not resolved by the checker', this.loc(call));
    return target;
  }

  private emitCall(call: CallExpr): string {
    const target = this.callTarget(call);
    const args = () => call.args.map((a) => this.emitExpr(a));
    switch (target.kind) {
      case 'print':
        return this.emitPrint(call.args[0], target.newline);
      case 'len':
        return `strlen(${this.emitExpr(call.args[0])})`;
      case 'function':
        return `${target.signature.cName}(${args().join(', ')})`;
      case 'intrinsic':
        if (mathIntrinsics.has(target.name)) this.usesMath = true;
        return `${target.name}(${args().join(', ')})`;
      case 'method': {
        if (call.callee.type !== 'Member') throw internalError('method call without a receiver', this.loc(call));
        return this.emitMethod(target.op, this.emitExpr(call.callee.object), args(), target.receiver);
      }
      case 'variant': {
        const type = this.typeOf(call);
        if (type.kind !== 'generic') throw internalError('variant construction without a generic type', this.loc(call));
        const [value] = args();
        return `((${mangleType(type)}){ .tag = ${variantTag(type, target.variant)}, .data = { .${payloadField(target.variant)} = ${value} } })`;
      }
    }
  }

  private emitMethod(op: MethodOp, receiver: string, args: string[], receiverType: Type): string {
    switch (op) {
      case 'string.length':
        return `strlen(${receiver})`;
      case 'array.length':
        return `(${receiver}.size)`;
      case 'string.contains':
        return `(strstr(${receiver}, ${args[0]}) != NULL)`;
      case 'string.substring':
        this.helpers.add('substring');
        return `tessel_substring(${receiver}, ${args[0]}, ${args[1]})`;
      case 'string.trim':
        this.helpers.add('trim');
        return `tessel_trim(${receiver})`;
      case 'string.split':
        this.helpers.add('split');
        return `tessel_split(${receiver}, ${args[0]})`;
      case 'array.push': {
        const a = receiver;
        return (
          `({ if (${a}.size == ${a}.capacity) { size_t new_cap = ${a}.capacity ? ${a}.capacity * 2 : 4; ` +
          `${a}.data = realloc(${a}.data, new_cap * sizeof(${a}.data[0])); ${a}.capacity = new_cap; } ` +
          `${a}.data[${a}.size++] = ${args[0]}; })`
        );
      }
      case 'array.pop': {
        const element = receiverType.kind === 'dynamicArray' ? receiverType.element : receiverType;
        return `(${receiver}.size > 0 ? ${receiver}.data[--${receiver}.size] : ${zeroValue(element)})`;
      }
      default:
        throw new CompilerError('UnsupportedFeature', `method \`${op}\` has no lowering`, toSourceLocation(this.current.file));
    }
  }

  private emitPrint(arg: Expr | undefined, newline: boolean): string {
    const nl = newline ? '\\n' : '';
    if (!arg) return `printf("${nl}")`;
    const type = this.typeOf(arg);
    const value = this.emitExpr(arg);
    if (type.kind !== 'array' && type.kind !== 'dynamicArray') {
      return `printf("${printfFormat(type)}${nl}", ${value})`;
    }
    const n = this.nextTemp();
    const temp = `__print_${n}`;
    const index = `__i_${n}`;
    const fmt = printfFormat(type.element);
    if (type.kind === 'dynamicArray') {
      return (
        `({ ${cType(type)} ${temp} = ${value}; printf("["); for (size_t ${index} = 0; ${index} < ${temp}.size; ${index}++) ` +
        `{ if (${index} > 0) printf(", "); printf("${fmt}", ${temp}.data[${index}]); } printf("]${nl}"); })`
      );
    }
    if (type.length === undefined) {
      throw new CompilerError('UnsupportedFeature', 'cannot print an array of unknown length', this.loc(arg));
    }
    return (
      `({ ${cType(type)} ${temp} = ${value}; printf("["); for (int ${index} = 0; ${index} < ${type.length}; ${index}++) ` +
      `{ if (${index} > 0) printf(", "); printf("${fmt}", ${temp}[${index}]); } printf("]${nl}"); })`
    );
  }

  // ---- match and try ----

  private emitMatch(expr: MatchExpr): string {
    const scrutineeType = this.typeOf(expr.scrutinee);
    const resultType = this.typeOf(expr);
    const n = this.nextTemp();
    const subject = `__match_${n}`;
    const result = `__result_${n}`;
    const hasResult = !isPrimitive(resultType, 'void');
    const head = `({ ${cType(scrutineeType)} ${subject} = ${this.emitExpr(expr.scrutinee)};`;
    const resultDecl = hasResult ? ` ${cType(resultType)} ${result};` : '';
    const tail = hasResult ? ` ${result}; })` : ' })';
    const assign = (body: Expr) => (hasResult ? `${result} = ${this.emitExpr(body)};` : `${this.emitExpr(body)};`);

    if (isStringLike(scrutineeType) || isPrimitive(scrutineeType, 'float')) {
      const branches: string[] = [];
      for (const arm of expr.arms) {
        if (arm.pattern.kind === 'wildcard') {
          branches.push(branches.length === 0 ? `{ ${assign(arm.body)} }` : `else { ${assign(arm.body)} }`);
          break;
        }
        if (arm.pattern.kind !== 'literal') {
          throw new CompilerError('UnsupportedFeature', 'only literal patterns can match strings and floats', this.loc(expr));
        }
        const literal = this.emitLiteral(arm.pattern.literal);
        const test = isStringLike(scrutineeType) ? `strcmp(${subject}, ${literal}) == 0` : `${subject} == ${literal}`;
        branches.push(`${branches.length === 0 ? 'if' : 'else if'} (${test}) { ${assign(arm.body)} }`);
      }
      return `${head}${resultDecl} ${branches.join(' ')}${tail}`;
    }

    const generic = scrutineeType.kind === 'generic' ? scrutineeType : null;
    if (!generic && !isIntegral(scrutineeType)) {
      // Only `_` can match structs, arrays and pointers.
      const [arm] = expr.arms;
      if (!arm || arm.pattern.kind !== 'wildcard') {
        throw new CompilerError(
          'UnsupportedFeature',
          `cannot lower a match on a value of type \`${formatType(scrutineeType)}\``,
          this.loc(expr)
        );
      }
      return `${head}${resultDecl} { ${assign(arm.body)} }${tail}`;
    }
    const cases: string[] = [];
    for (const arm of expr.arms) {
      const { pattern } = arm;
      let label: string;
      let binding = '';
      if (pattern.kind === 'wildcard') {
        label = 'default:';
      } else if (pattern.kind === 'literal') {
        label = `case ${this.emitLiteral(pattern.literal)}:`;
      } else if (generic) {
        label = `case ${variantTag(generic, pattern.variant)}:`;
        const bound = this.current.armBindings.get(arm);
        if (pattern.binding !== undefined && bound) {
          binding = `${cType(bound)} ${pattern.binding} = ${subject}.data.${payloadField(pattern.variant)}; `;
        }
      } else {
        label = `case ${enumConstant(pattern.enumName, pattern.variant)}:`;
      }
      cases.push(`${label} { ${binding}${assign(arm.body)} break; }`);
    }
    const switchOn = generic ? `${subject}.tag` : subject;
    return `${head}${resultDecl} switch (${switchOn}) { ${cases.join(' ')} }${tail}`;
  }

  private emitLiteral(literal: LiteralValue): string {
    switch (literal.kind) {
      case 'int':
        return String(literal.value);
      case 'float':
        return formatLiteralFloat(literal.value);
      case 'bool':
        return literal.value ? '1' : '0';
      case 'char':
        return `'${escapeC(literal.value, "'")}'`;
      case 'string':
        return `"${escapeC(literal.value, '"')}"`;
    }
  }

  private emitTry(valueExpr: Expr, node: Expr): string {
    const valueType = this.typeOf(valueExpr);
    const returnType = this.returnType;
    if (valueType.kind !== 'generic' || !returnType || !isGenericOf(returnType, valueType.name)) {
      throw internalError('`?` reached lowering without a matching return type', this.loc(node));
    }
    const success = builtinGenerics.successVariant(valueType.name);
    const failure = builtinGenerics.failureVariant(valueType.name);
    if (!success || !failure) throw internalError(`\`${valueType.name}\` has no success or failure variant`, this.loc(node));

    const n = this.nextTemp();
    const temp = `__try_${n}`;
    const out = `__try_value_${n}`;
    const propagate = failure.hasValue
      ? `return ((${mangleType(returnType)}){ .tag = ${variantTag(returnType, failure.name)}, .data = { .${payloadField(failure.name)} = ${temp}.data.${payloadField(failure.name)} } });`
      : `return ${variantMacro(returnType, failure.name)};`;
    return (
      `({ ${mangleType(valueType)} ${temp} = ${this.emitExpr(valueExpr)}; ${cType(valueType.args[0])} ${out}; ` +
      `switch (${temp}.tag) { case ${variantTag(valueType, success.name)}: ${out} = ${temp}.data.${payloadField(success.name)}; break; ` +
      `case ${variantTag(valueType, failure.name)}: ${propagate} } ${out}; })`
    );
  }

  // ---- helpers ----

  private typeOf(expr: Expr): Type {
    const type = this.current.exprTypes.get(expr);
    if (!type) throw internalError('expression has no checked type', this.loc(expr));
    return type;
  }

  private bindingType(node: Statement): Type {
    if (node.type !== 'Let' && node.type !== 'Const' && node.type !== 'For') {
      throw internalError(`\`${node.type}\` does not bind a name`, this.loc(node));
    }
    const type = this.current.bindingTypes.get(node);
    if (!type) throw internalError('binding has no checked type', this.loc(node));
    return type;
  }

  private nextTemp(): number {
    return this.tempCounter++;
  }

  private loc(node: { location?: Expr['location'] }) {
    return toSourceLocation(this.current.file, node.location);
  }
}
