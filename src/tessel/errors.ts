import { type Location } from '../utils/types.js';

export type ErrorKind =
  | 'UnexpectedCharacter'
  | 'UnterminatedString'
  | 'InvalidNumber'
  | 'InvalidEscapeSequence'
  | 'UnexpectedToken'
  | 'ExpectedToken'
  | 'MissingSemicolon'
  | 'UnclosedDelimiter'
  | 'InvalidSyntax'
  | 'UndefinedVariable'
  | 'UndefinedFunction'
  | 'UndefinedType'
  | 'UndefinedModule'
  | 'DuplicateDefinition'
  | 'TypeMismatch'
  | 'InvalidOperation'
  | 'WrongArgumentCount'
  | 'ImmutableAssignment'
  | 'MissingReturnType'
  | 'ModuleNotFound'
  | 'ModuleLoadError'
  | 'ModuleExportError'
  | 'CircularImport'
  | 'ExportNotFound'
  | 'ImportConflict'
  | 'UnsupportedFeature'
  | 'InternalError';

const errorKindInfo: Record<ErrorKind, { code: string; title: string }> = {
  UnexpectedCharacter: { code: 'E001', title: 'unexpected character' },
  UnterminatedString: { code: 'E002', title: 'unterminated string literal' },
  InvalidNumber: { code: 'E003', title: 'invalid number literal' },
  InvalidEscapeSequence: { code: 'E004', title: 'invalid escape sequence' },
  UnexpectedToken: { code: 'E101', title: 'unexpected token' },
  ExpectedToken: { code: 'E102', title: 'expected token' },
  MissingSemicolon: { code: 'E103', title: 'missing semicolon' },
  UnclosedDelimiter: { code: 'E104', title: 'unclosed delimiter' },
  InvalidSyntax: { code: 'E105', title: 'invalid syntax' },
  UndefinedVariable: { code: 'E201', title: 'undefined variable' },
  UndefinedFunction: { code: 'E202', title: 'undefined function' },
  UndefinedType: { code: 'E203', title: 'undefined type' },
  UndefinedModule: { code: 'E204', title: 'undefined module' },
  DuplicateDefinition: { code: 'E205', title: 'duplicate definition' },
  TypeMismatch: { code: 'E206', title: 'type mismatch' },
  InvalidOperation: { code: 'E207', title: 'invalid operation' },
  WrongArgumentCount: { code: 'E208', title: 'wrong number of arguments' },
  ImmutableAssignment: { code: 'E209', title: 'cannot assign to immutable variable' },
  MissingReturnType: { code: 'E210', title: 'missing return type' },
  ModuleNotFound: { code: 'E301', title: 'module not found' },
  ModuleLoadError: { code: 'E302', title: 'module load error' },
  ModuleExportError: { code: 'E303', title: 'module export error' },
  CircularImport: { code: 'E304', title: 'circular import detected' },
  ExportNotFound: { code: 'E305', title: 'export not found' },
  ImportConflict: { code: 'E306', title: 'import conflict' },
  UnsupportedFeature: { code: 'E401', title: 'unsupported feature' },
  InternalError: { code: 'E500', title: 'internal compiler error' },
};

export function errorCode(kind: ErrorKind): string {
  return errorKindInfo[kind].code;
}

export function errorTitle(kind: ErrorKind): string {
  return errorKindInfo[kind].title;
}

export interface SourceLocation {
  file: string;
  line: number;
  column: number;
  length?: number;
}

export interface Suggestion {
  message: string;
  codeExample?: string;
  helpLink?: string;
}

export const unknownLocation = (file = '<unknown>'): SourceLocation => ({ file, line: 0, column: 0 });

/**
 * Converts an AST span into the single-line form errors carry.
 * Multi-line spans keep only their start.
 */
export function toSourceLocation(file: string, location?: Location): SourceLocation {
  if (!location) return unknownLocation(file);
  const { start, end } = location;
  const length = start.line === end.line && end.offset > start.offset ? end.offset - start.offset : undefined;
  return { file, line: start.line, column: start.column, length };
}

export class CompilerError extends Error {
  readonly kind: ErrorKind;
  location: SourceLocation;
  context?: string;
  readonly suggestions: Suggestion[] = [];
  readonly relatedErrors: CompilerError[] = [];

  constructor(kind: ErrorKind, message: string, location: SourceLocation) {
    super(message);
    this.name = 'CompilerError';
    this.kind = kind;
    this.location = location;
  }

  get code(): string {
    return errorCode(this.kind);
  }

  get title(): string {
    return errorTitle(this.kind);
  }

  withContext(context: string): this {
    this.context = context;
    return this;
  }

  withSuggestion(message: string, codeExample?: string, helpLink?: string): this {
    this.suggestions.push({ message, codeExample, helpLink });
    return this;
  }

  withRelated(error: CompilerError): this {
    this.relatedErrors.push(error);
    return this;
  }
}

export function isCompilerError(value: unknown): value is CompilerError {
  return value instanceof CompilerError;
}

export function undefinedVariable(name: string, location: SourceLocation): CompilerError {
  return new CompilerError('UndefinedVariable', `cannot find variable \`${name}\` in this scope`, location)
    .withSuggestion("consider declaring the variable with `let` or check if it's spelled correctly");
}

export function typeMismatch(expected: string, found: string, location: SourceLocation): CompilerError {
  return new CompilerError('TypeMismatch', `expected \`${expected}\`, found \`${found}\``, location)
    .withSuggestion('consider converting the value to the expected type or changing the expected type');
}

export function unexpectedToken(expected: string, found: string, location: SourceLocation): CompilerError {
  return new CompilerError('UnexpectedToken', `expected \`${expected}\`, found \`${found}\``, location)
    .withSuggestion('check for missing or extra punctuation');
}

export function duplicateDefinition(
  name: string,
  location: SourceLocation,
  previous: SourceLocation
): CompilerError {
  return new CompilerError('DuplicateDefinition', `the name \`${name}\` is already defined`, location)
    .withRelated(new CompilerError('DuplicateDefinition', `previous definition of \`${name}\``, previous))
    .withSuggestion('consider renaming one of the definitions or using different scopes');
}

export function internalError(message: string, location: SourceLocation = unknownLocation()): CompilerError {
  return new CompilerError('InternalError', message, location)
    .withSuggestion('this is a bug in the compiler; please report it with the input that triggered it');
}
