// src/index.ts
// ============================================
// 🌐 Tessel Main API Surface (Public Entry)
// ============================================

// 🚀 Pipeline
export {
  checkFile,
  checkSource,
  compileFile,
  compileSource,
  type CheckResult,
  type CompileOptions,
  type CompileResult,
} from './tessel/compile.js';

// 🔤 Front end
export { tokenize, keywords, type Token, type TesselToken, type TokenType } from './tessel/lexer.js';
export { parseTessel, Parser, type ParseOptions } from './tessel/parser.js';
export type * from './tessel/ast.js';

// 🧠 Types and checking
export {
  INT,
  FLOAT,
  BOOL,
  CHAR,
  STRING,
  VOID,
  arrayOf,
  compatible,
  dynamicArrayOf,
  enumType,
  formatType,
  genericType,
  mangleType,
  pointerTo,
  structType,
  typesEqual,
  type GenericType,
  type Type,
} from './tessel/types.js';
export { builtinGenerics } from './tessel/builtins.js';
export { TypeEnvironment, type FunctionSignature, type ImportedSymbols } from './tessel/environment.js';
export { analyzeModule, type AnalyzeOptions, type CallTarget, type CheckedModule } from './tessel/semantic.js';

// 🛠️ Lowering
export { generateC, cType, type CodegenCResult } from './tessel/codegen-c.js';
export { collectInstantiations, orderDefinitions, InstantiationSet } from './tessel/monomorphize.js';

// 📦 Modules
export {
  ModuleResolver,
  MemorySource,
  fileSystemSource,
  type LoadedModule,
  type ModuleSource,
} from './tessel/module-resolver.js';

// ❗ Errors and diagnostics
export {
  CompilerError,
  errorCode,
  errorTitle,
  isCompilerError,
  type ErrorKind,
  type SourceLocation,
  type Suggestion,
} from './tessel/errors.js';
export { formatCompilerError, toDiagnostic, type Diagnostic } from './utils/index.js';
