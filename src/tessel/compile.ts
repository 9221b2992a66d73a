import path from 'node:path';
import { generateC } from './codegen-c.js';
import { CompilerError, isCompilerError, unknownLocation } from './errors.js';
import { fileSystemSource, ModuleResolver, type ModuleSource } from './module-resolver.js';
import { parseTessel } from './parser.js';
import { analyzeModule, type CheckedModule } from './semantic.js';

export interface CompileOptions {
  /** Name of the entry file, used in locations and to find the module root. */
  file?: string;
  /** Defaults to the entry file's directory. */
  moduleRoot?: string;
  fileExtension?: string;
  source?: ModuleSource;
}

export type CheckResult = { ok: true; modules: CheckedModule[] } | { ok: false; error: CompilerError };

export type CompileResult =
  | { ok: true; code: string; modules: CheckedModule[] }
  | { ok: false; error: CompilerError };

/**
 * Parses and checks `source` together with every module it imports.
 * The entry module comes last in the result.
 */
export function checkSource(source: string, options: CompileOptions = {}): CheckResult {
  const file = options.file ?? '<input>';
  try {
    const program = parseTessel(source, { file });
    const resolver = new ModuleResolver({
      root: options.moduleRoot ?? path.dirname(file),
      fileExtension: options.fileExtension,
      source: options.source,
    });
    resolver.loadImportsOf(program, file);

    const checked = new Map<string, CheckedModule>();
    for (const loaded of resolver.modulesInOrder()) {
      const imports = resolver.resolveImports(loaded.program, loaded.file, checked);
      checked.set(loaded.name, analyzeModule(loaded.program, { file: loaded.file, moduleName: loaded.name, imports }));
    }
    const entry = analyzeModule(program, { file, imports: resolver.resolveImports(program, file, checked) });
    return { ok: true, modules: [...checked.values(), entry] };
  } catch (error) {
    if (isCompilerError(error)) return { ok: false, error };
    throw error;
  }
}

export function compileSource(source: string, options: CompileOptions = {}): CompileResult {
  const checked = checkSource(source, options);
  if (!checked.ok) return checked;
  try {
    const { code } = generateC(checked.modules);
    return { ok: true, code, modules: checked.modules };
  } catch (error) {
    if (isCompilerError(error)) return { ok: false, error };
    throw error;
  }
}

function readEntry(filePath: string, source: ModuleSource): { ok: true; text: string } | { ok: false; error: CompilerError } {
  if (!source.exists(filePath)) {
    return { ok: false, error: new CompilerError('ModuleNotFound', `cannot find file \`${filePath}\``, unknownLocation(filePath)) };
  }
  try {
    return { ok: true, text: source.read(filePath) };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return {
      ok: false,
      error: new CompilerError('ModuleLoadError', `failed to read \`${filePath}\`: ${reason}`, unknownLocation(filePath)),
    };
  }
}

export function checkFile(filePath: string, options: Omit<CompileOptions, 'file'> = {}): CheckResult {
  const entry = readEntry(filePath, options.source ?? fileSystemSource);
  if (!entry.ok) return entry;
  return checkSource(entry.text, { ...options, file: filePath });
}

export function compileFile(filePath: string, options: Omit<CompileOptions, 'file'> = {}): CompileResult {
  const entry = readEntry(filePath, options.source ?? fileSystemSource);
  if (!entry.ok) return entry;
  return compileSource(entry.text, { ...options, file: filePath });
}
