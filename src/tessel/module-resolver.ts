import fs from 'node:fs';
import path from 'node:path';
import type { ImportDecl, Program } from './ast.js';
import { emptyImports, type ImportedSymbols } from './environment.js';
import { CompilerError, internalError, toSourceLocation, unknownLocation, type SourceLocation } from './errors.js';
import { parseTessel } from './parser.js';
import type { CheckedModule } from './semantic.js';

/** Where module text comes from. Tests swap in `MemorySource`. */
export interface ModuleSource {
  exists(filePath: string): boolean;
  read(filePath: string): string;
}

export const fileSystemSource: ModuleSource = {
  exists: (filePath) => fs.existsSync(filePath),
  read: (filePath) => fs.readFileSync(filePath, 'utf-8'),
};

export class MemorySource implements ModuleSource {
  private readonly files: Map<string, string>;

  constructor(files: Record<string, string> = {}) {
    this.files = new Map(Object.entries(files).map(([file, text]) => [path.normalize(file), text]));
  }

  set(filePath: string, text: string): void {
    this.files.set(path.normalize(filePath), text);
  }

  exists(filePath: string): boolean {
    return this.files.has(path.normalize(filePath));
  }

  read(filePath: string): string {
    const text = this.files.get(path.normalize(filePath));
    if (text === undefined) throw new Error(`ENOENT: no such file '${filePath}'`);
    return text;
  }
}

export interface ModuleExports {
  functions: Set<string>;
  structs: Set<string>;
  enums: Set<string>;
}

export interface LoadedModule {
  /** Dotted module path, as written in `import`. */
  name: string;
  file: string;
  source: string;
  program: Program;
  exports: ModuleExports;
}

export interface ModuleResolverOptions {
  root: string;
  fileExtension?: string;
  source?: ModuleSource;
}

/** Collects a module's exported names. Listed names must refer to a declaration. */
export function collectExports(program: Program, file: string): ModuleExports {
  const exports: ModuleExports = { functions: new Set(), structs: new Set(), enums: new Set() };
  for (const item of program.exports) {
    const kind =
      item.kind ??
      (program.functions.some((f) => f.name === item.name)
        ? 'function'
        : program.structs.some((s) => s.name === item.name)
          ? 'struct'
          : program.enums.some((e) => e.name === item.name)
            ? 'enum'
            : undefined);
    if (kind === 'function') exports.functions.add(item.name);
    else if (kind === 'struct') exports.structs.add(item.name);
    else if (kind === 'enum') exports.enums.add(item.name);
    else {
      throw new CompilerError(
        'ModuleExportError',
        `cannot export \`${item.name}\`: no function, struct or enum with that name is defined`,
        toSourceLocation(file, item.location)
      ).withSuggestion('define the item in this module or remove it from the export list');
    }
  }
  return exports;
}

/** Loads imported modules once each and builds what every module sees of its imports. */
export class ModuleResolver {
  private readonly cache = new Map<string, LoadedModule>();
  private readonly loading: string[] = [];
  private readonly order: string[] = [];
  private readonly root: string;
  private readonly extension: string;
  private readonly source: ModuleSource;

  constructor(options: ModuleResolverOptions) {
    this.root = options.root;
    this.extension = options.fileExtension ?? '.tsl';
    this.source = options.source ?? fileSystemSource;
  }

  /** `geo.shapes` maps to `<root>/geo/shapes.tsl`. */
  modulePath(name: string): string {
    return path.join(this.root, ...name.split('.')) + this.extension;
  }

  /** Loads every module `program` imports, transitively. */
  loadImportsOf(program: Program, file: string): void {
    for (const decl of program.imports) this.load(decl.module, toSourceLocation(file, decl.location));
  }

  load(name: string, from: SourceLocation = unknownLocation()): LoadedModule {
    const cached = this.cache.get(name);
    if (cached) return cached;
    if (this.loading.includes(name)) {
      const cycle = [...this.loading.slice(this.loading.indexOf(name)), name].join(' -> ');
      throw new CompilerError('CircularImport', `circular import detected: ${cycle}`, from).withSuggestion(
        'move the shared items into a module both can import'
      );
    }

    const file = this.modulePath(name);
    if (!this.source.exists(file)) {
      throw new CompilerError('ModuleNotFound', `cannot find module \`${name}\``, from)
        .withContext(`looked for ${file}`)
        .withSuggestion('check the module path, or set `moduleRoot` in tessel.config.json');
    }
    let text: string;
    try {
      text = this.source.read(file);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new CompilerError('ModuleLoadError', `failed to load module \`${name}\`: ${reason}`, from);
    }

    const program = parseTessel(text, { file });
    this.loading.push(name);
    try {
      this.loadImportsOf(program, file);
    } finally {
      this.loading.pop();
    }
    const loaded: LoadedModule = { name, file, source: text, program, exports: collectExports(program, file) };
    this.cache.set(name, loaded);
    this.order.push(name);
    return loaded;
  }

  get(name: string): LoadedModule | undefined {
    return this.cache.get(name);
  }

  /** Every loaded module, dependencies before the modules that import them. */
  modulesInOrder(): LoadedModule[] {
    return this.order.flatMap((name) => {
      const loaded = this.cache.get(name);
      return loaded ? [loaded] : [];
    });
  }

  /**
   * Symbols `program` receives from its imports. `checked` must already hold
   * every module it imports.
   */
  resolveImports(program: Program, file: string, checked: ReadonlyMap<string, CheckedModule>): ImportedSymbols {
    const symbols = emptyImports();
    const origins = new Map<string, string>();

    const claim = (name: string, moduleName: string, decl: ImportDecl) => {
      const previous = origins.get(name);
      if (previous !== undefined && previous !== moduleName) {
        throw new CompilerError(
          'ImportConflict',
          `\`${name}\` is imported from both \`${previous}\` and \`${moduleName}\``,
          toSourceLocation(file, decl.location)
        ).withSuggestion('call it through its module prefix, or give one import an alias with `as`');
      }
      origins.set(name, moduleName);
    };

    for (const decl of program.imports) {
      const loaded = this.cache.get(decl.module);
      const module = checked.get(decl.module);
      if (!loaded || !module) throw internalError(`module \`${decl.module}\` was not loaded before use`);
      const prefix = decl.alias ?? decl.module;
      symbols.modules.add(prefix);

      for (const [name, signature] of module.functions) {
        if (!loaded.exports.functions.has(name)) {
          symbols.hidden.set(`${prefix}.${name}`, decl.module);
          continue;
        }
        claim(name, decl.module, decl);
        symbols.functions.set(name, signature);
        symbols.functions.set(`${prefix}.${name}`, signature);
      }
      for (const [name, layout] of module.structs) {
        if (!loaded.exports.structs.has(name)) continue;
        claim(name, decl.module, decl);
        symbols.structs.set(name, layout);
        symbols.structs.set(`${prefix}.${name}`, layout);
      }
      for (const [name, layout] of module.enums) {
        if (!loaded.exports.enums.has(name)) continue;
        claim(name, decl.module, decl);
        symbols.enums.set(name, layout);
        symbols.enums.set(`${prefix}.${name}`, layout);
      }
    }
    return symbols;
  }
}
