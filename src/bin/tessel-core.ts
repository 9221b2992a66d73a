import fs from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';

import { checkFile, compileFile, type CompileOptions } from '../tessel/compile.js';
import { isCompilerError, type CompilerError } from '../tessel/errors.js';
import { tokenize, type Token } from '../tessel/lexer.js';
import { formatCompilerError, formatSuccessMessage } from '../utils/index.js';

export const CONFIG_FILE = 'tessel.config.json';

export type TesselConfig = {
  entries?: string[];
  outDir?: string;
  moduleRoot?: string;
  fileExtension?: string;
  color?: boolean;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Validates a parsed config file. Returns the normalized config and every problem found. */
export function collectConfigErrors(raw: unknown): { config: TesselConfig; errors: string[] } {
  const errors: string[] = [];
  const config: TesselConfig = {};
  if (!isRecord(raw)) return { config, errors: ['config must be a JSON object'] };

  const { entries, outDir, moduleRoot, fileExtension, color } = raw;
  if (entries !== undefined) {
    if (typeof entries === 'string') config.entries = [entries];
    else if (Array.isArray(entries) && entries.every((e): e is string => typeof e === 'string')) config.entries = entries;
    else errors.push('entries must be a string or string[]');
  }
  if (outDir !== undefined) {
    if (typeof outDir === 'string') config.outDir = outDir;
    else errors.push('outDir must be a string');
  }
  if (moduleRoot !== undefined) {
    if (typeof moduleRoot === 'string') config.moduleRoot = moduleRoot;
    else errors.push('moduleRoot must be a string');
  }
  if (fileExtension !== undefined) {
    if (typeof fileExtension === 'string' && fileExtension.replace(/^\./, '') !== '') {
      config.fileExtension = fileExtension.startsWith('.') ? fileExtension : `.${fileExtension}`;
    } else errors.push('fileExtension must be a non-empty string');
  }
  if (color !== undefined) {
    if (typeof color === 'boolean') config.color = color;
    else errors.push('color must be a boolean');
  }
  for (const key of Object.keys(raw)) {
    if (!['entries', 'outDir', 'moduleRoot', 'fileExtension', 'color'].includes(key)) {
      errors.push(`unknown field "${key}"`);
    }
  }
  return { config, errors };
}

export function validateConfig(raw: unknown): TesselConfig {
  const { config, errors } = collectConfigErrors(raw);
  if (errors.length > 0) {
    console.error(`Invalid ${CONFIG_FILE}:`);
    errors.forEach((err) => console.error(`  - ${err}`));
    process.exit(1);
  }
  return config;
}

export function loadConfig(cwd = process.cwd()): TesselConfig | null {
  const configPath = path.join(cwd, CONFIG_FILE);
  if (!fs.existsSync(configPath)) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    console.error(`Invalid ${CONFIG_FILE}: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
  return validateConfig(raw);
}

const BOOLEAN_FLAGS = new Set(['--no-color', '--list-config', '--help', '-h']);
const FLAG_ALIASES: Record<string, string> = { '-o': '--out' };

export function parseArgs(argv: string[]) {
  const args = new Map<string, string | boolean>();
  const positionals: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === undefined) continue;
    if (!a.startsWith('-')) {
      positionals.push(a);
      continue;
    }
    const key = FLAG_ALIASES[a] ?? a;
    const next = argv[i + 1];
    if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('-')) {
      args.set(key, next);
      i++;
    } else {
      args.set(key, true);
    }
  }
  const [command, file] = positionals;
  return { command, file, args };
}

const stringFlag = (args: Map<string, string | boolean>, key: string): string | undefined => {
  const value = args.get(key);
  return typeof value === 'string' ? value : undefined;
};

/** `-o` wins, then `outDir`, then `<name>.c` beside the source. */
export function resolveOutPath(sourcePath: string, outArg: string | undefined, outDir: string | undefined): string {
  if (outArg) return path.resolve(outArg);
  const base = `${path.basename(sourcePath, path.extname(sourcePath))}.c`;
  if (outDir) return path.resolve(outDir, base);
  return path.join(path.dirname(path.resolve(sourcePath)), base);
}

/** One `line:col type text` row per token, without the end-of-file marker. */
export function formatTokens(tokens: readonly Token[]): string[] {
  return tokens.filter((t) => t.type !== 'eof').map((t) => `${t.line}:${t.col} ${t.type} ${t.text}`);
}

function reportError(error: CompilerError, useColor: boolean) {
  const file = error.location.file;
  const source = fs.existsSync(file) ? fs.readFileSync(file, 'utf-8') : undefined;
  console.error(formatCompilerError(error, source, { color: useColor }));
}

function printHelp() {
  console.log(`
tessel <command> [file] [options]

Commands:
  compile <file>   Compile a Tessel source file to C
  check <file>     Parse and type-check only (no emit)
  tokens <file>    Print the token stream
  build            Compile every file matched by "entries" in ${CONFIG_FILE}

Options:
  --out, -o <file>       Output C file (default: <name>.c beside the source)
  --module-root <dir>    Root directory for imports (default: the entry file's directory)
  --no-color             Disable colored diagnostics
  --list-config          Print resolved config and exit

Config file:
  ${CONFIG_FILE} supports entries, outDir, moduleRoot, fileExtension, color
`);
}

function compileTo(sourcePath: string, outPath: string, options: Omit<CompileOptions, 'file'>, useColor: boolean): boolean {
  const result = compileFile(sourcePath, options);
  if (!result.ok) {
    reportError(result.error, useColor);
    return false;
  }
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, result.code, 'utf-8');
  console.log(formatSuccessMessage(`Compiled ${sourcePath} -> ${outPath}`, { color: useColor }));
  return true;
}

/** Runs the CLI and resolves to the process exit code. */
export async function runTessel(argv: string[] = process.argv.slice(2)): Promise<number> {
  const { command, file, args } = parseArgs(argv);
  if (!command || args.has('--help') || args.has('-h') || command === 'help') {
    printHelp();
    return 0;
  }

  const config = loadConfig() ?? {};
  const useColor = !args.has('--no-color') && config.color !== false;
  const moduleRootArg = stringFlag(args, '--module-root') ?? config.moduleRoot;
  const options: Omit<CompileOptions, 'file'> = {
    moduleRoot: moduleRootArg ? path.resolve(moduleRootArg) : undefined,
    fileExtension: config.fileExtension,
  };
  const outArg = stringFlag(args, '--out');

  if (args.has('--list-config')) {
    console.log(
      JSON.stringify(
        {
          entries: config.entries ?? [],
          outDir: config.outDir ?? null,
          moduleRoot: options.moduleRoot ?? null,
          fileExtension: config.fileExtension ?? '.tsl',
          color: useColor,
        },
        null,
        2
      )
    );
    return 0;
  }

  if (command === 'compile' || command === 'check' || command === 'tokens') {
    if (!file) {
      console.error(`Missing <file> for ${command}`);
      return 1;
    }
    const sourcePath = path.resolve(file);

    if (command === 'tokens') {
      if (!fs.existsSync(sourcePath)) {
        console.error(`File not found: ${sourcePath}`);
        return 1;
      }
      try {
        formatTokens(tokenize(fs.readFileSync(sourcePath, 'utf-8'), sourcePath)).forEach((line) => console.log(line));
      } catch (err) {
        if (!isCompilerError(err)) throw err;
        reportError(err, useColor);
        return 1;
      }
      return 0;
    }

    if (command === 'check') {
      const result = checkFile(sourcePath, options);
      if (!result.ok) {
        reportError(result.error, useColor);
        return 1;
      }
      console.log(formatSuccessMessage(`Check passed: ${file}`, { color: useColor }));
      return 0;
    }

    return compileTo(sourcePath, resolveOutPath(sourcePath, outArg, config.outDir), options, useColor) ? 0 : 1;
  }

  if (command === 'build') {
    const patterns = config.entries ?? [];
    if (patterns.length === 0) {
      console.error(`No entries configured in ${CONFIG_FILE}`);
      return 1;
    }
    const files = await fg(patterns, { onlyFiles: true, unique: true, dot: false });
    if (files.length === 0) {
      console.error(`No files matched: ${patterns.join(', ')}`);
      return 1;
    }
    for (const entry of files.sort()) {
      const sourcePath = path.resolve(entry);
      if (!compileTo(sourcePath, resolveOutPath(sourcePath, undefined, config.outDir), options, useColor)) return 1;
    }
    console.log(`Built ${files.length} file(s)`);
    return 0;
  }

  console.error(`Unknown command: ${command}`);
  printHelp();
  return 1;
}
