import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  collectConfigErrors,
  formatTokens,
  parseArgs,
  resolveOutPath,
  runTessel,
  validateConfig,
} from '../src/bin/tessel-core.js';
import { tokenize } from '../src/tessel/lexer.js';

describe('config validation', () => {
  test('normalizes a valid config', () => {
    expect(collectConfigErrors({ entries: 'src/*.tsl', fileExtension: 'tl', color: false, outDir: 'build' })).toEqual({
      config: { entries: ['src/*.tsl'], fileExtension: '.tl', color: false, outDir: 'build' },
      errors: [],
    });
  });

  test('collects every problem', () => {
    const { errors } = collectConfigErrors({ entries: [1], outDir: 3, fileExtension: '.', color: 'yes', extra: 1 });
    expect(errors).toEqual([
      'entries must be a string or string[]',
      'outDir must be a string',
      'fileExtension must be a non-empty string',
      'color must be a boolean',
      'unknown field "extra"',
    ]);
    expect(collectConfigErrors([]).errors).toEqual(['config must be a JSON object']);
  });

  test('validateConfig prints the errors and exits', () => {
    const exit = jest.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    try {
      expect(() => validateConfig({ moduleRoot: 7 })).toThrow('process.exit');
      expect(error.mock.calls).toEqual([['Invalid tessel.config.json:'], ['  - moduleRoot must be a string']]);
      expect(exit).toHaveBeenCalledWith(1);
    } finally {
      exit.mockRestore();
      error.mockRestore();
    }
  });
});

describe('argument parsing', () => {
  test('positionals, values and boolean flags', () => {
    const { command, file, args } = parseArgs(['compile', 'main.tsl', '-o', 'out.c', '--no-color']);
    expect(command).toBe('compile');
    expect(file).toBe('main.tsl');
    expect(Array.from(args)).toEqual([
      ['--out', 'out.c'],
      ['--no-color', true],
    ]);
  });

  test('a flag followed by another flag is boolean', () => {
    const { args } = parseArgs(['check', '--module-root', '--list-config']);
    expect(args.get('--module-root')).toBe(true);
    expect(args.get('--list-config')).toBe(true);
  });

  test('output paths', () => {
    expect(resolveOutPath('/src/app/main.tsl', undefined, undefined)).toBe('/src/app/main.c');
    expect(resolveOutPath('/src/app/main.tsl', undefined, '/out')).toBe('/out/main.c');
    expect(resolveOutPath('/src/app/main.tsl', '/tmp/x.c', '/out')).toBe('/tmp/x.c');
  });

  test('token listing', () => {
    expect(formatTokens(tokenize('let x = 1;'))).toEqual([
      '1:1 keyword let',
      '1:5 identifier x',
      '1:7 op =',
      '1:9 integer 1',
      '1:10 semicolon ;',
    ]);
  });
});

describe('runTessel', () => {
  let dir: string;
  let log: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tessel-cli-'));
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    log.mockRestore();
    error.mockRestore();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('check reports success', async () => {
    const file = path.join(dir, 'main.tsl');
    fs.writeFileSync(file, 'fn main() {}');
    await expect(runTessel(['check', file, '--no-color'])).resolves.toBe(0);
    expect(log).toHaveBeenCalledWith(`Check passed: ${file}`);
  });

  test('compile writes the C file', async () => {
    const file = path.join(dir, 'main.tsl');
    const out = path.join(dir, 'build', 'main.c');
    fs.writeFileSync(file, 'fn main() {\n  println("hi");\n}');
    await expect(runTessel(['compile', file, '-o', out, '--no-color'])).resolves.toBe(0);
    expect(fs.readFileSync(out, 'utf-8')).toContain('  printf("%s\\n", "hi");');
    expect(log).toHaveBeenCalledWith(`Compiled ${file} -> ${out}`);
  });

  test('compile errors exit with 1 and print the diagnostic', async () => {
    const file = path.join(dir, 'bad.tsl');
    fs.writeFileSync(file, 'fn main() {\n  println(y);\n}');
    await expect(runTessel(['compile', file, '--no-color'])).resolves.toBe(1);
    const printed = String(error.mock.calls[0]?.[0]).split('\n');
    expect(printed.slice(0, 3)).toEqual([
      'error[E201]: undefined variable',
      '  cannot find variable `y` in this scope',
      `  --> ${file}:2:11`,
    ]);
    expect(fs.existsSync(path.join(dir, 'bad.c'))).toBe(false);
  });

  test('usage errors', async () => {
    await expect(runTessel(['compile'])).resolves.toBe(1);
    expect(error).toHaveBeenCalledWith('Missing <file> for compile');
    await expect(runTessel(['frobnicate'])).resolves.toBe(1);
    expect(error).toHaveBeenCalledWith('Unknown command: frobnicate');
  });
});
