import { type CompilerError, isCompilerError } from '../src/tessel/errors.js';
import { parseTessel } from '../src/tessel/parser.js';
import { analyzeModule, type CheckedModule } from '../src/tessel/semantic.js';

/** Runs `fn` and returns the `CompilerError` it throws. */
export function catchCompilerError(fn: () => unknown): CompilerError {
  try {
    fn();
  } catch (err) {
    if (isCompilerError(err)) return err;
    throw err;
  }
  throw new Error('expected a CompilerError to be thrown');
}

export function check(source: string): CheckedModule {
  return analyzeModule(parseTessel(source, { file: 'main.tsl' }), { file: 'main.tsl' });
}

export function checkError(source: string): CompilerError {
  return catchCompilerError(() => check(source));
}
