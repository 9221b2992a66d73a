import type { SourceLocation } from '../tessel/errors.js';
import chalk from 'chalk';

/** Width of the line-number column for a snippet pointing at `line`. */
export function gutterWidth(line: number): number {
  return Math.max(1, String(line).length);
}

/**
 * Renders the source line a location points at, with carets under the span:
 *
 *    |
 *  3 |   let x: int = "hi";
 *    |                ^^^^
 *
 * Returns no lines when the location falls outside `source`.
 */
export function highlightSnippet(source: string, location: SourceLocation, useColor = true): string[] {
  const lines = source.split('\n');
  const { line, column } = location;
  if (line < 1 || line > lines.length) return [];

  const text = (lines[line - 1] ?? '').replace(/\r$/, '');
  const width = gutterWidth(line);
  const bar = useColor ? chalk.blue('|') : '|';
  const gutter = ' '.repeat(width + 2) + bar;
  const lineLabel = useColor ? chalk.blue(String(line).padStart(width)) : String(line).padStart(width);

  const caretCount = Math.max(1, location.length ?? 1);
  const carets = '^'.repeat(caretCount);
  const pointer = ' '.repeat(Math.max(0, column - 1)) + (useColor ? chalk.redBright(carets) : carets);

  return [gutter, ` ${lineLabel} ${bar} ${text}`, `${gutter} ${pointer}`];
}
