import type { CompilerError, SourceLocation } from '../tessel/errors.js';
import { gutterWidth, highlightSnippet } from './highlight.js';
import { createColors } from 'colorette';

export interface FormatOptions {
  color?: boolean;
}

export function formatLocation(location: SourceLocation): string {
  if (location.line < 1) return location.file;
  return `${location.file}:${location.line}:${location.column}`;
}

/**
 * Renders a compiler error for the terminal: header, location, snippet, notes and help.
 * The snippet is included only when `source` is the text of the error's file.
 */
export function formatCompilerError(error: CompilerError, source?: string, options: FormatOptions = {}): string {
  const useColor = options.color ?? true;
  const colors = createColors({ useColor });
  const width = gutterWidth(error.location.line);
  const indent = ' '.repeat(width + 2);

  const parts: string[] = [
    `${colors.bold(colors.red(`error[${error.code}]`))}${colors.bold(`: ${error.title}`)}`,
    `  ${error.message}`,
    `  ${colors.blue('-->')} ${formatLocation(error.location)}`,
  ];
  if (source !== undefined) parts.push(...highlightSnippet(source, error.location, useColor));
  if (error.context) parts.push(`${indent}${colors.blue('=')} ${colors.bold('note')}: ${error.context}`);

  for (const suggestion of error.suggestions) {
    parts.push(`  ${colors.cyan('help')}: ${suggestion.message}`);
    if (suggestion.codeExample) {
      for (const line of suggestion.codeExample.split('\n')) parts.push(`      ${colors.green(line)}`);
    }
    if (suggestion.helpLink) parts.push(`  ${colors.dim(`see: ${suggestion.helpLink}`)}`);
  }

  for (const related of error.relatedErrors) {
    const relatedSource = related.location.file === error.location.file ? source : undefined;
    parts.push('', formatCompilerError(related, relatedSource, options));
  }
  return parts.join('\n');
}

export function formatSuccessMessage(message: string, options: FormatOptions = {}): string {
  return createColors({ useColor: options.color ?? true }).green(message);
}

export interface DiagnosticRelatedInformation {
  location: SourceLocation;
  message: string;
}

/** Editor-facing form of a compiler error. */
export interface Diagnostic {
  severity: 'error';
  message: string;
  location: SourceLocation;
  code: string;
  source: 'tessel';
  relatedInformation: DiagnosticRelatedInformation[];
}

export function toDiagnostic(error: CompilerError): Diagnostic {
  return {
    severity: 'error',
    message: error.context ? `${error.message}\n${error.context}` : error.message,
    location: error.location,
    code: error.code,
    source: 'tessel',
    relatedInformation: error.relatedErrors.map((related) => ({
      location: related.location,
      message: related.message,
    })),
  };
}
