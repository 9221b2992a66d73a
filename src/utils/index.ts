// utils/index.ts
// ==========================
// 📦 Utility Exports
// ==========================

export { formatCompilerError, formatLocation, formatSuccessMessage, toDiagnostic } from './format.js';
export { gutterWidth, highlightSnippet } from './highlight.js';
export type { Diagnostic, DiagnosticRelatedInformation, FormatOptions } from './format.js';
export type { Location, Position } from './types.js';
