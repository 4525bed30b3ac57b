/**
 * CLI LSP Diagnostic Conversion
 * Convert lexer diagnostics to LSP Diagnostic format
 */

import type { ErrorSeverity } from './error-registry.js';
import type { SourceLocation, SourceSpan } from './token-types.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export interface LspDiagnostic {
  readonly range: LspRange;
  readonly severity: 1 | 2 | 3;
  readonly code: string;
  readonly source: 'c89lex';
  readonly message: string;
}

export interface LspRange {
  readonly start: LspPosition;
  readonly end: LspPosition;
}

export interface LspPosition {
  readonly line: number;
  readonly character: number;
}

/** Fields shared by LexerErrorData and EnrichedError */
export interface DiagnosticFields {
  readonly errorId: string;
  readonly severity: ErrorSeverity;
  readonly message: string;
  readonly span: SourceSpan;
}

// ============================================================
// LSP DIAGNOSTIC CONVERSION
// ============================================================

/**
 * Convert a diagnostic to LSP Diagnostic format.
 *
 * LSP positions are zero-based; the range covers the offending lexeme.
 * Pass `LexerError.toData()` so the message carries no location suffix.
 */
export function toLspDiagnostic(diagnostic: DiagnosticFields): LspDiagnostic {
  return {
    range: {
      start: toLspPosition(diagnostic.span.start),
      end: toLspPosition(diagnostic.span.end),
    },
    severity: mapSeverityToLsp(diagnostic.severity),
    code: diagnostic.errorId,
    source: 'c89lex',
    message: diagnostic.message,
  };
}

function toLspPosition(location: SourceLocation): LspPosition {
  return {
    line: location.line - 1,
    character: location.column - 1,
  };
}

/** fatal and error -> 1 (Error), warning -> 2 (Warning) */
function mapSeverityToLsp(severity: ErrorSeverity): 1 | 2 | 3 {
  switch (severity) {
    case 'warning':
      return 2;
    case 'fatal':
    case 'error':
      return 1;
  }
}
