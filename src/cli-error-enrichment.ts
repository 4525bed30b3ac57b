/**
 * CLI Error Enrichment
 * Attach source snippets and registry guidance to lexer diagnostics
 */

import { ERROR_REGISTRY, type ErrorSeverity } from './error-registry.js';
import type { LexerError } from './lexer/errors.js';
import type { SourceSpan } from './token-types.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export interface SourceSnippet {
  readonly lines: SnippetLine[];
  readonly highlightSpan: SourceSpan;
}

export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

export interface EnrichedError {
  readonly errorId: string;
  readonly severity: ErrorSeverity;
  readonly message: string;
  readonly span: SourceSpan;
  readonly context?: Record<string, unknown> | undefined;
  readonly sourceSnippet?: SourceSnippet | undefined;
  readonly resolution?: string | undefined;
}

// ============================================================
// SOURCE SNIPPET EXTRACTION
// ============================================================

/**
 * Extract source lines around the start of a span.
 *
 * Only the line the span starts on is marked as the error line; a span
 * that runs on (an unterminated comment) is not copied in full. A `\r`
 * ending a line is dropped from its content.
 *
 * @throws {RangeError} When the span starts outside the source
 */
export function extractSnippet(
  source: string,
  span: SourceSpan,
  contextLines: number = 2
): SourceSnippet {
  if (source === '') {
    return { lines: [], highlightSpan: span };
  }

  const lines = source.split('\n');
  const totalLines = lines.length;
  const errorLine = span.start.line;

  if (errorLine < 1 || errorLine > totalLines) {
    throw new RangeError('Span exceeds source bounds');
  }

  const firstLine = Math.max(1, errorLine - contextLines);
  const lastLine = Math.min(totalLines, errorLine + contextLines);

  const snippetLines: SnippetLine[] = [];
  for (let lineNum = firstLine; lineNum <= lastLine; lineNum++) {
    const content = lines[lineNum - 1] ?? '';
    snippetLines.push({
      lineNumber: lineNum,
      content: content.endsWith('\r') ? content.slice(0, -1) : content,
      isErrorLine: lineNum === errorLine,
    });
  }

  return { lines: snippetLines, highlightSpan: span };
}

// ============================================================
// ERROR ENRICHMENT
// ============================================================

/**
 * Enrich a LexerError with a source snippet and the registry's resolution.
 */
export function enrichError(
  error: LexerError,
  source: string,
  contextLines: number = 2
): EnrichedError {
  const data = error.toData();
  return {
    errorId: data.errorId,
    severity: data.severity,
    message: data.message,
    span: data.span,
    context: data.context,
    sourceSnippet:
      source === ''
        ? undefined
        : extractSnippet(source, data.span, contextLines),
    resolution: ERROR_REGISTRY.get(data.errorId)?.resolution,
  };
}
