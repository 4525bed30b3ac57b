/**
 * CLI Error Formatter
 * Format enriched diagnostics for human-readable, JSON, or compact output
 */

import type { EnrichedError } from './cli-error-enrichment.js';
import { toLspDiagnostic } from './cli-lsp-diagnostic.js';
import type { SourceSpan } from './token-types.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export type OutputFormat = 'human' | 'json' | 'compact';

export interface FormatOptions {
  readonly format: OutputFormat;
  /** Append the registry's resolution text (human format) */
  readonly verbose: boolean;
  /** Display name of the scanned file */
  readonly file?: string | undefined;
}

// ============================================================
// ERROR FORMATTING
// ============================================================

/**
 * Format an enriched diagnostic for output.
 *
 * - Human format: multi-line with snippet and caret underline
 * - JSON format: LSP Diagnostic compatible
 * - Compact format: single line for CI output
 */
export function formatError(
  error: EnrichedError,
  options: FormatOptions
): string {
  switch (options.format) {
    case 'json':
      return JSON.stringify(toLspDiagnostic(error), null, 2);
    case 'compact':
      return formatErrorCompact(error, options);
    case 'human':
      return formatErrorHuman(error, options);
  }
}

/**
 * Output format:
 * ```
 * error[C89-L003]: Invalid numeric constant 08: invalid digit '8' in octal constant
 *   --> main.c:2:9
 *    |
 *  1 | int main(void) {
 *  2 | int x = 08;
 *    |         ^^
 *  3 | }
 *    |
 * ```
 */
function formatErrorHuman(
  error: EnrichedError,
  options: FormatOptions
): string {
  const lines: string[] = [];
  const { start } = error.span;

  lines.push(`${error.severity}[${error.errorId}]: ${error.message}`);
  lines.push(`  --> ${locationPrefix(options)}${start.line}:${start.column}`);

  const snippet = error.sourceSnippet;
  if (snippet && snippet.lines.length > 0) {
    const maxLineNumber = Math.max(...snippet.lines.map((l) => l.lineNumber));
    const lineNumberWidth = String(maxLineNumber).length;
    const gutter = ' '.repeat(lineNumberWidth + 1);

    lines.push(`${gutter} |`);
    for (const line of snippet.lines) {
      const lineNumStr = String(line.lineNumber).padStart(lineNumberWidth, ' ');
      lines.push(` ${lineNumStr} | ${line.content}`);
      if (line.isErrorLine) {
        lines.push(
          `${gutter} | ${renderCaretUnderline(error.span, line.content)}`
        );
      }
    }
    lines.push(`${gutter} |`);
  }

  if (options.verbose && error.resolution) {
    lines.push(`   = help: ${error.resolution}`);
  }

  return lines.join('\n');
}

function formatErrorCompact(
  error: EnrichedError,
  options: FormatOptions
): string {
  const { start } = error.span;
  return `${locationPrefix(options)}${start.line}:${start.column}: ${error.severity}[${error.errorId}] ${error.message}`;
}

function locationPrefix(options: FormatOptions): string {
  return options.file === undefined ? '' : `${options.file}:`;
}

// ============================================================
// CARET UNDERLINE
// ============================================================

/**
 * Render the caret underline for a span on its first line.
 *
 * Columns are 1-based and the end column is exclusive, so a one-character
 * span gets a single `^`. A span that continues onto later lines is
 * underlined to the end of its first line.
 *
 * @throws {RangeError} Invalid span (start after end)
 */
export function renderCaretUnderline(
  span: SourceSpan,
  lineContent: string
): string {
  if (
    span.start.line > span.end.line ||
    (span.start.line === span.end.line && span.start.column > span.end.column)
  ) {
    throw new RangeError('Span start must precede end');
  }

  const startColumn = span.start.column;
  const endColumn =
    span.start.line === span.end.line
      ? span.end.column
      : lineContent.length + 1;

  const padding = ' '.repeat(startColumn - 1);
  const carets = '^'.repeat(Math.max(1, endColumn - startColumn));
  return padding + carets;
}
