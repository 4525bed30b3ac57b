/**
 * Lexer Errors
 * Registry-backed diagnostics produced while scanning
 */

import {
  type DiagnosticKind,
  ERROR_REGISTRY,
  type ErrorSeverity,
  renderMessage,
} from '../error-registry.js';
import type { SourceLocation, SourceSpan } from '../token-types.js';

/** Structured diagnostic data for host applications */
export interface LexerErrorData {
  readonly errorId: string;
  readonly kind: DiagnosticKind;
  readonly severity: ErrorSeverity;
  readonly message: string;
  readonly lexeme: string;
  readonly span: SourceSpan;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * A lexical diagnostic.
 *
 * Recoverable diagnostics are collected, not thrown; only fatal ones
 * interrupt `nextToken`.
 */
export class LexerError extends Error {
  readonly errorId: string;
  readonly kind: DiagnosticKind;
  readonly severity: ErrorSeverity;
  readonly span: SourceSpan;
  readonly lexeme: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(
    errorId: string,
    message: string,
    span: SourceSpan,
    lexeme: string,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }

    super(`${message} at ${span.start.line}:${span.start.column}`);
    this.name = 'LexerError';
    this.errorId = errorId;
    this.kind = definition.kind;
    this.severity = definition.severity;
    this.span = span;
    this.lexeme = lexeme;
    this.context = context;
  }

  /** Start of the offending text */
  get location(): SourceLocation {
    return this.span.start;
  }

  get fatal(): boolean {
    return this.severity === 'fatal';
  }

  /** Get structured error data for custom formatting */
  toData(): LexerErrorData {
    return {
      errorId: this.errorId,
      kind: this.kind,
      severity: this.severity,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      lexeme: this.lexeme,
      span: this.span,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: LexerErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

/**
 * Create a diagnostic from its registry definition.
 *
 * The message is rendered from the definition's template with `lexeme`
 * and the given context values.
 *
 * @throws TypeError if the kind is not registered
 *
 * @example
 * createError('InvalidNumericConstant', span, '08', { reason: "invalid digit '8' in octal constant" })
 * // LexerError: "Invalid numeric constant 08: invalid digit '8' in octal constant at 1:9"
 */
export function createError(
  kind: DiagnosticKind,
  span: SourceSpan,
  lexeme: string,
  context: Record<string, unknown> = {}
): LexerError {
  const definition = ERROR_REGISTRY.byKind(kind);
  const message = renderMessage(definition.messageTemplate, {
    lexeme,
    ...context,
  });
  return new LexerError(definition.errorId, message, span, lexeme, context);
}
