/**
 * Lexer State
 * Source cursor plus the driver's per-scan bookkeeping
 */

import type { SourceLocation, Token } from '../token-types.js';
import type { LexerError } from './errors.js';

/**
 * Driver mode.
 * `directive` holds from a directive token until the next scan step.
 * `done` and `fatal` are terminal.
 */
export type LexerMode = 'scanning' | 'directive' | 'done' | 'fatal';

/** Observability hooks invoked while scanning */
export interface LexerCallbacks {
  onToken?: ((token: Token) => void) | undefined;
  onDiagnostic?: ((error: LexerError) => void) | undefined;
}

export interface TokenizeOptions {
  /** Accept `//` comments (not part of C89) */
  allowLineComments?: boolean | undefined;
  /** Keep comments in the token stream as Comment tokens */
  includeComments?: boolean | undefined;
  callbacks?: LexerCallbacks | undefined;
}

export interface LexerState {
  readonly source: string;
  readonly options: TokenizeOptions;
  pos: number;
  line: number;
  column: number;
  mode: LexerMode;
  /** True until the first token of the current logical line */
  atLineStart: boolean;
  readonly diagnostics: LexerError[];
  fatal: LexerError | null;
}

/** Saved cursor position for backtracking */
export interface CursorMark {
  readonly pos: number;
  readonly line: number;
  readonly column: number;
}

export function createLexerState(
  source: string,
  options: TokenizeOptions = {}
): LexerState {
  return {
    source,
    options,
    pos: 0,
    line: 1,
    column: 1,
    mode: 'scanning',
    atLineStart: true,
    diagnostics: [],
    fatal: null,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

/** Character at pos + offset, or '' past either end of the source */
export function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

export function advance(state: LexerState): string {
  const ch = state.source[state.pos] ?? '';
  if (ch === '') return ch;
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

export function mark(state: LexerState): CursorMark {
  return { pos: state.pos, line: state.line, column: state.column };
}

export function rewind(state: LexerState, saved: CursorMark): void {
  state.pos = saved.pos;
  state.line = saved.line;
  state.column = saved.column;
}

/** Source text from an earlier offset up to the cursor */
export function sliceFrom(state: LexerState, start: SourceLocation): string {
  return state.source.slice(start.offset, state.pos);
}

/** Record a diagnostic and notify the host */
export function report(state: LexerState, error: LexerError): void {
  state.diagnostics.push(error);
  state.options.callbacks?.onDiagnostic?.(error);
}
