/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type {
  SourceLocation,
  Token,
  TokenType,
  TokenValue,
} from '../token-types.js';
import {
  advance,
  currentLocation,
  type LexerState,
  peek,
  sliceFrom,
} from './state.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isOctalDigit(ch: string): boolean {
  return ch >= '0' && ch <= '7';
}

export function isHexDigit(ch: string): boolean {
  return isDigit(ch) || (ch >= 'a' && ch <= 'f') || (ch >= 'A' && ch <= 'F');
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isIdentifierStart(ch: string): boolean {
  return isLetter(ch) || ch === '_';
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

export function isWhitespace(ch: string): boolean {
  return (
    ch === ' ' ||
    ch === '\t' ||
    ch === '\n' ||
    ch === '\r' ||
    ch === '\f' ||
    ch === '\v'
  );
}

/**
 * Length of a backslash-newline splice at the cursor (`\` LF or `\` CR LF),
 * or 0 when there is none.
 */
export function spliceLength(state: LexerState, offset = 0): number {
  if (peek(state, offset) !== '\\') return 0;
  const next = peek(state, offset + 1);
  if (next === '\n') return 2;
  if (next === '\r' && peek(state, offset + 2) === '\n') return 3;
  return 0;
}

export function advanceBy(state: LexerState, n: number): void {
  for (let i = 0; i < n; i++) advance(state);
}

/** Consume characters while the predicate holds */
export function advanceWhile(
  state: LexerState,
  predicate: (ch: string) => boolean
): void {
  while (predicate(peek(state))) {
    advance(state);
  }
}

/** Build a token whose lexeme runs from `start` to the cursor */
export function makeToken(
  state: LexerState,
  type: TokenType,
  start: SourceLocation,
  value?: TokenValue
): Token {
  const lexeme = sliceFrom(state, start);
  const span = { start, end: currentLocation(state) };
  return value === undefined
    ? { type, lexeme, span }
    : { type, lexeme, span, value };
}
