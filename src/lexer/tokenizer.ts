/**
 * Tokenizer
 * Main tokenization logic
 */

import { TOKEN_TYPES, type Token } from '../token-types.js';
import { createError, LexerError } from './errors.js';
import {
  advanceBy,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
  spliceLength,
} from './helpers.js';
import { readNumber } from './numbers.js';
import {
  readCharacter,
  readComment,
  readDirective,
  readIdentifier,
  readPunctuator,
  readString,
  readUnknown,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  type LexerState,
  peek,
  report,
  type TokenizeOptions,
} from './state.js';

/** Outcome of a full scan */
export interface TokenizeResult {
  /** Emitted tokens; ends with EndOfFile unless the scan stopped on a fatal error */
  readonly tokens: Token[];
  /** Every diagnostic in source order, fatal last */
  readonly diagnostics: LexerError[];
  readonly fatal: LexerError | null;
  /** True when no diagnostic has error or fatal severity */
  readonly success: boolean;
}

/** Skip whitespace and backslash-newline splices between tokens */
function skipWhitespace(state: LexerState): void {
  for (;;) {
    const ch = peek(state);
    if (isWhitespace(ch)) {
      if (ch === '\n') state.atLineStart = true;
      advance(state);
      continue;
    }
    const splice = spliceLength(state);
    if (splice === 0) return;
    advanceBy(state, splice);
  }
}

/**
 * Scan the next token, comments included.
 *
 * Recoverable problems are reported through the state and come back as
 * Invalid tokens.
 *
 * @throws LexerError when the error is fatal
 */
export function nextToken(state: LexerState): Token {
  if (state.mode === 'directive') state.mode = 'scanning';
  skipWhitespace(state);

  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === '') {
    state.mode = 'done';
    return makeToken(state, TOKEN_TYPES.EOF, start);
  }

  // Comments do not end the run of whitespace that opens a line
  const comment = readComment(state);
  if (comment !== null) return comment;

  const token = readSignificant(state, ch);
  state.atLineStart = false;
  return token;
}

function readSignificant(state: LexerState, ch: string): Token {
  if (ch === '#' && state.atLineStart) {
    return readDirective(state);
  }
  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }
  if (isDigit(ch) || (ch === '.' && isDigit(peek(state, 1)))) {
    return readNumber(state);
  }
  if (ch === "'") {
    return readCharacter(state);
  }
  if (ch === '"') {
    return readString(state);
  }
  return readPunctuator(state) ?? readUnknown(state);
}

/**
 * Lazily scan tokens until EndOfFile or a fatal error.
 *
 * A fatal error is recorded on the state (and reported) instead of thrown,
 * and ends the sequence without an EndOfFile token.
 */
export function* scanTokens(state: LexerState): Generator<Token, void> {
  const includeComments = state.options.includeComments === true;

  while (state.mode !== 'done' && state.mode !== 'fatal') {
    const before = state.pos;
    let token: Token;
    try {
      token = nextToken(state);
    } catch (error) {
      if (error instanceof LexerError && error.fatal) {
        state.mode = 'fatal';
        state.fatal = error;
        report(state, error);
        return;
      }
      throw error;
    }

    if (state.pos === before && token.type !== TOKEN_TYPES.EOF) {
      const location = currentLocation(state);
      const stalled = createError(
        'ScannerStalled',
        { start: location, end: location },
        '',
        { offset: state.pos }
      );
      state.mode = 'fatal';
      state.fatal = stalled;
      report(state, stalled);
      return;
    }

    if (token.type === TOKEN_TYPES.COMMENT && !includeComments) continue;

    state.options.callbacks?.onToken?.(token);
    yield token;
  }
}

/**
 * Tokenize C89 source text.
 *
 * @example
 * const { tokens } = tokenize('int x = 0x1F;');
 * tokens.map((t) => t.type);
 * // ['Keyword', 'Identifier', 'Punctuator', 'IntegerConstant', 'Punctuator', 'EndOfFile']
 */
export function tokenize(
  source: string,
  options: TokenizeOptions = {}
): TokenizeResult {
  const state = createLexerState(source, options);
  const tokens = [...scanTokens(state)];
  const diagnostics = state.diagnostics;
  return {
    tokens,
    diagnostics,
    fatal: state.fatal,
    success: diagnostics.every((d) => d.severity === 'warning'),
  };
}
