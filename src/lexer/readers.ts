/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { DiagnosticKind } from '../error-registry.js';
import {
  type SourceLocation,
  TOKEN_TYPES,
  type Token,
} from '../token-types.js';
import { createError, type LexerError } from './errors.js';
import {
  advanceBy,
  advanceWhile,
  isHexDigit,
  isIdentifierChar,
  isOctalDigit,
  makeToken,
  spliceLength,
} from './helpers.js';
import { KEYWORDS, PUNCTUATOR_TABLES, SIMPLE_ESCAPES } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
  report,
  sliceFrom,
} from './state.js';

// ============================================================
// COMMENTS AND DIRECTIVES
// ============================================================

/**
 * Length of a comment terminator at the cursor, counting any line splices
 * between the `*` and the `/`, or 0 when there is none.
 */
function closerLength(state: LexerState): number {
  if (peek(state) !== '*') return 0;
  let length = 1;
  for (
    let splice = spliceLength(state, length);
    splice > 0;
    splice = spliceLength(state, length)
  ) {
    length += splice;
  }
  return peek(state, length) === '/' ? length + 1 : 0;
}

/**
 * Consume a block comment whose `/*` is at the cursor.
 *
 * @throws LexerError (fatal) when the comment runs to end of input
 */
function skipBlockComment(state: LexerState, start: SourceLocation): void {
  advanceBy(state, 2);
  while (!isAtEnd(state)) {
    const closer = closerLength(state);
    if (closer > 0) {
      advanceBy(state, closer);
      return;
    }
    advance(state);
  }
  throw createError(
    'UnterminatedComment',
    { start, end: currentLocation(state) },
    sliceFrom(state, start)
  );
}

/**
 * Read a comment at the cursor, or return null when there is none.
 *
 * @throws LexerError (fatal) when a block comment runs to end of input
 */
export function readComment(state: LexerState): Token | null {
  const start = currentLocation(state);
  const opener = peekString(state, 2);

  if (opener === '/*') {
    skipBlockComment(state, start);
    return makeToken(state, TOKEN_TYPES.COMMENT, start);
  }

  if (opener === '//' && state.options.allowLineComments === true) {
    advanceWhile(state, (ch) => ch !== '\n' && ch !== '');
    return makeToken(state, TOKEN_TYPES.COMMENT, start);
  }

  return null;
}

function isLineEnd(state: LexerState): boolean {
  const ch = peek(state);
  return (
    ch === '' || ch === '\n' || (ch === '\r' && peek(state, 1) === '\n')
  );
}

/**
 * Read a preprocessor directive: the `#` and the rest of its logical line.
 *
 * A block comment opened outside a quoted run belongs to the directive even
 * when it spans lines, and the line continues after it. In `text`, splices
 * are removed and each comment becomes one space. The line break itself is
 * left for the whitespace skipper, and the state stays in `directive` mode
 * until the next scan step.
 *
 * @throws LexerError (fatal) when a comment in the directive never closes
 */
export function readDirective(state: LexerState): Token {
  const start = currentLocation(state);
  state.mode = 'directive';

  let text = '';
  let quote: string | null = null;
  while (!isLineEnd(state)) {
    const splice = spliceLength(state);
    if (splice > 0) {
      advanceBy(state, splice);
      continue;
    }

    const ch = peek(state);
    if (quote === null && ch === '/' && peek(state, 1) === '*') {
      skipBlockComment(state, currentLocation(state));
      text += ' ';
      continue;
    }

    if (quote !== null && ch === '\\') {
      text += advance(state);
      if (!isLineEnd(state)) text += advance(state);
      continue;
    }
    if (ch === quote) {
      quote = null;
    } else if (quote === null && (ch === '"' || ch === "'")) {
      quote = ch;
    }
    text += advance(state);
  }

  const name = /^#\s*([A-Za-z_]\w*)/.exec(text)?.[1] ?? '';
  return makeToken(state, TOKEN_TYPES.PREPROCESSOR_DIRECTIVE, start, {
    kind: 'directive',
    name,
    text,
  });
}

// ============================================================
// IDENTIFIERS AND PUNCTUATORS
// ============================================================

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  advanceWhile(state, isIdentifierChar);
  const word = sliceFrom(state, start);
  const type = KEYWORDS.has(word)
    ? TOKEN_TYPES.KEYWORD
    : TOKEN_TYPES.IDENTIFIER;
  return makeToken(state, type, start);
}

/** Longest-match punctuator at the cursor, or null */
export function readPunctuator(state: LexerState): Token | null {
  const start = currentLocation(state);
  for (const [length, table] of PUNCTUATOR_TABLES) {
    const candidate = peekString(state, length);
    if (candidate.length !== length || !Object.hasOwn(table, candidate)) {
      continue;
    }
    const name = table[candidate];
    if (name === undefined) continue;
    advanceBy(state, length);
    return makeToken(state, TOKEN_TYPES.PUNCTUATOR, start, {
      kind: 'punctuator',
      name,
    });
  }
  return null;
}

function formatCodePoint(ch: string): string {
  const code = ch.codePointAt(0) ?? 0;
  return `U+${code.toString(16).toUpperCase().padStart(4, '0')}`;
}

function isHighSurrogate(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code >= 0xdc00 && code <= 0xdfff;
}

/** Consume one unrecognized code point as an Invalid token */
export function readUnknown(state: LexerState): Token {
  const start = currentLocation(state);
  let ch = advance(state);
  if (isHighSurrogate(ch) && isLowSurrogate(peek(state))) {
    ch += advance(state);
  }
  const token = makeToken(state, TOKEN_TYPES.INVALID, start);
  report(
    state,
    createError('UnknownCharacter', token.span, ch, {
      char: `'${ch}'`,
      code: formatCodePoint(ch),
    })
  );
  return token;
}

// ============================================================
// CHARACTER CONSTANTS AND STRING LITERALS
// ============================================================

interface QuotedBody {
  readonly codes: readonly number[];
  readonly closed: boolean;
  /** Escape diagnostics in source order */
  readonly problems: readonly LexerError[];
}

/** Keep the low byte of an escape value, warning when bits are lost */
function truncateEscape(
  state: LexerState,
  start: SourceLocation,
  value: bigint,
  problems: LexerError[]
): number {
  if (value > 0xffn) {
    const sequence = sliceFrom(state, start);
    problems.push(
      createError(
        'EscapeOutOfRange',
        { start, end: currentLocation(state) },
        sequence,
        { sequence }
      )
    );
  }
  return Number(value & 0xffn);
}

/**
 * Decode the escape sequence at the cursor (which is on the backslash).
 * Returns null when the sequence is invalid or input ends after the `\`.
 */
function readEscape(state: LexerState, problems: LexerError[]): number | null {
  const start = currentLocation(state);
  advance(state); // consume backslash
  const ch = peek(state);
  if (ch === '') return null;

  if (Object.hasOwn(SIMPLE_ESCAPES, ch)) {
    const code = SIMPLE_ESCAPES[ch];
    if (code !== undefined) {
      advance(state);
      return code;
    }
  }

  if (isOctalDigit(ch)) {
    let digits = '';
    while (digits.length < 3 && isOctalDigit(peek(state))) {
      digits += advance(state);
    }
    return truncateEscape(state, start, BigInt(`0o${digits}`), problems);
  }

  if (ch === 'x') {
    advance(state);
    let digits = '';
    while (isHexDigit(peek(state))) {
      digits += advance(state);
    }
    if (digits !== '') {
      return truncateEscape(state, start, BigInt(`0x${digits}`), problems);
    }
  } else {
    advance(state);
  }

  const sequence = sliceFrom(state, start);
  problems.push(
    createError(
      'InvalidEscapeSequence',
      { start, end: currentLocation(state) },
      sequence,
      { sequence }
    )
  );
  return null;
}

/** Read from the opening quote through the closing one or the line end */
function readQuoted(state: LexerState, quote: string): QuotedBody {
  advance(state); // consume opening quote
  const codes: number[] = [];
  const problems: LexerError[] = [];

  for (;;) {
    if (isLineEnd(state)) {
      return { codes, closed: false, problems };
    }
    const ch = peek(state);
    if (ch === quote) {
      advance(state);
      return { codes, closed: true, problems };
    }
    if (ch === '\\') {
      const splice = spliceLength(state);
      if (splice > 0) {
        advanceBy(state, splice);
        continue;
      }
      const code = readEscape(state, problems);
      if (code !== null) codes.push(code);
      continue;
    }
    codes.push(ch.charCodeAt(0));
    advance(state);
  }
}

function hasErrors(problems: readonly LexerError[]): boolean {
  return problems.some((problem) => problem.severity !== 'warning');
}

/** Emit an Invalid token for a malformed literal */
function invalidLiteral(
  state: LexerState,
  start: SourceLocation,
  kind: DiagnosticKind | null,
  problems: readonly LexerError[]
): Token {
  const token = makeToken(state, TOKEN_TYPES.INVALID, start);
  if (kind !== null) {
    report(state, createError(kind, token.span, token.lexeme));
  }
  for (const problem of problems) report(state, problem);
  return token;
}

/** Multi-character constants pack each byte in, first character highest */
function characterValue(codes: readonly number[]): number {
  let value = 0;
  for (const code of codes) {
    value = ((value << 8) | (code & 0xff)) >>> 0;
  }
  return value;
}

export function readCharacter(state: LexerState): Token {
  const start = currentLocation(state);
  const body = readQuoted(state, "'");

  if (!body.closed) {
    return invalidLiteral(
      state,
      start,
      'UnterminatedCharacterConstant',
      body.problems
    );
  }
  if (body.codes.length === 0 && body.problems.length === 0) {
    return invalidLiteral(state, start, 'EmptyCharacterConstant', []);
  }
  if (hasErrors(body.problems)) {
    return invalidLiteral(state, start, null, body.problems);
  }

  const token = makeToken(state, TOKEN_TYPES.CHARACTER_CONSTANT, start, {
    kind: 'character',
    value: characterValue(body.codes),
    codes: body.codes,
  });
  if (body.codes.length > 1) {
    const detail =
      body.codes.length > 4
        ? '; value keeps only the last 4 characters'
        : '';
    report(
      state,
      createError('MultiCharacterConstant', token.span, token.lexeme, {
        detail,
      })
    );
  }
  for (const problem of body.problems) report(state, problem);
  return token;
}

export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  const body = readQuoted(state, '"');

  if (!body.closed) {
    return invalidLiteral(
      state,
      start,
      'UnterminatedStringLiteral',
      body.problems
    );
  }
  if (hasErrors(body.problems)) {
    return invalidLiteral(state, start, null, body.problems);
  }

  const token = makeToken(state, TOKEN_TYPES.STRING_LITERAL, start, {
    kind: 'string',
    text: body.codes.map((code) => String.fromCharCode(code)).join(''),
    codes: body.codes,
  });
  for (const problem of body.problems) report(state, problem);
  return token;
}
