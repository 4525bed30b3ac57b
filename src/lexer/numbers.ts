/**
 * Numeric Constant Reader
 * Integer (decimal, octal, hex) and floating constants with C89 suffixes
 */

import {
  type SourceLocation,
  TOKEN_TYPES,
  type Token,
} from '../token-types.js';
import { createError } from './errors.js';
import {
  advanceBy,
  advanceWhile,
  isDigit,
  isHexDigit,
  isIdentifierChar,
  isOctalDigit,
  makeToken,
} from './helpers.js';
import {
  advance,
  currentLocation,
  type LexerState,
  mark,
  peek,
  report,
  rewind,
  sliceFrom,
} from './state.js';

interface IntegerSuffix {
  readonly unsigned: boolean;
  readonly long: boolean;
}

/** Integer suffixes, keyed by their lowercase spelling */
const INTEGER_SUFFIXES: ReadonlyMap<string, IntegerSuffix> = new Map([
  ['', { unsigned: false, long: false }],
  ['u', { unsigned: true, long: false }],
  ['l', { unsigned: false, long: true }],
  ['ul', { unsigned: true, long: true }],
  ['lu', { unsigned: true, long: true }],
]);

/** Trailing run of identifier characters after the digits */
function readSuffix(state: LexerState): string {
  const begin = state.pos;
  advanceWhile(state, isIdentifierChar);
  return state.source.slice(begin, state.pos);
}

function floatingSuffix(lowered: string): 'f' | 'l' | null | undefined {
  if (lowered === '') return null;
  if (lowered === 'f' || lowered === 'l') return lowered;
  return undefined;
}

function invalidNumber(
  state: LexerState,
  start: SourceLocation,
  reason: string
): Token {
  const token = makeToken(state, TOKEN_TYPES.INVALID, start);
  report(
    state,
    createError('InvalidNumericConstant', token.span, token.lexeme, { reason })
  );
  return token;
}

function readHexConstant(state: LexerState, start: SourceLocation): Token {
  advanceBy(state, 2); // 0x
  const digitsStart = state.pos;
  advanceWhile(state, isHexDigit);
  const digits = state.source.slice(digitsStart, state.pos);
  const suffix = readSuffix(state);

  if (digits === '') {
    return invalidNumber(state, start, 'missing hexadecimal digits after 0x');
  }
  const flags = INTEGER_SUFFIXES.get(suffix.toLowerCase());
  if (!flags) {
    return invalidNumber(
      state,
      start,
      `invalid suffix "${suffix}" on integer constant`
    );
  }

  return makeToken(state, TOKEN_TYPES.INTEGER_CONSTANT, start, {
    kind: 'integer',
    value: BigInt(`0x${digits}`),
    radix: 16,
    ...flags,
  });
}

/**
 * Read an integer or floating constant.
 *
 * The cursor is on a digit, or on a `.` followed by a digit. Any run of
 * identifier characters directly after the constant belongs to its suffix,
 * so `12abc` is one malformed constant rather than `12` followed by `abc`.
 */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  const next = peek(state, 1);
  if (peek(state) === '0' && (next === 'x' || next === 'X')) {
    return readHexConstant(state, start);
  }

  let floating = false;
  let problem: string | null = null;

  advanceWhile(state, isDigit);
  if (peek(state) === '.') {
    floating = true;
    advance(state);
    advanceWhile(state, isDigit);
  }

  if (peek(state) === 'e' || peek(state) === 'E') {
    const saved = mark(state);
    advance(state);
    if (peek(state) === '+' || peek(state) === '-') {
      advance(state);
    }
    if (isDigit(peek(state))) {
      advanceWhile(state, isDigit);
      floating = true;
    } else {
      // Not an exponent: the `e` is read again as part of the suffix
      rewind(state, saved);
      problem = 'exponent has no digits';
    }
  }

  const body = sliceFrom(state, start);
  const suffix = readSuffix(state);
  if (problem !== null) {
    return invalidNumber(state, start, problem);
  }

  const lowered = suffix.toLowerCase();

  // A digit sequence with an f suffix is floating, like 1.0f
  if (floating || lowered === 'f') {
    const floatSuffix = floatingSuffix(lowered);
    if (floatSuffix === undefined) {
      return invalidNumber(
        state,
        start,
        `invalid suffix "${suffix}" on floating constant`
      );
    }
    return makeToken(state, TOKEN_TYPES.FLOATING_CONSTANT, start, {
      kind: 'floating',
      value: Number.parseFloat(body),
      suffix: floatSuffix,
    });
  }

  const flags = INTEGER_SUFFIXES.get(lowered);
  if (!flags) {
    return invalidNumber(
      state,
      start,
      `invalid suffix "${suffix}" on integer constant`
    );
  }

  if (body.length > 1 && body.startsWith('0')) {
    const badDigit = [...body].find((ch) => !isOctalDigit(ch));
    if (badDigit !== undefined) {
      return invalidNumber(
        state,
        start,
        `invalid digit '${badDigit}' in octal constant`
      );
    }
    return makeToken(state, TOKEN_TYPES.INTEGER_CONSTANT, start, {
      kind: 'integer',
      value: BigInt(`0o${body.slice(1)}`),
      radix: 8,
      ...flags,
    });
  }

  return makeToken(state, TOKEN_TYPES.INTEGER_CONSTANT, start, {
    kind: 'integer',
    value: BigInt(body),
    radix: 10,
    ...flags,
  });
}
