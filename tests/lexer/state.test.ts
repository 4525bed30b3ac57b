/**
 * Source cursor primitives
 */

import { describe, expect, it, vi } from 'vitest';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  mark,
  peek,
  peekString,
  report,
  rewind,
  sliceFrom,
} from '../../src/lexer/state.js';
import { createError } from '../../src/lexer/errors.js';

describe('createLexerState', () => {
  it('starts at line 1, column 1 in scanning mode', () => {
    const state = createLexerState('int x;');

    expect(state.pos).toBe(0);
    expect(currentLocation(state)).toEqual({ line: 1, column: 1, offset: 0 });
    expect(state.mode).toBe('scanning');
    expect(state.atLineStart).toBe(true);
    expect(state.diagnostics).toEqual([]);
    expect(state.fatal).toBeNull();
  });

  it('defaults options to an empty object', () => {
    expect(createLexerState('').options).toEqual({});
  });
});

describe('peek', () => {
  it('returns the character at the offset without consuming', () => {
    const state = createLexerState('abc');

    expect(peek(state)).toBe('a');
    expect(peek(state, 2)).toBe('c');
    expect(state.pos).toBe(0);
  });

  it('returns empty string past the end', () => {
    const state = createLexerState('ab');

    expect(peek(state, 2)).toBe('');
    expect(peek(state, 10)).toBe('');
  });

  it('peekString truncates at the end of input', () => {
    const state = createLexerState('ab');

    expect(peekString(state, 3)).toBe('ab');
  });
});

describe('advance', () => {
  it('increments column for ordinary characters', () => {
    const state = createLexerState('ab');

    expect(advance(state)).toBe('a');
    expect(currentLocation(state)).toEqual({ line: 1, column: 2, offset: 1 });
  });

  it('moves to the next line on newline', () => {
    const state = createLexerState('a\nb');
    advance(state);
    advance(state);

    expect(currentLocation(state)).toEqual({ line: 2, column: 1, offset: 2 });
    advance(state);
    expect(currentLocation(state)).toEqual({ line: 2, column: 2, offset: 3 });
  });

  it('treats carriage return as an ordinary character', () => {
    const state = createLexerState('\r\nx');
    advance(state);

    expect(currentLocation(state)).toEqual({ line: 1, column: 2, offset: 1 });
  });

  it('does not move at end of input', () => {
    const state = createLexerState('a');
    advance(state);

    expect(advance(state)).toBe('');
    expect(state.pos).toBe(1);
    expect(isAtEnd(state)).toBe(true);
  });
});

describe('mark and rewind', () => {
  it('restores offset, line and column', () => {
    const state = createLexerState('a\nbc');
    advance(state);
    const saved = mark(state);
    advance(state);
    advance(state);

    rewind(state, saved);

    expect(currentLocation(state)).toEqual({ line: 1, column: 2, offset: 1 });
  });
});

describe('sliceFrom', () => {
  it('returns the text between a location and the cursor', () => {
    const state = createLexerState('int x');
    const start = currentLocation(state);
    advance(state);
    advance(state);
    advance(state);

    expect(sliceFrom(state, start)).toBe('int');
  });
});

describe('report', () => {
  it('records the diagnostic and notifies onDiagnostic', () => {
    const onDiagnostic = vi.fn();
    const state = createLexerState('@', { callbacks: { onDiagnostic } });
    const location = currentLocation(state);
    const error = createError(
      'UnknownCharacter',
      { start: location, end: location },
      '@',
      { char: "'@'", code: 'U+0040' }
    );

    report(state, error);

    expect(state.diagnostics).toEqual([error]);
    expect(onDiagnostic).toHaveBeenCalledWith(error);
  });
});
