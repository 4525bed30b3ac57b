/**
 * Comments and preprocessor directives
 */

import { describe, expect, it } from 'vitest';
import { tokenize } from '../../src/index.js';
import { first, pairs } from '../helpers/lexer.js';

describe('block comments', () => {
  it('strips comments from the token stream', () => {
    const result = tokenize('/* a */int/* b */ x;');

    expect(result.tokens.map((t) => [t.type, t.lexeme])).toEqual([
      ['Keyword', 'int'],
      ['Identifier', 'x'],
      ['Punctuator', ';'],
      ['EndOfFile', ''],
    ]);
  });

  it('passes comments through when includeComments is on', () => {
    expect(pairs('/* a */int', { includeComments: true })).toEqual([
      ['Comment', '/* a */'],
      ['Keyword', 'int'],
    ]);
  });

  it('does not nest', () => {
    expect(pairs('/* a /* b */ c */')).toEqual([
      ['Identifier', 'c'],
      ['Punctuator', '*'],
      ['Punctuator', '/'],
    ]);
  });

  it('keeps line numbers exact across multi-line comments', () => {
    expect(first('/* one\ntwo\n*/ x').span.start).toEqual({
      line: 3,
      column: 4,
      offset: 14,
    });
  });

  it('halts on an unterminated comment', () => {
    const result = tokenize('/* never closed');

    expect(result.tokens).toEqual([]);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.fatal?.errorId).toBe('C89-L001');
    expect(result.fatal?.severity).toBe('fatal');
    expect(result.success).toBe(false);
  });

  it('keeps the tokens scanned before an unterminated comment', () => {
    const result = tokenize('int x; /* open');

    expect(result.tokens.map((t) => t.lexeme)).toEqual(['int', 'x', ';']);
    expect(result.fatal?.span.start).toEqual({
      line: 1,
      column: 8,
      offset: 7,
    });
    expect(result.fatal?.lexeme).toBe('/* open');
  });

  it('honors a line splice inside the closing */', () => {
    const result = tokenize('/* a *\\\n/ int');

    expect(result.tokens.map((t) => [t.type, t.lexeme])).toEqual([
      ['Keyword', 'int'],
      ['EndOfFile', ''],
    ]);
    expect(result.diagnostics).toEqual([]);
  });

  it('keeps a spliced terminator in the comment lexeme', () => {
    expect(pairs('/* a *\\\n/', { includeComments: true })).toEqual([
      ['Comment', '/* a *\\\n/'],
    ]);
  });
});

describe('line comments', () => {
  it('skips // comments when allowed', () => {
    expect(pairs('a // note\nb', { allowLineComments: true })).toEqual([
      ['Identifier', 'a'],
      ['Identifier', 'b'],
    ]);
  });

  it('passes line comments through without the newline', () => {
    expect(
      pairs('a // note\nb', { allowLineComments: true, includeComments: true })
    ).toEqual([
      ['Identifier', 'a'],
      ['Comment', '// note'],
      ['Identifier', 'b'],
    ]);
  });
});

describe('preprocessor directives', () => {
  it('reads a directive line as one token', () => {
    const result = tokenize('#include <stdio.h>\nint x;');
    const [directive] = result.tokens;

    expect(directive?.type).toBe('PreprocessorDirective');
    expect(directive?.lexeme).toBe('#include <stdio.h>');
    expect(directive?.value).toEqual({
      kind: 'directive',
      name: 'include',
      text: '#include <stdio.h>',
    });
    expect(result.tokens.slice(1).map((t) => t.lexeme)).toEqual([
      'int',
      'x',
      ';',
      '',
    ]);
  });

  it('allows whitespace before and after the #', () => {
    const token = first('  #  define X 1');

    expect(token.lexeme).toBe('#  define X 1');
    expect(token.value).toMatchObject({ name: 'define' });
    expect(token.span.start.column).toBe(3);
  });

  it('follows backslash-newline continuations', () => {
    const source = '#define M(a) \\\n  (a + 1)\nint';
    const result = tokenize(source);
    const [directive, keyword] = result.tokens;

    expect(directive?.lexeme).toBe('#define M(a) \\\n  (a + 1)');
    expect(directive?.value).toMatchObject({
      text: '#define M(a)   (a + 1)',
    });
    expect(keyword?.span.start.line).toBe(3);
  });

  it('leaves CRLF line endings out of the directive', () => {
    const result = tokenize('#define A\r\nint');

    expect(result.tokens.map((t) => t.lexeme)).toEqual(['#define A', 'int', '']);
    expect(result.tokens[1]?.span.start.line).toBe(2);
  });

  it('recognizes a directive after a comment on the same line', () => {
    expect(pairs('/* c */ #if X\n')).toEqual([
      ['PreprocessorDirective', '#if X'],
    ]);
  });

  it('recognizes the null directive', () => {
    expect(first('#\n').value).toEqual({
      kind: 'directive',
      name: '',
      text: '#',
    });
  });

  it('recognizes a directive on a later line', () => {
    const result = tokenize('int a;\n#define B');

    expect(result.tokens[3]?.type).toBe('PreprocessorDirective');
    expect(result.tokens[3]?.span.start).toEqual({
      line: 2,
      column: 1,
      offset: 7,
    });
  });

  it('keeps a multi-line comment opened on a directive line', () => {
    const result = tokenize('#define N 1 /* first\n   second */\nint x;');
    const [directive, keyword] = result.tokens;

    expect(directive?.lexeme).toBe('#define N 1 /* first\n   second */');
    expect(directive?.value).toEqual({
      kind: 'directive',
      name: 'define',
      text: '#define N 1  ',
    });
    expect(result.tokens.slice(1).map((t) => [t.type, t.lexeme])).toEqual([
      ['Keyword', 'int'],
      ['Identifier', 'x'],
      ['Punctuator', ';'],
      ['EndOfFile', ''],
    ]);
    expect(keyword?.span.start.line).toBe(3);
    expect(result.diagnostics).toEqual([]);
  });

  it('continues the directive after a comment closes', () => {
    expect(pairs('#if A /* x\n */ && B\nc')).toEqual([
      ['PreprocessorDirective', '#if A /* x\n */ && B'],
      ['Identifier', 'c'],
    ]);
  });

  it('halts on an unterminated comment in a directive', () => {
    const result = tokenize('#define N 1 /* open');

    expect(result.tokens).toEqual([]);
    expect(result.fatal?.errorId).toBe('C89-L001');
    expect(result.fatal?.lexeme).toBe('/* open');
    expect(result.fatal?.span.start).toEqual({
      line: 1,
      column: 13,
      offset: 12,
    });
    expect(result.success).toBe(false);
  });

  it('does not open a comment inside a quoted run', () => {
    expect(pairs('#define S "/*" x\ny')).toEqual([
      ['PreprocessorDirective', '#define S "/*" x'],
      ['Identifier', 'y'],
    ]);
  });

  it('does not close a quoted run at an escaped quote', () => {
    expect(pairs('#define S "\\" /*" x\ny')).toEqual([
      ['PreprocessorDirective', '#define S "\\" /*" x'],
      ['Identifier', 'y'],
    ]);
  });

  it('does not start a directive after a spliced line', () => {
    expect(pairs('x \\\n#y')).toEqual([
      ['Identifier', 'x'],
      ['Invalid', '#'],
      ['Identifier', 'y'],
    ]);
  });
});
