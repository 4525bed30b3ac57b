/**
 * Punctuator and Keyword Lookup Tables
 */

import type { PunctuatorName } from '../token-types.js';

/** Three-character punctuator lookup table */
export const THREE_CHAR_PUNCTUATORS: Readonly<Record<string, PunctuatorName>> =
  Object.freeze({
    '...': 'ELLIPSIS',
    '<<=': 'SHL_ASSIGN',
    '>>=': 'SHR_ASSIGN',
  });

/** Two-character punctuator lookup table */
export const TWO_CHAR_PUNCTUATORS: Readonly<Record<string, PunctuatorName>> =
  Object.freeze({
    '->': 'ARROW',
    '++': 'INCREMENT',
    '--': 'DECREMENT',
    '<<': 'SHL',
    '>>': 'SHR',
    '<=': 'LE',
    '>=': 'GE',
    '==': 'EQ',
    '!=': 'NE',
    '&&': 'AND',
    '||': 'OR',
    '*=': 'MUL_ASSIGN',
    '/=': 'DIV_ASSIGN',
    '%=': 'MOD_ASSIGN',
    '+=': 'ADD_ASSIGN',
    '-=': 'SUB_ASSIGN',
    '&=': 'AND_ASSIGN',
    '^=': 'XOR_ASSIGN',
    '|=': 'OR_ASSIGN',
  });

/** Single-character punctuator lookup table */
export const SINGLE_CHAR_PUNCTUATORS: Readonly<
  Record<string, PunctuatorName>
> = Object.freeze({
  '[': 'LBRACKET',
  ']': 'RBRACKET',
  '(': 'LPAREN',
  ')': 'RPAREN',
  '{': 'LBRACE',
  '}': 'RBRACE',
  '.': 'DOT',
  '&': 'AMPERSAND',
  '*': 'STAR',
  '+': 'PLUS',
  '-': 'MINUS',
  '~': 'TILDE',
  '!': 'BANG',
  '/': 'SLASH',
  '%': 'PERCENT',
  '<': 'LT',
  '>': 'GT',
  '^': 'CARET',
  '|': 'PIPE',
  '?': 'QUESTION',
  ':': 'COLON',
  ';': 'SEMICOLON',
  '=': 'ASSIGN',
  ',': 'COMMA',
});

/**
 * Punctuator tables ordered longest first; the longest entry bounds the
 * lookahead at three characters.
 */
export const PUNCTUATOR_TABLES: readonly (readonly [
  length: number,
  table: Readonly<Record<string, PunctuatorName>>,
])[] = [
  [3, THREE_CHAR_PUNCTUATORS],
  [2, TWO_CHAR_PUNCTUATORS],
  [1, SINGLE_CHAR_PUNCTUATORS],
];

/** The 32 reserved words of C89 */
export const KEYWORDS: ReadonlySet<string> = new Set([
  'auto',
  'break',
  'case',
  'char',
  'const',
  'continue',
  'default',
  'do',
  'double',
  'else',
  'enum',
  'extern',
  'float',
  'for',
  'goto',
  'if',
  'int',
  'long',
  'register',
  'return',
  'short',
  'signed',
  'sizeof',
  'static',
  'struct',
  'switch',
  'typedef',
  'union',
  'unsigned',
  'void',
  'volatile',
  'while',
]);

/**
 * Simple escape sequences and the character code each denotes.
 * Octal and hex escapes are decoded separately.
 */
export const SIMPLE_ESCAPES: Readonly<Record<string, number>> = Object.freeze({
  n: 0x0a,
  t: 0x09,
  v: 0x0b,
  b: 0x08,
  r: 0x0d,
  f: 0x0c,
  a: 0x07,
  '\\': 0x5c,
  '?': 0x3f,
  "'": 0x27,
  '"': 0x22,
});
