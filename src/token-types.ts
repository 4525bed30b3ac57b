/**
 * C89 Token Model
 * Token kinds, source positions and literal payloads
 */

// ============================================================
// SOURCE LOCATION
// ============================================================

/** Position of a character: 1-based line and column, 0-based offset */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  KEYWORD: 'Keyword',
  IDENTIFIER: 'Identifier',

  // Constants and literals
  INTEGER_CONSTANT: 'IntegerConstant',
  FLOATING_CONSTANT: 'FloatingConstant',
  CHARACTER_CONSTANT: 'CharacterConstant',
  STRING_LITERAL: 'StringLiteral',

  // Operators and separators
  PUNCTUATOR: 'Punctuator',

  // Raw `#` line, continuations included
  PREPROCESSOR_DIRECTIVE: 'PreprocessorDirective',

  // Special
  COMMENT: 'Comment',
  INVALID: 'Invalid', // raw text of a recoverable lexical error
  EOF: 'EndOfFile',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

// ============================================================
// PUNCTUATOR NAMES
// ============================================================

export type PunctuatorName =
  | 'ELLIPSIS' // ...
  | 'SHL_ASSIGN' // <<=
  | 'SHR_ASSIGN' // >>=
  | 'ARROW' // ->
  | 'INCREMENT' // ++
  | 'DECREMENT' // --
  | 'SHL' // <<
  | 'SHR' // >>
  | 'LE' // <=
  | 'GE' // >=
  | 'EQ' // ==
  | 'NE' // !=
  | 'AND' // &&
  | 'OR' // ||
  | 'MUL_ASSIGN' // *=
  | 'DIV_ASSIGN' // /=
  | 'MOD_ASSIGN' // %=
  | 'ADD_ASSIGN' // +=
  | 'SUB_ASSIGN' // -=
  | 'AND_ASSIGN' // &=
  | 'XOR_ASSIGN' // ^=
  | 'OR_ASSIGN' // |=
  | 'LBRACKET'
  | 'RBRACKET'
  | 'LPAREN'
  | 'RPAREN'
  | 'LBRACE'
  | 'RBRACE'
  | 'DOT'
  | 'AMPERSAND'
  | 'STAR'
  | 'PLUS'
  | 'MINUS'
  | 'TILDE'
  | 'BANG'
  | 'SLASH'
  | 'PERCENT'
  | 'LT'
  | 'GT'
  | 'CARET'
  | 'PIPE'
  | 'QUESTION'
  | 'COLON'
  | 'SEMICOLON'
  | 'ASSIGN'
  | 'COMMA';

// ============================================================
// TOKEN VALUES
// ============================================================

export interface IntegerConstantValue {
  readonly kind: 'integer';
  readonly value: bigint;
  readonly radix: 8 | 10 | 16;
  readonly unsigned: boolean;
  readonly long: boolean;
}

export interface FloatingConstantValue {
  readonly kind: 'floating';
  readonly value: number;
  readonly suffix: 'f' | 'l' | null;
}

export interface CharacterConstantValue {
  readonly kind: 'character';
  /** Integer value of the constant (multi-character constants pack bytes) */
  readonly value: number;
  readonly codes: readonly number[];
}

export interface StringLiteralValue {
  readonly kind: 'string';
  readonly text: string;
  readonly codes: readonly number[];
}

export interface PunctuatorValue {
  readonly kind: 'punctuator';
  readonly name: PunctuatorName;
}

export interface DirectiveValue {
  readonly kind: 'directive';
  /** Directive word after `#` (e.g. "include"), empty for a null directive */
  readonly name: string;
  /** Directive line with backslash-newline splices removed */
  readonly text: string;
}

export type TokenValue =
  | IntegerConstantValue
  | FloatingConstantValue
  | CharacterConstantValue
  | StringLiteralValue
  | PunctuatorValue
  | DirectiveValue;

export interface Token {
  readonly type: TokenType;
  /** Exact source text consumed */
  readonly lexeme: string;
  readonly span: SourceSpan;
  readonly value?: TokenValue | undefined;
}
