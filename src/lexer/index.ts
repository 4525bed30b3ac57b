/**
 * Lexer Module
 * Converts C89 source text into tokens
 */

export { createError, LexerError, type LexerErrorData } from './errors.js';
export {
  createLexerState,
  type LexerCallbacks,
  type LexerMode,
  type LexerState,
  type TokenizeOptions,
} from './state.js';
export {
  nextToken,
  scanTokens,
  tokenize,
  type TokenizeResult,
} from './tokenizer.js';
