/**
 * c89lex
 * Exports the lexer, token model and error taxonomy
 */

export {
  createError,
  createLexerState,
  LexerError,
  type LexerCallbacks,
  type LexerErrorData,
  type LexerMode,
  type LexerState,
  nextToken,
  scanTokens,
  tokenize,
  type TokenizeOptions,
  type TokenizeResult,
} from './lexer/index.js';
export {
  type CharacterConstantValue,
  type DirectiveValue,
  type FloatingConstantValue,
  type IntegerConstantValue,
  type PunctuatorName,
  type PunctuatorValue,
  type SourceLocation,
  type SourceSpan,
  type StringLiteralValue,
  type Token,
  TOKEN_TYPES,
  type TokenType,
  type TokenValue,
} from './token-types.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type DiagnosticKind,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  type ErrorSeverity,
  ERROR_ID_PATTERN,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
