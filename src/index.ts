/**
 * USCL Lexer
 * Exports the tokenizer, token types and diagnostics
 */

export {
  defaultObservability,
  formatToken,
  formatTokens,
  KEYWORDS,
  PUNCTUATION,
  SINGLE_CHAR_OPERATORS,
  tokenize,
  tokenToJSON,
  TWO_CHAR_OPERATORS,
  type TokenizeOptions,
  type TokenJSON,
} from './lexer/index.js';
export {
  ConfigError,
  DIAGNOSTIC_CODES,
  TOKEN_TYPES,
  UsageError,
  USCL_ERROR_CODES,
  UsclError,
  type DiagnosticCode,
  type LexerDiagnostic,
  type LexerObservability,
  type SourceLocation,
  type Token,
  type TokenType,
  type TokenValue,
  type UsclErrorCode,
  type UsclErrorData,
} from './types.js';
export { VERSION } from './version.js';
