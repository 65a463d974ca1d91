/**
 * Lexer Module
 * Converts source text into tokens
 */

export { defaultObservability } from './diagnostics.js';
export {
  formatToken,
  formatTokens,
  tokenToJSON,
  type TokenJSON,
} from './format.js';
export {
  KEYWORDS,
  PUNCTUATION,
  SINGLE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
export { createLexerState, type LexerState } from './state.js';
export { tokenize, type TokenizeOptions } from './tokenizer.js';
