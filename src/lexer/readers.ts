/**
 * Token Readers
 * Functions to read specific token types from source
 *
 * Literal readers append their token after consuming the lexeme, so the
 * recorded position trails it.
 */

import { TOKEN_TYPES } from '../types.js';
import { addToken, isDigit, isIdentifierChar } from './helpers.js';
import { KEYWORDS } from './operators.js';
import { advance, isAtEnd, type LexerState, peek } from './state.js';

/** Decode the character after a backslash; unknown escapes pass through */
function processEscape(escaped: string): string {
  switch (escaped) {
    case 'n':
      return '\n';
    case 't':
      return '\t';
    case '\\':
      return '\\';
    default:
      return escaped;
  }
}

export function readNumber(state: LexerState): void {
  let text = '';

  while (!isAtEnd(state) && isDigit(peek(state))) {
    text += advance(state);
  }

  if (peek(state) === '.') {
    text += advance(state); // consume .
    while (!isAtEnd(state) && isDigit(peek(state))) {
      text += advance(state);
    }
    // "3." parses as 3
    addToken(state, TOKEN_TYPES.FLOAT, parseFloat(text));
    return;
  }

  addToken(state, TOKEN_TYPES.INTEGER, parseInt(text, 10));
}

export function readIdentifier(state: LexerState): void {
  let value = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const type = KEYWORDS.get(value) ?? TOKEN_TYPES.IDENTIFIER;
  addToken(state, type, value);
}

/**
 * Read a string closed by the same quote that opened it.
 * End of input before the closing quote ends the string silently.
 */
export function readString(state: LexerState): void {
  const quote = advance(state); // consume opening quote

  let value = '';
  while (!isAtEnd(state) && peek(state) !== quote) {
    if (peek(state) === '\\') {
      advance(state); // consume backslash
      if (!isAtEnd(state)) {
        value += processEscape(advance(state));
      }
    } else {
      value += advance(state);
    }
  }

  if (peek(state) === quote) {
    advance(state); // consume closing quote
  }

  addToken(state, TOKEN_TYPES.STRING, value);
}
