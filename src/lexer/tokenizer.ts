/**
 * Tokenizer
 * Main tokenization logic
 */

import type { LexerDiagnostic, LexerObservability, Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { resolveObservability, unknownCharacter } from './diagnostics.js';
import {
  addToken,
  addTokenAndAdvance,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import {
  PUNCTUATION,
  SINGLE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

export interface TokenizeOptions {
  observability?: LexerObservability;
}

function skipWhitespaceAndComments(state: LexerState): void {
  while (!isAtEnd(state)) {
    const ch = peek(state);
    if (isWhitespace(ch)) {
      advance(state);
    } else if (ch === '#') {
      while (!isAtEnd(state) && peek(state) !== '\n') {
        advance(state);
      }
    } else {
      break;
    }
  }
}

/**
 * Operators are appended before their characters are consumed.
 * Returns a diagnostic when the character is not an operator; the
 * character is skipped either way.
 */
function readOperator(state: LexerState): LexerDiagnostic | null {
  const twoChar = peekString(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS.get(twoChar);
  if (twoCharType) {
    addTokenAndAdvance(state, 2, twoCharType, twoChar);
    return null;
  }

  const ch = peek(state);
  const singleCharType = SINGLE_CHAR_OPERATORS.get(ch);
  if (singleCharType) {
    addTokenAndAdvance(state, 1, singleCharType, ch);
    return null;
  }

  const diagnostic = unknownCharacter(ch, currentLocation(state));
  advance(state);
  return diagnostic;
}

/** Emit NEWLINE stamped with the line it ends and the reset column */
function readNewline(state: LexerState): void {
  advance(state);
  state.tokens.push(
    makeToken(TOKEN_TYPES.NEWLINE, '\n', state.line - 1, state.column)
  );
}

export function tokenize(source: string, options?: TokenizeOptions): Token[] {
  const observability = resolveObservability(options?.observability);
  const state = createLexerState(source);

  observability.onDebug(`Tokenizing ${state.chars.length} characters`);

  while (!isAtEnd(state)) {
    skipWhitespaceAndComments(state);
    if (isAtEnd(state)) break;

    const ch = peek(state);

    if (ch === '\n') {
      readNewline(state);
    } else if (isDigit(ch)) {
      readNumber(state);
    } else if (isIdentifierStart(ch)) {
      readIdentifier(state);
    } else if (ch === '"' || ch === "'") {
      readString(state);
    } else {
      const punctuationType = PUNCTUATION.get(ch);
      if (punctuationType) {
        addTokenAndAdvance(state, 1, punctuationType, ch);
        continue;
      }
      const diagnostic = readOperator(state);
      if (diagnostic) observability.onWarning(diagnostic);
    }
  }

  addToken(state, TOKEN_TYPES.EOF, null);
  observability.onDebug(`Tokenized ${state.tokens.length} tokens`);

  return state.tokens;
}
