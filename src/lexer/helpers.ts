/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { Token, TokenType, TokenValue } from '../types.js';
import { advance, type LexerState } from './state.js';

const LETTER = /^\p{L}$/u;
const NUMERIC = /^\p{N}$/u;

/** ASCII decimal digit; the only characters that start a number */
export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return LETTER.test(ch);
}

export function isIdentifierStart(ch: string): boolean {
  return isLetter(ch) || ch === '_';
}

export function isIdentifierChar(ch: string): boolean {
  return (
    isIdentifierStart(ch) ||
    NUMERIC.test(ch) ||
    ch === '?' ||
    ch === '!'
  );
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t';
}

export function makeToken(
  type: TokenType,
  value: TokenValue,
  line: number,
  column: number
): Token {
  return { type, value, line, column };
}

/** Append a token stamped with the current cursor position */
export function addToken(
  state: LexerState,
  type: TokenType,
  value: TokenValue
): void {
  state.tokens.push(makeToken(type, value, state.line, state.column));
}

/** Append a token at the current position, then consume its n characters */
export function addTokenAndAdvance(
  state: LexerState,
  n: number,
  type: TokenType,
  value: string
): void {
  addToken(state, type, value);
  for (let i = 0; i < n; i++) advance(state);
}
