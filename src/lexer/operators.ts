/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Two-character operator lookup table, tried before single characters */
export const TWO_CHAR_OPERATORS: ReadonlyMap<string, TokenType> = new Map([
  ['==', TOKEN_TYPES.EQ],
  ['!=', TOKEN_TYPES.NEQ],
  ['<=', TOKEN_TYPES.LE],
  ['>=', TOKEN_TYPES.GE],
  ['->', TOKEN_TYPES.ARROW],
  ['**', TOKEN_TYPES.POW],
  ['|>', TOKEN_TYPES.PIPE],
]);

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: ReadonlyMap<string, TokenType> = new Map([
  ['+', TOKEN_TYPES.PLUS],
  ['-', TOKEN_TYPES.MINUS],
  ['*', TOKEN_TYPES.STAR],
  ['/', TOKEN_TYPES.SLASH],
  ['%', TOKEN_TYPES.PERCENT],
  ['=', TOKEN_TYPES.ASSIGN],
  ['<', TOKEN_TYPES.LT],
  ['>', TOKEN_TYPES.GT],
  ['|', TOKEN_TYPES.PIPE],
]);

/** Structural punctuation, dispatched ahead of the operator reader */
export const PUNCTUATION: ReadonlyMap<string, TokenType> = new Map([
  [':', TOKEN_TYPES.COLON],
  [';', TOKEN_TYPES.SEMICOLON],
  [',', TOKEN_TYPES.COMMA],
  ['.', TOKEN_TYPES.DOT],
  ['(', TOKEN_TYPES.LPAREN],
  [')', TOKEN_TYPES.RPAREN],
  ['[', TOKEN_TYPES.LBRACKET],
  [']', TOKEN_TYPES.RBRACKET],
  ['{', TOKEN_TYPES.LBRACE],
  ['}', TOKEN_TYPES.RBRACE],
]);

/** Keyword lookup table; true and false both map to BOOLEAN */
export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ['def', TOKEN_TYPES.DEF],
  ['let', TOKEN_TYPES.LET],
  ['if', TOKEN_TYPES.IF],
  ['else', TOKEN_TYPES.ELSE],
  ['lambda', TOKEN_TYPES.LAMBDA],
  ['match', TOKEN_TYPES.MATCH],
  ['quantum', TOKEN_TYPES.QUANTUM],
  ['async', TOKEN_TYPES.ASYNC],
  ['await', TOKEN_TYPES.AWAIT],
  ['return', TOKEN_TYPES.RETURN],
  ['import', TOKEN_TYPES.IMPORT],
  ['module', TOKEN_TYPES.MODULE],
  ['true', TOKEN_TYPES.BOOLEAN],
  ['false', TOKEN_TYPES.BOOLEAN],
  ['and', TOKEN_TYPES.AND],
  ['or', TOKEN_TYPES.OR],
  ['not', TOKEN_TYPES.NOT],
]);
