/**
 * Token Formatting
 * Readable and JSON renderings for debugging and tooling
 */

import type { Token, TokenType, TokenValue } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Plain record emitted by the JSON output of the token dump */
export interface TokenJSON {
  type: TokenType;
  value: TokenValue;
  line: number;
  column: number;
}

function formatValue(token: Token): string {
  const { value } = token;
  if (value === null) return 'null';
  if (typeof value === 'string') return JSON.stringify(value);
  // Keep FLOAT visibly distinct from INTEGER: 3.0, not 3
  if (token.type === TOKEN_TYPES.FLOAT && Number.isInteger(value)) {
    return value.toFixed(1);
  }
  return String(value);
}

/**
 * Format a token as `Token(TYPE, value, line:column)`.
 *
 * @example
 * formatToken({ type: 'IDENTIFIER', value: 'x', line: 1, column: 2 });
 * // => 'Token(IDENTIFIER, "x", 1:2)'
 */
export function formatToken(token: Token): string {
  return `Token(${token.type}, ${formatValue(token)}, ${token.line}:${token.column})`;
}

export function formatTokens(tokens: readonly Token[]): string {
  return tokens.map(formatToken).join('\n');
}

export function tokenToJSON(token: Token): TokenJSON {
  return {
    type: token.type,
    value: token.value,
    line: token.line,
    column: token.column,
  };
}
