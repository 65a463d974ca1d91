/**
 * Lexer Tests: Token Formatting
 */

import { describe, expect, it } from 'vitest';
import {
  formatToken,
  formatTokens,
  tokenize,
  tokenToJSON,
} from '../../src/index.js';
import { TOKEN_TYPES } from '../../src/types.js';

describe('formatToken', () => {
  it('quotes string values', () => {
    expect(
      formatToken({ type: TOKEN_TYPES.IDENTIFIER, value: 'x', line: 1, column: 2 })
    ).toBe('Token(IDENTIFIER, "x", 1:2)');
  });

  it('escapes control characters in strings', () => {
    expect(
      formatToken({ type: TOKEN_TYPES.NEWLINE, value: '\n', line: 1, column: 1 })
    ).toBe('Token(NEWLINE, "\\n", 1:1)');
  });

  it('prints an integral FLOAT with one decimal', () => {
    expect(
      formatToken({ type: TOKEN_TYPES.FLOAT, value: 3, line: 1, column: 3 })
    ).toBe('Token(FLOAT, 3.0, 1:3)');
    expect(
      formatToken({ type: TOKEN_TYPES.FLOAT, value: 3.14, line: 1, column: 5 })
    ).toBe('Token(FLOAT, 3.14, 1:5)');
  });

  it('prints INTEGER values bare', () => {
    expect(
      formatToken({ type: TOKEN_TYPES.INTEGER, value: 42, line: 1, column: 3 })
    ).toBe('Token(INTEGER, 42, 1:3)');
  });

  it('prints null for EOF', () => {
    expect(
      formatToken({ type: TOKEN_TYPES.EOF, value: null, line: 1, column: 1 })
    ).toBe('Token(EOF, null, 1:1)');
  });
});

describe('formatTokens', () => {
  it('prints one line per token', () => {
    expect(formatTokens(tokenize('x = 1'))).toBe(
      [
        'Token(IDENTIFIER, "x", 1:2)',
        'Token(ASSIGN, "=", 1:3)',
        'Token(INTEGER, 1, 1:6)',
        'Token(EOF, null, 1:6)',
      ].join('\n')
    );
  });
});

describe('tokenToJSON', () => {
  it('copies the four token fields', () => {
    const [token] = tokenize('2.5');
    expect(tokenToJSON(token!)).toEqual({
      type: 'FLOAT',
      value: 2.5,
      line: 1,
      column: 4,
    });
  });
});
