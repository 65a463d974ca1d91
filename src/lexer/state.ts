/**
 * Lexer State
 * Tracks position in source text during tokenization
 */

import type { SourceLocation, Token } from '../types.js';

export interface LexerState {
  readonly source: string;
  /** Source split into code points; the cursor indexes this array */
  readonly chars: readonly string[];
  pos: number;
  line: number;
  column: number;
  readonly tokens: Token[];
  /**
   * Leading-whitespace widths of open blocks.
   * Never pushed or popped: block structure is left to the parser.
   */
  readonly indentStack: number[];
}

export function createLexerState(source: string): LexerState {
  return {
    source,
    chars: Array.from(source),
    pos: 0,
    line: 1,
    column: 1,
    tokens: [],
    indentStack: [0],
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column };
}

export function peek(state: LexerState, offset = 0): string {
  return state.chars[state.pos + offset] ?? '';
}

export function peekString(state: LexerState, length: number): string {
  return state.chars.slice(state.pos, state.pos + length).join('');
}

/** Consume one character; a no-op returning '' at end of input */
export function advance(state: LexerState): string {
  const ch = state.chars[state.pos];
  if (ch === undefined) return '';
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.chars.length;
}
