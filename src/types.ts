/**
 * USCL Lexer Types
 * Tokens, source locations, diagnostics and the error hierarchy
 */

// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
}

// ============================================================
// ERROR HIERARCHY
// ============================================================

/** Error codes for programmatic handling */
export const USCL_ERROR_CODES = {
  // Command-line errors
  CLI_INVALID_ARGUMENT: 'CLI_INVALID_ARGUMENT',

  // Configuration errors
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_UNREADABLE: 'CONFIG_UNREADABLE',
} as const;

export type UsclErrorCode =
  (typeof USCL_ERROR_CODES)[keyof typeof USCL_ERROR_CODES];

/** Structured error data for host applications */
export interface UsclErrorData {
  readonly code: UsclErrorCode;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Base error class for all USCL tooling errors.
 * The lexer itself never throws; these cover the layers around it.
 */
export class UsclError extends Error {
  readonly code: UsclErrorCode;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: UsclErrorData) {
    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'UsclError';
    this.code = data.code;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): UsclErrorData {
    return {
      code: this.code,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }
}

/** Invalid command-line usage */
export class UsageError extends UsclError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({ code: USCL_ERROR_CODES.CLI_INVALID_ARGUMENT, message, context });
    this.name = 'UsageError';
  }
}

/** Invalid or unreadable configuration file */
export class ConfigError extends UsclError {
  readonly path: string;

  constructor(
    path: string,
    message: string,
    code: UsclErrorCode = USCL_ERROR_CODES.CONFIG_INVALID
  ) {
    super({ code, message, context: { path } });
    this.name = 'ConfigError';
    this.path = path;
  }
}

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  INTEGER: 'INTEGER',
  FLOAT: 'FLOAT',
  STRING: 'STRING',
  SYMBOL: 'SYMBOL', // reserved, never produced
  BOOLEAN: 'BOOLEAN', // true, false

  // Keywords
  DEF: 'DEF',
  LET: 'LET',
  IF: 'IF',
  ELSE: 'ELSE',
  LAMBDA: 'LAMBDA',
  MATCH: 'MATCH',
  QUANTUM: 'QUANTUM',
  ASYNC: 'ASYNC',
  AWAIT: 'AWAIT',
  RETURN: 'RETURN',
  IMPORT: 'IMPORT',
  MODULE: 'MODULE',

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /
  PERCENT: 'PERCENT', // %
  POW: 'POW', // **

  // Comparison operators
  EQ: 'EQ', // ==
  NEQ: 'NEQ', // !=
  LT: 'LT', // <
  GT: 'GT', // >
  LE: 'LE', // <=
  GE: 'GE', // >=

  // Logical operators (spelled as keywords)
  AND: 'AND', // and
  OR: 'OR', // or
  NOT: 'NOT', // not

  // Other operators
  ASSIGN: 'ASSIGN', // =
  ARROW: 'ARROW', // ->
  PIPE: 'PIPE', // |> and |
  DOT: 'DOT', // .
  COLON: 'COLON', // :
  SEMICOLON: 'SEMICOLON', // ;
  COMMA: 'COMMA', // ,

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }

  // Special
  IDENTIFIER: 'IDENTIFIER',
  NEWLINE: 'NEWLINE',
  INDENT: 'INDENT', // reserved, never produced
  DEDENT: 'DEDENT', // reserved, never produced
  EOF: 'EOF',
  WHITESPACE: 'WHITESPACE', // reserved, never produced
  COMMENT: 'COMMENT', // reserved, never produced
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/**
 * Literal payload of a token.
 * Numbers for INTEGER and FLOAT, null for EOF, the lexeme (or decoded
 * string contents) for everything else.
 */
export type TokenValue = number | string | null;

export interface Token {
  readonly type: TokenType;
  readonly value: TokenValue;
  readonly line: number;
  readonly column: number;
}

// ============================================================
// DIAGNOSTICS
// ============================================================

export const DIAGNOSTIC_CODES = {
  UNKNOWN_CHARACTER: 'USCL-L001',
} as const;

export type DiagnosticCode =
  (typeof DIAGNOSTIC_CODES)[keyof typeof DIAGNOSTIC_CODES];

/** Non-fatal anomaly reported while scanning */
export interface LexerDiagnostic {
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly character: string;
  readonly location: SourceLocation;
}

/** Observability callbacks for monitoring tokenization */
export interface LexerObservability {
  /** Called with the character count before and token count after scanning */
  onDebug?: (message: string) => void;
  /** Called once per skipped, unrecognized character */
  onWarning?: (diagnostic: LexerDiagnostic) => void;
}
