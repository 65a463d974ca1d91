/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import type { OutputFormat } from './cli-config.js';
import { formatTokens, tokenToJSON } from './lexer/index.js';
import type { LexerDiagnostic, Token } from './types.js';
import { ConfigError, UsageError, UsclError } from './types.js';

/**
 * Render a token sequence for stdout
 *
 * @param tokens - Tokens produced by tokenize()
 * @param format - `human` prints one Token(...) line per token, `json` an array
 */
export function formatOutput(
  tokens: readonly Token[],
  format: OutputFormat
): string {
  if (format === 'json') {
    return JSON.stringify(tokens.map(tokenToJSON), null, 2);
  }
  return formatTokens(tokens);
}

export function formatDiagnostic(diagnostic: LexerDiagnostic): string {
  return `warning: ${diagnostic.message}`;
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (err instanceof UsageError) {
    return `Usage error: ${err.message}`;
  }

  if (err instanceof ConfigError) {
    return `Config error in ${err.path}: ${err.message}`;
  }

  if (err instanceof UsclError) {
    return `Error [${err.code}]: ${err.message}`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}
