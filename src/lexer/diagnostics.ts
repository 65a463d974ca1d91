/**
 * Lexer Diagnostics
 * Default observability sinks and diagnostic construction
 */

import { DIAGNOSTIC_CODES } from '../types.js';
import type {
  LexerDiagnostic,
  LexerObservability,
  SourceLocation,
} from '../types.js';

export function unknownCharacter(
  character: string,
  location: SourceLocation
): LexerDiagnostic {
  return {
    code: DIAGNOSTIC_CODES.UNKNOWN_CHARACTER,
    message: `Unknown character: ${character} at ${location.line}:${location.column}`,
    character,
    location,
  };
}

/** Debug lines are dropped, warnings reach stderr */
export const defaultObservability: Required<LexerObservability> = {
  onDebug: () => {},
  onWarning: (diagnostic) => {
    console.warn(diagnostic.message);
  },
};

export function resolveObservability(
  observability?: LexerObservability
): Required<LexerObservability> {
  return {
    onDebug: observability?.onDebug ?? defaultObservability.onDebug,
    onWarning: observability?.onWarning ?? defaultObservability.onWarning,
  };
}
