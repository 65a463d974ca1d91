/**
 * CLI Shared Utilities Tests
 * Tests for formatError, formatOutput and formatDiagnostic
 */

import { describe, expect, it } from 'vitest';
import {
  formatDiagnostic,
  formatError,
  formatOutput,
} from '../../src/cli-shared.js';
import { tokenize } from '../../src/index.js';
import {
  ConfigError,
  UsageError,
  USCL_ERROR_CODES,
  UsclError,
} from '../../src/types.js';

describe('cli-shared', () => {
  describe('formatError', () => {
    it('formats UsageError', () => {
      expect(formatError(new UsageError('Unknown option: -x'))).toBe(
        'Usage error: Unknown option: -x'
      );
    });

    it('formats ConfigError with its path', () => {
      expect(formatError(new ConfigError('/tmp/c.yaml', 'bad'))).toBe(
        'Config error in /tmp/c.yaml: bad'
      );
    });

    it('formats other UsclErrors with their code and location', () => {
      const err = new UsclError({
        code: USCL_ERROR_CODES.CONFIG_INVALID,
        message: 'bad value',
        location: { line: 2, column: 3 },
      });
      expect(formatError(err)).toBe('Error [CONFIG_INVALID]: bad value at 2:3');
    });

    it('formats ENOENT errors as file not found', () => {
      const err = Object.assign(new Error('ENOENT'), {
        code: 'ENOENT',
        path: 'a.uscl',
      });
      expect(formatError(err)).toBe('File not found: a.uscl');
    });

    it('falls back to the message', () => {
      expect(formatError(new Error('boom'))).toBe('boom');
    });
  });

  describe('UsclError', () => {
    it('strips the location suffix in toData', () => {
      const err = new UsclError({
        code: USCL_ERROR_CODES.CLI_INVALID_ARGUMENT,
        message: 'bad',
        location: { line: 1, column: 4 },
      });
      expect(err.message).toBe('bad at 1:4');
      expect(err.toData()).toEqual({
        code: 'CLI_INVALID_ARGUMENT',
        message: 'bad',
        location: { line: 1, column: 4 },
        context: undefined,
      });
    });
  });

  describe('formatOutput', () => {
    it('renders human output', () => {
      expect(formatOutput(tokenize(''), 'human')).toBe('Token(EOF, null, 1:1)');
    });

    it('renders JSON output', () => {
      expect(formatOutput(tokenize(''), 'json')).toBe(
        '[\n  {\n    "type": "EOF",\n    "value": null,\n    "line": 1,\n    "column": 1\n  }\n]'
      );
    });
  });

  describe('formatDiagnostic', () => {
    it('prefixes the message', () => {
      expect(
        formatDiagnostic({
          code: 'USCL-L001',
          message: 'Unknown character: @ at 1:1',
          character: '@',
          location: { line: 1, column: 1 },
        })
      ).toBe('warning: Unknown character: @ at 1:1');
    });
  });
});
