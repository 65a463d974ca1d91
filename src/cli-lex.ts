#!/usr/bin/env node
/**
 * USCL CLI - Dump the token stream of a source file
 *
 * Usage:
 *   uscl-lex <file.uscl>
 *   uscl-lex -e "let x = 1"
 *   echo "let x = 1" | uscl-lex -
 */

import * as fs from 'node:fs';
import {
  isOutputFormat,
  loadConfig,
  type OutputFormat,
} from './cli-config.js';
import { formatDiagnostic, formatError, formatOutput } from './cli-shared.js';
import { tokenize } from './lexer/index.js';
import { UsageError } from './types.js';
import { VERSION } from './version.js';

/** Where the source text comes from */
export type LexInput =
  | { kind: 'file'; path: string }
  | { kind: 'inline'; code: string }
  | { kind: 'stdin' };

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'lex';
      input: LexInput;
      format: OutputFormat | undefined;
      verbose: boolean | undefined;
      config: string | undefined;
    }
  | { mode: 'help' }
  | { mode: 'version' };

const FLAGS_WITH_VALUES = ['--format', '--config', '-e'];
const KNOWN_FLAGS = [
  ...FLAGS_WITH_VALUES,
  '--verbose',
  '--help',
  '-h',
  '--version',
  '-v',
];

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws UsageError on unknown options, missing values or a missing input
 */
export function parseArgs(argv: string[]): ParsedArgs {
  // Help takes precedence over version, in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let format: OutputFormat | undefined;
  let verbose: boolean | undefined;
  let config: string | undefined;
  let inline: string | undefined;
  const positionalArgs: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg.startsWith('-') && arg !== '-') {
      if (!KNOWN_FLAGS.includes(arg)) {
        throw new UsageError(`Unknown option: ${arg}`);
      }

      if (arg === '--verbose') {
        verbose = true;
        continue;
      }

      const value = argv[i + 1];
      if (value === undefined) {
        throw new UsageError(`Missing value after ${arg}`);
      }
      i++;

      if (arg === '--format') {
        if (!isOutputFormat(value)) {
          throw new UsageError(
            `Invalid --format value: ${value}. Must be one of: human, json`
          );
        }
        format = value;
      } else if (arg === '--config') {
        config = value;
      } else {
        inline = value;
      }
      continue;
    }

    positionalArgs.push(arg);
  }

  if (inline !== undefined && positionalArgs.length > 0) {
    throw new UsageError('Cannot combine -e with an input file');
  }
  if (positionalArgs.length > 1) {
    throw new UsageError(`Unexpected argument: ${positionalArgs[1]}`);
  }

  const target = positionalArgs[0];
  let input: LexInput;
  if (inline !== undefined) {
    input = { kind: 'inline', code: inline };
  } else if (target === '-') {
    input = { kind: 'stdin' };
  } else if (target !== undefined) {
    input = { kind: 'file', path: target };
  } else {
    throw new UsageError('Missing input: pass a file, -e "code", or -');
  }

  return { mode: 'lex', input, format, verbose, config };
}

/** Process boundary, replaced in tests */
export interface CliIO {
  readonly cwd: string;
  readFile(path: string): string;
  readStdin(): string;
  stdout(text: string): void;
  stderr(text: string): void;
}

const processIO: CliIO = {
  cwd: process.cwd(),
  readFile: (path) => fs.readFileSync(path, 'utf-8'),
  readStdin: () => fs.readFileSync(0, 'utf-8'),
  stdout: (text) => {
    console.log(text);
  },
  stderr: (text) => {
    console.error(text);
  },
};

function readSource(input: LexInput, io: CliIO): string {
  switch (input.kind) {
    case 'inline':
      return input.code;
    case 'stdin':
      return io.readStdin();
    case 'file':
      return io.readFile(input.path);
  }
}

export const HELP_TEXT = `USCL Token Dump

Usage:
  uscl-lex <file>              Tokenize a file
  uscl-lex -e <code>           Tokenize inline code
  uscl-lex -                   Tokenize stdin

Options:
  --format <human|json>        Output format (default: human)
  --verbose                    Print debug diagnostics to stderr
  --config <path>              Configuration file (default: .uscl-lex.yaml)
  -h, --help                   Show this help message
  -v, --version                Show version information`;

/**
 * Entry point for the uscl-lex binary
 *
 * @returns Process exit code
 */
export function main(argv: string[], io: CliIO = processIO): number {
  try {
    const command = parseArgs(argv);

    if (command.mode === 'help') {
      io.stdout(HELP_TEXT);
      return 0;
    }

    if (command.mode === 'version') {
      io.stdout(`uscl-lex ${VERSION}`);
      return 0;
    }

    const config = loadConfig(io.cwd, command.config);
    const format = command.format ?? config.format;
    const verbose = command.verbose ?? config.verbose;

    const source = readSource(command.input, io);

    const tokens = tokenize(source, {
      observability: {
        onDebug: verbose
          ? (message) => io.stderr(`debug: ${message}`)
          : () => {},
        onWarning: (diagnostic) => io.stderr(formatDiagnostic(diagnostic)),
      },
    });

    io.stdout(formatOutput(tokens, format));
    return 0;
  } catch (err) {
    io.stderr(
      formatError(err instanceof Error ? err : new Error(String(err)))
    );
    return 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  process.exitCode = main(process.argv.slice(2));
}
