/**
 * Configuration Loader for uscl-lex
 * Loads and validates .uscl-lex.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import * as yaml from 'yaml';
import { ConfigError, USCL_ERROR_CODES } from './types.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.uscl-lex.yaml';

export type OutputFormat = 'human' | 'json';

export interface LexConfig {
  readonly format: OutputFormat;
  readonly verbose: boolean;
}

const KNOWN_KEYS = ['format', 'verbose'];

export function createDefaultConfig(): LexConfig {
  return { format: 'human', verbose: false };
}

// ============================================================
// VALIDATION
// ============================================================

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'human' || value === 'json';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed document and merge it over the defaults.
 * A null document (empty file) yields the defaults.
 */
export function validateConfig(data: unknown, path: string): LexConfig {
  const defaults = createDefaultConfig();
  if (data === null || data === undefined) {
    return defaults;
  }

  if (!isRecord(data)) {
    throw new ConfigError(path, 'Invalid configuration: must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.includes(key)) {
      throw new ConfigError(
        path,
        `Invalid configuration: unknown key "${key}"`
      );
    }
  }

  const format = data['format'] ?? defaults.format;
  if (!isOutputFormat(format)) {
    throw new ConfigError(
      path,
      `Invalid configuration: format must be 'human' or 'json', got ${JSON.stringify(format)}`
    );
  }

  const verbose = data['verbose'] ?? defaults.verbose;
  if (typeof verbose !== 'boolean') {
    throw new ConfigError(
      path,
      `Invalid configuration: verbose must be a boolean, got ${JSON.stringify(verbose)}`
    );
  }

  return { format, verbose };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration.
 *
 * An explicit path must exist. Without one, `.uscl-lex.yaml` in `cwd` is
 * used when present and the defaults otherwise.
 *
 * @throws ConfigError when the file is missing (explicit path only),
 * unreadable, not valid YAML, or fails validation
 */
export function loadConfig(cwd: string, explicitPath?: string): LexConfig {
  const configPath =
    explicitPath !== undefined
      ? resolve(cwd, explicitPath)
      : join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    if (explicitPath !== undefined) {
      throw new ConfigError(
        configPath,
        `Configuration file not found: ${configPath}`,
        USCL_ERROR_CODES.CONFIG_UNREADABLE
      );
    }
    return createDefaultConfig();
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      configPath,
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`,
      USCL_ERROR_CODES.CONFIG_UNREADABLE
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw new ConfigError(
      configPath,
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return validateConfig(parsedData, configPath);
}
