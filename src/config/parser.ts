/**
 * TOML configuration parser for ifgen.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { safeExistsSync, safeReadTextSync } from '../utils/safe-fs.js';
import {
  DEFAULT_BUILD,
  DEFAULT_CONFIG,
  DEFAULT_HASH,
  DEFAULT_LOG,
  DEFAULT_PACKAGES,
  DEFAULT_ROOTS,
} from './defaults.js';
import type {
  BuildConfig,
  Config,
  HashConfig,
  LogConfig,
  PackagesConfig,
  RootConfig,
} from './types.js';

/** File name looked up in the working directory when no path is given. */
export const CONFIG_FILE_NAME = 'ifgen.toml';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

function describeType(value: unknown): string {
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is an array of strings.
 *
 * @throws ConfigParseError if value is not an array or holds a non-string.
 */
function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected array of strings, got ${describeType(value)}`
    );
  }
  return value.map((item: unknown, index) => validateString(item, `${fieldPath}[${String(index)}]`));
}

/**
 * Validates that a section is a table, treating a missing section as absent.
 *
 * @throws ConfigParseError if the value is present but not a table.
 */
function validateSection(value: unknown, fieldPath: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected table, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Parses the `[roots]` table. Keys are package prefixes and must be quoted
 * when they contain dots.
 */
function parseRoots(raw: Record<string, unknown> | undefined): RootConfig[] {
  if (raw === undefined) {
    return [...DEFAULT_ROOTS];
  }

  const roots: RootConfig[] = [];
  for (const [prefix, value] of Object.entries(raw)) {
    if (isTable(value)) {
      throw new ConfigParseError(
        `Invalid type for 'roots.${prefix}': expected string, got table (quote dotted prefixes, e.g. "vendor.acme" = "...")`
      );
    }
    roots.push({ prefix, path: validateString(value, `roots.${prefix}`) });
  }
  return roots;
}

function parsePackages(raw: Record<string, unknown> | undefined): PackagesConfig {
  if (raw === undefined) {
    return { ...DEFAULT_PACKAGES };
  }

  const result: PackagesConfig = { ...DEFAULT_PACKAGES };

  if ('transport' in raw) {
    result.transport = validateStringArray(raw.transport, 'packages.transport');
  }
  if ('system_prefixes' in raw) {
    result.system_prefixes = validateStringArray(raw.system_prefixes, 'packages.system_prefixes');
  }
  if ('system_process' in raw) {
    result.system_process = validateStringArray(raw.system_process, 'packages.system_process');
  }

  return result;
}

function parseBuild(raw: Record<string, unknown> | undefined): BuildConfig {
  if (raw === undefined) {
    return { ...DEFAULT_BUILD };
  }

  const result: BuildConfig = { ...DEFAULT_BUILD };

  if ('module_defaults' in raw) {
    result.module_defaults = validateString(raw.module_defaults, 'build.module_defaults');
  }

  return result;
}

function parseHash(raw: Record<string, unknown> | undefined): HashConfig {
  if (raw === undefined) {
    return { ...DEFAULT_HASH };
  }

  const result: HashConfig = { ...DEFAULT_HASH };

  if ('ledger' in raw) {
    result.ledger = validateString(raw.ledger, 'hash.ledger');
  }

  return result;
}

function parseLog(raw: Record<string, unknown> | undefined): LogConfig {
  if (raw === undefined) {
    return { ...DEFAULT_LOG };
  }

  const result: LogConfig = { ...DEFAULT_LOG };

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'log.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [roots]
 * "vendor.acme" = "vendor/acme/interfaces"
 *
 * [hash]
 * ledger = "hashes.txt"
 * `);
 * console.log(config.roots[0]); // { prefix: 'vendor.acme', path: 'vendor/acme/interfaces' }
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${cause.message}`, cause);
  }

  const config: Config = {
    roots: parseRoots(validateSection(parsed.roots, 'roots')),
    packages: parsePackages(validateSection(parsed.packages, 'packages')),
    build: parseBuild(validateSection(parsed.build, 'build')),
    hash: parseHash(validateSection(parsed.hash, 'hash')),
    log: parseLog(validateSection(parsed.log, 'log')),
  };
  if ('root_path' in parsed) {
    config.root_path = validateString(parsed.root_path, 'root_path');
  }
  return config;
}

/**
 * Reads and parses a configuration file. A missing file yields the defaults.
 *
 * @throws ConfigParseError if the file exists but is not valid configuration.
 */
export function loadConfig(filePath: string): Config {
  if (!safeExistsSync(filePath)) {
    return getDefaultConfig();
  }
  try {
    return parseConfig(safeReadTextSync(filePath));
  } catch (error) {
    if (error instanceof ConfigParseError) {
      throw new ConfigParseError(`${filePath}: ${error.message}`, error.cause ?? error);
    }
    throw error;
  }
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return { ...DEFAULT_CONFIG, roots: [...DEFAULT_CONFIG.roots] };
}
